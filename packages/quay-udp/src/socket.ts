// Datagram socket abstraction.
//
// UdpServer is written against DatagramSocket so that it can run over
// node:dgram or over an in-process stand-in.

import dgram from "node:dgram";
import type { Address } from "@quay/core";

/** Interface for transports that carry datagrams. */
export interface DatagramSocket {
  /** Bind to `host:port` and resolve with the bound address. */
  bind(port: number, host: string): Promise<Address>;

  /** Send one datagram. */
  send(data: Uint8Array, address: Address): Promise<void>;

  onMessage(handler: (data: Uint8Array, address: Address) => void): void;

  onClose(handler: () => void): void;

  onError(handler: (error: Error) => void): void;

  /** Stop receiving; resolves once the socket is closed. */
  close(): Promise<void>;
}

/** A UDP socket from node:dgram. */
export class NodeDatagramSocket implements DatagramSocket {
  private socket: dgram.Socket;
  private closed = false;

  constructor(type: dgram.SocketType = "udp4") {
    this.socket = dgram.createSocket(type);
    this.socket.on("close", () => {
      this.closed = true;
    });
  }

  /** Socket type suited to binding `host`. */
  static typeFor(host: string): dgram.SocketType {
    return host.includes(":") ? "udp6" : "udp4";
  }

  /** Get the underlying socket. */
  getSocket(): dgram.Socket {
    return this.socket;
  }

  bind(port: number, host: string): Promise<Address> {
    return new Promise((resolve, reject) => {
      const onBindError = (err: Error) => {
        this.socket.close(() => reject(err));
      };
      this.socket.once("error", onBindError);
      this.socket.bind(port, host, () => {
        this.socket.off("error", onBindError);
        const info = this.socket.address();
        resolve({ host: info.address, port: info.port });
      });
    });
  }

  send(data: Uint8Array, address: Address): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.send(data, address.port, address.host, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  onMessage(handler: (data: Uint8Array, address: Address) => void): void {
    this.socket.on("message", (msg: Buffer, rinfo: dgram.RemoteInfo) => {
      handler(new Uint8Array(msg.buffer, msg.byteOffset, msg.byteLength), {
        host: rinfo.address,
        port: rinfo.port,
      });
    });
  }

  onClose(handler: () => void): void {
    this.socket.on("close", handler);
  }

  onError(handler: (error: Error) => void): void {
    this.socket.on("error", handler);
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.close(() => resolve());
    });
  }
}
