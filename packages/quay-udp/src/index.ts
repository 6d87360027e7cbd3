// @quay/udp - UDP transport for quay (Node.js only)
//
// Provides the node:dgram socket, PEM credential loading, the timer
// scheduler and the UdpServer that ties them to a QuicDispatcher.

export { UdpServer, type UdpServerOptions } from "./server.ts";
export { NodeDatagramSocket, type DatagramSocket } from "./socket.ts";
export { NodeScheduler } from "./scheduler.ts";
export { pemCredentialStore } from "./credentials.ts";
