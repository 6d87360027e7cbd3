// PEM credential loading.

import { X509Certificate, createPrivateKey, type KeyObject } from "node:crypto";
import { readFile } from "node:fs/promises";
import { StartupError, type CredentialStore, type Credentials } from "@quay/core";

async function readPem(path: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (e) {
    throw StartupError.credentials(path, e);
  }
}

function parseCertificate(path: string, pem: Buffer): X509Certificate {
  try {
    return new X509Certificate(pem);
  } catch (e) {
    throw StartupError.credentials(path, e);
  }
}

function parsePrivateKey(path: string, pem: Buffer): KeyObject {
  try {
    return createPrivateKey({ key: pem, format: "pem" });
  } catch (e) {
    throw StartupError.credentials(path, e);
  }
}

/**
 * Loads a PEM certificate and an unencrypted PEM private key.
 *
 * Any read or parse failure rejects with a StartupError of kind
 * `credentials` naming the offending file.
 */
export const pemCredentialStore: CredentialStore = {
  async load(certfile: string, keyfile: string): Promise<Credentials> {
    const certificate = parseCertificate(certfile, await readPem(certfile));
    const privateKey = parsePrivateKey(keyfile, await readPem(keyfile));
    return { certificate, privateKey };
  },
};
