import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import type { EncryptedSecret } from "@fleet-link/schemas";
import { ConfigError } from "./errors";

export const KEY_BYTES = 32;
const NONCE_BYTES = 12;
const ALGORITHM = "aes-256-gcm";

function assertKey(key: Buffer): void {
  if (key.length !== KEY_BYTES) {
    throw new ConfigError(`Credential key must be ${KEY_BYTES} bytes, got ${key.length}`);
  }
}

/**
 * Encrypts with AES-256-GCM under a fresh random nonce. `aad` is
 * authenticated but not encrypted; decryption must present the same value.
 */
export function encryptSecret(key: Buffer, plaintext: string, aad: string): EncryptedSecret {
  assertKey(key);
  const nonce = randomBytes(NONCE_BYTES);
  const cipher = createCipheriv(ALGORITHM, key, nonce);
  cipher.setAAD(Buffer.from(aad, "utf8"));
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
  return {
    algorithm: ALGORITHM,
    nonce: nonce.toString("base64"),
    authTag: cipher.getAuthTag().toString("base64"),
    ciphertext: ciphertext.toString("base64")
  };
}

export function decryptSecret(key: Buffer, secret: EncryptedSecret, aad: string): string {
  assertKey(key);
  try {
    const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(secret.nonce, "base64"));
    decipher.setAAD(Buffer.from(aad, "utf8"));
    decipher.setAuthTag(Buffer.from(secret.authTag, "base64"));
    return Buffer.concat([
      decipher.update(Buffer.from(secret.ciphertext, "base64")),
      decipher.final()
    ]).toString("utf8");
  } catch (err) {
    throw new ConfigError("Stored credentials could not be decrypted", { cause: err });
  }
}

export function generateKey(): Buffer {
  return randomBytes(KEY_BYTES);
}
