import { KEY_BYTES, generateKey } from "./cipher";
import { ConfigError } from "./errors";
import type { ISecretProvider, SecretsLogger } from "./interfaces";

export const DEFAULT_KEY_NAME = "FLEET_CREDENTIAL_KEY";

export interface LoadKeyOptions {
  keyName?: string;
  /** Generate a process-lifetime key when the provider has none. */
  allowEphemeral?: boolean;
  logger?: SecretsLogger;
}

/**
 * Reads the base64-encoded 256-bit credential key from a secret provider.
 */
export async function loadCredentialKey(provider: ISecretProvider, options: LoadKeyOptions = {}): Promise<Buffer> {
  const keyName = options.keyName ?? DEFAULT_KEY_NAME;
  const encoded = await provider.get(keyName);

  if (encoded === null) {
    if (!options.allowEphemeral) {
      throw new ConfigError(`Credential key ${keyName} is not set`);
    }
    options.logger?.warn(
      `${keyName} not set; using an ephemeral key, stored credentials will not survive a restart`
    );
    return generateKey();
  }

  const key = Buffer.from(encoded.trim(), "base64");
  if (key.length !== KEY_BYTES) {
    throw new ConfigError(`Credential key ${keyName} must decode to ${KEY_BYTES} bytes`);
  }
  return key;
}
