/**
 * Stored or supplied configuration cannot be used: a missing or malformed
 * key, a record that fails decryption, or broker settings that fail
 * validation. Reconnecting will not fix it.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
