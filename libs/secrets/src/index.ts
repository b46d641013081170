// Core interfaces
export type {
  ISecretProvider,
  SecretsConfig,
  SecretsProviderKind,
  SecretCacheEntry,
  SecretsLogger
} from "./interfaces";

// Providers
export { EnvSecretProvider } from "./env-provider";
export { AwsSecretsProvider, type AwsSecretsProviderConfig } from "./aws-provider";
export { MemorySecretProvider } from "./memory-provider";

// Factory
export { SecretsFactory } from "./factory";

// Credentials at rest
export { ConfigError } from "./errors";
export { encryptSecret, decryptSecret, generateKey, KEY_BYTES } from "./cipher";
export { loadCredentialKey, DEFAULT_KEY_NAME, type LoadKeyOptions } from "./credential-key";
export { CredentialStore, CREDENTIAL_SCHEMA, type CredentialStoreOptions } from "./credential-store";
