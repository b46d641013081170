/**
 * Source of raw secret strings. The gateway reads its credential encryption
 * key through one of these; the key never touches disk in plaintext.
 */
export interface ISecretProvider {
  /**
   * Retrieves a secret value by key.
   * @returns Secret value or null if not found
   */
  get(key: string): Promise<string | null>;
}

export type SecretsProviderKind = "env" | "aws" | "memory";

export interface SecretsConfig {
  /** 'env' reads process.env, 'aws' AWS Secrets Manager, 'memory' a process-local map */
  provider: SecretsProviderKind;

  /** Cache TTL in seconds (default: 300 = 5 minutes) */
  cacheTtl?: number;

  aws?: {
    region: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
}

export interface SecretCacheEntry {
  value: string;
  fetchedAt: number;
}

/** Minimal logger surface; a pino or Fastify logger satisfies it. */
export interface SecretsLogger {
  info(msg: string): void;
  warn(msg: string): void;
}
