import { SecretsManagerClient, GetSecretValueCommand, ResourceNotFoundException } from "@aws-sdk/client-secrets-manager";
import type { ISecretProvider, SecretCacheEntry } from "./interfaces";

export interface AwsSecretsProviderConfig {
  region: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  cacheTtl?: number; // seconds
}

/**
 * AWS Secrets Manager provider for production.
 * Caches secrets in memory with configurable TTL.
 */
export class AwsSecretsProvider implements ISecretProvider {
  private readonly client: SecretsManagerClient;
  private readonly cache = new Map<string, SecretCacheEntry>();

  constructor(private readonly config: AwsSecretsProviderConfig) {
    this.client = new SecretsManagerClient({
      region: config.region,
      credentials: config.credentials
    });
  }

  async get(key: string): Promise<string | null> {
    const cached = this.getFromCache(key);
    if (cached !== null) return cached;

    try {
      const response = await this.client.send(new GetSecretValueCommand({ SecretId: key }));
      const value = response.SecretString ?? null;
      if (value !== null) this.cache.set(key, { value, fetchedAt: Date.now() });
      return value;
    } catch (err) {
      if (err instanceof ResourceNotFoundException) return null;
      throw err;
    }
  }

  private getFromCache(key: string): string | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    const ttl = this.config.cacheTtl ?? 300;
    const age = (Date.now() - entry.fetchedAt) / 1000;
    if (age > ttl) {
      this.cache.delete(key);
      return null;
    }
    return entry.value;
  }
}
