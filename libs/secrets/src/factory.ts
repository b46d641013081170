import { z } from "zod";
import type { ISecretProvider, SecretsConfig } from "./interfaces";
import { EnvSecretProvider } from "./env-provider";
import { AwsSecretsProvider } from "./aws-provider";
import { MemorySecretProvider } from "./memory-provider";

const SecretsEnvSchema = z.object({
  FLEET_SECRETS_PROVIDER: z.enum(["env", "aws", "memory"]).default("env"),
  FLEET_SECRETS_CACHE_TTL: z.coerce.number().int().positive().default(300),
  AWS_REGION: z.string().optional(),
  AWS_DEFAULT_REGION: z.string().optional(),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional()
});

/**
 * Factory for creating secret provider instances based on configuration.
 */
export class SecretsFactory {
  static createProvider(config: SecretsConfig): ISecretProvider {
    switch (config.provider) {
      case "env":
        return new EnvSecretProvider();
      case "memory":
        return new MemorySecretProvider();
      case "aws":
        if (!config.aws?.region) {
          throw new Error("AWS Secrets Manager requires region configuration");
        }
        return new AwsSecretsProvider({
          region: config.aws.region,
          credentials: config.aws.credentials,
          cacheTtl: config.cacheTtl ?? 300
        });
    }
  }

  /**
   * Creates a secret provider from FLEET_SECRETS_* and AWS_* variables.
   */
  static createFromEnv(env: NodeJS.ProcessEnv = process.env): ISecretProvider {
    const parsed = SecretsEnvSchema.parse(env);
    const config: SecretsConfig = {
      provider: parsed.FLEET_SECRETS_PROVIDER,
      cacheTtl: parsed.FLEET_SECRETS_CACHE_TTL
    };

    if (config.provider === "aws") {
      const { AWS_ACCESS_KEY_ID: accessKeyId, AWS_SECRET_ACCESS_KEY: secretAccessKey } = parsed;
      config.aws = {
        region: parsed.AWS_REGION ?? parsed.AWS_DEFAULT_REGION ?? "us-east-1",
        credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined
      };
    }

    return SecretsFactory.createProvider(config);
  }
}
