import { z } from "zod";
import { NonEmptyStringSchema, PortSchema } from "../common/scalars";

export const BrokerConfigSchema = z.object({
  host: NonEmptyStringSchema,
  port: PortSchema.default(1883),
  useTls: z.boolean().default(false),
  username: z.string().default(""),
  password: z.string().default(""),
  clientId: NonEmptyStringSchema,
  keepaliveSeconds: z.number().int().positive().default(60),
  caFile: z.string().optional()
});

export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;
export type BrokerConfigInput = z.input<typeof BrokerConfigSchema>;

/** Broker settings with the secret removed, safe to log or return over HTTP. */
export type RedactedBrokerConfig = Omit<BrokerConfig, "password"> & { passwordSet: boolean };

export function redactBrokerConfig(config: BrokerConfig): RedactedBrokerConfig {
  const { password, ...rest } = config;
  return { ...rest, passwordSet: password.length > 0 };
}

export function formatBrokerUrl(config: Pick<BrokerConfig, "host" | "port" | "useTls">): string {
  const scheme = config.useTls ? "mqtts" : "mqtt";
  return `${scheme}://${config.host}:${config.port}`;
}

export const EncryptedSecretSchema = z.object({
  algorithm: z.literal("aes-256-gcm"),
  nonce: NonEmptyStringSchema,
  authTag: NonEmptyStringSchema,
  ciphertext: z.string()
});

export type EncryptedSecret = z.infer<typeof EncryptedSecretSchema>;
