import { z } from "zod";
import { BrokerConfigSchema, type BrokerConfig, type BrokerConfigInput } from "@fleet-link/schemas";
import { ConfigError } from "./errors";
import { DEFAULT_INTERFACE_NAME } from "./topics";

const TRUE_VALUES = new Set(["1", "true", "yes"]);

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? fallback : TRUE_VALUES.has(value.trim().toLowerCase())));

const millis = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const count = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === "" ? undefined : value));

const GatewayEnvSchema = z.object({
  BROKER_HOST: optionalText,
  BROKER_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  BROKER_TLS: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === "" ? undefined : TRUE_VALUES.has(value.toLowerCase()))),
  BROKER_USER: z.string().optional(),
  BROKER_PASS: z.string().optional(),
  BROKER_CLIENT_ID: optionalText,
  BROKER_CA_FILE: optionalText,
  BROKER_KEEPALIVE_SECONDS: z.coerce.number().int().positive().optional(),
  MAP_SERVICE_KEY: optionalText,

  FLEET_INTERFACE_NAME: z.string().min(1).default(DEFAULT_INTERFACE_NAME),
  FLEET_DEFAULT_CLIENT_ID: z.string().min(1).default("fleet-link-gateway"),
  FLEET_DB_PATH: z.string().min(1).default("./var/fleet-link.db"),
  FLEET_ALLOW_EPHEMERAL_KEY: flag(false),
  FLEET_KEEP_ALIVE: flag(true),
  FLEET_IDLE_TEARDOWN_MS: millis(300_000),

  FLEET_STALE_AFTER_MS: millis(60_000),
  FLEET_OFFLINE_AFTER_MS: millis(120_000),
  FLEET_WINDOW_SIZE: count(100),
  FLEET_SWEEP_INTERVAL_MS: count(5_000),

  FLEET_CONNECT_TIMEOUT_MS: count(10_000),
  FLEET_PUBLISH_TIMEOUT_MS: count(5_000),
  FLEET_PROBE_INTERVAL_MS: count(30_000),
  FLEET_INBOUND_SILENCE_MS: millis(90_000),
  FLEET_MISSED_PROBES: count(3),
  FLEET_MAX_SESSION_AGE_MS: millis(0),
  FLEET_RECONNECT_BASE_MS: count(2_000),
  FLEET_RECONNECT_MAX_MS: count(60_000),
  FLEET_RECONNECT_ATTEMPTS: count(5),

  FLEET_ACK_TIMEOUT_MS: count(30_000),
  FLEET_LEDGER_SIZE: count(500),
  FLEET_ORDER_PREFIX: z.string().regex(/^[A-Za-z0-9_-]+$/).default("ORDER"),
  FLEET_MAX_NODES: count(100),

  FLEET_GATEWAY_PORT: z.coerce.number().int().min(1).max(65535).default(4100),
  FLEET_GATEWAY_HOST: z.string().min(1).default("0.0.0.0")
});

/** Broker values taken from the environment; each one wins over the stored config. */
export type BrokerOverrides = Partial<BrokerConfigInput>;

export interface GatewayConfig {
  interfaceName: string;
  defaultClientId: string;
  dbPath: string;
  allowEphemeralKey: boolean;
  keepAlive: boolean;
  idleTeardownMs: number;
  mapServiceKey?: string;
  brokerOverrides: BrokerOverrides;
  telemetry: { staleAfterMs: number; offlineAfterMs: number; windowSize: number; sweepIntervalMs: number };
  connection: { connectTimeoutMs: number; publishTimeoutMs: number };
  health: {
    probeIntervalMs: number;
    inboundSilenceMs: number;
    missedProbeThreshold: number;
    maxSessionAgeMs: number;
    backoff: { baseMs: number; maxMs: number; maxAttempts: number };
  };
  missions: { ackTimeoutMs: number; ledgerSize: number; orderIdPrefix: string; maxNodes: number };
  http: { port: number; host: string };
}

export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = GatewayEnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid gateway environment: ${detail}`);
  }
  const vars = parsed.data;
  if (vars.FLEET_OFFLINE_AFTER_MS < vars.FLEET_STALE_AFTER_MS) {
    throw new ConfigError("FLEET_OFFLINE_AFTER_MS must not be shorter than FLEET_STALE_AFTER_MS");
  }

  const brokerOverrides: BrokerOverrides = {};
  if (vars.BROKER_HOST !== undefined) brokerOverrides.host = vars.BROKER_HOST;
  if (vars.BROKER_PORT !== undefined) brokerOverrides.port = vars.BROKER_PORT;
  if (vars.BROKER_TLS !== undefined) brokerOverrides.useTls = vars.BROKER_TLS;
  if (vars.BROKER_USER !== undefined) brokerOverrides.username = vars.BROKER_USER;
  if (vars.BROKER_PASS !== undefined) brokerOverrides.password = vars.BROKER_PASS;
  if (vars.BROKER_CLIENT_ID !== undefined) brokerOverrides.clientId = vars.BROKER_CLIENT_ID;
  if (vars.BROKER_CA_FILE !== undefined) brokerOverrides.caFile = vars.BROKER_CA_FILE;
  if (vars.BROKER_KEEPALIVE_SECONDS !== undefined) brokerOverrides.keepaliveSeconds = vars.BROKER_KEEPALIVE_SECONDS;

  return {
    interfaceName: vars.FLEET_INTERFACE_NAME,
    defaultClientId: vars.FLEET_DEFAULT_CLIENT_ID,
    dbPath: vars.FLEET_DB_PATH,
    allowEphemeralKey: vars.FLEET_ALLOW_EPHEMERAL_KEY,
    keepAlive: vars.FLEET_KEEP_ALIVE,
    idleTeardownMs: vars.FLEET_IDLE_TEARDOWN_MS,
    mapServiceKey: vars.MAP_SERVICE_KEY,
    brokerOverrides,
    telemetry: {
      staleAfterMs: vars.FLEET_STALE_AFTER_MS,
      offlineAfterMs: vars.FLEET_OFFLINE_AFTER_MS,
      windowSize: vars.FLEET_WINDOW_SIZE,
      sweepIntervalMs: vars.FLEET_SWEEP_INTERVAL_MS
    },
    connection: {
      connectTimeoutMs: vars.FLEET_CONNECT_TIMEOUT_MS,
      publishTimeoutMs: vars.FLEET_PUBLISH_TIMEOUT_MS
    },
    health: {
      probeIntervalMs: vars.FLEET_PROBE_INTERVAL_MS,
      inboundSilenceMs: vars.FLEET_INBOUND_SILENCE_MS,
      missedProbeThreshold: vars.FLEET_MISSED_PROBES,
      maxSessionAgeMs: vars.FLEET_MAX_SESSION_AGE_MS,
      backoff: {
        baseMs: vars.FLEET_RECONNECT_BASE_MS,
        maxMs: vars.FLEET_RECONNECT_MAX_MS,
        maxAttempts: vars.FLEET_RECONNECT_ATTEMPTS
      }
    },
    missions: {
      ackTimeoutMs: vars.FLEET_ACK_TIMEOUT_MS,
      ledgerSize: vars.FLEET_LEDGER_SIZE,
      orderIdPrefix: vars.FLEET_ORDER_PREFIX,
      maxNodes: vars.FLEET_MAX_NODES
    },
    http: { port: vars.FLEET_GATEWAY_PORT, host: vars.FLEET_GATEWAY_HOST }
  };
}

/**
 * Layers environment overrides over the stored broker config. With nothing
 * stored, the environment alone must name a host.
 */
export function mergeBrokerConfig(
  stored: BrokerConfig | null,
  overrides: BrokerOverrides,
  defaultClientId: string
): BrokerConfig {
  const merged: BrokerConfigInput = {
    ...(stored ?? { clientId: defaultClientId, host: "" }),
    ...overrides
  };
  if (!merged.host) {
    throw new ConfigError("No broker configured: store one via PUT /config or set BROKER_HOST");
  }
  const parsed = BrokerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid broker config: ${detail}`);
  }
  return parsed.data;
}
