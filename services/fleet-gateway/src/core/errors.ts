export { ConfigError } from "@fleet-link/secrets";

export type ConnectionErrorKind = "DNS" | "TLS" | "AUTH" | "TIMEOUT" | "NETWORK" | "ABORTED";

export class ConnectionError extends Error {
  constructor(
    readonly kind: ConnectionErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export type ProtocolErrorReason = "topic" | "json" | "schema" | "identity" | "sequence";

export class ProtocolError extends Error {
  constructor(
    readonly reason: ProtocolErrorReason,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

/** The broker session cannot take the message right now. */
export class PublishError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PublishError";
  }
}

export type MissionErrorCode =
  | "INVALID_ORDER"
  | "UNKNOWN_VEHICLE"
  | "UNKNOWN_ORDER"
  | "ORDER_PENDING"
  | "NOT_RETRYABLE";

export class MissionError extends Error {
  constructor(
    readonly code: MissionErrorCode,
    message: string
  ) {
    super(message);
    this.name = "MissionError";
  }
}

export type RouteLibraryErrorCode = "INVALID_ROUTE" | "DUPLICATE_NAME" | "NOT_FOUND" | "FORBIDDEN";

export class RouteLibraryError extends Error {
  constructor(
    readonly code: RouteLibraryErrorCode,
    message: string
  ) {
    super(message);
    this.name = "RouteLibraryError";
  }
}

const TLS_CODES = new Set([
  "EPROTO",
  "CERT_HAS_EXPIRED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "ERR_TLS_CERT_ALTNAME_INVALID"
]);
const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_FAIL", "EAI_NONAME"]);
const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT"]);
// CONNACK return codes: 4/5 in MQTT 3.1.1, 134/135 in MQTT 5
const AUTH_CODES = new Set([4, 5, 134, 135]);

export function errorCode(err: unknown): string | number | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    if (typeof code === "string" || typeof code === "number") return code;
  }
  return undefined;
}

/**
 * Maps a transport failure onto the connection error taxonomy.
 */
export function classifyConnectError(err: unknown): ConnectionErrorKind {
  if (err instanceof ConnectionError) return err.kind;
  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);

  if (typeof code === "number") {
    return AUTH_CODES.has(code) ? "AUTH" : "NETWORK";
  }
  if (code !== undefined) {
    if (DNS_CODES.has(code)) return "DNS";
    if (TLS_CODES.has(code) || code.startsWith("ERR_TLS_") || code.startsWith("ERR_SSL_")) return "TLS";
    if (TIMEOUT_CODES.has(code)) return "TIMEOUT";
  }
  if (/not authori[sz]ed|bad user ?name or password/i.test(message)) return "AUTH";
  if (/timed? ?out/i.test(message)) return "TIMEOUT";
  return "NETWORK";
}

export function toConnectionError(err: unknown, context: string): ConnectionError {
  if (err instanceof ConnectionError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ConnectionError(classifyConnectError(err), `${context}: ${message}`, { cause: err });
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
