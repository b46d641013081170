import type { FastifyReply } from "fastify";
import {
  ConfigError,
  ConnectionError,
  MissionError,
  PublishError,
  RouteLibraryError,
  type MissionErrorCode,
  type RouteLibraryErrorCode
} from "../core/errors";

const MISSION_STATUS: Record<MissionErrorCode, number> = {
  INVALID_ORDER: 400,
  UNKNOWN_VEHICLE: 404,
  UNKNOWN_ORDER: 404,
  ORDER_PENDING: 409,
  NOT_RETRYABLE: 409
};

const ROUTE_LIBRARY_STATUS: Record<RouteLibraryErrorCode, number> = {
  INVALID_ROUTE: 400,
  DUPLICATE_NAME: 409,
  NOT_FOUND: 404,
  FORBIDDEN: 403
};

/**
 * Maps domain errors onto HTTP responses; anything else is rethrown for
 * Fastify's 500 handler.
 */
export function sendDomainError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof MissionError) {
    return reply.status(MISSION_STATUS[err.code]).send({ error: err.message, code: err.code });
  }
  if (err instanceof RouteLibraryError) {
    return reply.status(ROUTE_LIBRARY_STATUS[err.code]).send({ error: err.message, code: err.code });
  }
  if (err instanceof PublishError) {
    return reply.status(409).send({ error: err.message, code: "NOT_CONNECTED" });
  }
  if (err instanceof ConfigError) {
    return reply.status(400).send({ error: err.message, code: "INVALID_CONFIG" });
  }
  if (err instanceof ConnectionError) {
    return reply.status(502).send({ error: err.message, code: err.kind });
  }
  throw err;
}
