import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { FastifyBaseLogger } from "fastify";
import { createDatabase, type Database, type DatabaseLogger } from "@fleet-link/database";

export function loadGatewaySchema(): string {
  const __filename = fileURLToPath(import.meta.url);
  const schemaPath = path.resolve(path.dirname(__filename), "schema.sql");
  return fs.readFileSync(schemaPath, "utf-8");
}

/** Adapts pino's (object, message) order to the database logger's (message, meta). */
export function toDatabaseLogger(log: FastifyBaseLogger): DatabaseLogger {
  return {
    info: (msg, meta) => log.info(meta ?? {}, msg),
    warn: (msg, meta) => log.warn(meta ?? {}, msg),
    error: (msg, meta) => log.error(meta ?? {}, msg),
    debug: (msg, meta) => log.debug(meta ?? {}, msg)
  };
}

/**
 * Opens the gateway database with the route library schema applied. The
 * credential store adds its own table when it opens.
 */
export async function openGatewayDatabase(dbPath: string, logger?: FastifyBaseLogger): Promise<Database> {
  logger?.info({ dbPath: dbPath === ":memory:" ? dbPath : path.resolve(dbPath) }, "fleet-link: opening sqlite database");
  return createDatabase({
    type: "sqlite",
    path: dbPath,
    schema: loadGatewaySchema(),
    logger: logger ? toDatabaseLogger(logger) : undefined
  });
}
