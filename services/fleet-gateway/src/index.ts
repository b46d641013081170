import { fileURLToPath } from "node:url";
import { setupGracefulShutdown } from "@fleet-link/health";
import { loadGatewayConfig } from "./core/config";
import { buildServer } from "./server";

async function main(): Promise<void> {
  try {
    const config = loadGatewayConfig();
    const server = await buildServer({ config });
    setupGracefulShutdown(server, {
      logger: { info: (msg) => server.log.info(msg), error: (msg) => server.log.error(msg) }
    });
    await server.listen({ port: config.http.port, host: config.http.host });
    server.log.info(`fleet-gateway listening on ${config.http.host}:${String(config.http.port)}`);
  } catch (error) {
    const message = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error);
    process.stderr.write(`fleet-gateway failed to start: ${message}\n`);
    process.exit(1);
  }
}

const entryFile = process.argv[1];
const isCliEntry = entryFile && fileURLToPath(import.meta.url) === entryFile;

if (isCliEntry) {
  void main();
}
