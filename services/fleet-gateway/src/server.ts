import Fastify, { type FastifyInstance } from "fastify";
import type { Database } from "@fleet-link/database";
import { createBrokerChecker, createDatabaseChecker, registerHealthChecks } from "@fleet-link/health";
import { FleetMetrics, Registry, initializeMetrics, metricsHandler } from "@fleet-link/metrics";
import { CredentialStore, SecretsFactory, loadCredentialKey, type ISecretProvider } from "@fleet-link/secrets";
import { loadGatewayConfig, type GatewayConfig } from "./core/config";
import { FleetLink, type FleetLease } from "./core/fleet-link";
import { loadGatewaySchema, openGatewayDatabase } from "./db/connection";
import { RouteRepository } from "./db/route-repo";
import { createMqttTransport, type TransportFactory } from "./mqtt/transport";
import { registerConfigRoutes } from "./routes/config";
import { registerConnectionRoutes } from "./routes/connection";
import { registerMissionRoutes } from "./routes/missions";
import { registerSavedRouteRoutes } from "./routes/saved-routes";
import { registerStatusRoutes } from "./routes/status";
import { registerVehicleRoutes } from "./routes/vehicles";

const SERVICE_NAME = "fleet-gateway";

export interface BuildServerOptions {
  env?: NodeJS.ProcessEnv;
  config?: GatewayConfig;
  logger?: boolean;
  /** Caller-owned database; left open when the server closes. */
  db?: Database;
  secrets?: ISecretProvider;
  credentialKey?: Buffer;
  transportFactory?: TransportFactory;
  registry?: Registry;
  collectDefaultMetrics?: boolean;
  /** Hold a lease for the server's lifetime; defaults to FLEET_KEEP_ALIVE. */
  keepAlive?: boolean;
  now?: () => number;
  orderIdSuffix?: () => string;
}

export interface GatewayServer {
  app: FastifyInstance;
  fleet: FleetLink;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const { app } = await buildGateway(options);
  return app;
}

/**
 * Same as `buildServer`, also handing back the fleet service.
 */
export async function buildGateway(options: BuildServerOptions = {}): Promise<GatewayServer> {
  const env = options.env ?? process.env;
  const config = options.config ?? loadGatewayConfig(env);
  const app = Fastify({ logger: options.logger ?? { level: env.LOG_LEVEL ?? "info" } });

  const registry = options.registry ?? new Registry();
  const httpMetrics = initializeMetrics({
    serviceName: SERVICE_NAME,
    registry,
    collectDefaultMetrics: options.collectDefaultMetrics
  });
  const fleetMetrics = new FleetMetrics({ registry });

  const ownsDb = options.db === undefined;
  const db = options.db ?? (await openGatewayDatabase(config.dbPath, app.log));
  if (!ownsDb) {
    await db.execRaw(loadGatewaySchema());
  }

  const key =
    options.credentialKey ??
    (await loadCredentialKey(options.secrets ?? SecretsFactory.createFromEnv(env), {
      allowEphemeral: config.allowEphemeralKey,
      logger: { info: (msg) => app.log.info(msg), warn: (msg) => app.log.warn(msg) }
    }));
  const credentials = await CredentialStore.open({ db, key });
  const savedRoutes = new RouteRepository(db);

  const fleet = new FleetLink({
    config,
    credentials,
    transportFactory: options.transportFactory ?? createMqttTransport,
    metrics: fleetMetrics,
    logger: app.log,
    now: options.now,
    orderIdSuffix: options.orderIdSuffix
  });

  app.addHook("onRequest", httpMetrics.middleware(SERVICE_NAME));

  registerHealthChecks(app, {
    serviceName: SERVICE_NAME,
    dependencies: {
      database: createDatabaseChecker(db),
      broker: createBrokerChecker(() => ({
        connected: fleet.connection.isConnected(),
        state: fleet.connection.state.get()
      }))
    },
    critical: ["database"]
  });

  app.get("/metrics", async (_request, reply) => {
    reply.header("Content-Type", registry.contentType);
    return metricsHandler(registry);
  });

  await registerStatusRoutes(app, fleet);
  await registerVehicleRoutes(app, fleet);
  await registerMissionRoutes(app, { fleet, routes: savedRoutes, maxNodes: config.missions.maxNodes });
  await registerConnectionRoutes(app, fleet);
  await registerConfigRoutes(app, {
    fleet,
    interfaceName: config.interfaceName,
    mapServiceKey: config.mapServiceKey
  });
  await registerSavedRouteRoutes(app, savedRoutes);

  let keepAliveLease: FleetLease | null = null;
  if (options.keepAlive ?? config.keepAlive) {
    app.addHook("onReady", async () => {
      keepAliveLease = await fleet.acquire();
    });
  }

  app.addHook("onClose", async () => {
    keepAliveLease?.release();
    keepAliveLease = null;
    await fleet.shutdown();
    if (ownsDb) {
      await db.close();
    }
  });

  return { app, fleet };
}
