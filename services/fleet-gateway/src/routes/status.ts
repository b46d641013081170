import type { FastifyInstance } from "fastify";
import type { FleetLink } from "../core/fleet-link";

export async function registerStatusRoutes(app: FastifyInstance, fleet: FleetLink): Promise<void> {
  app.get("/status", async () => fleet.status());
}
