import type { FastifyInstance, FastifyReply } from "fastify";
import type { FleetLink } from "../core/fleet-link";
import { sendDomainError } from "./errors";

export async function registerConnectionRoutes(app: FastifyInstance, fleet: FleetLink): Promise<void> {
  app.get("/connection", async () => ({
    session: fleet.connection.getSession(),
    health: fleet.monitor.snapshot()
  }));

  app.post("/connection/reconnect", async (_request, reply: FastifyReply) => {
    try {
      const health = await fleet.reconnect();
      return { session: fleet.connection.getSession(), health };
    } catch (err) {
      return sendDomainError(reply, err);
    }
  });
}
