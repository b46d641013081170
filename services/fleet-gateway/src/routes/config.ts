import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { BrokerConfigSchema } from "@fleet-link/schemas";
import type { FleetLink } from "../core/fleet-link";
import { sendDomainError } from "./errors";

const BrokerConfigUpdateSchema = BrokerConfigSchema.omit({ password: true }).extend({
  password: BrokerConfigSchema.shape.password.optional()
});

interface ConfigRouteDeps {
  fleet: FleetLink;
  interfaceName: string;
  mapServiceKey?: string;
}

/**
 * Broker settings over HTTP. Responses never carry the password, only
 * whether one is set.
 */
export async function registerConfigRoutes(app: FastifyInstance, deps: ConfigRouteDeps): Promise<void> {
  const { fleet } = deps;

  app.get("/config", async () => ({
    interfaceName: deps.interfaceName,
    mapServiceKeySet: deps.mapServiceKey !== undefined,
    broker: await fleet.describeConfig()
  }));

  app.put("/config", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = BrokerConfigUpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid broker config", details: parsed.error.issues });
    }
    try {
      const saved = await fleet.reconfigure(parsed.data);
      return { broker: saved, health: fleet.monitor.snapshot() };
    } catch (err) {
      return sendDomainError(reply, err);
    }
  });
}
