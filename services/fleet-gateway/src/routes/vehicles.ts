import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { FleetLink } from "../core/fleet-link";
import { VEHICLE_CONNECTION_STATES, type VehicleConnectionState } from "../core/telemetry-store";
import { vehicleIdOf } from "../core/topics";
import { sendDomainError } from "./errors";

type VehicleParams = { manufacturer: string; serialNumber: string };

type VehicleListRequest = FastifyRequest<{ Querystring: { state?: string } }>;
type VehicleRequest = FastifyRequest<{ Params: VehicleParams }>;
type VehicleEventsRequest = FastifyRequest<{
  Params: VehicleParams;
  Querystring: { topic?: string; limit?: string };
}>;

function isConnectionState(value: string): value is VehicleConnectionState {
  return VEHICLE_CONNECTION_STATES.some((state) => state === value);
}

/**
 * Vehicle ids are `<manufacturer>/<serialNumber>`, so they span two path
 * segments.
 */
export async function registerVehicleRoutes(app: FastifyInstance, fleet: FleetLink): Promise<void> {
  app.get("/vehicles", async (request: VehicleListRequest, reply: FastifyReply) => {
    const state = request.query.state?.toUpperCase();
    if (state !== undefined && !isConnectionState(state)) {
      return reply.status(400).send({ error: `state must be one of ${VEHICLE_CONNECTION_STATES.join(", ")}` });
    }
    return fleet.store.list({ connectionState: state });
  });

  app.get("/vehicles/:manufacturer/:serialNumber", async (request: VehicleRequest, reply: FastifyReply) => {
    const vehicleId = vehicleIdOf(request.params);
    const record = fleet.store.get(vehicleId);
    if (!record) {
      return reply.status(404).send({ error: "Vehicle not found" });
    }
    return { ...record, topics: fleet.store.eventTopics(vehicleId) };
  });

  app.get("/vehicles/:manufacturer/:serialNumber/events", async (request: VehicleEventsRequest, reply: FastifyReply) => {
    const vehicleId = vehicleIdOf(request.params);
    if (!fleet.store.get(vehicleId)) {
      return reply.status(404).send({ error: "Vehicle not found" });
    }
    const topic = request.query.topic ?? "state";
    const limit = request.query.limit !== undefined ? Number(request.query.limit) : undefined;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      return reply.status(400).send({ error: "limit must be a positive integer" });
    }
    const events = fleet.store.events(vehicleId, topic);
    return { vehicleId, topic, events: limit !== undefined ? events.slice(-limit) : events };
  });

  app.post("/vehicles/:manufacturer/:serialNumber/cancel", async (request: VehicleRequest, reply: FastifyReply) => {
    try {
      return await fleet.withLease(() => fleet.dispatcher.cancelOrder(vehicleIdOf(request.params)));
    } catch (err) {
      return sendDomainError(reply, err);
    }
  });
}
