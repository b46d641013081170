import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { OrderEdgeSchema, OrderNodeSchema } from "@fleet-link/schemas";
import { MissionError } from "../core/errors";
import type { FleetLink } from "../core/fleet-link";
import { ACK_STATES, ORDER_ID_PATTERN, type AckState, type DispatchRequest } from "../core/mission-dispatcher";
import { buildOrderGraph, parseNodesInput, validateNodes, type RoutePoint } from "../core/node-parser";
import type { RouteRepository } from "../db/route-repo";
import { sendDomainError } from "./errors";

/**
 * An order body names its route one of three ways: explicit VDA5050 nodes,
 * `nodeId,x,y,theta` text, or a saved route id.
 */
const MissionBodySchema = z
  .object({
    vehicleId: z.string().min(1),
    orderId: z.string().regex(ORDER_ID_PATTERN).optional(),
    orderUpdateId: z.number().int().nonnegative().optional(),
    zoneSetId: z.string().optional(),
    nodes: z.array(OrderNodeSchema).min(1).optional(),
    edges: z.array(OrderEdgeSchema).optional(),
    nodesText: z.string().optional(),
    routeId: z.number().int().positive().optional(),
    mapId: z.string().min(1).default("default")
  })
  .refine((body) => [body.nodes, body.nodesText, body.routeId].filter((v) => v !== undefined).length === 1, {
    message: "Provide exactly one of nodes, nodesText or routeId"
  });

type MissionListRequest = FastifyRequest<{ Querystring: { vehicleId?: string; state?: string; limit?: string } }>;
type MissionRequest = FastifyRequest<{ Params: { orderId: string } }>;

interface MissionRouteDeps {
  fleet: FleetLink;
  routes: RouteRepository;
  maxNodes: number;
}

function isAckState(value: string): value is AckState {
  return ACK_STATES.some((state) => state === value);
}

export async function registerMissionRoutes(app: FastifyInstance, deps: MissionRouteDeps): Promise<void> {
  const { fleet, routes, maxNodes } = deps;

  app.get("/missions", async (request: MissionListRequest, reply: FastifyReply) => {
    const state = request.query.state?.toUpperCase();
    if (state !== undefined && !isAckState(state)) {
      return reply.status(400).send({ error: `state must be one of ${ACK_STATES.join(", ")}` });
    }
    const limit = request.query.limit !== undefined ? Number(request.query.limit) : undefined;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      return reply.status(400).send({ error: "limit must be a positive integer" });
    }
    return fleet.dispatcher.list({ vehicleId: request.query.vehicleId, ackState: state, limit });
  });

  app.post("/missions", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = MissionBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid mission request", details: parsed.error.issues });
    }
    const body = parsed.data;
    try {
      let warnings: string[] = [];
      let dispatch: DispatchRequest;
      if (body.nodes) {
        dispatch = {
          vehicleId: body.vehicleId,
          orderId: body.orderId,
          orderUpdateId: body.orderUpdateId,
          zoneSetId: body.zoneSetId,
          nodes: body.nodes,
          edges: body.edges
        };
      } else {
        let points: RoutePoint[];
        let mapId = body.mapId;
        if (body.routeId !== undefined) {
          const saved = await routes.get(body.routeId);
          if (!saved) {
            return reply.status(404).send({ error: `Route ${body.routeId} not found` });
          }
          points = saved.nodes;
          mapId = saved.mapId;
        } else {
          points = parseNodesInput(body.nodesText ?? "");
        }
        if (points.length > maxNodes) {
          throw new MissionError("INVALID_ORDER", `Too many nodes: ${points.length} (maximum: ${maxNodes})`);
        }
        warnings = validateNodes(points, maxNodes);
        const graph = buildOrderGraph(points, mapId);
        dispatch = {
          vehicleId: body.vehicleId,
          orderId: body.orderId,
          orderUpdateId: body.orderUpdateId,
          zoneSetId: body.zoneSetId,
          nodes: graph.nodes,
          edges: graph.edges
        };
      }
      const order = await fleet.withLease(() => fleet.dispatcher.dispatch(dispatch));
      reply.status(201);
      return { order, warnings };
    } catch (err) {
      return sendDomainError(reply, err);
    }
  });

  app.get("/missions/:orderId", async (request: MissionRequest, reply: FastifyReply) => {
    const order = fleet.dispatcher.get(request.params.orderId);
    if (!order) {
      return reply.status(404).send({ error: "Order not found" });
    }
    return order;
  });

  app.post("/missions/:orderId/retry", async (request: MissionRequest, reply: FastifyReply) => {
    try {
      const order = await fleet.withLease(() => fleet.dispatcher.retry(request.params.orderId));
      reply.status(201);
      return { order, warnings: [] };
    } catch (err) {
      return sendDomainError(reply, err);
    }
  });
}
