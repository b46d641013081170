import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { parseNodesInput, validateNodes } from "../core/node-parser";
import type { RouteRepository } from "../db/route-repo";
import { sendDomainError } from "./errors";

/** Who is acting; there is no login here, the dashboard forwards its user. */
export const OPERATOR_HEADER = "x-fleet-operator";

const RouteBodySchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  mapId: z.string().optional(),
  nodes: z
    .array(z.object({ nodeId: z.string(), x: z.number(), y: z.number(), theta: z.number() }))
    .optional(),
  nodesText: z.string().optional()
});

type RouteListRequest = FastifyRequest<{ Querystring: { createdBy?: string; q?: string; limit?: string } }>;
type RouteRequest = FastifyRequest<{ Params: { id: string } }>;

function operatorOf(request: FastifyRequest): string | null {
  const header = request.headers[OPERATOR_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim() ? value.trim() : null;
}

function parseId(raw: string): number | null {
  const id = Number(raw);
  return Number.isInteger(id) && id > 0 ? id : null;
}

export async function registerSavedRouteRoutes(app: FastifyInstance, routes: RouteRepository): Promise<void> {
  app.get("/routes", async (request: RouteListRequest, reply: FastifyReply) => {
    const { createdBy, q } = request.query;
    if (q !== undefined && q.trim() !== "") {
      return routes.search(q, createdBy);
    }
    const limit = request.query.limit !== undefined ? Number(request.query.limit) : undefined;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      return reply.status(400).send({ error: "limit must be a positive integer" });
    }
    return routes.list({ createdBy, limit });
  });

  app.post("/routes", async (request: FastifyRequest, reply: FastifyReply) => {
    const operator = operatorOf(request);
    if (!operator) {
      return reply.status(400).send({ error: `${OPERATOR_HEADER} header is required` });
    }
    const parsed = RouteBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid route", details: parsed.error.issues });
    }
    const body = parsed.data;
    try {
      const nodes = body.nodes ?? parseNodesInput(body.nodesText ?? "");
      const saved = await routes.save(
        { name: body.name, description: body.description, mapId: body.mapId, nodes },
        operator
      );
      reply.status(201);
      return { route: saved, warnings: validateNodes(saved.nodes) };
    } catch (err) {
      return sendDomainError(reply, err);
    }
  });

  app.get("/routes/:id", async (request: RouteRequest, reply: FastifyReply) => {
    const id = parseId(request.params.id);
    if (id === null) {
      return reply.status(400).send({ error: "Route id must be a positive integer" });
    }
    const route = await routes.get(id);
    if (!route) {
      return reply.status(404).send({ error: "Route not found" });
    }
    return route;
  });

  app.delete("/routes/:id", async (request: RouteRequest, reply: FastifyReply) => {
    const operator = operatorOf(request);
    if (!operator) {
      return reply.status(400).send({ error: `${OPERATOR_HEADER} header is required` });
    }
    const id = parseId(request.params.id);
    if (id === null) {
      return reply.status(400).send({ error: "Route id must be a positive integer" });
    }
    try {
      await routes.delete(id, operator);
      return reply.status(204).send();
    } catch (err) {
      return sendDomainError(reply, err);
    }
  });
}
