import { z } from "zod";
import type { Database } from "@fleet-link/database";
import { RouteLibraryError } from "../core/errors";
import { MAX_COORDINATE_M, normalizeTheta, type RoutePoint } from "../core/node-parser";

const RoutePointSchema = z.object({
  nodeId: z.string().trim().min(1),
  x: z.number().finite().min(-MAX_COORDINATE_M).max(MAX_COORDINATE_M),
  y: z.number().finite().min(-MAX_COORDINATE_M).max(MAX_COORDINATE_M),
  theta: z.number().finite().transform(normalizeTheta)
});

export const SavedRouteInputSchema = z.object({
  name: z.string().trim().min(1, "Route name cannot be empty"),
  description: z.string().trim().default(""),
  mapId: z.string().min(1).default("default"),
  nodes: z.array(RoutePointSchema).min(1, "Route needs at least one node")
});

export type SavedRouteInput = z.input<typeof SavedRouteInputSchema>;

export interface SavedRoute {
  id: number;
  name: string;
  description: string;
  mapId: string;
  nodes: RoutePoint[];
  createdBy: string;
  createdAt: string;
  updatedAt: string;
}

interface SavedRouteRow {
  id: number;
  name: string;
  description: string;
  map_id: string;
  nodes_json: string;
  created_by: string;
  created_at: string;
  updated_at: string;
}

export interface RouteListOptions {
  createdBy?: string;
  limit?: number;
}

const COLUMNS = "id, name, description, map_id, nodes_json, created_by, created_at, updated_at";

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function parseStoredNodes(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/** A row whose nodes cannot be read comes back with no nodes. */
function hydrate(row: SavedRouteRow): SavedRoute {
  const nodes = z.array(RoutePointSchema).safeParse(parseStoredNodes(row.nodes_json));
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    mapId: row.map_id,
    nodes: nodes.success ? nodes.data : [],
    createdBy: row.created_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

/**
 * Library of reusable mission routes. Names are unique per creator and only
 * the creator may delete a route.
 */
export class RouteRepository {
  constructor(
    private readonly db: Database,
    private readonly now: () => Date = () => new Date()
  ) {}

  async save(input: SavedRouteInput, createdBy: string): Promise<SavedRoute> {
    const parsed = SavedRouteInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new RouteLibraryError("INVALID_ROUTE", parsed.error.issues.map((issue) => issue.message).join("; "));
    }
    if (!createdBy.trim()) {
      throw new RouteLibraryError("INVALID_ROUTE", "Route owner cannot be empty");
    }
    const route = parsed.data;

    const timestamp = this.now().toISOString();
    const result = await this.db.withTransaction(async (tx) => {
      const existing = await tx.query<{ id: number }>(
        "SELECT id FROM saved_routes WHERE name = ? AND created_by = ?",
        [route.name, createdBy]
      );
      if (existing.rowCount > 0) {
        throw new RouteLibraryError("DUPLICATE_NAME", `Route '${route.name}' already exists for ${createdBy}`);
      }
      return tx.exec(
        `INSERT INTO saved_routes (name, description, map_id, nodes_json, created_by, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [route.name, route.description, route.mapId, JSON.stringify(route.nodes), createdBy, timestamp, timestamp]
      );
    });
    return {
      id: Number(result.lastInsertId),
      name: route.name,
      description: route.description,
      mapId: route.mapId,
      nodes: route.nodes,
      createdBy,
      createdAt: timestamp,
      updatedAt: timestamp
    };
  }

  async get(id: number): Promise<SavedRoute | null> {
    const { rows } = await this.db.query<SavedRouteRow>(`SELECT ${COLUMNS} FROM saved_routes WHERE id = ?`, [id]);
    return rows.length > 0 ? hydrate(rows[0]) : null;
  }

  /** Most recently updated first. */
  async list(options: RouteListOptions = {}): Promise<SavedRoute[]> {
    const params: unknown[] = [];
    let where = "";
    if (options.createdBy !== undefined) {
      where = "WHERE created_by = ?";
      params.push(options.createdBy);
    }
    params.push(options.limit ?? 100);
    const { rows } = await this.db.query<SavedRouteRow>(
      `SELECT ${COLUMNS} FROM saved_routes ${where} ORDER BY updated_at DESC, id DESC LIMIT ?`,
      params
    );
    return rows.map(hydrate);
  }

  async search(term: string, createdBy?: string): Promise<SavedRoute[]> {
    const pattern = `%${escapeLike(term.trim())}%`;
    const params: unknown[] = [pattern, pattern];
    let ownerFilter = "";
    if (createdBy !== undefined) {
      ownerFilter = "AND created_by = ?";
      params.push(createdBy);
    }
    const { rows } = await this.db.query<SavedRouteRow>(
      `SELECT ${COLUMNS} FROM saved_routes
       WHERE (name LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\') ${ownerFilter}
       ORDER BY updated_at DESC, id DESC`,
      params
    );
    return rows.map(hydrate);
  }

  async delete(id: number, requestedBy: string): Promise<void> {
    const { rows } = await this.db.query<{ created_by: string }>("SELECT created_by FROM saved_routes WHERE id = ?", [id]);
    if (rows.length === 0) {
      throw new RouteLibraryError("NOT_FOUND", `Route ${id} not found`);
    }
    if (rows[0].created_by !== requestedBy) {
      throw new RouteLibraryError("FORBIDDEN", `Route ${id} belongs to another user`);
    }
    await this.db.exec("DELETE FROM saved_routes WHERE id = ? AND created_by = ?", [id, requestedBy]);
  }
}
