import type { OrderEdge, OrderNode } from "@fleet-link/schemas";
import { MissionError } from "./errors";

export const MAX_COORDINATE_M = 1000;
export const MIN_NODE_SPACING_M = 0.1;
export const DEFAULT_MAX_NODES = 100;

export interface RoutePoint {
  nodeId: string;
  x: number;
  y: number;
  theta: number;
  /** 1-based line in the submitted text; absent for points that did not come from text. */
  line?: number;
}

function parseNumber(raw: string): number | null {
  if (raw.length === 0) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export function normalizeTheta(theta: number): number {
  let value = theta;
  while (value > Math.PI) value -= 2 * Math.PI;
  while (value < -Math.PI) value += 2 * Math.PI;
  return value;
}

/**
 * Parses operator input, one `nodeId,x,y,theta` per line. Blank lines are
 * skipped; any other malformed line rejects the whole input.
 */
export function parseNodesInput(text: string): RoutePoint[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new MissionError("INVALID_ORDER", "Empty nodes input");
  }

  const points: RoutePoint[] = [];
  trimmed.split(/\r?\n/).forEach((rawLine, index) => {
    const line = index + 1;
    const content = rawLine.trim();
    if (!content) return;

    const parts = content.split(",").map((part) => part.trim());
    if (parts.length !== 4) {
      throw new MissionError("INVALID_ORDER", `Line ${line}: expected 4 values (nodeId,x,y,theta), got ${parts.length}`);
    }
    const [nodeId, xRaw, yRaw, thetaRaw] = parts;
    if (!nodeId) {
      throw new MissionError("INVALID_ORDER", `Line ${line}: node id cannot be empty`);
    }
    const x = parseNumber(xRaw);
    const y = parseNumber(yRaw);
    const theta = parseNumber(thetaRaw);
    if (x === null || y === null || theta === null) {
      throw new MissionError("INVALID_ORDER", `Line ${line}: invalid number format`);
    }
    if (Math.abs(x) > MAX_COORDINATE_M || Math.abs(y) > MAX_COORDINATE_M) {
      throw new MissionError("INVALID_ORDER", `Line ${line}: coordinates exceed ±${MAX_COORDINATE_M}m`);
    }
    points.push({ nodeId, x, y, theta: normalizeTheta(theta), line });
  });

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const point of points) {
    if (seen.has(point.nodeId)) duplicates.add(point.nodeId);
    seen.add(point.nodeId);
  }
  if (duplicates.size > 0) {
    throw new MissionError("INVALID_ORDER", `Duplicate node IDs found: ${[...duplicates].join(", ")}`);
  }
  return points;
}

/**
 * Soft checks; an empty result means the route looks sane.
 */
export function validateNodes(points: RoutePoint[], maxNodes = DEFAULT_MAX_NODES): string[] {
  if (points.length === 0) return ["No nodes provided"];
  if (points.length > maxNodes) return [`Too many nodes: ${points.length} (maximum: ${maxNodes})`];

  const warnings: string[] = [];
  for (let i = 0; i < points.length - 1; i += 1) {
    const current = points[i];
    const next = points[i + 1];
    const distance = Math.hypot(next.x - current.x, next.y - current.y);
    if (distance < MIN_NODE_SPACING_M) {
      warnings.push(`Nodes '${current.nodeId}' and '${next.nodeId}' are very close (${distance.toFixed(2)}m)`);
    }
  }
  return warnings;
}

export function edgeIdFor(startNodeId: string, endNodeId: string): string {
  return `${startNodeId}--${endNodeId}`;
}

/**
 * Nodes take even sequence ids, the edge between node i and i+1 the odd id
 * in between.
 */
export function buildOrderGraph(points: RoutePoint[], mapId: string): { nodes: OrderNode[]; edges: OrderEdge[] } {
  const nodes: OrderNode[] = points.map((point, index) => ({
    nodeId: point.nodeId,
    sequenceId: index * 2,
    released: true,
    nodePosition: { x: point.x, y: point.y, theta: point.theta, mapId },
    actions: []
  }));
  const edges: OrderEdge[] = [];
  for (let i = 0; i < nodes.length - 1; i += 1) {
    edges.push({
      edgeId: edgeIdFor(nodes[i].nodeId, nodes[i + 1].nodeId),
      sequenceId: i * 2 + 1,
      released: true,
      startNodeId: nodes[i].nodeId,
      endNodeId: nodes[i + 1].nodeId,
      actions: []
    });
  }
  return { nodes, edges };
}
