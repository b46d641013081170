import { randomBytes } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";
import {
  OrderEdgeSchema,
  OrderNodeSchema,
  type Action,
  type AgvError,
  type OrderEdge,
  type OrderMessage,
  type OrderNode
} from "@fleet-link/schemas";
import type { EncodedFrame, ProtocolCodec } from "./codec";
import { MissionError, ProtocolError, PublishError } from "./errors";
import { edgeIdFor } from "./node-parser";
import { parseVehicleId, type VehicleRef } from "./topics";

export type AckState = "PENDING" | "ACKED" | "FAILED" | "TIMEOUT";

export const ACK_STATES: readonly AckState[] = ["PENDING", "ACKED", "FAILED", "TIMEOUT"];

export const ORDER_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/** State error types that mean the vehicle rejected an order. */
export const ORDER_REJECTION_ERRORS: ReadonlySet<string> = new Set([
  "orderError",
  "orderUpdateError",
  "noRouteError"
]);

export interface MissionOrder {
  orderId: string;
  orderUpdateId: number;
  vehicleId: string;
  nodes: OrderNode[];
  edges: OrderEdge[];
  zoneSetId?: string;
  dispatchedAt: number;
  ackDeadline: number;
  ackState: AckState;
  resolvedAt?: number;
  failureReason?: string;
  retryOf?: string;
}

export const DispatchRequestSchema = z.object({
  vehicleId: z.string().min(1),
  orderId: z.string().regex(ORDER_ID_PATTERN, "orderId may only contain letters, digits, '-' and '_'").optional(),
  orderUpdateId: z.number().int().nonnegative().optional(),
  zoneSetId: z.string().optional(),
  nodes: z.array(OrderNodeSchema).min(1, "an order needs at least one node"),
  edges: z.array(OrderEdgeSchema).optional()
});

export type DispatchRequest = z.input<typeof DispatchRequestSchema>;

/** What the dispatcher needs from the broker session. */
export interface OrderPublisher {
  canPublish(): boolean;
  publish(topic: string, payload: string): Promise<void>;
}

export interface MissionMetricsSink {
  recordMission(outcome: string): void;
}

/** The parts of a VDA5050 state frame that settle an order. */
export interface OrderStateReport {
  orderId: string;
  orderUpdateId: number;
  errors: AgvError[];
}

export interface CancelResult {
  vehicleId: string;
  actionId: string;
  cancelled: string[];
}

export interface MissionListFilter {
  vehicleId?: string;
  ackState?: AckState;
  limit?: number;
}

export interface MissionDispatcherOptions {
  codec: ProtocolCodec;
  publisher: OrderPublisher;
  ackTimeoutMs?: number;
  /** Finished orders kept for inspection; pending orders are never evicted. */
  ledgerSize?: number;
  orderIdPrefix?: string;
  orderIdSuffix?: () => string;
  isKnownVehicle?: (vehicleId: string) => boolean;
  metrics?: MissionMetricsSink;
  logger?: FastifyBaseLogger;
  now?: () => number;
}

type OutcomeListener = (order: MissionOrder) => void;

interface Waiter {
  resolve: (order: MissionOrder) => void;
  reject: (err: Error) => void;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * `<prefix>-YYYYMMDD-HHMMSS-<suffix>` in UTC.
 */
export function formatOrderId(prefix: string, at: Date, suffix: string): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `${prefix}-${date}-${time}-${suffix}`;
}

function defaultSuffix(): string {
  return randomBytes(3).toString("hex");
}

/**
 * Checks node ordering and edge wiring. When no edges are given the nodes are
 * renumbered onto even sequence ids and the connecting edges generated on
 * the odd ids in between.
 */
export function prepareOrderGraph(
  nodes: OrderNode[],
  edges: OrderEdge[] | undefined
): { nodes: OrderNode[]; edges: OrderEdge[] } {
  if (nodes.length === 0) {
    throw new MissionError("INVALID_ORDER", "An order needs at least one node");
  }
  for (let i = 1; i < nodes.length; i += 1) {
    if (nodes[i].sequenceId <= nodes[i - 1].sequenceId) {
      throw new MissionError(
        "INVALID_ORDER",
        `Node ${nodes[i].nodeId} has sequenceId ${nodes[i].sequenceId}, expected more than ${nodes[i - 1].sequenceId}`
      );
    }
  }

  if (!edges || edges.length === 0) {
    const renumbered = nodes.map((node, index) => ({ ...node, sequenceId: index * 2 }));
    const generated: OrderEdge[] = [];
    for (let i = 0; i < renumbered.length - 1; i += 1) {
      const start = renumbered[i];
      const end = renumbered[i + 1];
      generated.push({
        edgeId: edgeIdFor(start.nodeId, end.nodeId),
        sequenceId: start.sequenceId + 1,
        released: start.released && end.released,
        startNodeId: start.nodeId,
        endNodeId: end.nodeId,
        actions: []
      });
    }
    return { nodes: renumbered, edges: generated };
  }

  if (edges.length !== nodes.length - 1) {
    throw new MissionError("INVALID_ORDER", `Expected ${nodes.length - 1} edges for ${nodes.length} nodes, got ${edges.length}`);
  }
  edges.forEach((edge, i) => {
    const start = nodes[i];
    const end = nodes[i + 1];
    if (edge.startNodeId !== start.nodeId || edge.endNodeId !== end.nodeId) {
      throw new MissionError(
        "INVALID_ORDER",
        `Edge ${edge.edgeId} must link ${start.nodeId} to ${end.nodeId}`
      );
    }
    if (edge.sequenceId <= start.sequenceId || edge.sequenceId >= end.sequenceId) {
      throw new MissionError(
        "INVALID_ORDER",
        `Edge ${edge.edgeId} sequenceId ${edge.sequenceId} must lie between ${start.sequenceId} and ${end.sequenceId}`
      );
    }
  });
  return { nodes, edges };
}

function snapshot(order: MissionOrder): MissionOrder {
  return { ...order };
}

/**
 * Publishes orders and tracks their acknowledgement. An order that is not
 * acknowledged before its deadline resolves TIMEOUT once and is never sent
 * again on its own; `retry` issues a fresh order.
 */
export class MissionDispatcher {
  private readonly codec: ProtocolCodec;
  private readonly publisher: OrderPublisher;
  private readonly ackTimeoutMs: number;
  private readonly ledgerSize: number;
  private readonly orderIdPrefix: string;
  private readonly orderIdSuffix: () => string;
  private readonly isKnownVehicle?: (vehicleId: string) => boolean;
  private readonly metrics?: MissionMetricsSink;
  private readonly logger?: FastifyBaseLogger;
  private readonly now: () => number;

  private readonly orders = new Map<string, MissionOrder>();
  private readonly pendingByVehicle = new Map<string, Set<string>>();
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly waiters = new Map<string, Waiter[]>();
  private readonly listeners = new Set<OutcomeListener>();
  private finished: string[] = [];

  constructor(options: MissionDispatcherOptions) {
    this.codec = options.codec;
    this.publisher = options.publisher;
    this.ackTimeoutMs = options.ackTimeoutMs ?? 30_000;
    this.ledgerSize = options.ledgerSize ?? 500;
    this.orderIdPrefix = options.orderIdPrefix ?? "ORDER";
    this.orderIdSuffix = options.orderIdSuffix ?? defaultSuffix;
    this.isKnownVehicle = options.isKnownVehicle;
    this.metrics = options.metrics;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  async dispatch(request: DispatchRequest): Promise<MissionOrder> {
    return this.send(request);
  }

  /**
   * Re-sends the route of a failed or timed-out order under a new orderId.
   */
  async retry(orderId: string): Promise<MissionOrder> {
    const original = this.orders.get(orderId);
    if (!original) {
      throw new MissionError("UNKNOWN_ORDER", `Order ${orderId} not found`);
    }
    if (original.ackState === "PENDING") {
      throw new MissionError("ORDER_PENDING", `Order ${orderId} is still awaiting acknowledgement`);
    }
    if (original.ackState === "ACKED") {
      throw new MissionError("NOT_RETRYABLE", `Order ${orderId} was acknowledged`);
    }
    return this.send(
      {
        vehicleId: original.vehicleId,
        zoneSetId: original.zoneSetId,
        nodes: original.nodes,
        edges: original.edges
      },
      orderId
    );
  }

  /**
   * Sends a `cancelOrder` instant action and settles the vehicle's pending
   * orders as FAILED.
   */
  async cancelOrder(vehicleId: string): Promise<CancelResult> {
    const target = this.parseTarget(vehicleId);
    if (!this.publisher.canPublish()) {
      throw new PublishError(`Cannot cancel orders on ${vehicleId}: broker session unavailable`);
    }
    this.ensureKnown(vehicleId);
    const actionId = `cancel-${this.orderIdSuffix()}`;
    const action: Action = {
      actionType: "cancelOrder",
      actionId,
      blockingType: "HARD",
      actionParameters: []
    };
    const frame = this.codec.encodeInstantActions(target, [action]);
    await this.publisher.publish(frame.topic, frame.body);

    const cancelled = [...(this.pendingByVehicle.get(vehicleId) ?? [])];
    for (const orderId of cancelled) {
      const order = this.orders.get(orderId);
      if (order) this.resolve(order, "FAILED", "cancelled by operator");
    }
    this.logger?.info({ vehicleId, actionId, cancelled }, "fleet-link: cancelOrder sent");
    return { vehicleId, actionId, cancelled };
  }

  /**
   * Matches a state frame against the vehicle's pending orders.
   */
  handleState(vehicleId: string, report: OrderStateReport): void {
    const pending = this.pendingByVehicle.get(vehicleId);
    if (!pending || pending.size === 0) return;

    for (const error of report.errors) {
      if (!ORDER_REJECTION_ERRORS.has(error.errorType)) continue;
      for (const reference of error.errorReferences) {
        if (reference.referenceKey !== "orderId" || !pending.has(reference.referenceValue)) continue;
        const order = this.orders.get(reference.referenceValue);
        if (order) {
          const detail = error.errorDescription ? `: ${error.errorDescription}` : "";
          this.resolve(order, "FAILED", `${error.errorType}${detail}`);
        }
      }
    }

    if (!report.orderId || !pending.has(report.orderId)) return;
    const order = this.orders.get(report.orderId);
    if (order && report.orderUpdateId >= order.orderUpdateId) {
      this.resolve(order, "ACKED");
    }
  }

  onOutcome(listener: OutcomeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves with the order once it leaves PENDING.
   */
  waitForOutcome(orderId: string): Promise<MissionOrder> {
    const order = this.orders.get(orderId);
    if (!order) {
      return Promise.reject(new MissionError("UNKNOWN_ORDER", `Order ${orderId} not found`));
    }
    if (order.ackState !== "PENDING") {
      return Promise.resolve(snapshot(order));
    }
    return new Promise<MissionOrder>((resolve, reject) => {
      const list = this.waiters.get(orderId) ?? [];
      list.push({ resolve, reject });
      this.waiters.set(orderId, list);
    });
  }

  get(orderId: string): MissionOrder | undefined {
    const order = this.orders.get(orderId);
    return order ? snapshot(order) : undefined;
  }

  /** Newest first. */
  list(filter: MissionListFilter = {}): MissionOrder[] {
    const result = [...this.orders.values()]
      .filter((order) => (filter.vehicleId ? order.vehicleId === filter.vehicleId : true))
      .filter((order) => (filter.ackState ? order.ackState === filter.ackState : true))
      .sort((a, b) => b.dispatchedAt - a.dispatchedAt)
      .map(snapshot);
    return filter.limit !== undefined ? result.slice(0, filter.limit) : result;
  }

  counts(): Record<AckState, number> {
    const counts: Record<AckState, number> = { PENDING: 0, ACKED: 0, FAILED: 0, TIMEOUT: 0 };
    for (const order of this.orders.values()) {
      counts[order.ackState] += 1;
    }
    return counts;
  }

  /**
   * Clears ack timers. Pending orders stay PENDING; anyone waiting on them is
   * rejected.
   */
  stop(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    for (const [orderId, list] of this.waiters) {
      for (const waiter of list) {
        waiter.reject(new Error(`Dispatcher stopped before order ${orderId} resolved`));
      }
    }
    this.waiters.clear();
  }

  /** Re-arms ack timers for orders still pending after a `stop()`. */
  resume(): void {
    for (const order of this.orders.values()) {
      if (order.ackState === "PENDING" && !this.timers.has(order.orderId)) {
        this.armTimer(order);
      }
    }
  }

  private async send(request: DispatchRequest, retryOf?: string): Promise<MissionOrder> {
    const parsed = DispatchRequestSchema.safeParse(request);
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => `${issue.path.join(".") || "order"}: ${issue.message}`).join("; ");
      throw new MissionError("INVALID_ORDER", message);
    }
    const body = parsed.data;
    const target = this.parseTarget(body.vehicleId);
    const graph = prepareOrderGraph(body.nodes, body.edges);

    if (!this.publisher.canPublish()) {
      throw new PublishError(`Cannot dispatch to ${body.vehicleId}: broker session unavailable`);
    }
    this.ensureKnown(body.vehicleId);

    const orderId = body.orderId ?? this.nextOrderId();
    const previous = this.orders.get(orderId);
    if (previous?.ackState === "PENDING") {
      throw new MissionError("ORDER_PENDING", `Order ${orderId} is still awaiting acknowledgement`);
    }

    let frame: EncodedFrame<OrderMessage>;
    try {
      frame = this.codec.encode({
        ...target,
        orderId,
        orderUpdateId: body.orderUpdateId,
        zoneSetId: body.zoneSetId,
        nodes: graph.nodes,
        edges: graph.edges
      });
    } catch (err) {
      if (err instanceof ProtocolError) {
        throw new MissionError("INVALID_ORDER", err.message);
      }
      throw err;
    }

    const dispatchedAt = this.now();
    const order: MissionOrder = {
      orderId,
      orderUpdateId: frame.payload.orderUpdateId,
      vehicleId: body.vehicleId,
      nodes: frame.payload.nodes,
      edges: frame.payload.edges,
      ...(body.zoneSetId !== undefined ? { zoneSetId: body.zoneSetId } : {}),
      dispatchedAt,
      ackDeadline: dispatchedAt + this.ackTimeoutMs,
      ackState: "PENDING",
      ...(retryOf !== undefined ? { retryOf } : {})
    };

    // Recorded before publishing so a state frame racing the PUBACK still matches.
    this.track(order);
    try {
      await this.publisher.publish(frame.topic, frame.body);
    } catch (err) {
      this.untrack(order, previous);
      this.codec.releaseOrderUpdate(orderId, order.orderUpdateId);
      this.metrics?.recordMission("publish_failed");
      this.logger?.warn({ orderId, vehicleId: body.vehicleId }, "fleet-link: order publish failed");
      throw err;
    }

    this.metrics?.recordMission("dispatched");
    this.logger?.info(
      { orderId, orderUpdateId: order.orderUpdateId, vehicleId: body.vehicleId, retryOf },
      "fleet-link: order dispatched"
    );
    if (order.ackState === "PENDING") {
      this.armTimer(order);
    }
    return snapshot(order);
  }

  private parseTarget(vehicleId: string): VehicleRef {
    const target = parseVehicleId(vehicleId);
    if (!target) {
      throw new MissionError("INVALID_ORDER", `Vehicle id must be <manufacturer>/<serialNumber>, got ${vehicleId}`);
    }
    return target;
  }

  /** Runs after the session check, so a DISCONNECTED session reports PublishError first. */
  private ensureKnown(vehicleId: string): void {
    if (this.isKnownVehicle && !this.isKnownVehicle(vehicleId)) {
      throw new MissionError("UNKNOWN_VEHICLE", `Vehicle ${vehicleId} has not reported yet`);
    }
  }

  private nextOrderId(): string {
    for (;;) {
      const candidate = formatOrderId(this.orderIdPrefix, new Date(this.now()), this.orderIdSuffix());
      if (!this.orders.has(candidate)) return candidate;
    }
  }

  private track(order: MissionOrder): void {
    this.finished = this.finished.filter((id) => id !== order.orderId);
    this.orders.set(order.orderId, order);
    const pending = this.pendingByVehicle.get(order.vehicleId) ?? new Set<string>();
    pending.add(order.orderId);
    this.pendingByVehicle.set(order.vehicleId, pending);
  }

  private untrack(order: MissionOrder, previous: MissionOrder | undefined): void {
    this.removePending(order);
    if (previous) {
      this.orders.set(previous.orderId, previous);
      this.finished.push(previous.orderId);
    } else {
      this.orders.delete(order.orderId);
    }
  }

  private removePending(order: MissionOrder): void {
    const pending = this.pendingByVehicle.get(order.vehicleId);
    if (!pending) return;
    pending.delete(order.orderId);
    if (pending.size === 0) this.pendingByVehicle.delete(order.vehicleId);
  }

  private armTimer(order: MissionOrder): void {
    const delay = Math.max(0, order.ackDeadline - this.now());
    const timer = setTimeout(() => {
      this.timers.delete(order.orderId);
      if (this.orders.get(order.orderId) !== order) return;
      this.logger?.warn(
        { orderId: order.orderId, vehicleId: order.vehicleId, ackTimeoutMs: this.ackTimeoutMs },
        "fleet-link: order not acknowledged in time"
      );
      this.resolve(order, "TIMEOUT", `no acknowledgement within ${this.ackTimeoutMs}ms`);
    }, delay);
    this.timers.set(order.orderId, timer);
  }

  private resolve(order: MissionOrder, state: Exclude<AckState, "PENDING">, reason?: string): void {
    if (order.ackState !== "PENDING") return;
    order.ackState = state;
    order.resolvedAt = this.now();
    if (reason !== undefined) order.failureReason = reason;

    const timer = this.timers.get(order.orderId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(order.orderId);
    }
    this.removePending(order);
    this.finished.push(order.orderId);
    this.evictFinished();
    this.metrics?.recordMission(state.toLowerCase());

    const result = snapshot(order);
    const waiting = this.waiters.get(order.orderId) ?? [];
    this.waiters.delete(order.orderId);
    for (const waiter of waiting) {
      waiter.resolve(result);
    }
    for (const listener of this.listeners) {
      try {
        listener(result);
      } catch (err) {
        this.logger?.error(
          { orderId: order.orderId, err: err instanceof Error ? err.message : String(err) },
          "fleet-link: order outcome listener failed"
        );
      }
    }
  }

  private evictFinished(): void {
    while (this.finished.length > this.ledgerSize) {
      const oldest = this.finished.shift();
      if (oldest === undefined) return;
      const order = this.orders.get(oldest);
      if (order && order.ackState !== "PENDING") {
        this.orders.delete(oldest);
        this.codec.forgetOrder(oldest);
      }
    }
  }
}
