import {
  ConnectionMessageSchema,
  InstantActionsMessageSchema,
  OrderMessageSchema,
  StateMessageSchema,
  VisualizationMessageSchema,
  type Action,
  type ConnectionMessage,
  type InstantActionsMessage,
  type OrderEdge,
  type OrderMessage,
  type OrderNode,
  type StateMessage,
  type VdaTopic,
  type VisualizationMessage
} from "@fleet-link/schemas";
import type { ZodIssue } from "zod";
import { ProtocolError } from "./errors";
import { buildTopic, DEFAULT_INTERFACE_NAME, parseTopic, vehicleIdOf, type VehicleRef } from "./topics";

export const PROTOCOL_VERSION = "2.0.0";

interface DecodedBase extends VehicleRef {
  topic: string;
  vehicleId: string;
}

export type DecodedMessage =
  | (DecodedBase & { kind: "state"; message: StateMessage })
  | (DecodedBase & { kind: "connection"; message: ConnectionMessage })
  | (DecodedBase & { kind: "visualization"; message: VisualizationMessage })
  | (DecodedBase & { kind: "order"; message: OrderMessage })
  | (DecodedBase & { kind: "instantActions"; message: InstantActionsMessage })
  | (DecodedBase & { kind: "unknown"; segment: string; payload: unknown });

export type DecodedKind = DecodedMessage["kind"];

export interface OrderDraft extends VehicleRef {
  orderId: string;
  /** Explicit update id; must exceed the last one encoded for this order. */
  orderUpdateId?: number;
  zoneSetId?: string;
  nodes: OrderNode[];
  edges: OrderEdge[];
}

export interface EncodedFrame<T> {
  topic: string;
  payload: T;
  body: string;
}

interface OrderUpdateEntry {
  last: number;
  previous?: number;
}

interface PayloadParser<T> {
  safeParse(data: unknown): { success: true; data: T } | { success: false; error: { issues: ZodIssue[] } };
}

function parseWith<T>(schema: PayloadParser<T>, raw: unknown, topic: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ProtocolError("schema", `Invalid payload on ${topic}`, result.error.issues);
  }
  return result.data;
}

export class ProtocolCodec {
  private readonly headerIds = new Map<string, number>();
  private readonly orderUpdates = new Map<string, OrderUpdateEntry>();

  constructor(
    readonly interfaceName: string = DEFAULT_INTERFACE_NAME,
    private readonly now: () => Date = () => new Date()
  ) {}

  decode(topic: string, raw: Buffer | string): DecodedMessage {
    const parsedTopic = parseTopic(this.interfaceName, topic);
    if (!parsedTopic) {
      throw new ProtocolError("topic", `Topic outside namespace ${this.interfaceName}: ${topic}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(typeof raw === "string" ? raw : raw.toString("utf-8"));
    } catch (err) {
      throw new ProtocolError("json", `Malformed JSON on ${topic}`, err instanceof Error ? err.message : String(err));
    }

    const base: DecodedBase = {
      topic,
      vehicleId: parsedTopic.vehicleId,
      manufacturer: parsedTopic.manufacturer,
      serialNumber: parsedTopic.serialNumber
    };

    const decoded = this.decodeSegment(parsedTopic.segment, json, base);
    if (decoded.kind !== "unknown") {
      const { manufacturer, serialNumber } = decoded.message;
      if (manufacturer !== base.manufacturer || serialNumber !== base.serialNumber) {
        throw new ProtocolError(
          "identity",
          `Payload identity ${manufacturer}/${serialNumber} does not match topic ${base.vehicleId}`
        );
      }
    }
    return decoded;
  }

  /**
   * Builds an order frame. The first update of an order gets orderUpdateId 0,
   * later ones count up unless an explicit, larger id is supplied.
   */
  encode(draft: OrderDraft): EncodedFrame<OrderMessage> {
    const entry = this.orderUpdates.get(draft.orderId);
    let orderUpdateId: number;
    if (draft.orderUpdateId !== undefined) {
      if (entry && draft.orderUpdateId <= entry.last) {
        throw new ProtocolError(
          "sequence",
          `orderUpdateId ${draft.orderUpdateId} for ${draft.orderId} must exceed ${entry.last}`
        );
      }
      orderUpdateId = draft.orderUpdateId;
    } else {
      orderUpdateId = entry ? entry.last + 1 : 0;
    }

    const topic = buildTopic(this.interfaceName, draft, "order");
    const payload = parseWith(
      OrderMessageSchema,
      {
        ...this.header(draft, "order"),
        orderId: draft.orderId,
        orderUpdateId,
        ...(draft.zoneSetId !== undefined ? { zoneSetId: draft.zoneSetId } : {}),
        nodes: draft.nodes,
        edges: draft.edges
      },
      topic
    );

    this.orderUpdates.set(draft.orderId, { last: orderUpdateId, previous: entry?.last });
    return { topic, payload, body: JSON.stringify(payload) };
  }

  /**
   * Gives back an orderUpdateId reserved by `encode` whose frame never left
   * the process.
   */
  releaseOrderUpdate(orderId: string, orderUpdateId: number): void {
    const entry = this.orderUpdates.get(orderId);
    if (!entry || entry.last !== orderUpdateId) return;
    if (entry.previous === undefined) {
      this.orderUpdates.delete(orderId);
    } else {
      this.orderUpdates.set(orderId, { last: entry.previous });
    }
  }

  /** Drops the orderUpdateId history of an order that left the ledger. */
  forgetOrder(orderId: string): void {
    this.orderUpdates.delete(orderId);
  }

  get trackedOrders(): number {
    return this.orderUpdates.size;
  }

  lastOrderUpdateId(orderId: string): number | undefined {
    return this.orderUpdates.get(orderId)?.last;
  }

  encodeInstantActions(target: VehicleRef, actions: Action[]): EncodedFrame<InstantActionsMessage> {
    const topic = buildTopic(this.interfaceName, target, "instantActions");
    const payload = parseWith(
      InstantActionsMessageSchema,
      { ...this.header(target, "instantActions"), actions },
      topic
    );
    return { topic, payload, body: JSON.stringify(payload) };
  }

  private decodeSegment(segment: string, json: unknown, base: DecodedBase): DecodedMessage {
    switch (segment) {
      case "state":
        return { ...base, kind: "state", message: parseWith(StateMessageSchema, json, base.topic) };
      case "connection":
        return { ...base, kind: "connection", message: parseWith(ConnectionMessageSchema, json, base.topic) };
      case "visualization":
        return { ...base, kind: "visualization", message: parseWith(VisualizationMessageSchema, json, base.topic) };
      case "order":
        return { ...base, kind: "order", message: parseWith(OrderMessageSchema, json, base.topic) };
      case "instantActions":
        return { ...base, kind: "instantActions", message: parseWith(InstantActionsMessageSchema, json, base.topic) };
      default:
        return { ...base, kind: "unknown", segment, payload: json };
    }
  }

  private header(target: VehicleRef, topic: VdaTopic) {
    const key = `${vehicleIdOf(target)}|${topic}`;
    const headerId = (this.headerIds.get(key) ?? -1) + 1;
    this.headerIds.set(key, headerId);
    return {
      headerId,
      timestamp: this.now().toISOString(),
      version: PROTOCOL_VERSION,
      manufacturer: target.manufacturer,
      serialNumber: target.serialNumber
    };
  }
}

export interface SequenceVerdict {
  accepted: boolean;
  /** Last accepted headerId before this frame, if any. */
  last?: number;
}

/**
 * Drops replays: a frame whose headerId is not above the last accepted one
 * for the same vehicle and topic. A state or connection frame flagged
 * `fullResync` clears every baseline of its vehicle first.
 */
export class SequenceGuard {
  private readonly baselines = new Map<string, Map<string, number>>();

  check(vehicleId: string, topic: string, headerId: number, fullResync = false): SequenceVerdict {
    if (fullResync) {
      this.baselines.delete(vehicleId);
    }
    let perTopic = this.baselines.get(vehicleId);
    if (!perTopic) {
      perTopic = new Map();
      this.baselines.set(vehicleId, perTopic);
    }
    const last = perTopic.get(topic);
    if (last !== undefined && headerId <= last) {
      return { accepted: false, last };
    }
    perTopic.set(topic, headerId);
    return { accepted: true, last };
  }

  reset(vehicleId?: string): void {
    if (vehicleId === undefined) {
      this.baselines.clear();
    } else {
      this.baselines.delete(vehicleId);
    }
  }
}
