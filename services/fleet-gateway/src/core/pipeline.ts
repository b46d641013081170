import type { FastifyBaseLogger } from "fastify";
import type { FrameOutcome } from "@fleet-link/metrics";
import type { AgvPosition, StateMessage } from "@fleet-link/schemas";
import type { DecodedMessage, ProtocolCodec, SequenceGuard } from "./codec";
import { ErrorBuffer, type RecordedError } from "./error-buffer";
import { ProtocolError, describeError } from "./errors";
import type { MissionDispatcher } from "./mission-dispatcher";
import type { AgvSnapshot, AgvUpdate, TelemetryStore } from "./telemetry-store";

export interface IngestCounters {
  received: number;
  accepted: number;
  duplicates: number;
  decodeErrors: number;
  unknownTopics: number;
}

export interface IngestStats {
  counters: IngestCounters;
  recentErrors: RecordedError[];
}

export interface IngestMetricsSink {
  recordFrame(topic: string, outcome: FrameOutcome): void;
  recordDecodeError(reason: string): void;
}

export interface IngestPipelineOptions {
  codec: ProtocolCodec;
  guard: SequenceGuard;
  store: TelemetryStore;
  dispatcher?: Pick<MissionDispatcher, "handleState">;
  metrics?: IngestMetricsSink;
  logger?: FastifyBaseLogger;
  now?: () => number;
  errorBufferSize?: number;
}

function toPosition(position: AgvPosition | undefined): AgvSnapshot["position"] {
  if (!position) return undefined;
  return { x: position.x, y: position.y, theta: position.theta, mapId: position.mapId };
}

function toSnapshot(message: StateMessage): AgvSnapshot {
  return {
    batteryCharge: message.batteryState.batteryCharge,
    charging: message.batteryState.charging,
    position: toPosition(message.agvPosition),
    operatingMode: message.operatingMode,
    errors: message.errors,
    orderId: message.orderId,
    orderUpdateId: message.orderUpdateId,
    lastNodeId: message.lastNodeId,
    driving: message.driving,
    timestamp: message.timestamp
  };
}

/**
 * Single writer for inbound frames: decode, drop replays, then update the
 * store and let the dispatcher match acknowledgements. A bad frame is
 * counted and recorded, never thrown.
 */
export class IngestPipeline {
  private readonly codec: ProtocolCodec;
  private readonly guard: SequenceGuard;
  private readonly store: TelemetryStore;
  private readonly dispatcher?: Pick<MissionDispatcher, "handleState">;
  private readonly metrics?: IngestMetricsSink;
  private readonly logger?: FastifyBaseLogger;
  private readonly now: () => number;
  private readonly errors: ErrorBuffer;
  private readonly counters: IngestCounters = {
    received: 0,
    accepted: 0,
    duplicates: 0,
    decodeErrors: 0,
    unknownTopics: 0
  };

  constructor(options: IngestPipelineOptions) {
    this.codec = options.codec;
    this.guard = options.guard;
    this.store = options.store;
    this.dispatcher = options.dispatcher;
    this.metrics = options.metrics;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.errors = new ErrorBuffer(options.errorBufferSize ?? 50, () => new Date(this.now()));
  }

  handle(topic: string, payload: Buffer | string): void {
    this.counters.received += 1;

    let decoded: DecodedMessage;
    try {
      decoded = this.codec.decode(topic, payload);
    } catch (err) {
      this.rejectFrame(topic, err);
      return;
    }

    if (decoded.kind === "unknown") {
      this.counters.unknownTopics += 1;
      this.metrics?.recordFrame(decoded.segment, "unknown_topic");
      return;
    }

    const { message } = decoded;
    const fullResync =
      decoded.kind === "state" || decoded.kind === "connection" ? (decoded.message.fullResync ?? false) : false;
    const verdict = this.guard.check(decoded.vehicleId, decoded.kind, message.headerId, fullResync);
    if (!verdict.accepted) {
      this.counters.duplicates += 1;
      this.metrics?.recordFrame(decoded.kind, "duplicate");
      this.logger?.debug(
        { vehicleId: decoded.vehicleId, topic: decoded.kind, headerId: message.headerId, last: verdict.last },
        "fleet-link: dropped replayed frame"
      );
      return;
    }

    const arrivedAt = this.now();
    const update = this.toUpdate(decoded);
    if (update) {
      this.store.upsert(update, arrivedAt);
    }
    this.store.appendEvent(decoded.vehicleId, decoded.kind, {
      receivedAt: arrivedAt,
      headerId: message.headerId,
      timestamp: message.timestamp,
      payload: message
    });
    if (decoded.kind === "state") {
      this.dispatcher?.handleState(decoded.vehicleId, decoded.message);
    }

    this.counters.accepted += 1;
    this.metrics?.recordFrame(decoded.kind, "accepted");
  }

  stats(): IngestStats {
    return { counters: { ...this.counters }, recentErrors: this.errors.list() };
  }

  private toUpdate(decoded: Exclude<DecodedMessage, { kind: "unknown" }>): AgvUpdate | null {
    const base = {
      vehicleId: decoded.vehicleId,
      manufacturer: decoded.manufacturer,
      serialNumber: decoded.serialNumber,
      headerId: decoded.message.headerId
    };
    switch (decoded.kind) {
      case "state":
        return { ...base, state: toSnapshot(decoded.message), velocity: decoded.message.velocity };
      case "connection":
        return { ...base, reportedConnection: decoded.message.connectionState };
      case "visualization":
        return {
          ...base,
          position: toPosition(decoded.message.agvPosition),
          velocity: decoded.message.velocity
        };
      default:
        return null;
    }
  }

  private rejectFrame(topic: string, err: unknown): void {
    if (err instanceof ProtocolError && err.reason === "topic") {
      this.counters.unknownTopics += 1;
      this.metrics?.recordFrame("unknown", "unknown_topic");
      this.errors.push(err.message, { topic, reason: err.reason });
      return;
    }
    const reason = err instanceof ProtocolError ? err.reason : "internal";
    this.counters.decodeErrors += 1;
    this.metrics?.recordDecodeError(reason);
    this.metrics?.recordFrame(topic.split("/").pop() ?? "unknown", "decode_error");
    this.errors.push(describeError(err), { topic, reason });
    if (err instanceof ProtocolError) {
      this.logger?.debug({ topic, reason }, "fleet-link: rejected inbound frame");
    } else {
      this.logger?.error({ topic, err: describeError(err) }, "fleet-link: unexpected error decoding frame");
    }
  }
}
