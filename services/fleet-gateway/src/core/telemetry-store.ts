import type {
  AgvError,
  AgvPosition,
  OperatingMode,
  ReportedConnectionState,
  Velocity
} from "@fleet-link/schemas";
import { TelemetryWindow } from "./telemetry-window";

export type VehicleConnectionState = "ONLINE" | "STALE" | "OFFLINE";

export const VEHICLE_CONNECTION_STATES: readonly VehicleConnectionState[] = ["ONLINE", "STALE", "OFFLINE"];

const SEVERITY: Record<VehicleConnectionState, number> = { ONLINE: 0, STALE: 1, OFFLINE: 2 };

/** Latest decoded state of one vehicle. */
export interface AgvSnapshot {
  batteryCharge: number;
  charging: boolean;
  position?: Pick<AgvPosition, "x" | "y" | "theta" | "mapId">;
  operatingMode: OperatingMode;
  errors: AgvError[];
  orderId: string;
  orderUpdateId: number;
  lastNodeId: string;
  driving: boolean;
  /** Timestamp embedded by the vehicle; display only. */
  timestamp: string;
}

export interface AgvRecord {
  vehicleId: string;
  manufacturer: string;
  serialNumber: string;
  state: AgvSnapshot | null;
  velocity?: Velocity;
  reportedConnection: ReportedConnectionState | null;
  connectionState: VehicleConnectionState;
  /** Arrival time (epoch ms) of the latest accepted frame. */
  lastSeenAt: number;
  lastHeaderId: number;
}

export interface AgvUpdate {
  vehicleId: string;
  manufacturer: string;
  serialNumber: string;
  headerId: number;
  state?: AgvSnapshot;
  position?: AgvSnapshot["position"];
  velocity?: Velocity;
  reportedConnection?: ReportedConnectionState;
}

export interface TelemetryEvent {
  receivedAt: number;
  headerId: number;
  timestamp: string;
  payload: unknown;
}

export interface ConnectionTransition {
  vehicleId: string;
  from: VehicleConnectionState;
  to: VehicleConnectionState;
  lastSeenAt: number;
}

export interface TelemetryStoreOptions {
  staleAfterMs?: number;
  offlineAfterMs?: number;
  windowSize?: number;
}

/**
 * Per-vehicle latest state plus capped event windows. Records are frozen
 * and replaced whole on every write, so a reader holding one never sees it
 * change underneath.
 */
export class TelemetryStore {
  readonly staleAfterMs: number;
  readonly offlineAfterMs: number;
  readonly windowSize: number;
  private readonly records = new Map<string, AgvRecord>();
  private readonly windows = new Map<string, Map<string, TelemetryWindow<TelemetryEvent>>>();
  private newestArrival: number | null = null;

  constructor(options: TelemetryStoreOptions = {}) {
    this.staleAfterMs = options.staleAfterMs ?? 60_000;
    this.offlineAfterMs = options.offlineAfterMs ?? 120_000;
    this.windowSize = options.windowSize ?? 100;
    if (this.offlineAfterMs < this.staleAfterMs) {
      throw new RangeError("offlineAfterMs must not be shorter than staleAfterMs");
    }
  }

  upsert(update: AgvUpdate, arrivedAt: number): AgvRecord {
    const previous = this.records.get(update.vehicleId);
    const reportedConnection = update.reportedConnection ?? previous?.reportedConnection ?? null;
    const state = mergeState(update, previous?.state ?? null);
    const reportedDown = reportedConnection === "OFFLINE" || reportedConnection === "CONNECTIONBROKEN";

    const record: AgvRecord = Object.freeze({
      vehicleId: update.vehicleId,
      manufacturer: update.manufacturer,
      serialNumber: update.serialNumber,
      state,
      velocity: update.velocity ?? previous?.velocity,
      reportedConnection,
      connectionState: reportedDown ? "OFFLINE" : "ONLINE",
      lastSeenAt: arrivedAt,
      lastHeaderId: update.headerId
    });
    this.records.set(update.vehicleId, record);
    if (this.newestArrival === null || arrivedAt > this.newestArrival) {
      this.newestArrival = arrivedAt;
    }
    return record;
  }

  /**
   * Demotes idle vehicles; never promotes and never deletes.
   */
  evictStale(now: number): ConnectionTransition[] {
    const transitions: ConnectionTransition[] = [];
    for (const record of this.records.values()) {
      const idle = now - record.lastSeenAt;
      const target: VehicleConnectionState =
        idle > this.offlineAfterMs ? "OFFLINE" : idle > this.staleAfterMs ? "STALE" : record.connectionState;
      if (SEVERITY[target] <= SEVERITY[record.connectionState]) continue;

      this.records.set(record.vehicleId, Object.freeze({ ...record, connectionState: target }));
      transitions.push({
        vehicleId: record.vehicleId,
        from: record.connectionState,
        to: target,
        lastSeenAt: record.lastSeenAt
      });
    }
    return transitions;
  }

  appendEvent(vehicleId: string, topic: string, event: TelemetryEvent): void {
    let perTopic = this.windows.get(vehicleId);
    if (!perTopic) {
      perTopic = new Map();
      this.windows.set(vehicleId, perTopic);
    }
    let window = perTopic.get(topic);
    if (!window) {
      window = new TelemetryWindow<TelemetryEvent>(this.windowSize);
      perTopic.set(topic, window);
    }
    window.push(Object.freeze(event));
  }

  get(vehicleId: string): AgvRecord | undefined {
    return this.records.get(vehicleId);
  }

  list(filter: { connectionState?: VehicleConnectionState } = {}): AgvRecord[] {
    return [...this.records.values()]
      .filter((record) => (filter.connectionState ? record.connectionState === filter.connectionState : true))
      .sort((a, b) => a.vehicleId.localeCompare(b.vehicleId));
  }

  /** Oldest first. */
  events(vehicleId: string, topic: string): TelemetryEvent[] {
    return this.windows.get(vehicleId)?.get(topic)?.toArray() ?? [];
  }

  eventTopics(vehicleId: string): string[] {
    return [...(this.windows.get(vehicleId)?.keys() ?? [])].sort();
  }

  counts(): Record<VehicleConnectionState, number> {
    const counts: Record<VehicleConnectionState, number> = { ONLINE: 0, STALE: 0, OFFLINE: 0 };
    for (const record of this.records.values()) {
      counts[record.connectionState] += 1;
    }
    return counts;
  }

  /** Arrival time of the newest accepted frame from any vehicle. */
  freshness(): number | null {
    return this.newestArrival;
  }

  get size(): number {
    return this.records.size;
  }
}

function mergeState(update: AgvUpdate, previous: AgvSnapshot | null): AgvSnapshot | null {
  if (update.state) return update.state;
  if (update.position && previous) return { ...previous, position: update.position };
  return previous;
}
