import type { FastifyBaseLogger } from "fastify";
import type { FleetMetrics } from "@fleet-link/metrics";
import { redactBrokerConfig, type BrokerConfig, type BrokerConfigInput, type RedactedBrokerConfig } from "@fleet-link/schemas";
import type { TransportFactory } from "../mqtt/transport";
import { ProtocolCodec, SequenceGuard } from "./codec";
import { mergeBrokerConfig, type GatewayConfig } from "./config";
import { ConnectionManager, SESSION_STATES, type ConnectionSession } from "./connection-manager";
import { ConfigError, describeError } from "./errors";
import { HEALTH_STATUSES, HealthMonitor, type HealthSnapshot } from "./health-monitor";
import { MissionDispatcher, type AckState } from "./mission-dispatcher";
import { IngestPipeline, type IngestStats } from "./pipeline";
import { TelemetryStore, type VehicleConnectionState } from "./telemetry-store";
import { fleetSubscriptions } from "./topics";

/** The slice of the credential store the service uses. */
export interface BrokerConfigSource {
  get(): Promise<BrokerConfig | null>;
  put(input: BrokerConfigInput): Promise<BrokerConfig>;
}

export interface FleetLease {
  readonly id: number;
  release(): void;
}

/** Broker settings as submitted; an omitted password keeps the stored one. */
export type BrokerConfigUpdate = Omit<BrokerConfigInput, "password"> & { password?: string };

export interface FleetLinkOptions {
  config: GatewayConfig;
  credentials: BrokerConfigSource;
  transportFactory: TransportFactory;
  metrics?: FleetMetrics;
  logger?: FastifyBaseLogger;
  now?: () => number;
  orderIdSuffix?: () => string;
}

export interface FleetStatus {
  initialized: boolean;
  leases: number;
  session: ConnectionSession;
  health: HealthSnapshot;
  vehicles: Record<VehicleConnectionState, number>;
  missions: Record<AckState, number>;
  ingest: IngestStats;
}

/**
 * Process-wide owner of the broker session and everything fed by it. Work
 * happens while at least one lease is held; after the last release an idle
 * timer tears the session down.
 */
export class FleetLink {
  readonly codec: ProtocolCodec;
  readonly guard = new SequenceGuard();
  readonly store: TelemetryStore;
  readonly connection: ConnectionManager;
  readonly monitor: HealthMonitor;
  readonly dispatcher: MissionDispatcher;
  readonly pipeline: IngestPipeline;

  private readonly config: GatewayConfig;
  private readonly credentials: BrokerConfigSource;
  private readonly metrics?: FleetMetrics;
  private readonly logger?: FastifyBaseLogger;
  private readonly now: () => number;
  private readonly leases = new Set<number>();
  private nextLeaseId = 0;
  private initialized = false;
  private initializing: Promise<void> | null = null;
  private tearingDown: Promise<void> | null = null;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private detachInbound: (() => void) | null = null;

  constructor(options: FleetLinkOptions) {
    this.config = options.config;
    this.credentials = options.credentials;
    this.metrics = options.metrics;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;

    this.codec = new ProtocolCodec(this.config.interfaceName, () => new Date(this.now()));
    this.store = new TelemetryStore({
      staleAfterMs: this.config.telemetry.staleAfterMs,
      offlineAfterMs: this.config.telemetry.offlineAfterMs,
      windowSize: this.config.telemetry.windowSize
    });
    this.connection = new ConnectionManager({
      transportFactory: options.transportFactory,
      connectTimeoutMs: this.config.connection.connectTimeoutMs,
      publishTimeoutMs: this.config.connection.publishTimeoutMs,
      logger: this.logger,
      now: this.now
    });
    this.monitor = new HealthMonitor({
      connection: this.connection,
      resolveConfig: () => this.resolveConfig(),
      freshness: () => this.store.freshness(),
      probeIntervalMs: this.config.health.probeIntervalMs,
      inboundSilenceMs: this.config.health.inboundSilenceMs,
      missedProbeThreshold: this.config.health.missedProbeThreshold,
      maxSessionAgeMs: this.config.health.maxSessionAgeMs,
      backoff: this.config.health.backoff,
      onReconnectAttempt: () => this.metrics?.recordReconnectAttempt(),
      logger: this.logger,
      now: this.now
    });
    this.dispatcher = new MissionDispatcher({
      codec: this.codec,
      publisher: this.connection,
      ackTimeoutMs: this.config.missions.ackTimeoutMs,
      ledgerSize: this.config.missions.ledgerSize,
      orderIdPrefix: this.config.missions.orderIdPrefix,
      orderIdSuffix: options.orderIdSuffix,
      isKnownVehicle: (vehicleId) => this.store.get(vehicleId) !== undefined,
      metrics: this.metrics,
      logger: this.logger,
      now: this.now
    });
    this.pipeline = new IngestPipeline({
      codec: this.codec,
      guard: this.guard,
      store: this.store,
      dispatcher: this.dispatcher,
      metrics: this.metrics,
      logger: this.logger,
      now: this.now
    });

    if (this.metrics) {
      const metrics = this.metrics;
      metrics.setConnectionState(this.connection.state.get(), SESSION_STATES);
      metrics.setHealthStatus(this.monitor.status.get(), HEALTH_STATUSES);
      metrics.setVehicleCounts(this.store.counts());
      this.connection.state.subscribe((state) => metrics.setConnectionState(state, SESSION_STATES));
      this.monitor.status.subscribe((status) => metrics.setHealthStatus(status, HEALTH_STATUSES));
    }
  }

  /**
   * Takes a lease, bringing the session up first if this is the first one.
   * A failed connect does not reject; it shows up in the health status.
   */
  async acquire(): Promise<FleetLease> {
    this.nextLeaseId += 1;
    const id = this.nextLeaseId;
    this.leases.add(id);
    this.cancelIdleTimer();
    try {
      await this.ensureInitialized();
    } catch (err) {
      this.releaseLease(id);
      throw err;
    }
    let released = false;
    return {
      id,
      release: () => {
        if (released) return;
        released = true;
        this.releaseLease(id);
      }
    };
  }

  async withLease<T>(fn: () => Promise<T> | T): Promise<T> {
    const lease = await this.acquire();
    try {
      return await fn();
    } finally {
      lease.release();
    }
  }

  /**
   * Env overrides layered over the stored credentials.
   */
  async resolveConfig(): Promise<BrokerConfig> {
    return mergeBrokerConfig(await this.credentials.get(), this.config.brokerOverrides, this.config.defaultClientId);
  }

  async describeConfig(): Promise<{ stored: RedactedBrokerConfig | null; effective: RedactedBrokerConfig | null; error?: string }> {
    let stored: BrokerConfig | null = null;
    try {
      stored = await this.credentials.get();
    } catch (err) {
      return { stored: null, effective: null, error: describeError(err) };
    }
    try {
      const effective = mergeBrokerConfig(stored, this.config.brokerOverrides, this.config.defaultClientId);
      return { stored: stored ? redactBrokerConfig(stored) : null, effective: redactBrokerConfig(effective) };
    } catch (err) {
      return { stored: stored ? redactBrokerConfig(stored) : null, effective: null, error: describeError(err) };
    }
  }

  /**
   * Persists new broker settings and, when the session is live, cancels
   * whatever connect is in flight and reconnects with them.
   */
  async reconfigure(update: BrokerConfigUpdate): Promise<RedactedBrokerConfig> {
    let previousPassword = "";
    if (update.password === undefined) {
      try {
        previousPassword = (await this.credentials.get())?.password ?? "";
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        this.logger?.warn({ err: err.message }, "fleet-link: stored broker config unreadable; replacing it");
      }
    }
    const saved = await this.credentials.put({ ...update, password: update.password ?? previousPassword });
    this.logger?.info({ broker: redactBrokerConfig(saved) }, "fleet-link: broker config updated");
    if (this.initialized) {
      await this.monitor.reconnectNow();
    }
    return redactBrokerConfig(saved);
  }

  /** Manual reconnect; also the only way out of FAILED. */
  async reconnect(): Promise<HealthSnapshot> {
    return this.withLease(async () => {
      await this.monitor.reconnectNow();
      return this.monitor.snapshot();
    });
  }

  /**
   * Demotes vehicles that went quiet. Runs on its own interval while the
   * service is up; public for callers that drive time themselves.
   */
  sweep(): void {
    const transitions = this.store.evictStale(this.now());
    for (const transition of transitions) {
      this.logger?.info(transition, "fleet-link: vehicle connection state changed");
    }
    this.metrics?.setVehicleCounts(this.store.counts());
  }

  status(): FleetStatus {
    return {
      initialized: this.initialized,
      leases: this.leases.size,
      session: this.connection.getSession(),
      health: this.monitor.snapshot(),
      vehicles: this.store.counts(),
      missions: this.dispatcher.counts(),
      ingest: this.pipeline.stats()
    };
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get leaseCount(): number {
    return this.leases.size;
  }

  async shutdown(): Promise<void> {
    this.leases.clear();
    this.cancelIdleTimer();
    await this.teardown("shutdown");
  }

  private async ensureInitialized(): Promise<void> {
    if (this.tearingDown) await this.tearingDown;
    if (this.initialized) return;
    if (!this.initializing) {
      this.initializing = this.initialize().finally(() => {
        this.initializing = null;
      });
    }
    await this.initializing;
  }

  private async initialize(): Promise<void> {
    this.logger?.info({ interfaceName: this.config.interfaceName }, "fleet-link: starting fleet session");
    await this.connection.addTopics(fleetSubscriptions(this.config.interfaceName));
    this.detachInbound = this.connection.onMessage((topic, payload) => this.pipeline.handle(topic, payload));
    this.dispatcher.resume();
    this.sweepTimer = setInterval(() => this.sweep(), this.config.telemetry.sweepIntervalMs);
    this.initialized = true;
    this.monitor.start();
    await this.monitor.nextAttempt();
  }

  private releaseLease(id: number): void {
    if (!this.leases.delete(id)) return;
    if (this.leases.size === 0 && this.initialized) {
      this.startIdleTimer();
    }
  }

  private startIdleTimer(): void {
    this.cancelIdleTimer();
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      if (this.leases.size > 0) return;
      this.teardown("idle").catch((err: unknown) => {
        this.logger?.error({ err: describeError(err) }, "fleet-link: idle teardown failed");
      });
    }, this.config.idleTeardownMs);
  }

  private cancelIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private async teardown(reason: "idle" | "shutdown"): Promise<void> {
    if (this.tearingDown) {
      await this.tearingDown;
      return;
    }
    if (this.initializing) {
      await this.initializing;
    }
    if (!this.initialized) return;
    this.tearingDown = this.stopAll(reason).finally(() => {
      this.tearingDown = null;
    });
    await this.tearingDown;
  }

  private async stopAll(reason: "idle" | "shutdown"): Promise<void> {
    this.initialized = false;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.detachInbound?.();
    this.detachInbound = null;
    await this.monitor.stop();
    this.dispatcher.stop();
    await this.connection.disconnect();
    this.logger?.info({ reason }, "fleet-link: fleet session stopped");
  }
}
