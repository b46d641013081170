import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import { formatBrokerUrl, type BrokerConfig } from "@fleet-link/schemas";
import type { BrokerTransport, MessageHandler, TransportFactory } from "../mqtt/transport";
import { ConnectionError, PublishError, describeError, toConnectionError } from "./errors";
import { StatusCell } from "./status-cell";
import { withDeadline } from "./timeouts";

export type SessionState = "DISCONNECTED" | "CONNECTING" | "CONNECTED" | "DEGRADED";

export const SESSION_STATES: readonly SessionState[] = ["DISCONNECTED", "CONNECTING", "CONNECTED", "DEGRADED"];

export interface ConnectionSession {
  sessionId: string | null;
  state: SessionState;
  brokerUrl: string | null;
  connectedAt: number | null;
  reconnectAttempts: number;
  lastHealthCheckAt: number | null;
  lastInboundAt: number | null;
  subscriptions: string[];
}

export interface ConnectionManagerOptions {
  transportFactory: TransportFactory;
  connectTimeoutMs?: number;
  publishTimeoutMs?: number;
  logger?: FastifyBaseLogger;
  now?: () => number;
}

/**
 * Sole owner of the broker session. Connect failures are classified and
 * returned to the caller; retrying is the health monitor's job.
 */
export class ConnectionManager {
  readonly state = new StatusCell<SessionState>("DISCONNECTED");
  private readonly transportFactory: TransportFactory;
  private readonly connectTimeoutMs: number;
  private readonly publishTimeoutMs: number;
  private readonly logger?: FastifyBaseLogger;
  private readonly now: () => number;
  private readonly topics = new Set<string>();
  private readonly handlers = new Set<MessageHandler>();
  private transport: BrokerTransport | null = null;
  private inFlight: AbortController | null = null;
  private sessionId: string | null = null;
  private brokerUrl: string | null = null;
  private connectedAt: number | null = null;
  private lastInboundAt: number | null = null;
  private lastHealthCheckAt: number | null = null;
  private reconnectAttempts = 0;

  constructor(options: ConnectionManagerOptions) {
    this.transportFactory = options.transportFactory;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.publishTimeoutMs = options.publishTimeoutMs ?? 5_000;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Registers topics for this and every later session.
   */
  async addTopics(topics: string[]): Promise<void> {
    const added = topics.filter((topic) => !this.topics.has(topic));
    added.forEach((topic) => this.topics.add(topic));
    if (added.length > 0 && this.transport && this.isConnected()) {
      await this.withIoDeadline(this.transport.subscribe(added), "subscribe");
    }
  }

  onMessage(handler: MessageHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async connect(config: BrokerConfig, options: { signal?: AbortSignal } = {}): Promise<void> {
    if (this.transport || this.inFlight) {
      await this.disconnect();
    }

    const controller = new AbortController();
    this.inFlight = controller;
    const forwardAbort = (): void => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    const url = formatBrokerUrl(config);
    this.state.set("CONNECTING");
    this.logger?.info({ brokerUrl: url, clientId: config.clientId }, "fleet-link: connecting to broker");

    let opened: BrokerTransport;
    try {
      opened = await this.establish(config, url, controller.signal);
    } catch (err) {
      if (this.inFlight === controller) {
        this.inFlight = null;
        this.state.set("DISCONNECTED");
      }
      const error = toConnectionError(err, `connect ${url}`);
      this.logger?.warn({ brokerUrl: url, kind: error.kind, err: error.message }, "fleet-link: broker connect failed");
      throw error;
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
    }

    this.inFlight = null;
    this.transport = opened;
    this.sessionId = randomUUID();
    this.brokerUrl = url;
    this.connectedAt = this.now();
    opened.onClose((err) => this.handleTransportClose(opened, err));
    this.state.set("CONNECTED");
    this.logger?.info(
      { brokerUrl: url, sessionId: this.sessionId, topics: this.topics.size },
      "fleet-link: broker session established"
    );
  }

  async publish(topic: string, payload: string | Buffer): Promise<void> {
    const transport = this.transport;
    if (!transport || !this.canPublish()) {
      throw new PublishError(`Cannot publish to ${topic}: session is ${this.state.get()}`);
    }
    try {
      await withDeadline(
        transport.publish(topic, payload),
        this.publishTimeoutMs,
        () => new PublishError(`Publish to ${topic} timed out after ${this.publishTimeoutMs}ms`)
      );
    } catch (err) {
      if (err instanceof PublishError) throw err;
      throw new PublishError(`Publish to ${topic} failed: ${describeError(err)}`, { cause: err });
    }
  }

  /**
   * Cancels an in-flight connect and closes the current session, if any.
   */
  async disconnect(): Promise<void> {
    if (this.inFlight) {
      this.inFlight.abort();
      this.inFlight = null;
    }
    const transport = this.transport;
    this.transport = null;
    this.resetSession();
    if (transport) {
      try {
        await this.withIoDeadline(transport.unsubscribe([...this.topics]), "unsubscribe");
      } catch (err) {
        this.logger?.debug({ err: describeError(err) }, "fleet-link: unsubscribe during disconnect failed");
      }
      await this.closeQuietly(transport);
      this.logger?.info("fleet-link: broker session closed");
    }
    this.state.set("DISCONNECTED");
  }

  /**
   * Runs `fn` inside a session that is always released afterwards.
   */
  async withSession<T>(config: BrokerConfig, fn: (manager: ConnectionManager) => Promise<T>): Promise<T> {
    await this.connect(config);
    try {
      return await fn(this);
    } finally {
      await this.disconnect();
    }
  }

  markDegraded(): void {
    if (this.state.get() === "CONNECTED") this.state.set("DEGRADED");
  }

  markHealthy(): void {
    if (this.state.get() === "DEGRADED") this.state.set("CONNECTED");
  }

  isConnected(): boolean {
    const state = this.state.get();
    return state === "CONNECTED" || state === "DEGRADED";
  }

  /** Publishing needs a healthy session; DEGRADED only receives. */
  canPublish(): boolean {
    return this.transport !== null && this.state.get() === "CONNECTED";
  }

  isTransportAlive(): boolean {
    return this.transport?.connected ?? false;
  }

  recordHealthCheck(at: number): void {
    this.lastHealthCheckAt = at;
  }

  recordReconnectAttempt(attempt: number): void {
    this.reconnectAttempts = attempt;
  }

  getSession(): ConnectionSession {
    return {
      sessionId: this.sessionId,
      state: this.state.get(),
      brokerUrl: this.brokerUrl,
      connectedAt: this.connectedAt,
      reconnectAttempts: this.reconnectAttempts,
      lastHealthCheckAt: this.lastHealthCheckAt,
      lastInboundAt: this.lastInboundAt,
      subscriptions: [...this.topics]
    };
  }

  /**
   * Opens a transport and subscribes every registered topic. The transport
   * is closed again if anything after its creation fails.
   */
  private async establish(config: BrokerConfig, url: string, signal: AbortSignal): Promise<BrokerTransport> {
    const transport = await this.openTransport(config, url, signal);
    // Retained frames can arrive right behind the SUBACK.
    transport.onMessage((topic, payload) => this.dispatchInbound(topic, payload));
    try {
      await withDeadline(
        transport.subscribe([...this.topics]),
        this.connectTimeoutMs,
        () => new ConnectionError("TIMEOUT", "subscribe timed out"),
        signal,
        () => new ConnectionError("ABORTED", "connect cancelled")
      );
      if (signal.aborted) {
        throw new ConnectionError("ABORTED", "connect cancelled");
      }
      return transport;
    } catch (err) {
      await this.closeQuietly(transport);
      throw err;
    }
  }

  private async openTransport(config: BrokerConfig, url: string, signal: AbortSignal): Promise<BrokerTransport> {
    const pending = this.transportFactory({
      url,
      host: config.host,
      port: config.port,
      useTls: config.useTls,
      username: config.username,
      password: config.password,
      clientId: config.clientId,
      keepaliveSeconds: config.keepaliveSeconds,
      caFile: config.caFile,
      connectTimeoutMs: this.connectTimeoutMs,
      signal
    });
    try {
      return await withDeadline(
        pending,
        this.connectTimeoutMs,
        () => new ConnectionError("TIMEOUT", `no CONNACK within ${this.connectTimeoutMs}ms`),
        signal,
        () => new ConnectionError("ABORTED", "connect cancelled")
      );
    } catch (err) {
      // A transport that arrives after we gave up must still be closed.
      void pending.then(
        (late) => this.closeQuietly(late),
        (lateErr: unknown) => {
          this.logger?.debug({ err: describeError(lateErr) }, "fleet-link: abandoned connect settled with error");
        }
      );
      throw err;
    }
  }

  private dispatchInbound(topic: string, payload: Buffer): void {
    this.lastInboundAt = this.now();
    for (const handler of this.handlers) {
      handler(topic, payload);
    }
  }

  private handleTransportClose(closed: BrokerTransport, err?: Error): void {
    if (this.transport !== closed) return;
    this.transport = null;
    this.resetSession();
    this.state.set("DISCONNECTED");
    this.logger?.warn({ err: err?.message }, "fleet-link: broker session closed unexpectedly");
  }

  private resetSession(): void {
    this.sessionId = null;
    this.connectedAt = null;
  }

  private async closeQuietly(transport: BrokerTransport): Promise<void> {
    try {
      await this.withIoDeadline(transport.end(), "close");
    } catch (err) {
      this.logger?.warn({ err: describeError(err) }, "fleet-link: closing broker transport failed");
    }
  }

  private withIoDeadline<T>(promise: Promise<T>, operation: string): Promise<T> {
    return withDeadline(
      promise,
      this.publishTimeoutMs,
      () => new ConnectionError("TIMEOUT", `${operation} timed out after ${this.publishTimeoutMs}ms`)
    );
  }
}
