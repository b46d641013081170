import type { FastifyBaseLogger } from "fastify";
import type { BrokerConfig } from "@fleet-link/schemas";
import { Backoff } from "./backoff";
import type { ConnectionManager } from "./connection-manager";
import { ConfigError, describeError } from "./errors";
import { StatusCell } from "./status-cell";

export type HealthStatus = "HEALTHY" | "RECONNECTING" | "DEGRADED" | "FAILED";

export const HEALTH_STATUSES: readonly HealthStatus[] = ["HEALTHY", "RECONNECTING", "DEGRADED", "FAILED"];

export interface ReconnectBackoffOptions {
  baseMs?: number;
  maxMs?: number;
  factor?: number;
  maxAttempts?: number;
}

export interface HealthMonitorOptions {
  connection: ConnectionManager;
  /** Supplies the broker config for each attempt; a ConfigError is terminal. */
  resolveConfig: () => Promise<BrokerConfig>;
  /** Newest telemetry arrival; defaults to the session's last inbound frame. */
  freshness?: () => number | null;
  probeIntervalMs?: number;
  /** 0 disables the silence check. */
  inboundSilenceMs?: number;
  missedProbeThreshold?: number;
  /** Recycle sessions older than this; 0 disables. */
  maxSessionAgeMs?: number;
  backoff?: ReconnectBackoffOptions;
  onReconnectAttempt?: (attempt: number) => void;
  logger?: FastifyBaseLogger;
  now?: () => number;
}

export interface HealthSnapshot {
  status: HealthStatus;
  missedProbes: number;
  reconnectAttempts: number;
  lastProbeAt: number | null;
  lastError: string | null;
}

interface Sleeper {
  timer: ReturnType<typeof setTimeout>;
  resolve: (proceed: boolean) => void;
}

/**
 * Probes the broker session on a fixed interval and owns reconnection.
 * At most one reconnect loop runs at a time; once its attempts are used up
 * the status stays FAILED until `reconnectNow()`.
 */
export class HealthMonitor {
  readonly status = new StatusCell<HealthStatus>("HEALTHY");
  private readonly connection: ConnectionManager;
  private readonly resolveConfig: () => Promise<BrokerConfig>;
  private readonly freshness: () => number | null;
  private readonly probeIntervalMs: number;
  private readonly inboundSilenceMs: number;
  private readonly missedProbeThreshold: number;
  private readonly maxSessionAgeMs: number;
  private readonly maxAttempts: number;
  private readonly backoff: Backoff;
  private readonly onReconnectAttempt?: (attempt: number) => void;
  private readonly logger?: FastifyBaseLogger;
  private readonly now: () => number;

  private running = false;
  private interval: ReturnType<typeof setInterval> | null = null;
  private detachSessionListener: (() => void) | null = null;
  private generation = 0;
  private loopActive = false;
  private loop: Promise<void> | null = null;
  private loopAbort: AbortController | null = null;
  private sleeper: Sleeper | null = null;
  private attemptWaiters: Array<() => void> = [];
  private missed = 0;
  private attempts = 0;
  private lastProbeAt: number | null = null;
  private lastError: string | null = null;

  constructor(options: HealthMonitorOptions) {
    this.connection = options.connection;
    this.resolveConfig = options.resolveConfig;
    this.freshness = options.freshness ?? (() => this.connection.getSession().lastInboundAt);
    this.probeIntervalMs = options.probeIntervalMs ?? 30_000;
    this.inboundSilenceMs = options.inboundSilenceMs ?? 90_000;
    this.missedProbeThreshold = options.missedProbeThreshold ?? 3;
    this.maxSessionAgeMs = options.maxSessionAgeMs ?? 0;
    this.maxAttempts = options.backoff?.maxAttempts ?? 5;
    this.backoff = new Backoff({
      minMs: options.backoff?.baseMs ?? 2_000,
      maxMs: options.backoff?.maxMs ?? 60_000,
      factor: options.backoff?.factor ?? 2
    });
    this.onReconnectAttempt = options.onReconnectAttempt;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Starts probing. Connects right away when no session is open.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.interval = setInterval(() => this.probe(), this.probeIntervalMs);
    this.detachSessionListener = this.connection.state.subscribe((state, previous) => {
      if (state !== "DISCONNECTED" || previous === "CONNECTING") return;
      if (!this.running || this.loopActive || this.status.get() === "FAILED") return;
      this.logger?.warn({ previous }, "fleet-link: broker session lost");
      this.beginReconnect(false);
    });
    if (!this.connection.isConnected()) {
      this.beginReconnect(true);
    }
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.detachSessionListener?.();
    this.detachSessionListener = null;
    await this.cancelLoop();
  }

  /**
   * One health probe. Public so the interval and callers share one path.
   */
  probe(): void {
    const now = this.now();
    this.lastProbeAt = now;
    this.connection.recordHealthCheck(now);
    if (!this.running || this.loopActive || this.status.get() === "FAILED") return;

    const state = this.connection.state.get();
    if (state === "CONNECTING") return;
    if (state === "DISCONNECTED") {
      this.beginReconnect(false);
      return;
    }

    const { connectedAt } = this.connection.getSession();
    if (this.maxSessionAgeMs > 0 && connectedAt !== null && now - connectedAt >= this.maxSessionAgeMs) {
      this.logger?.info({ sessionAgeMs: now - connectedAt }, "fleet-link: recycling broker session");
      this.beginReconnect(true);
      return;
    }

    const problem = this.findProblem(now, connectedAt);
    if (problem === null) {
      this.missed = 0;
      this.connection.markHealthy();
      this.status.set("HEALTHY");
      return;
    }

    this.missed += 1;
    this.lastError = problem;
    this.connection.markDegraded();
    if (this.missed >= this.missedProbeThreshold) {
      this.logger?.warn({ missed: this.missed, problem }, "fleet-link: health probes missed, reconnecting");
      this.beginReconnect(false);
    } else {
      this.logger?.info({ missed: this.missed, problem }, "fleet-link: health probe missed");
      this.status.set("DEGRADED");
    }
  }

  /**
   * Manual reconnect: abandons any running loop, clears FAILED, and
   * attempts immediately.
   */
  async reconnectNow(): Promise<void> {
    if (!this.running) {
      throw new Error("Health monitor is not running");
    }
    await this.cancelLoop();
    this.missed = 0;
    this.beginReconnect(true);
    await this.loop;
  }

  /**
   * Resolves when the running reconnect loop finishes its current attempt,
   * or at once when no loop runs.
   */
  nextAttempt(): Promise<void> {
    if (!this.loopActive) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.attemptWaiters.push(resolve);
    });
  }

  snapshot(): HealthSnapshot {
    return {
      status: this.status.get(),
      missedProbes: this.missed,
      reconnectAttempts: this.attempts,
      lastProbeAt: this.lastProbeAt,
      lastError: this.lastError
    };
  }

  private findProblem(now: number, connectedAt: number | null): string | null {
    if (!this.connection.isTransportAlive()) return "transport not connected";
    if (this.inboundSilenceMs > 0) {
      const fresh = this.freshness();
      if (fresh !== null) {
        const lastActivity = Math.max(fresh, connectedAt ?? fresh);
        const silence = now - lastActivity;
        if (silence > this.inboundSilenceMs) return `no inbound telemetry for ${silence}ms`;
      }
    }
    return null;
  }

  private beginReconnect(immediate: boolean): void {
    if (this.loopActive) return;
    this.loopActive = true;
    this.generation += 1;
    const generation = this.generation;
    const abort = new AbortController();
    this.loopAbort = abort;
    this.loop = this.runReconnect(immediate, generation, abort.signal).finally(() => {
      if (this.generation === generation) {
        this.loopActive = false;
        this.loopAbort = null;
      }
      this.settleAttempt();
    });
  }

  private async runReconnect(immediate: boolean, generation: number, signal: AbortSignal): Promise<void> {
    this.status.set("RECONNECTING");
    this.backoff.reset();
    this.attempts = 0;
    await this.connection.disconnect();

    while (this.generation === generation) {
      if (this.attempts >= this.maxAttempts) {
        this.fail(`gave up after ${this.attempts} reconnect attempts`);
        return;
      }
      const delay = this.attempts === 0 && immediate ? 0 : this.backoff.next();
      if (delay > 0 && !(await this.sleep(delay))) return;
      if (this.generation !== generation) return;

      this.attempts += 1;
      this.connection.recordReconnectAttempt(this.attempts);
      this.onReconnectAttempt?.(this.attempts);
      try {
        const config = await this.resolveConfig();
        if (this.generation !== generation) return;
        await this.connection.connect(config, { signal });
        this.missed = 0;
        this.lastError = null;
        this.status.set("HEALTHY");
        this.logger?.info({ attempt: this.attempts }, "fleet-link: broker session restored");
        return;
      } catch (err) {
        if (this.generation !== generation) return;
        if (err instanceof ConfigError) {
          this.fail(err.message);
          return;
        }
        this.lastError = describeError(err);
        this.logger?.warn({ attempt: this.attempts, err: this.lastError }, "fleet-link: reconnect attempt failed");
      } finally {
        this.settleAttempt();
      }
    }
  }

  private fail(reason: string): void {
    this.lastError = reason;
    this.status.set("FAILED");
    this.logger?.error({ reason }, "fleet-link: broker connection failed; manual reconnect required");
  }

  private settleAttempt(): void {
    const waiters = this.attemptWaiters;
    this.attemptWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private sleep(ms: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.sleeper = null;
        resolve(true);
      }, ms);
      this.sleeper = { timer, resolve };
    });
  }

  private async cancelLoop(): Promise<void> {
    this.generation += 1;
    this.loopAbort?.abort();
    this.loopAbort = null;
    if (this.sleeper) {
      clearTimeout(this.sleeper.timer);
      this.sleeper.resolve(false);
      this.sleeper = null;
    }
    const pending = this.loop;
    this.loopActive = false;
    if (pending) await pending;
  }
}
