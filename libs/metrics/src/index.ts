/**
 * Prometheus instrumentation for the fleet gateway: RED metrics for the
 * HTTP surface, default process metrics, and fleet-level counters.
 */

import { register, collectDefaultMetrics, Registry, Counter, Histogram, Gauge } from 'prom-client';
import type { FastifyRequest, FastifyReply } from 'fastify';

export { Counter, Histogram, Gauge, Registry, register };

export const DEFAULT_PREFIX = 'fleetlink';

export interface MetricsConfig {
  /** Service name (used as label) */
  serviceName: string;
  /** Whether to collect default Node.js process metrics */
  collectDefaultMetrics?: boolean;
  /** Custom registry (optional, defaults to global registry) */
  registry?: Registry;
  /** Prefix for all metric names (optional) */
  prefix?: string;
}

/**
 * Standard HTTP metrics
 */
export class HttpMetrics {
  private requestsTotal: Counter;
  private requestDuration: Histogram;
  private requestsInProgress: Gauge;

  constructor(config: MetricsConfig) {
    const registry = config.registry ?? register;
    const prefix = config.prefix ?? DEFAULT_PREFIX;

    this.requestsTotal = new Counter({
      name: `${prefix}_http_requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: ['service', 'method', 'route', 'status_code'],
      registers: [registry],
    });

    this.requestDuration = new Histogram({
      name: `${prefix}_http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['service', 'method', 'route', 'status_code'],
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [registry],
    });

    this.requestsInProgress = new Gauge({
      name: `${prefix}_http_requests_in_progress`,
      help: 'Number of HTTP requests currently being processed',
      labelNames: ['service', 'method', 'route'],
      registers: [registry],
    });
  }

  /**
   * Fastify onRequest hook to instrument HTTP requests
   */
  middleware(serviceName: string) {
    return async (request: FastifyRequest, reply: FastifyReply) => {
      const route = request.routeOptions.url || request.url;
      const method = request.method;

      const end = this.requestDuration.startTimer({ service: serviceName, method, route });
      this.requestsInProgress.inc({ service: serviceName, method, route });

      reply.raw.on('finish', () => {
        const statusCode = reply.statusCode.toString();
        end({ status_code: statusCode });
        this.requestsTotal.inc({ service: serviceName, method, route, status_code: statusCode });
        this.requestsInProgress.dec({ service: serviceName, method, route });
      });
    };
  }
}

export function initializeMetrics(config: MetricsConfig): HttpMetrics {
  const registry = config.registry ?? register;

  if (config.collectDefaultMetrics !== false) {
    collectDefaultMetrics({
      register: registry,
      labels: { service: config.serviceName },
    });
  }

  return new HttpMetrics(config);
}

/**
 * Handler for /metrics endpoint
 */
export async function metricsHandler(registry: Registry = register): Promise<string> {
  return registry.metrics();
}

export function createCounter(opts: { name: string; help: string; labelNames?: string[]; registry?: Registry }) {
  return new Counter({
    name: opts.name,
    help: opts.help,
    labelNames: opts.labelNames ?? [],
    registers: [opts.registry ?? register],
  });
}

export function createGauge(opts: { name: string; help: string; labelNames?: string[]; registry?: Registry }) {
  return new Gauge({
    name: opts.name,
    help: opts.help,
    labelNames: opts.labelNames ?? [],
    registers: [opts.registry ?? register],
  });
}

export type FrameOutcome = 'accepted' | 'duplicate' | 'decode_error' | 'unknown_topic';

/**
 * Fleet-level counters and gauges. State gauges are one-hot: the current
 * value's series reads 1, every other known value 0.
 */
export class FleetMetrics {
  private readonly frames: Counter;
  private readonly decodeErrors: Counter;
  private readonly missions: Counter;
  private readonly reconnects: Counter;
  private readonly connectionState: Gauge;
  private readonly healthStatus: Gauge;
  private readonly vehicles: Gauge;

  constructor(config: { registry?: Registry; prefix?: string } = {}) {
    const registry = config.registry ?? register;
    const prefix = config.prefix ?? DEFAULT_PREFIX;

    this.frames = createCounter({
      name: `${prefix}_frames_total`,
      help: 'Inbound MQTT frames by topic and outcome',
      labelNames: ['topic', 'outcome'],
      registry,
    });
    this.decodeErrors = createCounter({
      name: `${prefix}_decode_errors_total`,
      help: 'Frames rejected by the protocol codec',
      labelNames: ['reason'],
      registry,
    });
    this.missions = createCounter({
      name: `${prefix}_missions_total`,
      help: 'Mission orders by outcome',
      labelNames: ['outcome'],
      registry,
    });
    this.reconnects = createCounter({
      name: `${prefix}_reconnect_attempts_total`,
      help: 'Broker reconnect attempts',
      registry,
    });
    this.connectionState = createGauge({
      name: `${prefix}_connection_state`,
      help: 'Broker session state (one-hot)',
      labelNames: ['state'],
      registry,
    });
    this.healthStatus = createGauge({
      name: `${prefix}_health_status`,
      help: 'Connection health status (one-hot)',
      labelNames: ['status'],
      registry,
    });
    this.vehicles = createGauge({
      name: `${prefix}_vehicles`,
      help: 'Known vehicles by connection state',
      labelNames: ['state'],
      registry,
    });
  }

  recordFrame(topic: string, outcome: FrameOutcome): void {
    this.frames.inc({ topic, outcome });
  }

  recordDecodeError(reason: string): void {
    this.decodeErrors.inc({ reason });
  }

  recordMission(outcome: string): void {
    this.missions.inc({ outcome });
  }

  recordReconnectAttempt(): void {
    this.reconnects.inc();
  }

  setConnectionState(current: string, all: readonly string[]): void {
    setOneHot(this.connectionState, 'state', current, all);
  }

  setHealthStatus(current: string, all: readonly string[]): void {
    setOneHot(this.healthStatus, 'status', current, all);
  }

  setVehicleCounts(counts: Record<string, number>): void {
    for (const [state, count] of Object.entries(counts)) {
      this.vehicles.set({ state }, count);
    }
  }
}

function setOneHot(gauge: Gauge, label: string, current: string, all: readonly string[]): void {
  for (const value of all) {
    gauge.set({ [label]: value }, value === current ? 1 : 0);
  }
}
