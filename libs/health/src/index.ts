import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Database } from '@fleet-link/database';

/**
 * Health check result for a single dependency
 */
export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy';
  message?: string;
  latency?: number;
}

/**
 * Overall health status response
 */
export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: Record<string, HealthCheckResult>;
}

export type DependencyChecker = () => Promise<HealthCheckResult>;

export interface HealthCheckOptions {
  serviceName: string;
  dependencies?: Record<string, DependencyChecker>;
  /** Dependencies whose failure makes the service unhealthy rather than degraded */
  critical?: string[];
  includeSystemMetrics?: boolean;
}

export interface GracefulShutdownOptions {
  timeout?: number; // Timeout in milliseconds (default: 10000)
  signals?: NodeJS.Signals[]; // Signals to listen for (default: SIGTERM, SIGINT)
  logger?: {
    info: (msg: string) => void;
    error: (msg: string) => void;
  };
}

/**
 * What the broker checker needs to know about the live session.
 */
export interface BrokerProbe {
  connected: boolean;
  state: string;
}

/**
 * Database health checker over the adapter's own health query
 */
export function createDatabaseChecker(db: Database | (() => Database)): DependencyChecker {
  return async (): Promise<HealthCheckResult> => {
    const database = typeof db === 'function' ? db() : db;
    const health = await database.healthCheck();
    return health.healthy
      ? { status: 'healthy', latency: health.latency }
      : { status: 'unhealthy', message: health.error ?? 'Database health check failed' };
  };
}

/**
 * Broker session checker. The session owner decides what "connected" means.
 */
export function createBrokerChecker(probe: () => BrokerProbe): DependencyChecker {
  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    const { connected, state } = probe();
    if (!connected) {
      return {
        status: 'unhealthy',
        message: `Broker session ${state}`,
        latency: Date.now() - startTime,
      };
    }
    return { status: 'healthy', message: state, latency: Date.now() - startTime };
  };
}

function getSystemMetrics(): Record<string, HealthCheckResult> {
  const memUsage = process.memoryUsage();

  return {
    memory: {
      status: 'healthy',
      message: `RSS: ${Math.round(memUsage.rss / 1024 / 1024)}MB, Heap: ${Math.round(memUsage.heapUsed / 1024 / 1024)}MB`,
    },
    uptime: {
      status: 'healthy',
      message: `${Math.round(process.uptime())}s`,
    },
  };
}

async function executeHealthChecks(
  dependencies: Record<string, DependencyChecker>,
  includeSystemMetrics: boolean
): Promise<Record<string, HealthCheckResult>> {
  const checks: Record<string, HealthCheckResult> = {};

  const results = await Promise.all(
    Object.entries(dependencies).map(async ([name, checker]) => {
      try {
        return [name, await checker()] as const;
      } catch (error) {
        const failed: HealthCheckResult = {
          status: 'unhealthy',
          message: error instanceof Error ? error.message : 'Health check failed',
        };
        return [name, failed] as const;
      }
    })
  );

  for (const [name, result] of results) {
    checks[name] = result;
  }

  if (includeSystemMetrics) {
    Object.assign(checks, getSystemMetrics());
  }

  return checks;
}

export function determineOverallStatus(
  checks: Record<string, HealthCheckResult>,
  critical: string[]
): HealthStatus['status'] {
  const unhealthy = Object.entries(checks).filter(([, check]) => check.status === 'unhealthy');
  if (unhealthy.length === 0) {
    return 'healthy';
  }
  return unhealthy.some(([name]) => critical.includes(name)) ? 'unhealthy' : 'degraded';
}

/**
 * Register health check endpoints on Fastify instance
 *
 * /health - Liveness probe (always returns 200 if service is running)
 * /ready - Readiness probe (checks dependencies)
 */
export function registerHealthChecks(app: FastifyInstance, options: HealthCheckOptions): void {
  const { serviceName, dependencies = {}, critical = ['database'], includeSystemMetrics = true } = options;
  const startTime = Date.now();

  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    reply.status(200).send({
      status: 'healthy',
      service: serviceName,
      timestamp: new Date().toISOString(),
      uptime: (Date.now() - startTime) / 1000,
    });
  });

  app.get('/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    const checks = await executeHealthChecks(dependencies, includeSystemMetrics);
    const overallStatus = determineOverallStatus(checks, critical);

    const response: HealthStatus = {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      uptime: (Date.now() - startTime) / 1000,
      checks,
    };

    // 200 for healthy/degraded, 503 for unhealthy
    reply.status(overallStatus === 'unhealthy' ? 503 : 200).send(response);
  });
}

/**
 * Closes the Fastify server on SIGTERM/SIGINT; onClose hooks release
 * everything else the service owns.
 */
export function setupGracefulShutdown(app: FastifyInstance, options: GracefulShutdownOptions = {}): void {
  const { timeout = 10000, signals = ['SIGTERM', 'SIGINT'], logger = console } = options;

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.info('Shutdown already in progress, ignoring signal');
      return;
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown...`);

    const shutdownTimeout = setTimeout(() => {
      logger.error(`Graceful shutdown timed out after ${timeout}ms, forcing exit`);
      process.exit(1);
    }, timeout);

    try {
      await app.close();
      logger.info('Server closed successfully');
      clearTimeout(shutdownTimeout);
      process.exit(0);
    } catch (error) {
      logger.error(`Error during shutdown: ${error instanceof Error ? error.message : 'Unknown error'}`);
      clearTimeout(shutdownTimeout);
      process.exit(1);
    }
  };

  for (const signal of signals) {
    process.on(signal, () => void shutdown(signal));
  }

  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${String(reason)}`);
    void shutdown('unhandledRejection');
  });
}
