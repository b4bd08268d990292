import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";
import type { Registry } from "prom-client";

import { DEFAULT_CONFIG, type ExporterConfig } from "./config.js";
import { ExporterError, isFetchError } from "./errors.js";
import { PeerMetricsCollector, createMetricsRegistry } from "./metrics/index.js";
import { AddressWatchdog, type WatchdogState } from "./watchdog/index.js";
import type { StatusSource } from "./status/index.js";
import { metricsRoutes } from "./routes/metrics.js";
import { healthRoutes } from "./routes/health.js";

type TerminatedState = Extract<WatchdogState, { kind: "terminated" }>;

export interface BuildAppOptions extends FastifyServerOptions {
  /** Where status snapshots come from */
  statusSource: StatusSource;
  /** Address the server is (or will be) bound to */
  boundAddress: string;
  config?: ExporterConfig;
  /** Override the metrics registry (for testing) */
  registry?: Registry;
  /** Override the watchdog instance (for testing) */
  watchdog?: AddressWatchdog;
  /** Called once the process can no longer keep serving */
  onFatal?: (error: Error) => void;
}

function loggerOptions(config: ExporterConfig): FastifyServerOptions["logger"] {
  return config.prettyLogs
    ? {
        level: config.logLevel,
        transport: {
          target: "pino-pretty",
          options: { colorize: true },
        },
      }
    : { level: config.logLevel };
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts: BuildAppOptions) {
  const {
    statusSource,
    boundAddress,
    config = DEFAULT_CONFIG,
    registry: customRegistry,
    watchdog: customWatchdog,
    onFatal,
    ...fastifyOpts
  } = opts;

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : { logger: loggerOptions(config) },
  );

  // Registry + Collector + Watchdog (decorated so routes can access them)
  const registry = customRegistry ?? createMetricsRegistry({ defaultMetrics: config.defaultMetrics });
  const peerCollector = new PeerMetricsCollector(statusSource, {
    registry,
    namespace: config.namespace,
  });

  const terminate = (state: TerminatedState) => {
    app.log.fatal(
      { err: state.reason, code: state.reason.code, address: state.address },
      "address watchdog terminated, exporter cannot keep serving",
    );
    onFatal?.(state.reason);
  };

  const watchdog =
    customWatchdog ??
    new AddressWatchdog(statusSource, boundAddress, {
      intervalMs: config.watchdog.intervalMs,
      maxConsecutiveFailures: config.watchdog.maxConsecutiveFailures,
      fetchTimeoutMs: config.status.timeoutMs,
      onStateChange: (prev, next) => {
        if (next.kind === "degraded") {
          app.log.warn(
            { err: next.lastError, consecutiveFailures: next.consecutiveFailures },
            "tailscale status check failed",
          );
        } else if (next.kind === "running") {
          app.log.info({ address: next.address, previous: prev.kind }, "tailscale status check recovered");
        }
      },
      onTerminated: terminate,
      onError: (err) => {
        app.log.fatal({ err }, "address watchdog crashed");
        onFatal?.(err instanceof Error ? err : new Error(String(err)));
      },
    });

  app.decorate("statusSource", statusSource);
  app.decorate("metricsRegistry", registry);
  app.decorate("peerCollector", peerCollector);
  app.decorate("watchdog", watchdog);

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ExporterError) {
      // Status unavailable → 503; inconsistent snapshot → 500
      const statusCode = isFetchError(error) ? 503 : 500;
      request.log.error({ err: error, code: error.code }, "scrape failed");
      reply.status(statusCode).send({ error: error.message, code: error.code });
      return;
    }

    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    request.log.error({ err: error }, "unexpected error");
    reply.status(error.statusCode ?? 500).send({ error: "Internal server error" });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, { prefix: config.metricsPath });
  await app.register(healthRoutes, { prefix: config.healthPath });

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  // Start watching the address once the server is ready
  app.addHook("onReady", async () => {
    watchdog.start();
  });

  app.addHook("onClose", async () => {
    watchdog.stop();
  });

  return app;
}
