/**
 * Exporter configuration.
 *
 * Everything has a fixed default. The environment is only consulted for
 * log formatting (NODE_ENV) and verbosity (LOG_LEVEL).
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const LogLevel = Type.Union([
  Type.Literal("fatal"),
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
  Type.Literal("trace"),
  Type.Literal("silent"),
]);

export type LogLevel = Static<typeof LogLevel>;

export interface ExporterConfig {
  /** Port the HTTP server listens on (host is the tailnet address) */
  port: number;
  metricsPath: string;
  healthPath: string;
  /** Metric name prefix, e.g. "tailscale" → tailscale_peer_rx */
  namespace: string;
  /** Also export the default Node.js process metrics */
  defaultMetrics: boolean;
  status: {
    command: string;
    args: string[];
    timeoutMs: number;
  };
  watchdog: {
    intervalMs: number;
    maxConsecutiveFailures: number;
  };
  logLevel: LogLevel;
  /** Human-readable logs via pino-pretty */
  prettyLogs: boolean;
}

export const DEFAULT_CONFIG: ExporterConfig = {
  port: 9995,
  metricsPath: "/metrics",
  healthPath: "/health",
  namespace: "tailscale",
  defaultMetrics: true,
  status: {
    command: "tailscale",
    args: ["status", "--json"],
    timeoutMs: 10_000,
  },
  watchdog: {
    intervalMs: 20_000,
    maxConsecutiveFailures: 20,
  },
  logLevel: "info",
  prettyLogs: false,
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  const level = env.LOG_LEVEL;
  return {
    ...DEFAULT_CONFIG,
    logLevel: Value.Check(LogLevel, level) ? level : DEFAULT_CONFIG.logLevel,
    prettyLogs: env.NODE_ENV !== "production",
  };
}
