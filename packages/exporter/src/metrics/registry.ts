import { Registry, collectDefaultMetrics } from "prom-client";

export interface MetricsRegistryOptions {
  /** Register the default Node.js process metrics (CPU, memory, event loop) */
  defaultMetrics?: boolean;
}

/**
 * Create an isolated registry. Nothing is registered on prom-client's
 * global registry, so every app (and every test) gets its own.
 */
export function createMetricsRegistry(options?: MetricsRegistryOptions): Registry {
  const registry = new Registry();
  if (options?.defaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry });
  }
  return registry;
}
