/**
 * Metrics Module
 *
 * Exposes per-peer traffic counters through a prom-client registry.
 */

export { PeerMetricsCollector, derivePeerSamples } from "./peer-collector.js";
export type { PeerMetricsCollectorOptions } from "./peer-collector.js";
export { createMetricsRegistry } from "./registry.js";
export type { MetricsRegistryOptions } from "./registry.js";
export { PEER_LABEL_NAMES, givenName, primaryAddress } from "./labels.js";
