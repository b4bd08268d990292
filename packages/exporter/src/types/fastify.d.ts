import "fastify";
import type { Registry } from "prom-client";
import type { StatusSource } from "../status/status-fetcher.js";
import type { PeerMetricsCollector } from "../metrics/peer-collector.js";
import type { AddressWatchdog } from "../watchdog/address-watchdog.js";

declare module "fastify" {
  interface FastifyInstance {
    statusSource: StatusSource;
    metricsRegistry: Registry;
    peerCollector: PeerMetricsCollector;
    watchdog: AddressWatchdog;
  }
}
