/**
 * Peer Metrics Collector — turns a status snapshot into per-peer byte
 * counters on every scrape.
 *
 * Values are the raw cumulative counters reported by the client. Nothing is
 * kept between scrapes: each collect() fetches a fresh snapshot, and a
 * failed fetch clears the counters rather than leaving the previous values
 * in the registry.
 *
 * IMPORTANT: Like the status module, this is independent of the web
 * framework. It receives its dependencies via constructor injection.
 */

import { Counter, type Registry } from "prom-client";
import type { PeerCounterSample, StatusSnapshot } from "@tailnet-exporter/shared";
import type { StatusSource } from "../status/status-fetcher.js";
import { PEER_LABEL_NAMES, labelPeers, type PeerLabelName } from "./labels.js";

export interface PeerMetricsCollectorOptions {
  /** Registry the counters are registered into */
  registry: Registry;
  /** Metric name prefix (default: "tailscale") */
  namespace?: string;
}

const DEFAULT_NAMESPACE = "tailscale";

/**
 * Derive the rx and tx samples for every peer. Throws MissingAddressError
 * if this host or any peer has no tailnet address.
 */
export function derivePeerSamples(snapshot: StatusSnapshot): PeerCounterSample[] {
  const samples: PeerCounterSample[] = [];
  for (const { peer, labels } of labelPeers(snapshot)) {
    samples.push({ counter: "rx", labels, value: peer.rxBytes });
    samples.push({ counter: "tx", labels, value: peer.txBytes });
  }
  return samples;
}

export class PeerMetricsCollector {
  private source: StatusSource;
  private rx: Counter<PeerLabelName>;
  private tx: Counter<PeerLabelName>;

  constructor(source: StatusSource, options: PeerMetricsCollectorOptions) {
    const namespace = options.namespace ?? DEFAULT_NAMESPACE;
    this.source = source;
    this.rx = new Counter({
      name: `${namespace}_peer_rx`,
      help: "Bytes received from a tailnet peer",
      labelNames: [...PEER_LABEL_NAMES],
      registers: [options.registry],
    });
    this.tx = new Counter({
      name: `${namespace}_peer_tx`,
      help: "Bytes sent to a tailnet peer",
      labelNames: [...PEER_LABEL_NAMES],
      registers: [options.registry],
    });
  }

  /**
   * Fetch a snapshot and replace the counter values with it.
   * Rejects (and clears the counters) if the status cannot be obtained or
   * a node has no address.
   */
  async collect(): Promise<PeerCounterSample[]> {
    let samples: PeerCounterSample[];
    try {
      samples = derivePeerSamples(await this.source.fetchStatus());
    } catch (err) {
      this.rx.reset();
      this.tx.reset();
      throw err;
    }

    this.rx.reset();
    this.tx.reset();
    for (const sample of samples) {
      const counter = sample.counter === "rx" ? this.rx : this.tx;
      counter.inc({ ...sample.labels }, sample.value);
    }
    return samples;
  }
}
