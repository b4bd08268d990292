/**
 * Shared test helpers: status fixtures, snapshot builders and an in-process
 * StatusSource.
 */

import { readFileSync } from "node:fs";
import type { NodeStatus, PeerStatus, StatusSnapshot } from "@tailnet-exporter/shared";
import type { StatusSource } from "../status/status-fetcher.js";

/** Raw `tailscale status --json` output for host1 (100.64.0.1) with one peer p1 */
export function loadStatusFixture(): string {
  return readFileSync(new URL("./fixtures/status.json", import.meta.url), "utf8");
}

export function makeNode(overrides?: Partial<NodeStatus>): NodeStatus {
  return {
    id: "nSELF000CNTRL",
    hostName: "host1",
    dnsName: "host1.tailnetxyz.ts.net.",
    addresses: ["100.64.0.1"],
    rxBytes: 0,
    txBytes: 0,
    ...overrides,
  };
}

export function makePeer(overrides?: Partial<PeerStatus>): PeerStatus {
  return {
    id: "p1",
    hostName: "peer-one",
    dnsName: "peer1.tailnetxyz.ts.net.",
    addresses: ["100.64.0.2"],
    rxBytes: 10,
    txBytes: 20,
    userId: "5",
    ...overrides,
  };
}

export function makeSnapshot(options?: {
  self?: Partial<NodeStatus>;
  peers?: PeerStatus[];
}): StatusSnapshot {
  const peers = options?.peers ?? [makePeer()];
  return {
    self: makeNode(options?.self),
    peers: new Map(peers.map((p) => [p.id, p])),
  };
}

type Step = StatusSnapshot | Error;

/**
 * StatusSource that replays queued results (a snapshot or an error per
 * fetch) and falls back to a default once the queue is empty.
 */
export class FakeStatusSource implements StatusSource {
  private queue: Step[] = [];
  calls = 0;

  constructor(private fallback: Step = makeSnapshot()) {}

  /** Queue results for the next fetches, in order */
  push(...steps: Step[]): this {
    this.queue.push(...steps);
    return this;
  }

  /** Change the result returned once the queue is drained */
  setFallback(step: Step): void {
    this.fallback = step;
  }

  async fetchStatus(): Promise<StatusSnapshot> {
    this.calls++;
    const step = this.queue.shift() ?? this.fallback;
    if (step instanceof Error) throw step;
    return step;
  }
}
