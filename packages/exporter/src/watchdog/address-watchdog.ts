/**
 * Address Watchdog — periodically re-reads the tailnet status and checks
 * that this host still owns the address the server is bound to.
 *
 * A changed address is terminal straight away; failed checks are retried on
 * the next tick until too many happen in a row. The watchdog never exits
 * the process itself: it stops and reports the terminal state through
 * `onTerminated`, and the caller decides what to do.
 *
 * IMPORTANT: This module must remain independent of the web framework.
 */

import type { WatchdogHealth } from "@tailnet-exporter/shared";
import type { StatusSource } from "../status/status-fetcher.js";
import { primaryAddress } from "../metrics/labels.js";
import { FetchExhaustionError, IdentityDriftError } from "../errors.js";

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

export type WatchdogState =
  | { kind: "running"; address: string }
  | { kind: "degraded"; address: string; consecutiveFailures: number; lastError: Error }
  | { kind: "terminated"; address: string; reason: IdentityDriftError | FetchExhaustionError };

/** Result of one status check */
export type CheckOutcome =
  | { ok: true; address: string }
  | { ok: false; error: Error };

export function advanceWatchdog(
  state: WatchdogState,
  outcome: CheckOutcome,
  maxFailures: number,
): WatchdogState {
  if (state.kind === "terminated") return state;

  if (!outcome.ok) {
    const failures = (state.kind === "degraded" ? state.consecutiveFailures : 0) + 1;
    if (failures >= maxFailures) {
      return {
        kind: "terminated",
        address: state.address,
        reason: new FetchExhaustionError(failures, outcome.error),
      };
    }
    return { kind: "degraded", address: state.address, consecutiveFailures: failures, lastError: outcome.error };
  }

  if (outcome.address !== state.address) {
    return {
      kind: "terminated",
      address: state.address,
      reason: new IdentityDriftError(state.address, outcome.address),
    };
  }

  return { kind: "running", address: state.address };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Fetch once and return this host's primary tailnet address */
export async function resolveBoundAddress(source: StatusSource, timeoutMs?: number): Promise<string> {
  const snapshot = await source.fetchStatus(timeoutMs);
  return primaryAddress(snapshot.self, "self");
}

// ---------------------------------------------------------------------------
// AddressWatchdog
// ---------------------------------------------------------------------------

export interface AddressWatchdogOptions {
  /** Time between checks in milliseconds (default: 20000 = 20s) */
  intervalMs?: number;
  /** Consecutive failed checks that end the watchdog (default: 20) */
  maxConsecutiveFailures?: number;
  /** Bound for each status fetch in milliseconds (default: fetcher's own) */
  fetchTimeoutMs?: number;
  /** Called whenever the state kind changes or the failure count grows */
  onStateChange?: (prev: WatchdogState, next: WatchdogState) => void;
  /** Called once when the watchdog reaches a terminal state */
  onTerminated?: (state: Extract<WatchdogState, { kind: "terminated" }>) => void;
  /** Called if a scheduled check throws (only possible from a callback) */
  onError?: (err: unknown) => void;
}

const DEFAULT_INTERVAL_MS = 20_000;
const DEFAULT_MAX_FAILURES = 20;

export class AddressWatchdog {
  private source: StatusSource;
  private intervalMs: number;
  private maxFailures: number;
  private fetchTimeoutMs?: number;
  private onStateChange?: AddressWatchdogOptions["onStateChange"];
  private onTerminated?: AddressWatchdogOptions["onTerminated"];
  private onError?: AddressWatchdogOptions["onError"];

  private current: WatchdogState;
  private lastCheckedAt: Date | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(source: StatusSource, boundAddress: string, options?: AddressWatchdogOptions) {
    this.source = source;
    this.intervalMs = options?.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.maxFailures = options?.maxConsecutiveFailures ?? DEFAULT_MAX_FAILURES;
    this.fetchTimeoutMs = options?.fetchTimeoutMs;
    this.onStateChange = options?.onStateChange;
    this.onTerminated = options?.onTerminated;
    this.onError = options?.onError;
    this.current = { kind: "running", address: boundAddress };
  }

  /** Start checking; the first check happens one interval from now */
  start(): void {
    if (this.running || this.current.kind === "terminated") return;
    this.running = true;
    this.scheduleNext();
  }

  /** Stop checking. A check already in flight finishes but is not followed by another */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  get state(): WatchdogState {
    return this.current;
  }

  health(): WatchdogHealth {
    const state = this.current;
    const health: WatchdogHealth = {
      status: state.kind,
      address: state.address,
      consecutiveFailures: state.kind === "degraded" ? state.consecutiveFailures : 0,
      lastCheckedAt: this.lastCheckedAt?.toISOString() ?? null,
    };
    if (state.kind === "degraded") health.reason = state.lastError.message;
    if (state.kind === "terminated") health.reason = state.reason.message;
    return health;
  }

  /** Run one check and apply its outcome */
  async tick(): Promise<WatchdogState> {
    if (this.current.kind === "terminated") return this.current;

    let outcome: CheckOutcome;
    try {
      const snapshot = await this.source.fetchStatus(this.fetchTimeoutMs);
      outcome = { ok: true, address: primaryAddress(snapshot.self, "self") };
    } catch (err) {
      outcome = { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
    }

    const prev = this.current;
    const next = advanceWatchdog(prev, outcome, this.maxFailures);
    this.current = next;
    this.lastCheckedAt = new Date();

    if (next.kind === "terminated") {
      this.stop();
    }
    try {
      if (prev.kind !== next.kind || next.kind === "degraded") {
        this.onStateChange?.(prev, next);
      }
    } finally {
      // The terminal decision is delivered even if onStateChange throws
      if (next.kind === "terminated") {
        this.onTerminated?.(next);
      }
    }
    return next;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private scheduleNext(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().then(
        (state) => {
          if (this.running && state.kind !== "terminated") this.scheduleNext();
        },
        (err: unknown) => {
          this.stop();
          this.onError?.(err);
        },
      );
    }, this.intervalMs);
  }
}
