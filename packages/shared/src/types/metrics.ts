/**
 * Types for the exported peer metrics and the watchdog health view.
 */

// ---------------------------------------------------------------------------
// Peer counters
// ---------------------------------------------------------------------------

/**
 * Label set carried by every peer sample. Key order is the exposition order:
 * the first four describe this host, the last four the peer.
 */
export interface PeerLabelSet {
  readonly id: string;
  readonly name: string;
  readonly given_name: string;
  readonly ip: string;
  readonly peer_name: string;
  readonly peer_given_name: string;
  readonly peer_ip: string;
  readonly peer_user_id: string;
}

export type PeerCounter = "rx" | "tx";

/** One counter value for one peer */
export interface PeerCounterSample {
  counter: PeerCounter;
  labels: PeerLabelSet;
  /** Cumulative byte count as reported by the client */
  value: number;
}

// ---------------------------------------------------------------------------
// Watchdog
// ---------------------------------------------------------------------------

export type WatchdogStatus = "running" | "degraded" | "terminated";

/** Health endpoint payload */
export interface WatchdogHealth {
  status: WatchdogStatus;
  /** Address the server is bound to */
  address: string;
  consecutiveFailures: number;
  /** ISO 8601 timestamp of the last completed check (null before the first) */
  lastCheckedAt: string | null;
  /** Why the watchdog degraded or terminated */
  reason?: string;
}
