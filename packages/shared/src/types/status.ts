/**
 * Types for a decoded Tailscale status document.
 *
 * A snapshot is produced by a single `tailscale status --json` run and is
 * never mutated afterwards. Every scrape and every watchdog tick gets its own.
 */

// ---------------------------------------------------------------------------
// Nodes
// ---------------------------------------------------------------------------

/** A node on the tailnet as reported by the local client */
export interface NodeStatus {
  /** Stable node ID (e.g. "nXYZ123CNTRL") */
  readonly id: string;
  /** OS host name of the machine */
  readonly hostName: string;
  /** MagicDNS name, e.g. "host1.tailnet-abc.ts.net." */
  readonly dnsName: string;
  /** Tailnet addresses, first one is the primary (usually the IPv4 one) */
  readonly addresses: readonly string[];
  /** Cumulative bytes received */
  readonly rxBytes: number;
  /** Cumulative bytes sent */
  readonly txBytes: number;
}

/** A remote node, owned by a tailnet user */
export interface PeerStatus extends NodeStatus {
  /** Decimal text of the 64-bit user id */
  readonly userId: string;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export interface StatusSnapshot {
  readonly self: NodeStatus;
  /** Peers keyed by the identifier the client uses in its `Peer` map */
  readonly peers: ReadonlyMap<string, PeerStatus>;
}
