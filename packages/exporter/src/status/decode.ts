import { isInteger, parse } from "lossless-json";
import type { NodeStatus, PeerStatus, StatusSnapshot } from "@tailnet-exporter/shared";
import { DecodeFailureError } from "../errors.js";
import { RawStatusChecker, type RawNode } from "./status.schemas.js";

// Integers stay exact; user ids are 64-bit
const parseNumber = (text: string): bigint | number => (isInteger(text) ? BigInt(text) : parseFloat(text));

function toNode(raw: RawNode): NodeStatus {
  return Object.freeze({
    id: raw.ID,
    hostName: raw.HostName,
    dnsName: raw.DNSName,
    addresses: Object.freeze([...(raw.TailscaleIPs ?? [])]),
    rxBytes: Number(raw.RxBytes ?? 0),
    txBytes: Number(raw.TxBytes ?? 0),
  });
}

function toPeer(raw: RawNode): PeerStatus {
  return Object.freeze({ ...toNode(raw), userId: (raw.UserID ?? 0n).toString() });
}

/**
 * Decode the stdout of `tailscale status --json` into a snapshot.
 * Throws DecodeFailureError when the output is not JSON or lacks the
 * fields the exporter needs.
 */
export function decodeStatus(raw: string): StatusSnapshot {
  let parsed: unknown;
  try {
    parsed = parse(raw, null, parseNumber);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecodeFailureError(reason, raw, { cause: err });
  }

  if (!RawStatusChecker.Check(parsed)) {
    const first = RawStatusChecker.Errors(parsed).First();
    const reason = first ? `${first.path || "/"} ${first.message}` : "unexpected document shape";
    throw new DecodeFailureError(reason, raw);
  }

  const rawPeers: Record<string, RawNode> = parsed.Peer ?? {};
  const peers = new Map<string, PeerStatus>();
  for (const [key, node] of Object.entries(rawPeers)) {
    peers.set(key, toPeer(node));
  }

  return Object.freeze({ self: toNode(parsed.Self), peers });
}
