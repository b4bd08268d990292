import type {
  NodeStatus,
  PeerLabelSet,
  PeerStatus,
  StatusSnapshot,
} from "@tailnet-exporter/shared";
import { MissingAddressError } from "../errors.js";

/** Label names in exposition order */
export const PEER_LABEL_NAMES = [
  "id",
  "name",
  "given_name",
  "ip",
  "peer_name",
  "peer_given_name",
  "peer_ip",
  "peer_user_id",
] as const;

export type PeerLabelName = (typeof PEER_LABEL_NAMES)[number];

type SelfLabels = Pick<PeerLabelSet, "id" | "name" | "given_name" | "ip">;

/** First DNS label, e.g. "host1.tailnet-abc.ts.net." → "host1" */
export function givenName(dnsName: string): string {
  const dot = dnsName.indexOf(".");
  return dot === -1 ? dnsName : dnsName.slice(0, dot);
}

/** The node's first tailnet address */
export function primaryAddress(node: NodeStatus, role: "self" | "peer"): string {
  const [first] = node.addresses;
  if (first === undefined) {
    throw new MissingAddressError(node.id, role);
  }
  return first;
}

/** Labels shared by every sample of one scrape */
export function selfLabels(self: NodeStatus): SelfLabels {
  return {
    id: self.id,
    name: self.hostName,
    given_name: givenName(self.dnsName),
    ip: primaryAddress(self, "self"),
  };
}

export function peerLabels(prefix: SelfLabels, peer: PeerStatus): PeerLabelSet {
  return {
    ...prefix,
    peer_name: peer.hostName,
    peer_given_name: givenName(peer.dnsName),
    peer_ip: primaryAddress(peer, "peer"),
    peer_user_id: peer.userId,
  };
}

/** Build the label set of every peer in the snapshot */
export function labelPeers(snapshot: StatusSnapshot): Array<{ peer: PeerStatus; labels: PeerLabelSet }> {
  const prefix = selfLabels(snapshot.self);
  return Array.from(snapshot.peers.values(), (peer) => ({
    peer,
    labels: peerLabels(prefix, peer),
  }));
}
