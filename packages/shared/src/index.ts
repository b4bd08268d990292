export type { NodeStatus, PeerStatus, StatusSnapshot } from "./types/status.js";
export type {
  PeerLabelSet,
  PeerCounter,
  PeerCounterSample,
  WatchdogStatus,
  WatchdogHealth,
} from "./types/metrics.js";
