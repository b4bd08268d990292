/**
 * Status Module
 *
 * Obtains Tailscale status snapshots. Independent of the web framework and
 * of the metrics layer; both depend on it through the StatusSource interface.
 */

export { StatusFetcher } from "./status-fetcher.js";
export type { StatusSource, StatusFetcherOptions } from "./status-fetcher.js";
export { decodeStatus } from "./decode.js";
