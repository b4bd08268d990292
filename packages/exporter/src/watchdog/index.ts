export { AddressWatchdog, advanceWatchdog, resolveBoundAddress } from "./address-watchdog.js";
export type { AddressWatchdogOptions, CheckOutcome, WatchdogState } from "./address-watchdog.js";
