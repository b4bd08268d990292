/**
 * Error types raised while fetching and interpreting the Tailscale status.
 *
 * Fetch-kind errors (timeout, command failure, decode failure) fail a single
 * scrape and are counted by the watchdog. Identity drift and fetch
 * exhaustion are terminal watchdog reasons.
 */

export type ExporterErrorCode =
  | "FETCH_TIMEOUT"
  | "COMMAND_FAILURE"
  | "DECODE_FAILURE"
  | "MISSING_ADDRESS"
  | "IDENTITY_DRIFT"
  | "FETCH_EXHAUSTION";

export class ExporterError extends Error {
  constructor(
    public readonly code: ExporterErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ExporterError";
  }
}

// ---------------------------------------------------------------------------
// Fetch errors
// ---------------------------------------------------------------------------

export class FetchTimeoutError extends ExporterError {
  constructor(public readonly timeoutMs: number) {
    super("FETCH_TIMEOUT", `tailscale status did not finish within ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
  }
}

export class CommandFailureError extends ExporterError {
  constructor(
    message: string,
    /** Diagnostic output of the command (trimmed) */
    public readonly stderr: string,
    public readonly exitCode: number | null,
    options?: ErrorOptions,
  ) {
    super("COMMAND_FAILURE", stderr ? `${message}: ${stderr}` : message, options);
    this.name = "CommandFailureError";
  }
}

/** Length of raw output kept on a DecodeFailureError */
export const SNIPPET_LENGTH = 200;

export class DecodeFailureError extends ExporterError {
  /** Leading part of the undecodable output */
  public readonly snippet: string;

  constructor(reason: string, raw: string, options?: ErrorOptions) {
    super("DECODE_FAILURE", `could not decode tailscale status: ${reason}`, options);
    this.name = "DecodeFailureError";
    this.snippet = raw.slice(0, SNIPPET_LENGTH);
  }
}

// ---------------------------------------------------------------------------
// Snapshot consistency
// ---------------------------------------------------------------------------

export class MissingAddressError extends ExporterError {
  constructor(
    public readonly nodeId: string,
    public readonly role: "self" | "peer",
  ) {
    super("MISSING_ADDRESS", `${role} node ${nodeId} reports no tailnet address`);
    this.name = "MissingAddressError";
  }
}

// ---------------------------------------------------------------------------
// Terminal watchdog reasons
// ---------------------------------------------------------------------------

export class IdentityDriftError extends ExporterError {
  constructor(
    public readonly expected: string,
    public readonly observed: string,
  ) {
    super("IDENTITY_DRIFT", `tailnet address changed: was ${expected}, now ${observed}`);
    this.name = "IdentityDriftError";
  }
}

export class FetchExhaustionError extends ExporterError {
  constructor(
    public readonly failures: number,
    lastError: Error,
  ) {
    super(
      "FETCH_EXHAUSTION",
      `tailscale status failed ${failures} times in a row: ${lastError.message}`,
      { cause: lastError },
    );
    this.name = "FetchExhaustionError";
  }
}

/** Errors that mean "the status could not be obtained right now" */
export function isFetchError(err: unknown): err is ExporterError {
  return (
    err instanceof ExporterError &&
    (err.code === "FETCH_TIMEOUT" ||
      err.code === "COMMAND_FAILURE" ||
      err.code === "DECODE_FAILURE")
  );
}
