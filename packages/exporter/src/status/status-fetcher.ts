/**
 * Status Fetcher — runs `tailscale status --json` and decodes its output.
 *
 * There are no retries here: a scrape fails on the first error and the
 * watchdog applies its own retry policy.
 */

import { execFile } from "node:child_process";
import type { StatusSnapshot } from "@tailnet-exporter/shared";
import { CommandFailureError, FetchTimeoutError } from "../errors.js";
import { decodeStatus } from "./decode.js";

/** Anything that can produce a fresh status snapshot */
export interface StatusSource {
  fetchStatus(timeoutMs?: number): Promise<StatusSnapshot>;
}

export interface StatusFetcherOptions {
  /** Executable to run (default: "tailscale") */
  command?: string;
  /** Arguments (default: ["status", "--json"]) */
  args?: string[];
  /** Upper bound for one run in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Largest stdout/stderr accepted in bytes (default: 16 MiB) */
  maxBufferBytes?: number;
}

const DEFAULT_COMMAND = "tailscale";
const DEFAULT_ARGS = ["status", "--json"];
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_BUFFER = 16 * 1024 * 1024;

const MAX_BUFFER_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

export class StatusFetcher implements StatusSource {
  private command: string;
  private args: string[];
  private timeoutMs: number;
  private maxBufferBytes: number;

  constructor(options?: StatusFetcherOptions) {
    this.command = options?.command ?? DEFAULT_COMMAND;
    this.args = options?.args ?? DEFAULT_ARGS;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxBufferBytes = options?.maxBufferBytes ?? DEFAULT_MAX_BUFFER;
  }

  async fetchStatus(timeoutMs = this.timeoutMs): Promise<StatusSnapshot> {
    const stdout = await this.run(timeoutMs);
    return decodeStatus(stdout);
  }

  /** Run the status command and resolve with its stdout */
  private run(timeoutMs: number): Promise<string> {
    return new Promise((resolve, reject) => {
      execFile(
        this.command,
        this.args,
        { timeout: timeoutMs, killSignal: "SIGKILL", maxBuffer: this.maxBufferBytes, encoding: "utf8" },
        (error, stdout, stderr) => {
          const diagnostics = stderr.trim();

          if (error) {
            if (error.code === MAX_BUFFER_CODE) {
              reject(new CommandFailureError("tailscale status output too large", diagnostics, null, { cause: error }));
            } else if (error.killed) {
              reject(new FetchTimeoutError(timeoutMs));
            } else {
              // Numeric code = exit status; string code = spawn error such as ENOENT
              const exitCode = typeof error.code === "number" ? error.code : null;
              const reason = exitCode === null ? error.message : `tailscale status exited with code ${exitCode}`;
              reject(new CommandFailureError(reason, diagnostics, exitCode, { cause: error }));
            }
            return;
          }

          if (diagnostics) {
            reject(new CommandFailureError("tailscale status wrote to stderr", diagnostics, 0));
            return;
          }

          resolve(stdout);
        },
      );
    });
  }
}
