import { describe, it, expect, vi } from "vitest";
import { CommandFailureError, DecodeFailureError, FetchTimeoutError } from "../errors.js";
import { loadStatusFixture } from "../test/helpers.js";

// ---------------------------------------------------------------------------
// Mock child_process — hoisted so the factory can reference it
// ---------------------------------------------------------------------------

const { mockExecFile } = vi.hoisted(() => ({ mockExecFile: vi.fn() }));

vi.mock("node:child_process", () => ({
  execFile: mockExecFile,
}));

// ---------------------------------------------------------------------------
import { StatusFetcher } from "./status-fetcher.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

/** Make the next execFile call finish with the given result */
function respondWith(error: Error | null, stdout: string, stderr = "") {
  mockExecFile.mockImplementation(
    (_file: string, _args: string[], _options: unknown, callback: ExecCallback) => {
      callback(error, stdout, stderr);
    },
  );
}

function execError(fields: { code?: number | string; killed?: boolean; signal?: string | null }) {
  return Object.assign(new Error("Command failed: tailscale status --json"), {
    killed: false,
    signal: null,
    ...fields,
  });
}

async function fetchError(fetcher: StatusFetcher): Promise<unknown> {
  return fetcher.fetchStatus().then(
    () => {
      throw new Error("expected fetchStatus to reject");
    },
    (err: unknown) => err,
  );
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("StatusFetcher", () => {
  it("runs tailscale status --json with a 10s bound", async () => {
    respondWith(null, loadStatusFixture());

    const snapshot = await new StatusFetcher().fetchStatus();

    expect(snapshot.self.addresses[0]).toBe("100.64.0.1");
    expect(mockExecFile).toHaveBeenCalledWith(
      "tailscale",
      ["status", "--json"],
      expect.objectContaining({ timeout: 10_000, killSignal: "SIGKILL", encoding: "utf8" }),
      expect.any(Function),
    );
  });

  it("uses the configured command and a per-call timeout", async () => {
    respondWith(null, loadStatusFixture());

    const fetcher = new StatusFetcher({
      command: "/usr/bin/tailscale",
      args: ["--socket=/tmp/ts.sock", "status", "--json"],
      timeoutMs: 5_000,
    });
    await fetcher.fetchStatus(1_500);

    expect(mockExecFile).toHaveBeenCalledWith(
      "/usr/bin/tailscale",
      ["--socket=/tmp/ts.sock", "status", "--json"],
      expect.objectContaining({ timeout: 1_500 }),
      expect.any(Function),
    );
  });

  it("maps a killed process to FetchTimeoutError", async () => {
    respondWith(execError({ killed: true, signal: "SIGKILL" }), "");

    const err = await fetchError(new StatusFetcher({ timeoutMs: 2_000 }));

    expect(err).toBeInstanceOf(FetchTimeoutError);
    expect(err).toMatchObject({ code: "FETCH_TIMEOUT", timeoutMs: 2_000 });
  });

  it("maps a non-zero exit to CommandFailureError with stderr", async () => {
    respondWith(execError({ code: 1 }), "", "failed to connect to local tailscaled\n");

    const err = await fetchError(new StatusFetcher());

    expect(err).toBeInstanceOf(CommandFailureError);
    expect(err).toMatchObject({
      code: "COMMAND_FAILURE",
      exitCode: 1,
      stderr: "failed to connect to local tailscaled",
      message: "tailscale status exited with code 1: failed to connect to local tailscaled",
    });
  });

  it("maps a missing binary to CommandFailureError without exit code", async () => {
    const spawnError = Object.assign(new Error("spawn tailscale ENOENT"), { code: "ENOENT" });
    respondWith(spawnError, "");

    const err = await fetchError(new StatusFetcher());

    expect(err).toBeInstanceOf(CommandFailureError);
    expect(err).toMatchObject({ exitCode: null, message: "spawn tailscale ENOENT" });
  });

  it("treats diagnostic output on a successful exit as a failure", async () => {
    respondWith(null, loadStatusFixture(), "Warning: client version mismatch\n");

    const err = await fetchError(new StatusFetcher());

    expect(err).toBeInstanceOf(CommandFailureError);
    expect(err).toMatchObject({ exitCode: 0, stderr: "Warning: client version mismatch" });
  });

  it("maps oversized output to CommandFailureError", async () => {
    respondWith(execError({ code: "ERR_CHILD_PROCESS_STDIO_MAXBUFFER", killed: true, signal: "SIGTERM" }), "");

    const err = await fetchError(new StatusFetcher({ maxBufferBytes: 1024 }));

    expect(err).toBeInstanceOf(CommandFailureError);
    expect(err).toMatchObject({ message: "tailscale status output too large" });
  });

  it("maps undecodable output to DecodeFailureError", async () => {
    respondWith(null, "<html>not json</html>");

    const err = await fetchError(new StatusFetcher());

    expect(err).toBeInstanceOf(DecodeFailureError);
    expect(err).toMatchObject({ snippet: "<html>not json</html>" });
  });
});
