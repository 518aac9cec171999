import { describe, expect, it } from "vitest";
import { COMMAND_NOT_FOUND, describeFailure, runCommand } from "../src/utils/exec.js";
import { failed, succeeded, timedOut } from "./helpers.js";

describe("runCommand", () => {
  it("maps a missing executable to exit code 127 without throwing", async () => {
    const result = await runCommand("launchboard-test-no-such-binary", ["list"], { timeoutMs: 1000 });

    expect(result.success).toBe(false);
    expect(result.code).toBe(COMMAND_NOT_FOUND);
    expect(result.timedOut).toBe(false);
  });

  it("kills a child that ignores SIGTERM once the timeout passes", async () => {
    const startedAt = Date.now();
    const result = await runCommand("sh", ["-c", "trap '' TERM; exec sleep 3"], { timeoutMs: 200 });

    expect(Date.now() - startedAt).toBeLessThan(2000);
    expect(result.success).toBe(false);
    expect(result.timedOut).toBe(true);
  });

  it("returns stdout of a successful command", async () => {
    const result = await runCommand("sh", ["-c", "echo ready"], { timeoutMs: 2000 });

    expect(result).toEqual({ stdout: "ready\n", stderr: "", code: 0, success: true, timedOut: false });
  });

  it("reports a non-zero exit with its stderr", async () => {
    const result = await runCommand("sh", ["-c", "echo broken >&2; exit 3"], { timeoutMs: 2000 });

    expect(result.success).toBe(false);
    expect(result.code).toBe(3);
    expect(result.stderr).toBe("broken");
    expect(result.timedOut).toBe(false);
  });
});

describe("describeFailure", () => {
  it("describes a timeout", () => {
    expect(describeFailure(timedOut(), 10000)).toBe("timed out after 10000ms");
  });

  it("prefers stderr", () => {
    expect(describeFailure(failed(5, "  Bootstrap failed: 5  \n"), 10000)).toBe("exit code 5: Bootstrap failed: 5");
  });

  it("falls back to stdout and then to the bare code", () => {
    expect(describeFailure({ ...succeeded("partial output"), success: false, code: 2 }, 10000)).toBe(
      "exit code 2: partial output"
    );
    expect(describeFailure(failed(9), 10000)).toBe("exit code 9");
  });
});
