import { describe, expect, it, vi } from "vitest";
import type { ExecutionResult, RunOptions } from "@launchboard/core";
import { OPEN_TIMEOUT_MS, openInEditor, revealInFolder } from "../src/utils/open.js";

const runnerReturning = (result: ExecutionResult) =>
  vi.fn(async (_file: string, _args: readonly string[], _options: RunOptions): Promise<ExecutionResult> => result);

const OK: ExecutionResult = { stdout: "", stderr: "", code: 0, success: true, timedOut: false };

describe("openInEditor", () => {
  it("opens the file with the default text editor", async () => {
    const runner = runnerReturning(OK);

    const result = await openInEditor("/Library/LaunchDaemons/org.test.api.plist", runner);

    expect(runner).toHaveBeenCalledWith("open", ["-t", "/Library/LaunchDaemons/org.test.api.plist"], {
      timeoutMs: OPEN_TIMEOUT_MS,
    });
    expect(result).toEqual({
      success: true,
      data: "Opened /Library/LaunchDaemons/org.test.api.plist in text editor",
    });
  });

  it("reports a failure from open", async () => {
    const runner = runnerReturning({ ...OK, success: false, code: 1, stderr: "The file does not exist." });

    const result = await openInEditor("/tmp/gone.plist", runner);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("Failed to open /tmp/gone.plist: exit code 1: The file does not exist.");
  });
});

describe("revealInFolder", () => {
  it("opens the containing directory", async () => {
    const runner = runnerReturning(OK);

    const result = await revealInFolder("/Library/LaunchDaemons/org.test.api.plist", runner);

    expect(runner).toHaveBeenCalledWith("open", ["/Library/LaunchDaemons"], { timeoutMs: 5000 });
    expect(result).toEqual({ success: true, data: "Opened folder: /Library/LaunchDaemons" });
  });

  it("reports a timeout", async () => {
    const runner = runnerReturning({ ...OK, success: false, code: 1, timedOut: true });

    const result = await revealInFolder("/Library/LaunchDaemons/org.test.api.plist", runner);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("Failed to open folder /Library/LaunchDaemons: timed out after 5000ms");
  });
});
