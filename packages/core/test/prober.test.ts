import { describe, expect, it } from "vitest";
import { StatusProber, parseListOutput } from "../src/service/prober.js";
import { failed, fakeRunner, listOutput, succeeded, timedOut } from "./helpers.js";

describe("parseListOutput", () => {
  it("reads a running pid", () => {
    expect(parseListOutput("PID\tStatus\tLabel\n1234  0  com.test.foo\n")).toEqual({ state: "running", pid: 1234 });
  });

  it("reads a dash as stopped", () => {
    expect(parseListOutput("PID\tStatus\tLabel\n-    0  com.test.foo")).toEqual({ state: "stopped" });
  });

  it("is unknown without a second line", () => {
    expect(parseListOutput("PID\tStatus\tLabel")).toEqual({
      state: "unknown",
      reason: "no status line in launchctl output",
    });
  });

  it("is unknown with fewer than three fields", () => {
    expect(parseListOutput("header\n1234 0")).toEqual({
      state: "unknown",
      reason: "unexpected status line: 1234 0",
    });
  });

  it("is unknown when the pid field is not a number", () => {
    expect(parseListOutput('{\n\t"LimitLoadToSessionType" = "Aqua";\n}')).toEqual({
      state: "unknown",
      reason: 'unexpected pid field: "LimitLoadToSessionType"',
    });
  });

  it("is unknown for a zero pid", () => {
    expect(parseListOutput("header\n0 0 com.test.foo").state).toBe("unknown");
  });
});

describe("StatusProber", () => {
  it("runs launchctl list with the label", async () => {
    const runner = fakeRunner(() => succeeded(listOutput("com.test.foo", 42)));
    const prober = new StatusProber({ runner, timeoutMs: 1500 });

    const status = await prober.probe("com.test.foo");

    expect(status).toEqual({ state: "running", pid: 42 });
    expect(runner).toHaveBeenCalledWith("launchctl", ["list", "com.test.foo"], { timeoutMs: 1500 });
  });

  it("uses the configured launchctl path", async () => {
    const runner = fakeRunner(() => succeeded(listOutput("com.test.foo", "-")));
    const prober = new StatusProber({ runner, launchctlPath: "/bin/launchctl" });

    await prober.probe("com.test.foo");

    expect(runner).toHaveBeenCalledWith("/bin/launchctl", ["list", "com.test.foo"], { timeoutMs: 5000 });
  });

  it("is unknown when launchctl exits non-zero", async () => {
    const runner = fakeRunner(() => failed(113, 'Could not find service "com.test.foo" in domain for port'));
    const prober = new StatusProber({ runner });

    const status = await prober.probe("com.test.foo");

    expect(status).toEqual({
      state: "unknown",
      reason: 'exit code 113: Could not find service "com.test.foo" in domain for port',
    });
  });

  it("is unknown when the probe times out", async () => {
    const prober = new StatusProber({ runner: fakeRunner(() => timedOut()), timeoutMs: 250 });

    expect(await prober.probe("com.test.slow")).toEqual({ state: "unknown", reason: "timed out after 250ms" });
  });

  it("never rejects when the runner throws", async () => {
    const prober = new StatusProber({
      runner: fakeRunner(() => {
        throw new Error("spawn failed");
      }),
    });

    expect(await prober.probe("com.test.foo")).toEqual({ state: "unknown", reason: "spawn failed" });
  });
});
