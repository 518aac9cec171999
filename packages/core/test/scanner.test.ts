import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DirectoryScanner } from "../src/service/scanner.js";
import { StatusProber } from "../src/service/prober.js";
import type { RuntimeStatus, ServiceDefinition } from "../src/service/types.js";
import { ok } from "../src/types/common.js";
import { failed, fakeRunner, makeTempDir, removeDir, timedOut, writePlist } from "./helpers.js";

const stoppedProber = () => ({
  probe: vi.fn(async (_label: string): Promise<RuntimeStatus> => ({ state: "stopped" })),
});

describe("DirectoryScanner", () => {
  let base: string;
  let agents: string;
  let daemons: string;

  beforeEach(async () => {
    base = await makeTempDir();
    agents = path.join(base, "LaunchAgents");
    daemons = path.join(base, "LaunchDaemons");
    await fs.mkdir(agents);
    await fs.mkdir(daemons);
  });

  afterEach(async () => {
    await removeDir(base);
  });

  it("builds one record per definition across roots in order", async () => {
    await writePlist(daemons, "org.test.db.plist", { Label: "org.test.db", ProgramArguments: ["/usr/bin/db"] });
    await writePlist(agents, "com.test.b.plist", { Label: "com.test.b", ProgramArguments: ["/bin/b"] });
    await writePlist(agents, "com.test.a.plist", { Label: "com.test.a", ProgramArguments: ["/bin/a"] });

    const scanner = new DirectoryScanner({ prober: stoppedProber() });
    const result = await scanner.scan([daemons, agents]);

    expect(result.services.map((record) => record.definition.label)).toEqual([
      "org.test.db",
      "com.test.a",
      "com.test.b",
    ]);
    expect(result.services[1].sourcePath).toBe(path.join(agents, "com.test.a.plist"));
    expect(result.services[1].status).toEqual({ state: "stopped" });
    expect(result.warnings).toEqual([]);
  });

  it("probes with the definition's label", async () => {
    await writePlist(agents, "file-name.plist", { Label: "com.test.declared", ProgramArguments: ["/bin/x"] });
    const prober = stoppedProber();

    await new DirectoryScanner({ prober }).scan([agents]);

    expect(prober.probe).toHaveBeenCalledWith("com.test.declared");
  });

  it("keeps a record whose launchctl query fails, with an unknown status", async () => {
    await writePlist(agents, "com.test.unloaded.plist", { Label: "com.test.unloaded", ProgramArguments: ["/bin/u"] });
    const prober = new StatusProber({ runner: fakeRunner(() => failed(113, "Could not find service")) });

    const result = await new DirectoryScanner({ prober }).scan([agents]);

    expect(result.services).toHaveLength(1);
    expect(result.services[0].definition.label).toBe("com.test.unloaded");
    expect(result.services[0].status).toEqual({
      state: "unknown",
      reason: "exit code 113: Could not find service",
    });
    expect(result.warnings).toEqual([]);
  });

  it("keeps a record whose launchctl query times out, with an unknown status", async () => {
    await writePlist(agents, "com.test.slow.plist", { Label: "com.test.slow", ProgramArguments: ["/bin/s"] });
    const prober = new StatusProber({ runner: fakeRunner(() => timedOut()) });

    const result = await new DirectoryScanner({ prober }).scan([agents]);

    expect(result.services).toHaveLength(1);
    expect(result.services[0].status).toEqual({ state: "unknown", reason: "timed out after 5000ms" });
  });

  it("skips vendor definitions and other extensions", async () => {
    await writePlist(agents, "com.apple.test.plist", { Label: "com.apple.test" });
    await writePlist(agents, "com.test.keep.plist", { Label: "com.test.keep" });
    await fs.writeFile(path.join(agents, "notes.txt"), "not a definition", "utf-8");

    const result = await new DirectoryScanner({ prober: stoppedProber() }).scan([agents]);

    expect(result.services.map((record) => record.definition.label)).toEqual(["com.test.keep"]);
  });

  it("skips a missing root without a warning", async () => {
    await writePlist(agents, "com.test.only.plist", { Label: "com.test.only" });

    const result = await new DirectoryScanner({ prober: stoppedProber() }).scan([path.join(base, "absent"), agents]);

    expect(result.services).toHaveLength(1);
    expect(result.warnings).toEqual([]);
  });

  it("reports an unreadable root and keeps scanning the others", async () => {
    const notADirectory = path.join(base, "plain-file");
    await fs.writeFile(notADirectory, "", "utf-8");
    await writePlist(agents, "com.test.after.plist", { Label: "com.test.after" });

    const result = await new DirectoryScanner({ prober: stoppedProber() }).scan([notADirectory, agents]);

    expect(result.services.map((record) => record.definition.label)).toEqual(["com.test.after"]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].kind).toBe("root");
    expect(result.warnings[0].path).toBe(notADirectory);
    expect(result.warnings[0].error.message.startsWith(`Error loading ${notADirectory}: `)).toBe(true);
  });

  it("omits a definition that fails to parse and reports it", async () => {
    await writePlist(agents, "com.test.good.plist", { Label: "com.test.good" });
    const broken = path.join(agents, "com.test.broken.plist");
    await fs.writeFile(broken, "this is not a property list", "utf-8");

    const result = await new DirectoryScanner({ prober: stoppedProber() }).scan([agents]);

    expect(result.services.map((record) => record.definition.label)).toEqual(["com.test.good"]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({ kind: "file", path: broken });
  });

  it("lists a root named twice only once", async () => {
    await writePlist(agents, "com.test.once.plist", { Label: "com.test.once" });

    const result = await new DirectoryScanner({ prober: stoppedProber() }).scan([agents, agents]);

    expect(result.services).toHaveLength(1);
  });

  it("yields the same set when nothing changed", async () => {
    await writePlist(agents, "com.test.a.plist", { Label: "com.test.a", ProgramArguments: ["/bin/a"] });
    await writePlist(agents, "com.test.b.plist", { Label: "com.test.b", ProgramArguments: ["/bin/b"] });
    const scanner = new DirectoryScanner({ prober: stoppedProber() });

    const first = await scanner.scan([agents]);
    const second = await scanner.scan([agents]);

    expect(second.services).toEqual(first.services);
  });

  it("uses an injected parser", async () => {
    await fs.writeFile(path.join(agents, "com.test.custom.plist"), "", "utf-8");
    const parser = vi.fn(async (_filePath: string) =>
      ok<ServiceDefinition>({
        label: "com.test.injected",
        programPath: "/bin/injected",
        programArguments: [],
        runAtLoad: false,
        keepAlive: false,
        raw: {},
      })
    );

    const result = await new DirectoryScanner({ prober: stoppedProber(), parser }).scan([agents]);

    expect(parser).toHaveBeenCalledWith(path.join(agents, "com.test.custom.plist"));
    expect(result.services[0].definition.label).toBe("com.test.injected");
  });

  it("returns frozen results", async () => {
    await writePlist(agents, "com.test.a.plist", { Label: "com.test.a" });

    const result = await new DirectoryScanner({ prober: stoppedProber() }).scan([agents]);

    expect(Object.isFrozen(result.services)).toBe(true);
    expect(Object.isFrozen(result.services[0])).toBe(true);
  });
});
