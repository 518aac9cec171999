/**
 * Status Prober
 * Asks launchctl about one label and classifies the answer
 */

import { logger } from "../utils/logger.js";
import { runCommand, describeFailure } from "../utils/exec.js";
import type { CommandRunner } from "../utils/exec.js";
import { describeCause } from "./errors.js";
import type { RuntimeStatus } from "./types.js";

export interface StatusProberOptions {
  launchctlPath?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

const unknown = (reason: string): RuntimeStatus => ({ state: "unknown", reason });

/**
 * Classify the output of `launchctl list <label>`.
 * The second line is read as `<pid|-> <status> <label>`.
 */
export const parseListOutput = (stdout: string): RuntimeStatus => {
  const lines = stdout.trim().split("\n");
  if (lines.length < 2) {
    return unknown("no status line in launchctl output");
  }

  const fields = lines[1].trim().split(/\s+/);
  if (fields.length < 3) {
    return unknown(`unexpected status line: ${lines[1].trim()}`);
  }

  const [pidField] = fields;
  if (pidField === "-") {
    return { state: "stopped" };
  }

  if (!/^\d+$/.test(pidField)) {
    return unknown(`unexpected pid field: ${pidField}`);
  }

  const pid = Number.parseInt(pidField, 10);
  if (pid <= 0) {
    return unknown(`unexpected pid field: ${pidField}`);
  }
  return { state: "running", pid };
};

/**
 * Status Prober class
 */
export class StatusProber {
  private readonly launchctlPath: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: StatusProberOptions = {}) {
    this.launchctlPath = options.launchctlPath ?? "launchctl";
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.runner = options.runner ?? runCommand;
  }

  /**
   * Probe one label. Never rejects; failures degrade to an unknown status.
   */
  public async probe(label: string): Promise<RuntimeStatus> {
    try {
      const result = await this.runner(this.launchctlPath, ["list", label], { timeoutMs: this.timeoutMs });

      if (!result.success) {
        const reason = describeFailure(result, this.timeoutMs);
        logger.debug("Status probe failed", { label, reason });
        return unknown(reason);
      }

      return parseListOutput(result.stdout);
    } catch (error) {
      const reason = describeCause(error);
      logger.debug("Status probe failed", { label, reason });
      return unknown(reason);
    }
  }
}
