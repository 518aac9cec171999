/**
 * Restart Command
 * Stop a service, then start it again
 */

import { runLifecycleCommand } from "../utils/lifecycle.js";

/**
 * Restart command handler
 */
export async function restartCommand(target: string): Promise<void> {
  await runLifecycleCommand("restart", target);
}
