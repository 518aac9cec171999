/**
 * Start Command
 * Bootstrap a service into launchd
 */

import { runLifecycleCommand } from "../utils/lifecycle.js";

/**
 * Start command handler
 */
export async function startCommand(target: string): Promise<void> {
  await runLifecycleCommand("start", target);
}
