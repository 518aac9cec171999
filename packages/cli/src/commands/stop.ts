/**
 * Stop Command
 * Boot a service out of launchd
 */

import { runLifecycleCommand } from "../utils/lifecycle.js";

/**
 * Stop command handler
 */
export async function stopCommand(target: string): Promise<void> {
  await runLifecycleCommand("stop", target);
}
