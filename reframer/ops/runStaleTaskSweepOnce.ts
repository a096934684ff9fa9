import "dotenv/config";
import { reframeLogHelpers } from "../../logging/reframeLog.js";
import { getConfig } from "../config/loadConfig.js";
import { markStaleTasksFailed } from "../tasks/taskStore.js";

/**
 * Fails tasks that have been processing for longer than the configured
 * window, e.g. after a server restart mid-request.
 */
export async function runStaleTaskSweepOnce(now: Date = new Date()): Promise<string[]> {
  const staleCutoff = new Date(now.getTime() - getConfig().staleProcessingMs);
  const taskIds = await markStaleTasksFailed(staleCutoff);

  if (taskIds.length > 0) {
    reframeLogHelpers.staleSwept({ count: taskIds.length, task_ids: taskIds });
  } else {
    console.log("[stale-sweep] nothing to sweep", { cutoff: staleCutoff.toISOString() });
  }
  return taskIds;
}

if (process.argv[1]) {
  const invokedPath = (() => {
    try {
      return new URL(`file://${process.argv[1]}`).href;
    } catch {
      return undefined;
    }
  })();
  if (invokedPath && invokedPath === import.meta.url) {
    runStaleTaskSweepOnce().catch((e) => {
      console.error(e);
      process.exit(1);
    });
  }
}
