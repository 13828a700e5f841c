import type { Logger } from "./logger.js";

/**
 * Close every resource even when some fail. Failures are logged, never
 * thrown, so an error that ended the run is still the one reported.
 */
export async function closeAll(
  resources: Record<string, () => Promise<unknown>>,
  logger: Logger,
): Promise<void> {
  const names = Object.keys(resources);
  const results = await Promise.allSettled(names.map((name) => resources[name]?.()));
  results.forEach((result, i) => {
    if (result.status === "rejected") {
      logger.log("warning", "Failed to close {resource}: {exception}", {
        resource: names[i],
        exception: result.reason,
      });
    }
  });
}
