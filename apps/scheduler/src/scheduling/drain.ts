import type { DelayedStore } from "../data/delayed-store.js";
import type { JobQueue } from "../data/job-queue.js";
import type { SchedulerEvents } from "../events/scheduler-events.js";
import type { Logger } from "../lib/logger.js";
import { formatTimestamp, toUnixSeconds } from "../lib/time.js";
import { NOW, type DueTimestamp, type Horizon } from "../types.js";

export interface DrainDeps {
  store: DelayedStore;
  queue: JobQueue;
  events: SchedulerEvents;
  logger: Logger;
  /** Called before each timestamp is drained. */
  onTimestamp?: (timestamp: number) => void;
}

export interface DrainEngine {
  drainDue(horizon?: Horizon): Promise<number>;
  drainTimestamp(timestamp: DueTimestamp): Promise<number>;
}

/**
 * Moves due jobs from the delayed store to the job queue. Jobs run strictly
 * one after another; a timestamp is emptied before the next one is queried,
 * so dispatch order follows due time. Nothing here catches: a failed pop,
 * hook or dispatch ends the pass and reaches the caller.
 */
export function createDrainEngine(deps: DrainDeps): DrainEngine {
  const { store, queue, events, logger } = deps;

  async function drainTimestamp(timestamp: DueTimestamp): Promise<number> {
    let dispatched = 0;
    let job = await store.popJob(timestamp);
    while (job) {
      const ts = toUnixSeconds(timestamp);
      logger.log(
        "notice",
        "Queueing {taskId} scheduled to {datetime} in {queue} queue with args {args}",
        {
          taskId: job.taskId,
          queue: job.queue,
          args: JSON.stringify(job.args),
          datetime: formatTimestamp(ts),
        },
      );
      await events.trigger("beforeDelayedEnqueue", {
        queue: job.queue,
        taskId: job.taskId,
        args: job.args,
      });
      await queue.dispatch(job.queue, job.taskId, ...job.args);
      dispatched++;
      job = await store.popJob(timestamp);
    }
    return dispatched;
  }

  async function drainDue(horizon: Horizon = NOW): Promise<number> {
    let dispatched = 0;
    let ts = await store.nextDueTimestamp(horizon);
    while (ts !== null) {
      deps.onTimestamp?.(ts);
      dispatched += await drainTimestamp(ts);
      ts = await store.nextDueTimestamp(horizon);
    }
    return dispatched;
  }

  return { drainDue, drainTimestamp };
}
