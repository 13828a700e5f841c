/**
 * Scheduler worker: drains the delayed store into BullMQ every
 * SCHEDULER_INTERVAL seconds until SIGINT/SIGTERM/SIGQUIT, then finishes the
 * pass in progress and exits. Pass --once for a single drain pass.
 * Run several of these against one Redis if needed; LPOP keeps each job to one worker.
 */
import { Redis } from "ioredis";
import { bullQueueFactory, createJobQueue } from "../data/job-queue.js";
import { createRedisDelayedStore } from "../data/delayed-store.js";
import { closeRedis, delayedCommands, initRedis } from "../data/redis.js";
import { env } from "../env.js";
import { SchedulerEvents } from "../events/scheduler-events.js";
import { closeAll } from "../lib/close-all.js";
import { createLogger } from "../lib/logger.js";
import { SchedulerWorker } from "./scheduler-worker.js";

const logger = createLogger("workers:scheduler");

async function main(): Promise<void> {
  const redis = initRedis(env.REDIS_URL);

  // BullMQ needs its own connection that never gives up on a request
  const bullConnection = new Redis(env.REDIS_URL, { maxRetriesPerRequest: null });
  const queue = createJobQueue(bullQueueFactory(bullConnection));
  const store = createRedisDelayedStore(delayedCommands(redis), {
    prefix: env.REDIS_PREFIX,
  });
  const worker = new SchedulerWorker({
    store,
    queue,
    events: new SchedulerEvents(),
    logger,
  });

  try {
    if (process.argv.includes("--once")) {
      const count = await worker.handleDelayedItems();
      logger.log("notice", "Dispatched {count} delayed job(s)", { count });
    } else {
      await worker.work(env.SCHEDULER_INTERVAL);
    }
  } finally {
    await closeAll(
      {
        queue: () => queue.close(),
        bullmq: () => bullConnection.quit(),
        redis: () => closeRedis(),
      },
      logger,
    );
  }
}

main()
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    logger.log("error", "Scheduler worker failed: {exception}", {
      exception: err,
    });
    process.exit(1);
  });
