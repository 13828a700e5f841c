/**
 * Time-ordered store of jobs that are not yet due. Layout matches
 * resque-scheduler so existing producers and tooling keep working:
 *
 *   <prefix>:delayed_queue_schedule  sorted set, score = member = unix seconds
 *   <prefix>:delayed:<ts>            list of JSON {"class","args","queue"}
 *
 * Pops, pushes and removals each run as one Lua script: LPOP keeps a job to a
 * single worker, and a timestamp is only dropped from the schedule while its
 * list is still empty.
 */
import { z } from "zod";
import { InvalidPayloadError } from "../errors.js";
import { resolveHorizon, toUnixSeconds } from "../lib/time.js";
import {
  systemClock,
  type Clock,
  type DueTimestamp,
  type Horizon,
  type ScheduledJob,
} from "../types.js";
import type { DelayedCommands } from "./redis.js";

export interface DelayedStore {
  /** Earliest timestamp at or before the horizon that still has jobs, or null. */
  nextDueTimestamp(horizon: Horizon): Promise<number | null>;
  /** Atomically remove and return one job for the timestamp, or null when none remain. */
  popJob(timestamp: DueTimestamp): Promise<ScheduledJob | null>;
  push(timestamp: DueTimestamp, job: ScheduledJob): Promise<void>;
  scheduleSize(): Promise<number>;
  timestampSize(timestamp: DueTimestamp): Promise<number>;
  /** Remove every pending copy of the job across all timestamps. */
  remove(job: ScheduledJob): Promise<number>;
  removeFromTimestamp(timestamp: DueTimestamp, job: ScheduledJob): Promise<number>;
}

const StoredItemSchema = z.object({
  class: z.string().min(1),
  args: z.array(z.unknown()),
  queue: z.string().min(1),
});

/** Stored encoding; LREM matching depends on this exact key order. */
export function encodeJob(job: ScheduledJob): string {
  return JSON.stringify({ class: job.taskId, args: job.args, queue: job.queue });
}

export function decodeJob(raw: string): ScheduledJob {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new InvalidPayloadError(
      `Delayed item is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      raw,
    );
  }
  const result = StoredItemSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidPayloadError(
      `Delayed item is not a job: ${result.error.issues[0]?.message ?? "invalid"}`,
      raw,
    );
  }
  return {
    queue: result.data.queue,
    taskId: result.data.class,
    args: result.data.args,
  };
}

export interface RedisDelayedStoreOptions {
  prefix?: string;
  clock?: Clock;
}

export function createRedisDelayedStore(
  redis: DelayedCommands,
  options: RedisDelayedStoreOptions = {},
): DelayedStore {
  const prefix = options.prefix ?? "resque";
  const clock = options.clock ?? systemClock;
  const scheduleKey = `${prefix}:delayed_queue_schedule`;
  const listKey = (ts: number) => `${prefix}:delayed:${ts}`;

  async function removeAt(ts: number, encoded: string): Promise<number> {
    return redis.removeAndCleanup(listKey(ts), scheduleKey, String(ts), encoded);
  }

  return {
    async nextDueTimestamp(horizon) {
      const max = resolveHorizon(horizon, clock);
      const [first] = await redis.zrangeUpTo(scheduleKey, max, 1);
      return first === undefined ? null : Number(first);
    },

    async popJob(timestamp) {
      const ts = toUnixSeconds(timestamp);
      const raw = await redis.popAndCleanup(listKey(ts), scheduleKey, String(ts));
      return raw === null ? null : decodeJob(raw);
    },

    async push(timestamp, job) {
      const ts = toUnixSeconds(timestamp);
      await redis.pushScheduled(listKey(ts), scheduleKey, ts, encodeJob(job));
    },

    async scheduleSize() {
      return redis.zcard(scheduleKey);
    },

    async timestampSize(timestamp) {
      return redis.llen(listKey(toUnixSeconds(timestamp)));
    },

    async remove(job) {
      const encoded = encodeJob(job);
      let removed = 0;
      for (const member of await redis.zmembers(scheduleKey)) {
        removed += await removeAt(Number(member), encoded);
      }
      return removed;
    },

    async removeFromTimestamp(timestamp, job) {
      return removeAt(toUnixSeconds(timestamp), encodeJob(job));
    },
  };
}
