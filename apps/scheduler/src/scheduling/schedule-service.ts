/**
 * Producer-facing API: put jobs into the delayed store, inspect it, and take
 * jobs back out before they come due. The worker only ever drains.
 */
import { z } from "zod";
import type { DelayedStore } from "../data/delayed-store.js";
import { InvalidJobError } from "../errors.js";
import type { SchedulerEvents } from "../events/scheduler-events.js";
import { toUnixSeconds } from "../lib/time.js";
import {
  systemClock,
  type Clock,
  type DueTimestamp,
  type ScheduledJob,
} from "../types.js";

const JobSchema = z.object({
  taskId: z.string().min(1, "Jobs must be given a task."),
  queue: z.string().min(1, "Jobs must be put in a queue."),
  args: z.array(z.unknown()),
});

export function validateJob(
  queue: string,
  taskId: string,
  args: unknown[],
): ScheduledJob {
  const result = JobSchema.safeParse({ taskId, queue, args });
  if (!result.success) {
    throw new InvalidJobError(
      result.error.issues[0]?.message ?? "Invalid job.",
    );
  }
  return result.data;
}

export interface ScheduleService {
  enqueueAt(
    at: DueTimestamp,
    queue: string,
    taskId: string,
    args?: unknown[],
  ): Promise<void>;
  enqueueIn(
    seconds: number,
    queue: string,
    taskId: string,
    args?: unknown[],
  ): Promise<void>;
  removeDelayed(queue: string, taskId: string, args?: unknown[]): Promise<number>;
  removeDelayedJobFromTimestamp(
    at: DueTimestamp,
    queue: string,
    taskId: string,
    args?: unknown[],
  ): Promise<number>;
  getDelayedQueueScheduleSize(): Promise<number>;
  getDelayedTimestampSize(at: DueTimestamp): Promise<number>;
}

export interface ScheduleServiceOptions {
  store: DelayedStore;
  events: SchedulerEvents;
  clock?: Clock;
}

export function createScheduleService(
  options: ScheduleServiceOptions,
): ScheduleService {
  const { store, events } = options;
  const clock = options.clock ?? systemClock;

  async function enqueueAt(
    at: DueTimestamp,
    queue: string,
    taskId: string,
    args: unknown[] = [],
  ): Promise<void> {
    const job = validateJob(queue, taskId, args);
    const ts = toUnixSeconds(at);
    await store.push(ts, job);
    await events.trigger("afterSchedule", { at: ts, ...job });
  }

  return {
    enqueueAt,

    async enqueueIn(seconds, queue, taskId, args = []) {
      await enqueueAt(clock() + seconds, queue, taskId, args);
    },

    async removeDelayed(queue, taskId, args = []) {
      return store.remove({ queue, taskId, args });
    },

    async removeDelayedJobFromTimestamp(at, queue, taskId, args = []) {
      return store.removeFromTimestamp(at, { queue, taskId, args });
    },

    async getDelayedQueueScheduleSize() {
      return store.scheduleSize();
    },

    async getDelayedTimestampSize(at) {
      return store.timestampSize(at);
    },
  };
}
