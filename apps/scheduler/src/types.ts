/**
 * Shared types for the delayed scheduler. Persistence lives in data/delayed-store,
 * dispatch in data/job-queue, the drain loop in scheduling/ and workers/.
 */

/** Unix time in whole seconds, or a Date that resolves to one. */
export type DueTimestamp = number | Date;

/**
 * Upper bound for due-timestamp queries. "now" is resolved against the store
 * clock on every query, so time that passes during a drain is picked up.
 */
export type Horizon = { kind: "now" } | { kind: "at"; at: DueTimestamp };

export const NOW: Horizon = { kind: "now" };

export interface ScheduledJob {
  queue: string;
  taskId: string;
  args: unknown[];
}

/** Returns the current unix time in seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export type WorkerStatus =
  | "Starting"
  | "Processing Delayed Items"
  | "Waiting"
  | "Stopped";
