/**
 * Shared Redis client. Call initRedis(redisUrl) once at process startup;
 * later calls return the same client.
 */
import { Redis } from "ioredis";
import { createLogger } from "../lib/logger.js";

const logger = createLogger("data:redis");

let client: Redis | null = null;

const DEFAULT_OPTIONS = { maxRetriesPerRequest: 3 };

export function initRedis(redisUrl: string): Redis {
  if (client) return client;
  client = new Redis(redisUrl, { ...DEFAULT_OPTIONS });
  client.on("error", (err: Error) => {
    // commands reject on their own; this only keeps the emitter from throwing
    logger.log("error", "Redis connection error: {exception}", {
      exception: err,
    });
  });
  return client;
}

/**
 * Close the shared client. Call on process shutdown.
 */
export async function closeRedis(): Promise<void> {
  if (client) {
    const closing = client;
    client = null;
    await closing.quit();
  }
}

/**
 * The Redis commands the delayed store issues. Every write that touches both
 * a timestamp list and the schedule set is one atomic step, so a producer
 * writing to a second that a worker is just emptying cannot lose its job.
 * Kept narrow so an in-process stand-in can implement it for tests.
 */
export interface DelayedCommands {
  /** RPUSH listKey value; ZADD scheduleKey score score */
  pushScheduled(
    listKey: string,
    scheduleKey: string,
    score: number,
    value: string,
  ): Promise<void>;
  /** LPOP listKey, then drop listKey and member from the schedule if the list is empty. */
  popAndCleanup(
    listKey: string,
    scheduleKey: string,
    member: string,
  ): Promise<string | null>;
  /** LREM listKey 0 value, then the same cleanup as popAndCleanup. */
  removeAndCleanup(
    listKey: string,
    scheduleKey: string,
    member: string,
    value: string,
  ): Promise<number>;
  llen(key: string): Promise<number>;
  zcard(key: string): Promise<number>;
  /** ZRANGEBYSCORE key -inf max LIMIT 0 count */
  zrangeUpTo(key: string, max: number, count: number): Promise<string[]>;
  /** Every member, lowest score first. */
  zmembers(key: string): Promise<string[]>;
}

const PUSH_SCHEDULED = `
redis.call('RPUSH', KEYS[1], ARGV[2])
redis.call('ZADD', KEYS[2], ARGV[1], ARGV[1])
return 1
`;

const POP_AND_CLEANUP = `
local item = redis.call('LPOP', KEYS[1])
if redis.call('LLEN', KEYS[1]) == 0 then
  redis.call('DEL', KEYS[1])
  redis.call('ZREM', KEYS[2], ARGV[1])
end
return item
`;

const REMOVE_AND_CLEANUP = `
local removed = redis.call('LREM', KEYS[1], 0, ARGV[2])
if redis.call('LLEN', KEYS[1]) == 0 then
  redis.call('DEL', KEYS[1])
  redis.call('ZREM', KEYS[2], ARGV[1])
end
return removed
`;

export function delayedCommands(redis: Redis): DelayedCommands {
  return {
    async pushScheduled(listKey, scheduleKey, score, value) {
      await redis.eval(PUSH_SCHEDULED, 2, listKey, scheduleKey, score, value);
    },
    async popAndCleanup(listKey, scheduleKey, member) {
      const item = await redis.eval(POP_AND_CLEANUP, 2, listKey, scheduleKey, member);
      return typeof item === "string" ? item : null;
    },
    async removeAndCleanup(listKey, scheduleKey, member, value) {
      const removed = await redis.eval(
        REMOVE_AND_CLEANUP,
        2,
        listKey,
        scheduleKey,
        member,
        value,
      );
      return Number(removed);
    },
    llen: (key) => redis.llen(key),
    zcard: (key) => redis.zcard(key),
    zrangeUpTo: (key, max, count) =>
      redis.zrangebyscore(key, "-inf", max, "LIMIT", 0, count),
    zmembers: (key) => redis.zrange(key, 0, -1),
  };
}
