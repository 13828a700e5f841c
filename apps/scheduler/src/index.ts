export { env, VERSION } from "./env.js";
export * from "./errors.js";
export * from "./types.js";
export {
  createRedisDelayedStore,
  decodeJob,
  encodeJob,
  type DelayedStore,
  type RedisDelayedStoreOptions,
} from "./data/delayed-store.js";
export {
  bullQueueFactory,
  createJobQueue,
  type DispatchedJobData,
  type JobQueue,
  type QueueFactory,
  type QueueHandle,
} from "./data/job-queue.js";
export {
  closeRedis,
  delayedCommands,
  initRedis,
  type DelayedCommands,
} from "./data/redis.js";
export {
  SchedulerEvents,
  type SchedulerEventHandler,
  type SchedulerEventMap,
  type SchedulerEventName,
} from "./events/scheduler-events.js";
export { createLogger, type LogLevel, type Logger } from "./lib/logger.js";
export { createDrainEngine, type DrainEngine } from "./scheduling/drain.js";
export {
  createScheduleService,
  validateJob,
  type ScheduleService,
} from "./scheduling/schedule-service.js";
export {
  detectSignalSource,
  ShutdownCoordinator,
  type SignalSource,
} from "./scheduling/shutdown.js";
export {
  SchedulerWorker,
  type SchedulerWorkerOptions,
} from "./workers/scheduler-worker.js";
