import type { DelayedStore } from "../data/delayed-store.js";
import type { JobQueue } from "../data/job-queue.js";
import { env } from "../env.js";
import { InvalidIntervalError } from "../errors.js";
import type { SchedulerEvents } from "../events/scheduler-events.js";
import {
  processTitle,
  setProcessTitle,
  workerIdentity,
  type TitleSetter,
} from "../lib/identity.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { createDrainEngine, type DrainEngine } from "../scheduling/drain.js";
import {
  detectSignalSource,
  ShutdownCoordinator,
  type SignalSource,
} from "../scheduling/shutdown.js";
import { NOW, type DueTimestamp, type Horizon, type WorkerStatus } from "../types.js";

export interface SchedulerWorkerOptions {
  store: DelayedStore;
  queue: JobQueue;
  events: SchedulerEvents;
  logger?: Logger;
  /** Defaults to the process; pass null where the runtime has no signals. */
  signals?: SignalSource | null;
  setTitle?: TitleSetter;
  sleep?: (ms: number) => Promise<void>;
  identity?: string;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Moves delayed jobs into the job queue once they come due.
 *
 * Every `interval` seconds the delayed store is drained of everything due as
 * of now. Shutdown is cooperative: a signal or shutdown() sets a flag that is
 * looked at between passes, so a pass that has started always finishes.
 */
export class SchedulerWorker {
  readonly logger: Logger;
  private readonly id: string;
  private readonly drain: DrainEngine;
  private readonly coordinator: ShutdownCoordinator;
  private readonly setTitle: TitleSetter;
  private readonly sleep: (ms: number) => Promise<void>;
  private currentStatus: WorkerStatus = "Stopped";

  constructor(options: SchedulerWorkerOptions) {
    this.logger = options.logger ?? createLogger("workers:scheduler");
    this.id = options.identity ?? workerIdentity();
    this.setTitle = options.setTitle ?? setProcessTitle;
    this.sleep = options.sleep ?? defaultSleep;
    this.coordinator = new ShutdownCoordinator(
      this.logger,
      options.signals === undefined ? detectSignalSource() : options.signals,
    );
    this.drain = createDrainEngine({
      store: options.store,
      queue: options.queue,
      events: options.events,
      logger: this.logger,
      onTimestamp: () => this.updateStatus("Processing Delayed Items"),
    });
  }

  get status(): WorkerStatus {
    return this.currentStatus;
  }

  get shutdownRequested(): boolean {
    return this.coordinator.shutdownRequested;
  }

  get signalsSupported(): boolean {
    return this.coordinator.signalsSupported;
  }

  /**
   * The primary loop. Resolves once shutdown has been requested; rejects with
   * the first store or dispatch failure.
   *
   * @param interval seconds between drain passes
   */
  async work(interval: number = env.SCHEDULER_INTERVAL): Promise<void> {
    if (!Number.isFinite(interval) || interval <= 0) {
      throw new InvalidIntervalError(
        `The poll interval must be a positive number of seconds, got ${interval}.`,
      );
    }
    this.updateStatus("Starting");
    this.coordinator.register();
    this.logger.log("notice", "Starting scheduler worker {worker}", {
      worker: this.id,
      interval,
    });
    try {
      while (!this.coordinator.shutdownRequested) {
        await this.handleDelayedItems();
        if (this.coordinator.shutdownRequested) break;
        this.updateStatus("Waiting");
        await this.sleep(interval * 1000);
      }
    } finally {
      this.coordinator.unregister();
      this.updateStatus("Stopped");
    }
    this.logger.log("notice", "Scheduler worker {worker} stopped", {
      worker: this.id,
    });
  }

  /** One drain pass over every timestamp due at or before the horizon. */
  handleDelayedItems(horizon: Horizon = NOW): Promise<number> {
    return this.drain.drainDue(horizon);
  }

  /** Dispatch every job stored for exactly this timestamp. */
  enqueueDelayedItemsForTimestamp(timestamp: DueTimestamp): Promise<number> {
    return this.drain.drainTimestamp(timestamp);
  }

  /** Stop after the current pass. Safe to call any number of times. */
  shutdown(): void {
    this.coordinator.request();
  }

  toString(): string {
    return this.id;
  }

  private updateStatus(status: WorkerStatus): void {
    this.currentStatus = status;
    this.setTitle(processTitle(status));
  }
}
