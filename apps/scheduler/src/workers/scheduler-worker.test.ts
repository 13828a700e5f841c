import { EventEmitter } from "events";
import { describe, it, expect, beforeEach } from "vitest";
import { createRedisDelayedStore, type DelayedStore } from "../data/delayed-store.js";
import { InvalidIntervalError } from "../errors.js";
import { SchedulerEvents } from "../events/scheduler-events.js";
import { workerIdentity } from "../lib/identity.js";
import {
  FakeRedis,
  RecordingJobQueue,
  RecordingLogger,
  manualClock,
} from "../testing/fakes.js";
import { SchedulerWorker, type SchedulerWorkerOptions } from "./scheduler-worker.js";

describe("SchedulerWorker", () => {
  let clock: ReturnType<typeof manualClock>;
  let store: DelayedStore;
  let queue: RecordingJobQueue;
  let events: SchedulerEvents;
  let logger: RecordingLogger;
  let signals: EventEmitter;
  let titles: string[];
  let sleeps: number[];

  function createWorker(overrides: Partial<SchedulerWorkerOptions> = {}) {
    return new SchedulerWorker({
      store,
      queue,
      events,
      logger,
      signals,
      identity: "test-host:42",
      setTitle: (title) => titles.push(title),
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      ...overrides,
    });
  }

  beforeEach(() => {
    clock = manualClock(2_000);
    store = createRedisDelayedStore(new FakeRedis(), { clock });
    queue = new RecordingJobQueue();
    events = new SchedulerEvents();
    logger = new RecordingLogger();
    signals = new EventEmitter();
    titles = [];
    sleeps = [];
  });

  it("finishes the drain in progress and exits without sleeping when shut down mid-drain", async () => {
    await store.push(1_000, { queue: "emails", taskId: "Send", args: ["x"] });
    await store.push(1_000, { queue: "emails", taskId: "Send", args: ["y"] });
    const worker = createWorker();
    events.on("beforeDelayedEnqueue", () => worker.shutdown());

    await worker.work(0.1);

    expect(queue.calls.map((c) => c.args)).toEqual([["x"], ["y"]]);
    expect(sleeps).toEqual([]);
    expect(worker.status).toBe("Stopped");
    expect(titles).toEqual([
      "deferq-scheduler-1.0.0: Starting",
      "deferq-scheduler-1.0.0: Processing Delayed Items",
      "deferq-scheduler-1.0.0: Stopped",
    ]);
  });

  it("sleeps the interval between passes and dispatches jobs that come due", async () => {
    const worker = createWorker({
      sleep: async (ms) => {
        sleeps.push(ms);
        if (sleeps.length === 1) {
          await store.push(2_005, { queue: "q", taskId: "Later", args: [] });
          clock.set(2_005);
        } else {
          worker.shutdown();
        }
      },
    });
    await store.push(2_000, { queue: "q", taskId: "Now", args: [] });

    await worker.work(0.25);

    expect(sleeps).toEqual([250, 250]);
    expect(queue.calls.map((c) => c.taskId)).toEqual(["Now", "Later"]);
  });

  it("stops on a termination signal and removes its listeners", async () => {
    const worker = createWorker({
      sleep: async (ms) => {
        sleeps.push(ms);
        signals.emit("SIGTERM", "SIGTERM");
        signals.emit("SIGINT", "SIGINT");
      },
    });

    await worker.work(1);

    expect(sleeps).toEqual([1000]);
    expect(worker.shutdownRequested).toBe(true);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
    expect(signals.listenerCount("SIGQUIT")).toBe(0);
    expect(logger.messages("notice").filter((m) => m === "Shutting down")).toHaveLength(1);
    expect(logger.messages("debug")).toEqual(["Registered signals"]);
  });

  it("does not drain at all when shutdown was requested before starting", async () => {
    await store.push(1_000, { queue: "q", taskId: "A", args: [] });
    const worker = createWorker();
    worker.shutdown();
    worker.shutdown();

    await worker.work(1);

    expect(queue.calls).toEqual([]);
    expect(await store.timestampSize(1_000)).toBe(1);
    expect(logger.messages("notice").filter((m) => m === "Shutting down")).toHaveLength(1);
  });

  it("rejects with a dispatch failure after cleaning up", async () => {
    await store.push(1_000, { queue: "q", taskId: "A", args: [] });
    queue.beforeDispatch = () => {
      throw new Error("queue unavailable");
    };
    const worker = createWorker();

    await expect(worker.work(1)).rejects.toThrow("queue unavailable");
    expect(worker.status).toBe("Stopped");
    expect(signals.listenerCount("SIGINT")).toBe(0);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])(
    "refuses to poll with an interval of %s seconds",
    async (interval) => {
      await store.push(1_000, { queue: "q", taskId: "A", args: [] });
      const worker = createWorker();

      await expect(worker.work(interval)).rejects.toBeInstanceOf(InvalidIntervalError);
      expect(queue.calls).toEqual([]);
      expect(sleeps).toEqual([]);
      expect(titles).toEqual([]);
      expect(signals.listenerCount("SIGTERM")).toBe(0);
    },
  );

  it("runs without signal support and says so", async () => {
    const worker = createWorker({
      signals: null,
      sleep: async () => {
        worker.shutdown();
      },
    });

    await worker.work(1);

    expect(worker.signalsSupported).toBe(false);
    expect(logger.messages("warning")).toEqual([
      "Signal handling unavailable; worker can only be stopped externally",
    ]);
  });

  it("drains once on demand without the loop", async () => {
    await store.push(1_000, { queue: "q", taskId: "A", args: [] });
    await store.push(1_500, { queue: "q", taskId: "B", args: [] });
    const worker = createWorker();

    expect(await worker.handleDelayedItems({ kind: "at", at: 1_200 })).toBe(1);
    expect(await worker.enqueueDelayedItemsForTimestamp(1_500)).toBe(1);
    expect(queue.calls.map((c) => c.taskId)).toEqual(["A", "B"]);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });

  it("identifies itself by host and pid", () => {
    expect(createWorker().toString()).toBe("test-host:42");
    expect(workerIdentity(42)).toMatch(/:42$/);
  });
});
