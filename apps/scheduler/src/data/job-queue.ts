/**
 * Immediate-execution side: due jobs are added to BullMQ, one Queue per
 * destination queue name. The job name is the task identifier and the data
 * carries the argument list untouched.
 */
import { Queue } from "bullmq";
import type { Redis } from "ioredis";

export interface DispatchedJobData {
  args: unknown[];
}

export interface JobQueue {
  /** Hand a job over for immediate execution. Resolves with the queue's job id. */
  dispatch(queue: string, taskId: string, ...args: unknown[]): Promise<string>;
  close(): Promise<void>;
}

/** The part of a BullMQ Queue the dispatcher uses. */
export interface QueueHandle {
  add(name: string, data: DispatchedJobData): Promise<{ id?: string }>;
  close(): Promise<void>;
}

export type QueueFactory = (name: string) => QueueHandle;

export function bullQueueFactory(connection: Redis): QueueFactory {
  return (name) => {
    const queue = new Queue<DispatchedJobData>(name, { connection });
    return {
      add: (jobName, data) => queue.add(jobName, data),
      close: () => queue.close(),
    };
  };
}

export function createJobQueue(factory: QueueFactory): JobQueue {
  const queues = new Map<string, QueueHandle>();

  function queueFor(name: string): QueueHandle {
    let queue = queues.get(name);
    if (!queue) {
      queue = factory(name);
      queues.set(name, queue);
    }
    return queue;
  }

  return {
    async dispatch(queue, taskId, ...args) {
      const job = await queueFor(queue).add(taskId, { args });
      return job.id ?? "";
    },

    async close() {
      const open = [...queues.values()];
      queues.clear();
      await Promise.all(open.map((q) => q.close()));
    },
  };
}
