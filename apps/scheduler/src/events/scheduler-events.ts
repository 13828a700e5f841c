/**
 * Scheduler lifecycle hooks. Handlers are notified in registration order and
 * awaited one at a time; whatever they return is ignored. A handler that
 * throws aborts the trigger and the error reaches the caller.
 */

export interface SchedulerEventMap {
  /** A job was written to the delayed store. */
  afterSchedule: { at: number; queue: string; taskId: string; args: unknown[] };
  /** A due job is about to be handed to the job queue. */
  beforeDelayedEnqueue: { queue: string; taskId: string; args: unknown[] };
}

export type SchedulerEventName = keyof SchedulerEventMap;

export type SchedulerEventHandler<E extends SchedulerEventName> = (
  payload: SchedulerEventMap[E],
) => unknown;

type HandlerTable = {
  [E in SchedulerEventName]: SchedulerEventHandler<E>[];
};

export class SchedulerEvents {
  private handlers: HandlerTable = {
    afterSchedule: [],
    beforeDelayedEnqueue: [],
  };

  /** Register a handler; returns a function that unregisters it. */
  on<E extends SchedulerEventName>(
    event: E,
    handler: SchedulerEventHandler<E>,
  ): () => void {
    const list: SchedulerEventHandler<E>[] = this.handlers[event];
    list.push(handler);
    return () => {
      const i = list.indexOf(handler);
      if (i !== -1) list.splice(i, 1);
    };
  }

  async trigger<E extends SchedulerEventName>(
    event: E,
    payload: SchedulerEventMap[E],
  ): Promise<void> {
    const list: SchedulerEventHandler<E>[] = this.handlers[event];
    for (const handler of [...list]) {
      await handler(payload);
    }
  }

  listenerCount(event: SchedulerEventName): number {
    return this.handlers[event].length;
  }
}
