import { IEventHandler, IEventQueue, TimerHandle } from "@core/interfaces";
import { RadioEvent } from "@core/types";
import { toError } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";

const logger = getLogger("EventQueue");

type WorkItem =
  | { kind: "event"; event: RadioEvent }
  | { kind: "timer"; handle: TimerHandle; label: string; task: () => void };

/**
 * Single worker for radio events and state machine timers.
 *
 * Work runs one item at a time in arrival order. Work enqueued while an item
 * is running (a handler dispatching, a timer firing) waits for the current
 * drain to reach it, so no handler ever runs inside another.
 *
 * A timer that fires is not run directly; it is enqueued like an event. Until
 * it runs it can still be cancelled, which makes "cancel this timer and
 * schedule the next one" atomic with respect to everything else in the queue.
 */
export class EventQueue implements IEventQueue {
  private readonly handlers: IEventHandler[] = [];
  private readonly queue: WorkItem[] = [];
  private readonly timers = new Map<
    TimerHandle,
    ReturnType<typeof setTimeout> | null
  >();
  private nextHandle: TimerHandle = 1;
  private isDraining: boolean = false;

  subscribe(handler: IEventHandler): () => void {
    this.handlers.push(handler);
    logger.debug(`${handler.name} subscribed`);
    return () => {
      const index = this.handlers.indexOf(handler);
      if (index >= 0) {
        this.handlers.splice(index, 1);
      }
    };
  }

  dispatch(event: RadioEvent): void {
    this.queue.push({ kind: "event", event });
    this.drain();
  }

  schedule(delayMs: number, task: () => void, label: string = "timer"): TimerHandle {
    const handle = this.nextHandle++;
    const timeout = setTimeout(() => {
      // Fired: stays cancellable until the queue runs it
      this.timers.set(handle, null);
      this.queue.push({ kind: "timer", handle, label, task });
      this.drain();
    }, delayMs);
    this.timers.set(handle, timeout);
    logger.debug(`Scheduled ${label} #${handle} in ${delayMs}ms`);
    return handle;
  }

  cancel(handle: TimerHandle): void {
    if (!this.timers.has(handle)) {
      return;
    }
    const timeout = this.timers.get(handle);
    if (timeout) {
      clearTimeout(timeout);
    }
    this.timers.delete(handle);
    logger.debug(`Cancelled timer #${handle}`);
  }

  pendingTimers(): number {
    return this.timers.size;
  }

  dispose(): void {
    for (const timeout of this.timers.values()) {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
    this.timers.clear();
    this.queue.length = 0;
    this.handlers.length = 0;
  }

  private drain(): void {
    if (this.isDraining) {
      return;
    }
    this.isDraining = true;
    try {
      let item = this.queue.shift();
      while (item) {
        this.run(item);
        item = this.queue.shift();
      }
    } finally {
      this.isDraining = false;
    }
  }

  private run(item: WorkItem): void {
    if (item.kind === "timer") {
      if (!this.timers.has(item.handle)) {
        logger.debug(`Skipping cancelled ${item.label} #${item.handle}`);
        return;
      }
      this.timers.delete(item.handle);
      this.guard(item.label, item.task);
      return;
    }

    const event = item.event;
    for (const handler of [...this.handlers]) {
      this.guard(`${handler.name} on ${event.type}`, () =>
        handler.handleEvent(event),
      );
    }
  }

  /**
   * A failing handler is logged and the queue moves on
   */
  private guard(label: string, work: () => void): void {
    try {
      work();
    } catch (error) {
      logger.error(`${label} failed: ${toError(error).message}`);
    }
  }
}
