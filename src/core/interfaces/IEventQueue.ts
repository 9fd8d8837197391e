import { RadioEvent } from "../types";

/**
 * Consumer of radio events
 */
export interface IEventHandler {
  /** Used in log lines */
  readonly name: string;

  handleEvent(event: RadioEvent): void;
}

/**
 * Opaque handle of a scheduled task
 */
export type TimerHandle = number;

/**
 * Event Queue Interface
 *
 * A single worker that runs event handlers and timer tasks one at a time, in
 * arrival order.
 */
export interface IEventQueue {
  /**
   * Register a handler for every dispatched event
   * @returns Function that removes the handler
   */
  subscribe(handler: IEventHandler): () => void;

  /**
   * Enqueue an event. Handlers run before this returns unless the queue is
   * already draining, in which case the event runs after the current work.
   */
  dispatch(event: RadioEvent): void;

  /**
   * Enqueue `task` once `delayMs` has elapsed
   */
  schedule(delayMs: number, task: () => void, label?: string): TimerHandle;

  /**
   * Cancel a scheduled task. A task that already fired but has not run yet is
   * skipped. Unknown handles are ignored.
   */
  cancel(handle: TimerHandle): void;

  /**
   * Number of timers that have not fired yet
   */
  pendingTimers(): number;

  /**
   * Drop queued work and cancel every timer
   */
  dispose(): void;
}
