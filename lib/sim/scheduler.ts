import { InvariantViolationError, invariant } from "./errors";
import type { EventKind, SimEvent } from "./types";

/** Tie-break at equal timestamps: arrivals first, completions last. */
export const KIND_PRIORITY: Record<EventKind, number> = {
  arrival: 0,
  timeout: 1,
  "service-start": 2,
  "service-complete": 3,
};

type QueuedEvent = {
  event: SimEvent;
  seq: number;
};

export type EventHandler = (event: SimEvent) => void;

export type SchedulerObserver = {
  /** Called before dispatching an event that moves the clock forward. */
  onAdvance?: (fromMs: number, toMs: number) => void;
};

const before = (a: QueuedEvent, b: QueuedEvent) => {
  if (a.event.timeMs !== b.event.timeMs) return a.event.timeMs < b.event.timeMs;
  const kindDelta = KIND_PRIORITY[a.event.kind] - KIND_PRIORITY[b.event.kind];
  if (kindDelta !== 0) return kindDelta < 0;
  return a.seq < b.seq;
};

/**
 * Single-owner discrete-event clock. Events sit in a binary min-heap keyed
 * by (time, kind priority, insertion order), so dispatch order is total
 * and reproducible.
 */
export class Scheduler {
  private heap: QueuedEvent[] = [];
  private seq = 0;
  private handlers: Partial<Record<EventKind, EventHandler>> = {};
  private current = 0;

  get nowMs() {
    return this.current;
  }

  on(kind: EventKind, handler: EventHandler) {
    this.handlers[kind] = handler;
  }

  schedule(event: SimEvent) {
    if (!(event.timeMs >= this.current)) {
      throw new InvariantViolationError(
        `event ${event.kind} for request ${event.request.id} scheduled at ${event.timeMs}ms, clock is at ${this.current}ms`
      );
    }
    this.heap.push({ event, seq: this.seq++ });
    this.siftUp(this.heap.length - 1);
  }

  /**
   * Dispatches events in order until the queue is empty or the next one
   * lies beyond `untilMs`. Returns the number of events dispatched.
   */
  run(untilMs: number, observer: SchedulerObserver = {}): number {
    let count = 0;
    for (;;) {
      const head = this.heap[0];
      if (!head || head.event.timeMs > untilMs) break;
      const { event } = this.pop();
      invariant(
        event.timeMs >= this.current,
        `clock moved backwards from ${this.current}ms to ${event.timeMs}ms`
      );
      if (event.timeMs > this.current) {
        observer.onAdvance?.(this.current, event.timeMs);
      }
      this.current = event.timeMs;
      const handler = this.handlers[event.kind];
      invariant(handler, `no handler registered for ${event.kind} events`);
      handler(event);
      count += 1;
    }
    return count;
  }

  private pop(): QueuedEvent {
    const top = this.heap[0];
    const last = this.heap.pop();
    invariant(top && last, "pop from an empty event queue");
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftUp(index: number) {
    const heap = this.heap;
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!before(heap[child], heap[parent])) break;
      [heap[child], heap[parent]] = [heap[parent], heap[child]];
      child = parent;
    }
  }

  private siftDown(index: number) {
    const heap = this.heap;
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < heap.length && before(heap[left], heap[smallest])) smallest = left;
      if (right < heap.length && before(heap[right], heap[smallest])) smallest = right;
      if (smallest === parent) return;
      [heap[parent], heap[smallest]] = [heap[smallest], heap[parent]];
      parent = smallest;
    }
  }
}
