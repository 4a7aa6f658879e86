import type { OverflowPolicy } from "../config.js";
import type { EventType, WorkflowEvent } from "../workflow/types.js";

/** Consumer of workflow lifecycle events. */
export interface ProgressSink {
  emit(event: WorkflowEvent): void | Promise<void>;
}

export function createEvent(eventType: EventType, taskId: string, payload: Record<string, unknown> = {}): WorkflowEvent {
  return { eventType, taskId, timestamp: new Date().toISOString(), payload };
}

/** Adapts a plain callback to a sink. */
export class CallbackSink implements ProgressSink {
  constructor(private readonly fn: (event: WorkflowEvent) => void | Promise<void>) {}

  emit(event: WorkflowEvent): void | Promise<void> {
    return this.fn(event);
  }
}

/** Fans one event out to several sinks in order. */
export class FanOutSink implements ProgressSink {
  private readonly sinks: ProgressSink[];

  constructor(sinks: Array<ProgressSink | undefined>) {
    this.sinks = sinks.filter((s): s is ProgressSink => s !== undefined);
  }

  async emit(event: WorkflowEvent): Promise<void> {
    for (const sink of this.sinks) await sink.emit(event);
  }
}

export type EventChannelOptions = {
  capacity?: number;
  /**
   * "drop-oldest": never waits; a full buffer discards its oldest event.
   * "block": waits up to `blockTimeoutMs` for a reader to make room, then discards the new event.
   */
  overflow?: OverflowPolicy;
  blockTimeoutMs?: number;
};

/**
 * Bounded single-producer/multi-reader channel between an orchestrator and
 * whatever streams its progress out. Read it with `for await`.
 */
export class EventChannel implements ProgressSink, AsyncIterable<WorkflowEvent> {
  readonly capacity: number;
  readonly overflow: OverflowPolicy;
  private readonly blockTimeoutMs: number;

  private buffer: WorkflowEvent[] = [];
  private readers: Array<(result: IteratorResult<WorkflowEvent>) => void> = [];
  private writers: Array<() => void> = [];
  private isClosed = false;
  private droppedCount = 0;

  constructor(opts: EventChannelOptions = {}) {
    this.capacity = Math.max(1, opts.capacity ?? 1_000);
    this.overflow = opts.overflow ?? "drop-oldest";
    this.blockTimeoutMs = opts.blockTimeoutMs ?? 1_000;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async emit(event: WorkflowEvent): Promise<void> {
    if (this.isClosed) {
      this.droppedCount++;
      return;
    }
    if (this.deliverToReader(event)) return;

    if (this.buffer.length < this.capacity) {
      this.buffer.push(event);
      return;
    }

    if (this.overflow === "drop-oldest") {
      this.buffer.shift();
      this.buffer.push(event);
      this.droppedCount++;
      return;
    }

    const deadline = Date.now() + this.blockTimeoutMs;
    while (this.buffer.length >= this.capacity && !this.isClosed) {
      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await this.waitForSpace(remaining))) {
        this.droppedCount++;
        return;
      }
    }
    if (this.isClosed) {
      this.droppedCount++;
      return;
    }
    if (!this.deliverToReader(event)) this.buffer.push(event);
  }

  /** Remove and return everything currently buffered. */
  drain(): WorkflowEvent[] {
    const events = this.buffer;
    this.buffer = [];
    this.wakeWriters();
    return events;
  }

  /** End iteration for readers once the buffer is empty, and release blocked writers. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    if (this.buffer.length === 0) {
      for (const reader of this.readers.splice(0)) reader({ done: true, value: undefined });
    }
    this.wakeWriters();
  }

  [Symbol.asyncIterator](): AsyncIterator<WorkflowEvent> {
    return {
      next: () => this.next(),
    };
  }

  private next(): Promise<IteratorResult<WorkflowEvent>> {
    const event = this.buffer.shift();
    if (event) {
      this.wakeWriters(1);
      return Promise.resolve({ done: false, value: event });
    }
    if (this.isClosed) return Promise.resolve({ done: true, value: undefined });
    return new Promise((resolve) => this.readers.push(resolve));
  }

  private deliverToReader(event: WorkflowEvent): boolean {
    const reader = this.readers.shift();
    if (!reader) return false;
    reader({ done: false, value: event });
    return true;
  }

  private waitForSpace(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.writers = this.writers.filter((w) => w !== wake);
        resolve(false);
      }, ms);
      this.writers.push(wake);
    });
  }

  private wakeWriters(count = Infinity): void {
    const woken = this.writers.splice(0, count);
    for (const wake of woken) wake();
  }
}
