/**
 * Event stream
 *
 * Finite, single-consumer async sequence of a run's progress events. Events
 * pushed before anyone iterates are buffered; the stream ends when the run
 * reaches a terminal state and closes it.
 */

import type { ProgressEvent } from "../../models/progress-event";
import { StreamConsumedError } from "./errors";

export class EventStream implements AsyncIterable<ProgressEvent> {
  private buffer: ProgressEvent[] = [];
  private pending: ((result: IteratorResult<ProgressEvent>) => void) | null =
    null;
  private closed = false;
  private consumed = false;
  private detached = false;

  /**
   * Queue an event for the consumer. Ignored once the stream is closed.
   */
  push(event: ProgressEvent): void {
    if (this.closed || this.detached) {
      return;
    }
    if (this.pending) {
      const resolve = this.pending;
      this.pending = null;
      resolve({ done: false, value: event });
      return;
    }
    this.buffer.push(event);
  }

  /**
   * End the stream; buffered events are still delivered first
   */
  close(): void {
    this.closed = true;
    if (this.pending) {
      const resolve = this.pending;
      this.pending = null;
      resolve({ done: true, value: undefined });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    if (this.consumed) {
      throw new StreamConsumedError();
    }
    this.consumed = true;

    return {
      next: (): Promise<IteratorResult<ProgressEvent>> => {
        const event = this.buffer.shift();
        if (event) {
          return Promise.resolve({ done: false, value: event });
        }
        if (this.closed || this.detached) {
          return Promise.resolve({ done: true, value: undefined });
        }
        return new Promise((resolve) => {
          this.pending = resolve;
        });
      },
      return: (): Promise<IteratorResult<ProgressEvent>> => {
        // Consumer stopped early (break / throw inside for await)
        this.detached = true;
        this.buffer = [];
        if (this.pending) {
          const resolve = this.pending;
          this.pending = null;
          resolve({ done: true, value: undefined });
        }
        return Promise.resolve({ done: true, value: undefined });
      },
    };
  }

  /**
   * Drain the whole stream into an array
   */
  async collect(): Promise<ProgressEvent[]> {
    const events: ProgressEvent[] = [];
    for await (const event of this) {
      events.push(event);
    }
    return events;
  }
}
