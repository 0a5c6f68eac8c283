/**
 * ResultChannel – ordered, asynchronous hand-off from the acquisition loop
 * to the consumer.
 *
 * `send` never calls the listener synchronously. Values are delivered one at
 * a time in send order; a throwing listener is reported and the queue keeps
 * going.
 */

import { toError } from '../../utils/errors';

export class ResultChannel<T> {
  private readonly listener: (value: T) => void;
  private readonly onError?: (error: Error) => void;
  private tail: Promise<void> = Promise.resolve();
  private closed = false;
  private queued = 0;

  constructor(listener: (value: T) => void, onError?: (error: Error) => void) {
    this.listener = listener;
    this.onError = onError;
  }

  /** Number of values sent but not yet delivered. */
  get pending(): number {
    return this.queued;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): void {
    if (this.closed) {
      console.warn('[ResultChannel] send() after close() ignored');
      return;
    }
    this.queued++;
    this.tail = this.tail.then(() => {
      this.queued--;
      try {
        this.listener(value);
      } catch (err) {
        this.report(toError(err));
      }
    });
  }

  /** Resolves once every value sent so far has been delivered. */
  drain(): Promise<void> {
    return this.tail;
  }

  /** Delivers what is already queued, then refuses further sends. */
  async close(): Promise<void> {
    this.closed = true;
    await this.tail;
  }

  private report(error: Error): void {
    if (this.onError) {
      this.onError(error);
      return;
    }
    console.error('[ResultChannel] listener failed:', error);
  }
}
