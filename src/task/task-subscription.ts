import { PipelineError, PipelineErrorCode } from '../types-global/errors.js';
import { TaskSnapshot } from './task-types.js';

/**
 * Outcome of waiting on a subscription: a snapshot, a timeout with nothing
 * delivered, or the end of the subscription.
 */
export type SubscriptionResult =
  | { kind: 'snapshot'; snapshot: TaskSnapshot }
  | { kind: 'timeout' }
  | { kind: 'closed' };

type Waiter = (result: SubscriptionResult) => void;

/**
 * Unbounded FIFO delivery channel of task snapshots for one subscriber.
 * `push` never waits, so a slow reader cannot hold up task mutation.
 */
export class TaskSubscription implements AsyncIterable<TaskSnapshot> {
  private readonly buffer: TaskSnapshot[] = [];
  private waiter: Waiter | null = null;
  private closed = false;

  constructor(readonly taskId: string) {}

  push(snapshot: TaskSnapshot): void {
    if (this.closed) {
      throw new PipelineError(
        PipelineErrorCode.SUBSCRIPTION_CLOSED,
        `Subscription to task '${this.taskId}' is closed`,
        { taskId: this.taskId }
      );
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ kind: 'snapshot', snapshot });
      return;
    }
    this.buffer.push(snapshot);
  }

  /**
   * Resolves with the next snapshot. Buffered snapshots are drained before a
   * close is reported. With `timeoutMs`, resolves with a timeout once that
   * long passes without a delivery.
   */
  next(timeoutMs?: number): Promise<SubscriptionResult> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return Promise.resolve({ kind: 'snapshot', snapshot: buffered });
    }
    if (this.closed) {
      return Promise.resolve({ kind: 'closed' });
    }
    if (this.waiter) {
      return Promise.reject(new PipelineError(
        PipelineErrorCode.SUBSCRIPTION_CLOSED,
        `Subscription to task '${this.taskId}' already has a pending reader`,
        { taskId: this.taskId }
      ));
    }

    return new Promise<SubscriptionResult>(resolve => {
      let timer: NodeJS.Timeout | undefined;
      const waiter: Waiter = result => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve(result);
      };
      this.waiter = waiter;

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          if (this.waiter === waiter) {
            this.waiter = null;
          }
          resolve({ kind: 'timeout' });
        }, timeoutMs);
      }
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.({ kind: 'closed' });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Snapshots delivered but not yet read. */
  get pending(): number {
    return this.buffer.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<TaskSnapshot> {
    for (;;) {
      const result = await this.next();
      if (result.kind !== 'snapshot') {
        return;
      }
      yield result.snapshot;
    }
  }
}
