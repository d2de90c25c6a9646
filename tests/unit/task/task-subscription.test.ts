import { describe, it, expect } from '@jest/globals';
import { TaskSubscription } from '../../../src/task/task-subscription.js';
import { TaskSnapshot, TaskStatuses } from '../../../src/task/task-types.js';
import { PipelineErrorCode } from '../../../src/types-global/errors.js';

function snapshotWith(percent: number): TaskSnapshot {
  return Object.freeze({
    taskId: 'task_1',
    status: TaskStatuses.SEARCHING,
    currentStep: 'Searching',
    percent,
    createdAt: 0,
  });
}

describe('TaskSubscription', () => {
  it('should yield snapshots in delivery order until closed', async () => {
    const subscription = new TaskSubscription('task_1');
    subscription.push(snapshotWith(30));
    subscription.push(snapshotWith(47));
    subscription.close();

    const percents: number[] = [];
    for await (const snapshot of subscription) {
      percents.push(snapshot.percent);
    }
    expect(percents).toEqual([30, 47]);
  });

  it('should wake a waiting reader on push', async () => {
    const subscription = new TaskSubscription('task_1');
    const waiting = subscription.next();

    subscription.push(snapshotWith(70));

    expect(await waiting).toEqual({ kind: 'snapshot', snapshot: snapshotWith(70) });
  });

  it('should time out when nothing arrives', async () => {
    const subscription = new TaskSubscription('task_1');
    expect(await subscription.next(10)).toEqual({ kind: 'timeout' });

    subscription.push(snapshotWith(10));
    expect(subscription.pending).toBe(1);
  });

  it('should resolve a waiting reader on close', async () => {
    const subscription = new TaskSubscription('task_1');
    const waiting = subscription.next();

    subscription.close();

    expect(await waiting).toEqual({ kind: 'closed' });
  });

  it('should refuse pushes once closed', () => {
    const subscription = new TaskSubscription('task_1');
    subscription.close();

    expect(() => subscription.push(snapshotWith(10))).toThrow(
      expect.objectContaining({ code: PipelineErrorCode.SUBSCRIPTION_CLOSED })
    );
  });

  it('should reject a second concurrent reader', async () => {
    const subscription = new TaskSubscription('task_1');
    const first = subscription.next();

    await expect(subscription.next()).rejects.toMatchObject({
      code: PipelineErrorCode.SUBSCRIPTION_CLOSED,
    });

    subscription.close();
    expect(await first).toEqual({ kind: 'closed' });
  });
});
