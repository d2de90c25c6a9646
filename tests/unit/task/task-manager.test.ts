import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { TaskManager } from '../../../src/task/task-manager.js';
import { TaskStatuses } from '../../../src/task/task-types.js';

const MINUTE = 60 * 1000;

describe('TaskManager', () => {
  let now: number;
  let manager: TaskManager;

  beforeEach(() => {
    now = 5_000_000;
    jest.spyOn(Date, 'now').mockImplementation(() => now);
    manager = new TaskManager();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('createTask', () => {
    it('should register the task in the planning state', () => {
      expect(manager.createTask('task_1')).toEqual({
        taskId: 'task_1',
        status: TaskStatuses.PLANNING,
        currentStep: 'Starting...',
        percent: 0,
        createdAt: 5_000_000,
      });
      expect(manager.getTask('task_1')?.status).toBe(TaskStatuses.PLANNING);
    });

    it('should close the subscriptions of a replaced task', async () => {
      manager.createTask('task_1');
      const subscription = manager.subscribe('task_1');

      manager.createTask('task_1');

      expect(subscription.isClosed).toBe(true);
      expect(await subscription.next()).toEqual({ kind: 'closed' });
    });
  });

  describe('updateTask', () => {
    it('should ignore an unknown task', () => {
      expect(() => manager.updateTask('missing', { percent: 50 })).not.toThrow();
      expect(manager.getTask('missing')).toBeUndefined();
    });

    it('should apply only the given fields', () => {
      manager.createTask('task_1');
      manager.updateTask('task_1', { status: TaskStatuses.SEARCHING, percent: 30 });

      expect(manager.getTask('task_1')).toMatchObject({
        status: TaskStatuses.SEARCHING,
        currentStep: 'Starting...',
        percent: 30,
      });
    });

    it('should deliver exactly one matching snapshot per update', async () => {
      manager.createTask('task_1');
      const subscription = manager.subscribe('task_1');

      manager.updateTask('task_1', { status: TaskStatuses.SEARCHING, percent: 30 });

      expect(subscription.pending).toBe(1);
      const result = await subscription.next();
      expect(result.kind).toBe('snapshot');
      if (result.kind === 'snapshot') {
        expect(result.snapshot).toMatchObject({ taskId: 'task_1', status: 'searching', percent: 30 });
        expect(Object.isFrozen(result.snapshot)).toBe(true);
      }
      expect(subscription.pending).toBe(0);
    });

    it('should keep delivered snapshots unaffected by later updates', async () => {
      manager.createTask('task_1');
      const subscription = manager.subscribe('task_1');

      manager.updateTask('task_1', { percent: 30 });
      manager.updateTask('task_1', { percent: 65 });

      const percents: number[] = [];
      for (let i = 0; i < 2; i++) {
        const result = await subscription.next();
        if (result.kind === 'snapshot') {
          percents.push(result.snapshot.percent);
        }
      }
      expect(percents).toEqual([30, 65]);
    });

    it('should not replay earlier updates to a new subscriber', () => {
      manager.createTask('task_1');
      manager.updateTask('task_1', { percent: 30 });

      const late = manager.subscribe('task_1');
      expect(late.pending).toBe(0);
    });

    it('should keep delivering when one subscriber fails', () => {
      manager.createTask('task_1');
      const broken = manager.subscribe('task_1');
      const healthy = manager.subscribe('task_1');
      broken.close();

      expect(() => manager.updateTask('task_1', { percent: 40 })).not.toThrow();
      expect(healthy.pending).toBe(1);
      expect(manager.getTask('task_1')?.percent).toBe(40);
    });

    it('should drop a subscription that was closed directly', () => {
      manager.createTask('task_1');
      const closed = manager.subscribe('task_1');
      const healthy = manager.subscribe('task_1');
      closed.close();

      manager.updateTask('task_1', { percent: 40 });
      manager.updateTask('task_1', { percent: 60 });

      expect(manager.getStats().activeSubscriptions).toBe(1);
      expect(healthy.pending).toBe(2);
    });

    it('should freeze snapshots but share the result by reference', () => {
      const report = { summary: 'draft', sources: ['a'] };
      manager.createTask('task_1');
      manager.updateTask('task_1', { result: report });

      const task = manager.getTask('task_1');
      expect(Object.isFrozen(task)).toBe(true);
      expect(task?.result).toBe(report);
      expect(Object.isFrozen(report)).toBe(false);
    });
  });

  describe('subscriptions', () => {
    it('should stop delivering after unsubscribe', () => {
      manager.createTask('task_1');
      const subscription = manager.subscribe('task_1');

      manager.unsubscribe('task_1', subscription);
      manager.updateTask('task_1', { percent: 10 });

      expect(subscription.isClosed).toBe(true);
      expect(subscription.pending).toBe(0);
      expect(manager.getStats().activeSubscriptions).toBe(0);
    });

    it('should hand out a closed subscription for an unknown task', () => {
      expect(manager.subscribe('missing').isClosed).toBe(true);
    });
  });

  describe('cleanupOldTasks', () => {
    it('should remove only tasks strictly older than the threshold', async () => {
      manager.createTask('old');
      const oldSubscription = manager.subscribe('old');
      now += MINUTE;
      manager.createTask('edge');
      now += 30 * MINUTE;
      manager.createTask('fresh');

      now += 30 * MINUTE;
      expect(manager.cleanupOldTasks(60)).toBe(1);

      expect(manager.getTask('old')).toBeUndefined();
      expect(manager.getTask('edge')).toBeDefined();
      expect(manager.getTask('fresh')).toBeDefined();
      expect(await oldSubscription.next()).toEqual({ kind: 'closed' });
    });
  });

  it('should summarise tasks by status', () => {
    manager.createTask('a');
    manager.createTask('b');
    manager.updateTask('b', { status: TaskStatuses.COMPLETED, percent: 100 });
    manager.subscribe('a');

    expect(manager.getStats()).toEqual({
      totalTasks: 2,
      activeSubscriptions: 1,
      byStatus: { planning: 1, completed: 1 },
    });
  });
});
