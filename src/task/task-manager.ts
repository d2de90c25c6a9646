/**
 * Task Manager
 *
 * Registry of pipeline jobs and their progress subscribers. Every update is
 * broadcast inline to the task's subscriptions as a frozen snapshot.
 */
import { getErrorMessage } from '../utils/internal/errorHandler.js';
import { logger } from '../utils/internal/logger.js';
import { TaskSubscription } from './task-subscription.js';
import { Task, TaskSnapshot, TaskStatuses, TaskUpdate } from './task-types.js';

interface TaskRecord {
  task: Task;
  subscribers: Set<TaskSubscription>;
}

export interface TaskManagerStats {
  totalTasks: number;
  activeSubscriptions: number;
  byStatus: Record<string, number>;
}

export class TaskManager {
  private readonly tasks = new Map<string, TaskRecord>();

  /**
   * Registers a task in the planning state. Re-creating an existing id
   * replaces it and closes the previous subscriptions.
   */
  createTask(taskId: string): TaskSnapshot {
    const existing = this.tasks.get(taskId);
    if (existing) {
      this.closeSubscribers(existing);
      logger.warning('Task id reused, previous task replaced', {
        component: 'TaskManager',
        taskId,
      });
    }

    const task: Task = {
      taskId,
      status: TaskStatuses.PLANNING,
      currentStep: 'Starting...',
      percent: 0,
      createdAt: Date.now(),
    };
    this.tasks.set(taskId, { task, subscribers: new Set() });

    logger.debug('Task created', { component: 'TaskManager', taskId });
    return snapshot(task);
  }

  /**
   * Applies `update` and notifies every subscriber. Unknown ids are ignored.
   */
  updateTask(taskId: string, update: TaskUpdate): void {
    const record = this.tasks.get(taskId);
    if (!record) {
      return;
    }

    const { task } = record;
    if (update.status !== undefined) task.status = update.status;
    if (update.currentStep !== undefined) task.currentStep = update.currentStep;
    if (update.percent !== undefined) task.percent = update.percent;
    if (update.result !== undefined) task.result = update.result;
    if (update.error !== undefined) task.error = update.error;

    const current = snapshot(task);
    for (const subscription of record.subscribers) {
      try {
        subscription.push(current);
      } catch (error) {
        if (subscription.isClosed) {
          record.subscribers.delete(subscription);
        }
        logger.debug('Progress delivery to subscriber failed', {
          component: 'TaskManager',
          taskId,
          error: getErrorMessage(error),
        });
      }
    }
  }

  /**
   * Opens a subscription receiving every update from now on. A subscription
   * to an unknown task starts closed.
   */
  subscribe(taskId: string): TaskSubscription {
    const subscription = new TaskSubscription(taskId);
    const record = this.tasks.get(taskId);
    if (record) {
      record.subscribers.add(subscription);
    } else {
      subscription.close();
    }
    return subscription;
  }

  unsubscribe(taskId: string, subscription: TaskSubscription): void {
    this.tasks.get(taskId)?.subscribers.delete(subscription);
    subscription.close();
  }

  getTask(taskId: string): TaskSnapshot | undefined {
    const record = this.tasks.get(taskId);
    return record ? snapshot(record.task) : undefined;
  }

  /**
   * Removes tasks created more than `maxAgeMinutes` ago.
   * @returns The number of tasks removed.
   */
  cleanupOldTasks(maxAgeMinutes: number): number {
    const cutoff = Date.now() - maxAgeMinutes * 60 * 1000;
    let removed = 0;

    for (const [taskId, record] of this.tasks) {
      if (record.task.createdAt < cutoff) {
        this.closeSubscribers(record);
        this.tasks.delete(taskId);
        removed++;
      }
    }

    if (removed > 0) {
      logger.info('Old tasks removed', {
        component: 'TaskManager',
        removed,
        remaining: this.tasks.size,
        maxAgeMinutes,
      });
    }
    return removed;
  }

  getStats(): TaskManagerStats {
    const byStatus: Record<string, number> = {};
    let activeSubscriptions = 0;
    for (const { task, subscribers } of this.tasks.values()) {
      byStatus[task.status] = (byStatus[task.status] ?? 0) + 1;
      activeSubscriptions += subscribers.size;
    }
    return { totalTasks: this.tasks.size, activeSubscriptions, byStatus };
  }

  private closeSubscribers(record: TaskRecord): void {
    for (const subscription of record.subscribers) {
      subscription.close();
    }
    record.subscribers.clear();
  }
}

/** Shallow: `result` is caller-owned and shared by reference with every snapshot. */
function snapshot(task: Task): TaskSnapshot {
  return Object.freeze({ ...task });
}
