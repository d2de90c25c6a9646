import { config } from '../config/index.js';
import { TaskManager } from './task-manager.js';
import { TaskSnapshot, isTerminalStatus } from './task-types.js';

export type ProgressEvent =
  | { type: 'progress'; task: TaskSnapshot }
  | { type: 'ping' };

export interface ProgressStreamOptions {
  /** Idle interval after which a ping is emitted. */
  keepaliveMs?: number;
}

/**
 * Streams a task's progress: the current snapshot first, then every update,
 * with a ping whenever nothing arrives within the keepalive interval. Ends
 * after a completed or failed snapshot, or when the task goes away.
 */
export async function* streamTaskProgress(
  manager: TaskManager,
  taskId: string,
  options: ProgressStreamOptions = {}
): AsyncGenerator<ProgressEvent, void, undefined> {
  const keepaliveMs = options.keepaliveMs ?? config.tasks.keepaliveMs;
  const subscription = manager.subscribe(taskId);

  try {
    const initial = manager.getTask(taskId);
    if (!initial) {
      return;
    }
    yield { type: 'progress', task: initial };
    if (isTerminalStatus(initial.status)) {
      return;
    }

    for (;;) {
      const result = await subscription.next(keepaliveMs);
      if (result.kind === 'closed') {
        return;
      }
      if (result.kind === 'timeout') {
        yield { type: 'ping' };
        continue;
      }

      yield { type: 'progress', task: result.snapshot };
      if (isTerminalStatus(result.snapshot.status)) {
        return;
      }
    }
  } finally {
    manager.unsubscribe(taskId, subscription);
  }
}
