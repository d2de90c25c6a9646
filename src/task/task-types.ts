export const TaskStatuses = {
  PLANNING: 'planning',
  SEARCHING: 'searching',
  WRITING: 'writing',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type TaskStatus = (typeof TaskStatuses)[keyof typeof TaskStatuses];

/**
 * Progress record of one pipeline job. Status is vocabulary only: callers set
 * it directly and no transition order is enforced.
 */
export interface Task {
  taskId: string;
  status: TaskStatus;
  currentStep: string;
  /** 0 to 100 */
  percent: number;
  /** Stored and handed out by reference; snapshots do not copy or freeze it. */
  result?: unknown;
  error?: string;
  /** Epoch milliseconds */
  createdAt: number;
}

/**
 * Immutable copy of a task handed to subscribers and pollers.
 */
export type TaskSnapshot = Readonly<Task>;

export interface TaskUpdate {
  status?: TaskStatus;
  currentStep?: string;
  percent?: number;
  result?: unknown;
  error?: string;
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === TaskStatuses.COMPLETED || status === TaskStatuses.FAILED;
}
