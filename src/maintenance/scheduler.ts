/**
 * Maintenance Scheduler
 *
 * Periodic sweep owned by the process lifecycle: drops expired cache entries,
 * old tasks and idle rate-limiter clients.
 */
import * as nodeCron from 'node-cron';
import { TTLCache } from '../cache/ttl-cache.js';
import { config } from '../config/index.js';
import { RateLimiter } from '../server/rate-limiter.js';
import { TaskManager } from '../task/task-manager.js';
import { BaseErrorCode, PipelineError } from '../types-global/errors.js';
import { ErrorHandler } from '../utils/internal/errorHandler.js';
import { logger } from '../utils/internal/logger.js';

export interface MaintenanceTargets {
  cache: TTLCache;
  taskManager: TaskManager;
  rateLimiter: RateLimiter;
}

export interface MaintenanceOptions {
  /** Cron expression. */
  schedule?: string;
  maxTaskAgeMinutes?: number;
}

export interface MaintenanceReport {
  expiredCacheEntries: number;
  removedTasks: number;
  idleClients: number;
}

export class MaintenanceScheduler {
  private cronJob: nodeCron.ScheduledTask | null = null;
  private readonly schedule: string;
  private readonly maxTaskAgeMinutes: number;

  constructor(
    private readonly targets: MaintenanceTargets,
    options: MaintenanceOptions = {}
  ) {
    this.schedule = options.schedule ?? config.maintenance.schedule;
    this.maxTaskAgeMinutes = options.maxTaskAgeMinutes ?? config.tasks.maxAgeMinutes;
  }

  /**
   * Starts the recurring sweep. Calling it again restarts the job.
   * @throws {PipelineError} if the cron expression is invalid
   */
  start(): void {
    this.stop();

    if (!nodeCron.validate(this.schedule)) {
      throw new PipelineError(BaseErrorCode.VALIDATION_ERROR, `Invalid cron schedule: ${this.schedule}`, {
        schedule: this.schedule,
      });
    }

    this.cronJob = nodeCron.schedule(this.schedule, async () => {
      try {
        await this.runOnce();
      } catch (error) {
        ErrorHandler.handleError(error, { operation: 'MaintenanceScheduler.runOnce' });
      }
    });

    logger.info('Maintenance scheduled', {
      component: 'MaintenanceScheduler',
      schedule: this.schedule,
      maxTaskAgeMinutes: this.maxTaskAgeMinutes,
    });
  }

  stop(): void {
    if (this.cronJob) {
      logger.info('Stopping scheduled maintenance', { component: 'MaintenanceScheduler' });
      this.cronJob.stop();
      this.cronJob = null;
    }
  }

  get isRunning(): boolean {
    return this.cronJob !== null;
  }

  async runOnce(): Promise<MaintenanceReport> {
    const expiredCacheEntries = await this.targets.cache.cleanupExpired();
    const removedTasks = this.targets.taskManager.cleanupOldTasks(this.maxTaskAgeMinutes);
    const idleClients = this.targets.rateLimiter.pruneIdleClients();

    const report: MaintenanceReport = { expiredCacheEntries, removedTasks, idleClients };
    logger.debug('Maintenance sweep finished', { component: 'MaintenanceScheduler', ...report });
    return report;
  }
}
