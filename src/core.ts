/**
 * Explicit construction of the pipeline core. Every shared structure is
 * created here once and handed to its consumers; nothing lives in module scope.
 */
import { TTLCache } from './cache/ttl-cache.js';
import { CacheOptions, CacheStats } from './cache/cache-types.js';
import { config } from './config/index.js';
import { MaintenanceOptions, MaintenanceScheduler } from './maintenance/scheduler.js';
import { ResearchAgents } from './pipeline/agents.js';
import { ResearchPipeline } from './pipeline/research-pipeline.js';
import { BreakerDefaults, CircuitBreakerRegistry } from './resilience/breaker-registry.js';
import { ResilienceManager } from './resilience/resilience-manager.js';
import { RetryExecutor } from './resilience/retry.js';
import { CircuitBreakerSnapshot, RetryPolicy, SleepFn } from './resilience/types.js';
import { RateLimiter, RateLimiterOptions, RateLimiterStats } from './server/rate-limiter.js';
import { TaskManager, TaskManagerStats } from './task/task-manager.js';
import { LogLevel, logger } from './utils/internal/logger.js';

export interface PipelineCoreOptions {
  agents: ResearchAgents;
  cache?: CacheOptions;
  breakers?: BreakerDefaults;
  retryPolicy?: Partial<RetryPolicy>;
  /** Replaces the backoff sleep, mainly for tests. */
  sleep?: SleepFn;
  rateLimit?: RateLimiterOptions;
  maintenance?: MaintenanceOptions;
  /** Overrides `config.logLevel` and `config.logsPath` for `start()`. */
  logging?: { level?: LogLevel; logsDir?: string };
}

export interface PipelineCoreStatus {
  service: { name: string; version: string; environment: string };
  cache: CacheStats;
  circuitBreakers: Record<string, CircuitBreakerSnapshot>;
  rateLimiter: RateLimiterStats;
  tasks: TaskManagerStats;
  activeJobs: number;
  maintenanceRunning: boolean;
}

export interface PipelineCore {
  cache: TTLCache;
  breakers: CircuitBreakerRegistry;
  resilience: ResilienceManager;
  rateLimiter: RateLimiter;
  taskManager: TaskManager;
  pipeline: ResearchPipeline;
  maintenance: MaintenanceScheduler;
  /** Read-only operator view of every component. */
  getStatus(): PipelineCoreStatus;
  /** Initializes the logger, then starts the maintenance sweep. */
  start(): Promise<void>;
  /** Stops maintenance, waits for running jobs to settle and flushes the logger. */
  shutdown(): Promise<void>;
}

export function createPipelineCore(options: PipelineCoreOptions): PipelineCore {
  const cache = new TTLCache(options.cache);
  const breakers = new CircuitBreakerRegistry(options.breakers);
  const resilience = new ResilienceManager({
    registry: breakers,
    executor: new RetryExecutor({ sleep: options.sleep }),
    policy: options.retryPolicy,
  });
  const rateLimiter = new RateLimiter(options.rateLimit);
  const taskManager = new TaskManager();
  const pipeline = new ResearchPipeline({
    agents: options.agents,
    cache,
    resilience,
    rateLimiter,
    taskManager,
  });
  const maintenance = new MaintenanceScheduler({ cache, taskManager, rateLimiter }, options.maintenance);

  return {
    cache,
    breakers,
    resilience,
    rateLimiter,
    taskManager,
    pipeline,
    maintenance,
    getStatus: () => ({
      service: {
        name: config.serviceName,
        version: config.serviceVersion,
        environment: config.environment,
      },
      cache: cache.getStats(),
      circuitBreakers: resilience.getBreakerStates(),
      rateLimiter: rateLimiter.getStats(),
      tasks: taskManager.getStats(),
      activeJobs: pipeline.activeJobs,
      maintenanceRunning: maintenance.isRunning,
    }),
    start: async () => {
      await logger.initialize(
        options.logging?.level ?? config.logLevel,
        options.logging?.logsDir ?? config.logsPath,
      );
      maintenance.start();
      logger.notice('Pipeline core started', {
        component: 'PipelineCore',
        service: config.serviceName,
        version: config.serviceVersion,
        environment: config.environment,
      });
    },
    shutdown: async () => {
      maintenance.stop();
      await pipeline.waitForIdle();
      logger.info('Pipeline core shut down', { component: 'PipelineCore' });
      await logger.close();
    },
  };
}
