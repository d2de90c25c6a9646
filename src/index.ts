export { createPipelineCore, type PipelineCore, type PipelineCoreOptions, type PipelineCoreStatus } from './core.js';
export { config, loadConfig, type AppConfig } from './config/index.js';

export { TTLCache } from './cache/ttl-cache.js';
export { generateCacheKey } from './cache/cache-key.js';
export type { CacheEntry, CacheEntryInfo, CacheOptions, CacheStats, ComputeFn } from './cache/cache-types.js';

export * from './resilience/index.js';

export {
  RateLimiter,
  type RateLimitInfo,
  type RateLimitResult,
  type RateLimiterOptions,
  type RateLimiterStats,
} from './server/rate-limiter.js';

export { TaskManager, type TaskManagerStats } from './task/task-manager.js';
export { TaskSubscription, type SubscriptionResult } from './task/task-subscription.js';
export { streamTaskProgress, type ProgressEvent, type ProgressStreamOptions } from './task/progress-stream.js';
export {
  TaskStatuses,
  isTerminalStatus,
  type Task,
  type TaskSnapshot,
  type TaskStatus,
  type TaskUpdate,
} from './task/task-types.js';

export {
  ResearchPipeline,
  DependencyNames,
  PLAN_CACHE_TTL_MS,
  SEARCH_CACHE_TTL_MS,
  type ResearchPipelineDeps,
} from './pipeline/research-pipeline.js';
export type { ReportData, ResearchAgents, WebSearchItem, WebSearchPlan } from './pipeline/agents.js';

export {
  MaintenanceScheduler,
  type MaintenanceOptions,
  type MaintenanceReport,
  type MaintenanceTargets,
} from './maintenance/scheduler.js';

export * from './types-global/errors.js';
export * from './utils/index.js';
