/**
 * Research Pipeline
 *
 * Runs plan -> search -> write jobs in the background. Each job is admitted by
 * the rate limiter, every agent call goes through the resilience layer, plan
 * and search results are cached by content, and progress flows through the
 * task manager.
 */
import { generateCacheKey } from '../cache/cache-key.js';
import { TTLCache } from '../cache/ttl-cache.js';
import { ResilienceManager } from '../resilience/resilience-manager.js';
import { RateLimiter } from '../server/rate-limiter.js';
import { TaskManager } from '../task/task-manager.js';
import { TaskSnapshot, TaskStatuses } from '../task/task-types.js';
import { BaseErrorCode, PipelineError, RateLimitExceededError } from '../types-global/errors.js';
import { ErrorHandler } from '../utils/internal/errorHandler.js';
import { logger } from '../utils/internal/logger.js';
import { requestContextService } from '../utils/internal/requestContext.js';
import { generatePrefixedId } from '../utils/security/idGenerator.js';
import { ReportData, ResearchAgents, WebSearchItem, WebSearchPlan } from './agents.js';

export const PLAN_CACHE_TTL_MS = 60 * 60 * 1000;
export const SEARCH_CACHE_TTL_MS = 2 * 60 * 60 * 1000;

export const DependencyNames = {
  PLANNER: 'planner',
  SEARCHER: 'searcher',
  WRITER: 'writer',
} as const;

export interface ResearchPipelineDeps {
  agents: ResearchAgents;
  cache: TTLCache;
  resilience: ResilienceManager;
  rateLimiter: RateLimiter;
  taskManager: TaskManager;
}

export class ResearchPipeline {
  private readonly agents: ResearchAgents;
  private readonly cache: TTLCache;
  private readonly resilience: ResilienceManager;
  private readonly rateLimiter: RateLimiter;
  private readonly taskManager: TaskManager;
  private readonly running = new Set<Promise<void>>();

  constructor(deps: ResearchPipelineDeps) {
    this.agents = deps.agents;
    this.cache = deps.cache;
    this.resilience = deps.resilience;
    this.rateLimiter = deps.rateLimiter;
    this.taskManager = deps.taskManager;
  }

  /**
   * Admits a research job for `clientKey` and starts it in the background.
   *
   * @returns The initial task snapshot; progress follows through the task manager.
   * @throws {RateLimitExceededError} when the client is over its limit
   */
  submit(clientKey: string, query: string): TaskSnapshot {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new PipelineError(BaseErrorCode.VALIDATION_ERROR, 'Research query must not be empty');
    }

    const { allowed, info } = this.rateLimiter.checkRateLimit(clientKey);
    if (!allowed) {
      throw new RateLimitExceededError(clientKey, {
        limit: info.limit,
        remaining: info.remaining,
        retryAfter: info.retryAfter ?? 0,
      });
    }

    const taskId = generatePrefixedId('task');
    const task = this.taskManager.createTask(taskId);

    const job = this.run(taskId, trimmed).finally(() => {
      this.running.delete(job);
    });
    this.running.add(job);

    return task;
  }

  /**
   * Runs one job to completion. Never rejects: failures end in the failed state.
   */
  async run(taskId: string, query: string): Promise<void> {
    const context = requestContextService.createRequestContext({
      operation: 'ResearchPipeline.run',
      taskId,
    });
    logger.info('Research started', { ...context, component: 'ResearchPipeline' });

    try {
      this.taskManager.updateTask(taskId, {
        status: TaskStatuses.PLANNING,
        currentStep: 'Planning searches...',
        percent: 10,
      });
      const plan = await this.planSearches(query);

      this.taskManager.updateTask(taskId, {
        status: TaskStatuses.SEARCHING,
        currentStep: `Searching ${plan.searches.length} sources...`,
        percent: 30,
      });
      const results = await this.performSearches(taskId, plan);

      this.taskManager.updateTask(taskId, {
        status: TaskStatuses.WRITING,
        currentStep: 'Writing report...',
        percent: 70,
      });
      const report = await this.writeReport(query, results);

      this.taskManager.updateTask(taskId, {
        status: TaskStatuses.COMPLETED,
        currentStep: 'Research complete',
        percent: 100,
        result: report,
      });
      logger.info('Research completed', { ...context, component: 'ResearchPipeline' });
    } catch (error) {
      const handled = ErrorHandler.handleError(error, {
        operation: 'ResearchPipeline.run',
        context,
      });
      this.taskManager.updateTask(taskId, {
        status: TaskStatuses.FAILED,
        currentStep: 'Research failed',
        error: handled.message,
      });
    }
  }

  /**
   * Resolves once every job started so far has settled.
   */
  async waitForIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running]);
    }
  }

  get activeJobs(): number {
    return this.running.size;
  }

  private async planSearches(query: string): Promise<WebSearchPlan> {
    const value = await this.cache.getOrCompute(
      generateCacheKey('plan', query),
      () => this.resilience.withResilience(DependencyNames.PLANNER, () => this.agents.plan(query)),
      PLAN_CACHE_TTL_MS
    );
    return toSearchPlan(value);
  }

  private async performSearches(taskId: string, plan: WebSearchPlan): Promise<string[]> {
    const results: string[] = [];
    const total = plan.searches.length;

    for (const [index, item] of plan.searches.entries()) {
      this.taskManager.updateTask(taskId, {
        currentStep: `Searching: ${item.query} (${index + 1}/${total})`,
        percent: 30 + Math.floor((index / total) * 35),
      });
      results.push(await this.search(item));
    }
    return results;
  }

  private async search(item: WebSearchItem): Promise<string> {
    const value = await this.cache.getOrCompute(
      generateCacheKey('search', item.query),
      () => this.resilience.withResilience(DependencyNames.SEARCHER, () => this.agents.search(item)),
      SEARCH_CACHE_TTL_MS
    );
    if (typeof value !== 'string') {
      throw new PipelineError(BaseErrorCode.INTERNAL_ERROR, 'Cached search result has an unexpected shape', {
        query: item.query,
      });
    }
    return value;
  }

  private writeReport(query: string, results: string[]): Promise<ReportData> {
    return this.resilience.withResilience(DependencyNames.WRITER, () => this.agents.write(query, results));
  }
}

// The cache stores opaque values; narrow a plan read back from it.
function toSearchPlan(value: unknown): WebSearchPlan {
  if (
    typeof value === 'object' &&
    value !== null &&
    'searches' in value &&
    Array.isArray(value.searches)
  ) {
    const searches: WebSearchItem[] = [];
    for (const item of value.searches) {
      if (
        typeof item === 'object' &&
        item !== null &&
        'query' in item &&
        typeof item.query === 'string' &&
        'reason' in item &&
        typeof item.reason === 'string'
      ) {
        searches.push({ query: item.query, reason: item.reason });
      }
    }
    return { searches };
  }
  throw new PipelineError(BaseErrorCode.INTERNAL_ERROR, 'Cached search plan has an unexpected shape');
}
