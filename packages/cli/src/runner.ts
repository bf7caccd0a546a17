/**
 * Wire everything together: parse config, load tables and datasets, create engines, run syncs.
 */

import {
  ConfigurationError,
  createLogger,
  createRateLimitStrategy,
  createRetryStrategy,
  describeError,
  GridSyncEngine,
  RequestController,
  SyncEngine,
  systemClock,
  type Clock,
  type Logger,
  type LogLevel,
  type RateLimitStrategyOptions,
  type RetryStrategyOptions,
  type RunSummary,
  type SyncPlan,
} from "@rowsync/core";
import type { ConfigFile, JobConfigRaw, RateLimitConfigRaw, RetryConfigRaw } from "./config.js";
import { gridOrigin, loadRows, TableLoader } from "./loaders.js";
import { expandEnvironmentVariables, loadConfigFile } from "./parser.js";

/**
 * Airtable allows 5 requests per second per base.
 */
export const DEFAULT_RATE_LIMIT: RateLimitStrategyOptions = {
  type: "sliding_window",
  windowMs: 1000,
  maxRequests: 5,
};

function secToMs(sec: number | undefined): number | undefined {
  return sec === undefined ? undefined : Math.round(sec * 1000);
}

/**
 * Convert raw retry config (snake_case, seconds) to strategy options (camelCase, ms).
 */
export function convertRetryConfig(raw: RetryConfigRaw | undefined): RetryStrategyOptions {
  if (!raw) {
    return { type: "exponential_backoff" };
  }
  const base = {
    initialDelayMs: secToMs(raw.initial_delay_sec),
    maxRetries: raw.max_retries,
    maxWaitMs: secToMs(raw.max_wait_sec),
  };
  switch (raw.strategy) {
    case "exponential_backoff":
      return { type: "exponential_backoff", ...base, multiplier: raw.multiplier };
    case "linear_growth":
      return { type: "linear_growth", ...base, incrementMs: secToMs(raw.increment_sec) };
    case "fixed_wait":
      return { type: "fixed_wait", ...base };
  }
}

/**
 * Convert raw rate limit config (snake_case, seconds) to strategy options (camelCase, ms).
 */
export function convertRateLimitConfig(raw: RateLimitConfigRaw | undefined): RateLimitStrategyOptions {
  if (!raw) {
    return DEFAULT_RATE_LIMIT;
  }
  if (raw.strategy === "fixed_wait") {
    return { type: "fixed_wait", minIntervalMs: secToMs(raw.delay_sec) ?? 0 };
  }
  const windowMs = secToMs(raw.window_sec);
  if (windowMs === undefined || raw.max_requests === undefined) {
    throw new ConfigurationError(`rate_limit.window_sec and rate_limit.max_requests are required for ${raw.strategy}`);
  }
  return { type: raw.strategy, windowMs, maxRequests: raw.max_requests };
}

export interface RunnerOptions {
  /** Overrides log_level from the config */
  logLevel?: LogLevel;
  logger?: Logger;
  clock?: Clock;
  tables?: TableLoader;
}

/**
 * Outcome of one job: a run summary, a dry-run plan, or a setup error.
 */
export type JobOutcome =
  | { jobId: string; kind: "run"; summary: RunSummary }
  | { jobId: string; kind: "plan"; plan: SyncPlan }
  | { jobId: string; kind: "error"; error: string };

export function isSuccessful(outcome: JobOutcome): boolean {
  switch (outcome.kind) {
    case "run":
      return outcome.summary.status === "success";
    case "plan":
      return true;
    case "error":
      return false;
  }
}

/**
 * Runs the jobs of one configuration. Every job shares one rate limiter and one
 * request controller, since they all talk to the same API.
 */
export class JobRunner {
  readonly config: ConfigFile;
  readonly controller: RequestController;
  readonly tables: TableLoader;
  private readonly configFilePath: string;
  private readonly logger: Logger;

  constructor(config: ConfigFile, configFilePath: string, options: RunnerOptions = {}) {
    const clock = options.clock ?? systemClock;
    this.config = config;
    this.configFilePath = configFilePath;
    this.logger =
      options.logger ?? createLogger({ level: options.logLevel ?? config.log_level ?? "info" });
    this.tables = options.tables ?? new TableLoader();
    this.controller = new RequestController({
      retry: createRetryStrategy(convertRetryConfig(config.retry)),
      rateLimit: createRateLimitStrategy(convertRateLimitConfig(config.rate_limit), clock),
      clock,
      logger: this.logger,
    });
  }

  /**
   * Load, expand and validate a configuration file, then build a runner for it.
   */
  static async fromFile(configFilePath: string, options: RunnerOptions = {}): Promise<JobRunner> {
    const config = expandEnvironmentVariables(await loadConfigFile(configFilePath));
    return new JobRunner(config, configFilePath, options);
  }

  /**
   * Select jobs by ID, in configuration order.
   * @throws ConfigurationError for an ID no job carries
   */
  selectJobs(jobIds?: string[]): JobConfigRaw[] {
    if (!jobIds || jobIds.length === 0) {
      return this.config.jobs;
    }
    const known = new Set(this.config.jobs.map((job) => job.id));
    const unknown = jobIds.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown job id(s): ${unknown.join(", ")}`);
    }
    return this.config.jobs.filter((job) => jobIds.includes(job.id));
  }

  /**
   * Create the engine of a job: a GridSyncEngine for grid targets, a SyncEngine otherwise.
   */
  async createEngine(job: JobConfigRaw): Promise<SyncEngine | GridSyncEngine> {
    const rows = await loadRows(job.source.path, this.configFilePath);
    const options = {
      jobId: job.id,
      rows,
      policy: job.policy,
      indexColumn: job.index_column,
      columns: job.columns,
      batchSize: job.batch_size,
      controller: this.controller,
      logger: this.logger,
    };
    if (job.target.type === "grid") {
      return new GridSyncEngine({
        ...options,
        grid: this.tables.loadGrid(job.target),
        origin: gridOrigin(job.target),
        columnBatchSize: job.column_batch_size,
      });
    }
    return new SyncEngine({
      ...options,
      table: this.tables.load(job.target),
      createMissingFields: job.create_missing_fields,
    });
  }

  /**
   * Run jobs one after another. A job that cannot be set up is reported and
   * does not stop the others.
   * @param dryRun - Plan only; nothing is written
   */
  async run(jobIds?: string[], dryRun = false): Promise<JobOutcome[]> {
    const outcomes: JobOutcome[] = [];

    for (const job of this.selectJobs(jobIds)) {
      let engine: SyncEngine | GridSyncEngine;
      try {
        engine = await this.createEngine(job);
      } catch (error) {
        const message = describeError(error);
        this.logger.error("Failed to create engine for job", { jobId: job.id, error: message });
        outcomes.push({ jobId: job.id, kind: "error", error: message });
        continue;
      }

      if (!dryRun) {
        outcomes.push({ jobId: job.id, kind: "run", summary: await engine.run() });
        continue;
      }

      try {
        outcomes.push({ jobId: job.id, kind: "plan", plan: await engine.plan() });
      } catch (error) {
        const message = describeError(error);
        this.logger.error("Dry run failed", { jobId: job.id, error: message });
        outcomes.push({ jobId: job.id, kind: "error", error: message });
      }
    }

    return outcomes;
  }
}

/**
 * Run jobs from a configuration file.
 * @param configFilePath - Path to the JSONC configuration file
 * @param jobIds - Optional array of job IDs to run (if not provided, runs all jobs)
 */
export async function runJobs(
  configFilePath: string,
  jobIds?: string[],
  options: RunnerOptions & { dryRun?: boolean } = {}
): Promise<JobOutcome[]> {
  const runner = await JobRunner.fromFile(configFilePath, options);
  return runner.run(jobIds, options.dryRun ?? false);
}
