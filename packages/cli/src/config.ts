/**
 * Type definitions for JSONC configuration file format.
 * These types represent the raw configuration as it appears in the JSONC file.
 * Uses snake_case to match JSONC format; durations are in seconds.
 */

import type { LogLevel, RateLimitStrategyType, RetryStrategyType, SyncPolicy } from "@rowsync/core";

/**
 * Retry configuration (as it appears in JSONC).
 */
export interface RetryConfigRaw {
  strategy: RetryStrategyType;
  initial_delay_sec?: number;
  max_retries?: number;
  max_wait_sec?: number;
  /** exponential_backoff only */
  multiplier?: number;
  /** linear_growth only */
  increment_sec?: number;
}

/**
 * Rate limit configuration (as it appears in JSONC).
 * `delay_sec` applies to fixed_wait, `window_sec` and `max_requests` to the window strategies.
 */
export interface RateLimitConfigRaw {
  strategy: RateLimitStrategyType;
  delay_sec?: number;
  window_sec?: number;
  max_requests?: number;
}

/**
 * Credentials for an adapter (as it appears in JSONC).
 * Environment variables are resolved after parsing.
 */
export interface CredentialsConfig {
  [key: string]: string;
}

export type AdapterName = "airtable" | "memory";

/**
 * `table` targets hold records, `grid` targets hold cells (spreadsheets).
 */
export type TargetType = "table" | "grid";

/**
 * Remote table or grid of a sync job (as it appears in JSONC).
 */
export interface TargetConfigRaw {
  adapter: AdapterName;
  /** Table name, or sheet name for a grid */
  table: string;
  type?: TargetType;
  creds?: CredentialsConfig;
  typecast?: boolean;
  /** Grid only: 1-based row of the header, default 1 */
  start_row?: number;
  /** Grid only: column letters of the first column, default "A" */
  start_column?: string;
}

/**
 * Local dataset of a sync job (as it appears in JSONC).
 */
export interface SourceConfigRaw {
  /** JSON or JSONC file holding an array of row objects, relative to the config file */
  path: string;
}

/**
 * Individual job configuration (as it appears in JSONC).
 */
export interface JobConfigRaw {
  id: string;
  schedule?: string; // Cron expression; omit for manual/CLI-only
  source: SourceConfigRaw;
  target: TargetConfigRaw;
  policy: SyncPolicy;
  index_column?: string;
  batch_size?: number;
  /** Grid only: columns per write call */
  column_batch_size?: number;
  create_missing_fields?: boolean;
  /** Sync only these columns; the index column is always included */
  columns?: string[];
}

/**
 * Complete configuration file structure (as it appears in JSONC).
 */
export interface ConfigFile {
  log_level?: LogLevel;
  retry?: RetryConfigRaw;
  rate_limit?: RateLimitConfigRaw;
  jobs: JobConfigRaw[];
}
