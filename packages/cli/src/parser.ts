/**
 * JSONC configuration file parsing, validation and environment variable expansion.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import {
  ConfigurationError,
  describeError,
  isLogLevel,
  isSyncPolicy,
  LOG_LEVELS,
  RATE_LIMIT_STRATEGY_TYPES,
  RETRY_STRATEGY_TYPES,
  SYNC_POLICIES,
  type RateLimitStrategyType,
  type RetryStrategyType,
} from "@rowsync/core";
import type {
  AdapterName,
  ConfigFile,
  CredentialsConfig,
  JobConfigRaw,
  RateLimitConfigRaw,
  RetryConfigRaw,
  TargetConfigRaw,
  TargetType,
} from "./config.js";

type JsonObject = { [key: string]: unknown };

const ADAPTERS: readonly AdapterName[] = ["airtable", "memory"];
const TARGET_TYPES: readonly TargetType[] = ["table", "grid"];
const COLUMN_LETTERS = /^[A-Za-z]+$/;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return typeof value === "string" && allowed.some((item) => item === value);
}

/**
 * Parse JSONC text (comments and trailing commas allowed).
 * @throws ConfigurationError listing every syntax error with its offset
 */
export function parseJsoncText(content: string): unknown {
  const errors: ParseError[] = [];
  const value: unknown = parseJsonc(content, errors, {
    allowTrailingComma: true,
    disallowComments: false,
  });
  if (errors.length > 0) {
    const messages = errors.map((e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`);
    throw new ConfigurationError(`Failed to parse JSONC: ${messages.join(", ")}`);
  }
  return value;
}

/**
 * Load and parse a JSONC configuration file.
 * Environment variables are left unexpanded; see {@link expandEnvironmentVariables}.
 * @param configPath - Path to the JSONC configuration file
 * @throws ConfigurationError if the file cannot be read, parsed or validated
 */
export async function loadConfigFile(configPath: string): Promise<ConfigFile> {
  const fullPath = path.resolve(configPath);

  try {
    const content = await fs.readFile(fullPath, "utf-8");
    return validateConfig(parseJsoncText(content));
  } catch (error) {
    throw new ConfigurationError(`Failed to load config from ${fullPath}: ${describeError(error)}`);
  }
}

/**
 * Expand environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax; unknown variables without a default are kept as written.
 */
export function expandEnvVar(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(
    /\$\{([^}:-]+)(?::-(.+?))?\}/g,
    (match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      return match;
    }
  );
}

/**
 * Recursively expand environment variables in every string of a value.
 */
function expandEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return expandEnvVar(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnvVars(item, env));
  }
  if (isObject(value)) {
    const expanded: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      expanded[key] = expandEnvVars(item, env);
    }
    return expanded;
  }
  return value;
}

/**
 * Expand environment variables in the configuration.
 * The result is validated again, since expansion only ever produces strings.
 */
export function expandEnvironmentVariables(
  config: ConfigFile,
  env: NodeJS.ProcessEnv = process.env
): ConfigFile {
  return validateConfig(expandEnvVars(config, env));
}

/**
 * Validate the structure of the configuration object.
 * @returns the configuration with only known keys
 * @throws ConfigurationError naming the offending path
 */
export function validateConfig(config: unknown): ConfigFile {
  if (!isObject(config)) {
    throw new ConfigurationError("Configuration file must contain an object");
  }

  const result: ConfigFile = { jobs: [] };

  if (config.log_level !== undefined) {
    if (!isLogLevel(config.log_level)) {
      throw new ConfigurationError(`log_level must be one of ${LOG_LEVELS.join(", ")}`);
    }
    result.log_level = config.log_level;
  }
  if (config.retry !== undefined) {
    result.retry = validateRetryConfig(config.retry);
  }
  if (config.rate_limit !== undefined) {
    result.rate_limit = validateRateLimitConfig(config.rate_limit);
  }

  if (!Array.isArray(config.jobs)) {
    throw new ConfigurationError("Configuration must include 'jobs' array");
  }

  const ids = new Set<string>();
  config.jobs.forEach((job: unknown, i: number) => {
    const validated = validateJobConfig(job, i);
    if (ids.has(validated.id)) {
      throw new ConfigurationError(`Duplicate job id '${validated.id}'`);
    }
    ids.add(validated.id);
    result.jobs.push(validated);
  });

  return result;
}

function readNumber(
  obj: JsonObject,
  key: string,
  where: string,
  check: (value: number) => boolean,
  expectation: string
): number | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || !check(value)) {
    throw new ConfigurationError(`${where}.${key} must be ${expectation}`);
  }
  return value;
}

const nonNegative = (value: number): boolean => value >= 0;
const positive = (value: number): boolean => value > 0;
const positiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;
const nonNegativeInteger = (value: number): boolean => Number.isInteger(value) && value >= 0;

function validateRetryConfig(retry: unknown): RetryConfigRaw {
  if (!isObject(retry)) {
    throw new ConfigurationError("retry must be an object");
  }
  const strategy: unknown = retry.strategy ?? "exponential_backoff";
  if (!oneOf<RetryStrategyType>(RETRY_STRATEGY_TYPES, strategy)) {
    throw new ConfigurationError(`retry.strategy must be one of ${RETRY_STRATEGY_TYPES.join(", ")}`);
  }

  const result: RetryConfigRaw = { strategy };
  result.initial_delay_sec = readNumber(retry, "initial_delay_sec", "retry", nonNegative, "a non-negative number");
  result.max_retries = readNumber(retry, "max_retries", "retry", nonNegativeInteger, "a non-negative integer");
  result.max_wait_sec = readNumber(retry, "max_wait_sec", "retry", nonNegative, "a non-negative number");
  result.multiplier = readNumber(retry, "multiplier", "retry", positive, "a positive number");
  result.increment_sec = readNumber(retry, "increment_sec", "retry", nonNegative, "a non-negative number");
  return result;
}

function validateRateLimitConfig(rateLimit: unknown): RateLimitConfigRaw {
  if (!isObject(rateLimit)) {
    throw new ConfigurationError("rate_limit must be an object");
  }
  const strategy: unknown = rateLimit.strategy;
  if (!oneOf<RateLimitStrategyType>(RATE_LIMIT_STRATEGY_TYPES, strategy)) {
    throw new ConfigurationError(
      `rate_limit.strategy must be one of ${RATE_LIMIT_STRATEGY_TYPES.join(", ")}`
    );
  }

  const result: RateLimitConfigRaw = { strategy };
  if (strategy === "fixed_wait") {
    result.delay_sec = readNumber(rateLimit, "delay_sec", "rate_limit", nonNegative, "a non-negative number");
    if (result.delay_sec === undefined) {
      throw new ConfigurationError("rate_limit.delay_sec is required for fixed_wait");
    }
    return result;
  }

  result.window_sec = readNumber(rateLimit, "window_sec", "rate_limit", positive, "a positive number");
  result.max_requests = readNumber(rateLimit, "max_requests", "rate_limit", positiveInteger, "a positive integer");
  if (result.window_sec === undefined || result.max_requests === undefined) {
    throw new ConfigurationError(`rate_limit.window_sec and rate_limit.max_requests are required for ${strategy}`);
  }
  return result;
}

/**
 * Validate a single job configuration.
 * @param index - Position in the jobs array, for error messages
 */
function validateJobConfig(job: unknown, index: number): JobConfigRaw {
  if (!isObject(job)) {
    throw new ConfigurationError(`jobs[${index}] must be an object`);
  }
  if (typeof job.id !== "string" || job.id.trim() === "") {
    throw new ConfigurationError(`jobs[${index}] must have a string 'id'`);
  }
  const where = `Job '${job.id}'`;

  if (!isSyncPolicy(job.policy)) {
    throw new ConfigurationError(`${where}: policy must be one of ${SYNC_POLICIES.join(", ")}`);
  }
  if (!isObject(job.source) || typeof job.source.path !== "string" || job.source.path === "") {
    throw new ConfigurationError(`${where}: must have a 'source' object with a 'path' string`);
  }

  const result: JobConfigRaw = {
    id: job.id,
    policy: job.policy,
    source: { path: job.source.path },
    target: validateTargetConfig(where, job.target),
  };

  if (job.schedule !== undefined) {
    if (typeof job.schedule !== "string") {
      throw new ConfigurationError(`${where}: schedule must be a cron expression string`);
    }
    result.schedule = job.schedule;
  }
  if (job.index_column !== undefined) {
    if (typeof job.index_column !== "string") {
      throw new ConfigurationError(`${where}: index_column must be a string`);
    }
    result.index_column = job.index_column;
  }
  if (job.policy === "overwrite" && (result.index_column ?? "").trim() === "") {
    throw new ConfigurationError(`${where}: the overwrite policy requires 'index_column'`);
  }
  result.batch_size = readNumber(job, "batch_size", where, positiveInteger, "a positive integer");
  result.column_batch_size = readNumber(job, "column_batch_size", where, positiveInteger, "a positive integer");
  if (result.column_batch_size !== undefined && result.target.type !== "grid") {
    throw new ConfigurationError(`${where}: column_batch_size applies to grid targets only`);
  }
  if (job.create_missing_fields !== undefined) {
    if (typeof job.create_missing_fields !== "boolean") {
      throw new ConfigurationError(`${where}: create_missing_fields must be a boolean`);
    }
    result.create_missing_fields = job.create_missing_fields;
  }
  if (job.columns !== undefined) {
    const { columns } = job;
    if (!Array.isArray(columns) || columns.length === 0) {
      throw new ConfigurationError(`${where}: columns must be a non-empty array of column names`);
    }
    const names: string[] = [];
    for (const column of columns) {
      if (typeof column !== "string" || column.trim() === "") {
        throw new ConfigurationError(`${where}: columns must be a non-empty array of column names`);
      }
      names.push(column);
    }
    if (job.policy === "clone") {
      throw new ConfigurationError(`${where}: columns cannot be combined with the clone policy`);
    }
    result.columns = names;
  }
  return result;
}

/**
 * Validate the target of a job.
 */
function validateTargetConfig(where: string, target: unknown): TargetConfigRaw {
  if (!isObject(target)) {
    throw new ConfigurationError(`${where}: must have a 'target' object`);
  }
  if (!oneOf<AdapterName>(ADAPTERS, target.adapter)) {
    throw new ConfigurationError(`${where}, target: adapter must be one of ${ADAPTERS.join(", ")}`);
  }
  if (typeof target.table !== "string" || target.table === "") {
    throw new ConfigurationError(`${where}, target: must have 'table' string`);
  }

  const result: TargetConfigRaw = { adapter: target.adapter, table: target.table };

  if (target.type !== undefined) {
    if (!oneOf<TargetType>(TARGET_TYPES, target.type)) {
      throw new ConfigurationError(`${where}, target: type must be one of ${TARGET_TYPES.join(", ")}`);
    }
    result.type = target.type;
  }
  if (result.type === "grid") {
    if (result.adapter !== "memory") {
      throw new ConfigurationError(`${where}, target: the ${result.adapter} adapter has no grid targets`);
    }
    result.start_row = readNumber(target, "start_row", `${where}, target`, positiveInteger, "a positive integer");
    if (target.start_column !== undefined) {
      if (typeof target.start_column !== "string" || !COLUMN_LETTERS.test(target.start_column)) {
        throw new ConfigurationError(`${where}, target: start_column must be column letters such as "A"`);
      }
      result.start_column = target.start_column.toUpperCase();
    }
  } else if (target.start_row !== undefined || target.start_column !== undefined) {
    throw new ConfigurationError(`${where}, target: start_row and start_column apply to grid targets only`);
  }

  if (target.creds !== undefined) {
    if (!isObject(target.creds)) {
      throw new ConfigurationError(`${where}, target: 'creds' must be an object`);
    }
    const creds: CredentialsConfig = {};
    for (const [key, value] of Object.entries(target.creds)) {
      if (typeof value !== "string") {
        throw new ConfigurationError(`${where}, target: creds.${key} must be a string`);
      }
      creds[key] = value;
    }
    result.creds = creds;
  }
  if (target.adapter === "airtable") {
    for (const key of ["api_key", "base_id"]) {
      if (!result.creds?.[key]) {
        throw new ConfigurationError(`${where}, target: airtable requires creds.${key}`);
      }
    }
  }

  if (target.typecast !== undefined) {
    if (typeof target.typecast !== "boolean") {
      throw new ConfigurationError(`${where}, target: typecast must be a boolean`);
    }
    result.typecast = target.typecast;
  }
  return result;
}
