/**
 * @rowsync/cli - CLI for rowsync
 */

export {
  runJobs,
  JobRunner,
  isSuccessful,
  convertRetryConfig,
  convertRateLimitConfig,
  DEFAULT_RATE_LIMIT,
  type JobOutcome,
  type RunnerOptions,
} from "./runner.js";
export {
  loadConfigFile,
  expandEnvironmentVariables,
  expandEnvVar,
  validateConfig,
  parseJsoncText,
} from "./parser.js";
export { TableLoader, loadRows, columnIndex, gridOrigin, type TableFactory } from "./loaders.js";
export { formatOutcome } from "./report.js";
export type {
  ConfigFile,
  JobConfigRaw,
  TargetConfigRaw,
  SourceConfigRaw,
  RetryConfigRaw,
  RateLimitConfigRaw,
  CredentialsConfig,
  AdapterName,
  TargetType,
} from "./config.js";
