#!/usr/bin/env node
/**
 * rowsync CLI - Main entry point
 */

import { Command } from "commander";
import * as path from "path";
import * as fs from "fs/promises";
import { config } from "dotenv";
import * as cron from "node-cron";
import { describeError, isLogLevel, LOG_LEVELS, type LogLevel } from "@rowsync/core";
import { isSuccessful, JobRunner } from "./runner.js";
import { formatOutcome } from "./report.js";
import { expandEnvironmentVariables, loadConfigFile } from "./parser.js";

// Load environment variables from .env file if it exists
config();

const DEFAULT_CONFIG = "rowsync.jsonc";

interface CommonOptions {
  config: string;
  logLevel?: string;
}

interface RunCommandOptions extends CommonOptions {
  jobs?: string[];
  dryRun?: boolean;
}

/**
 * Resolve the config path, exiting when the file does not exist.
 */
async function resolveConfigPath(configOption: string): Promise<string> {
  const configPath = path.resolve(configOption);
  try {
    await fs.access(configPath);
  } catch {
    console.error(`Error: Configuration file not found: ${configPath}`);
    process.exit(1);
  }
  return configPath;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isLogLevel(value)) {
    console.error(`Error: --log-level must be one of ${LOG_LEVELS.join(", ")}`);
    process.exit(1);
  }
  return value;
}

const program = new Command();

program
  .name("rowsync")
  .description("Push local tabular datasets into rate-limited remote tables")
  .version("0.1.0");

program
  .command("run")
  .description("Run sync jobs once")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .option("-j, --jobs <ids...>", "Specific job IDs to run (default: all jobs)")
  .option("--dry-run", "Read the remote tables and print the plans without writing")
  .option("--log-level <level>", `Log level (${LOG_LEVELS.join(", ")})`)
  .action(async (options: RunCommandOptions) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const logLevel = parseLogLevel(options.logLevel);
      const runner = await JobRunner.fromFile(configPath, { logLevel });

      const jobIds = options.jobs && options.jobs.length > 0 ? options.jobs : undefined;
      const outcomes = await runner.run(jobIds, options.dryRun ?? false);

      for (const outcome of outcomes) {
        const lines = formatOutcome(outcome);
        const print = isSuccessful(outcome) ? console.log : console.error;
        lines.forEach((line) => print(line));
      }
      console.log(`\nCompleted ${outcomes.length} job(s)`);

      // Exit with error code if any job did not fully succeed
      process.exit(outcomes.every(isSuccessful) ? 0 : 1);
    } catch (error) {
      console.error(`Error running jobs: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("schedule")
  .description("Run sync jobs on their configured schedules")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .option("--log-level <level>", `Log level (${LOG_LEVELS.join(", ")})`)
  .action(async (options: CommonOptions) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const logLevel = parseLogLevel(options.logLevel);
      const runner = await JobRunner.fromFile(configPath, { logLevel });

      console.log(`Starting scheduled sync jobs from ${configPath}`);
      console.log(`Found ${runner.config.jobs.length} job(s)\n`);

      // Schedule each job that has a schedule
      const scheduledJobs = new Map<string, cron.ScheduledTask>();
      const running = new Set<string>();

      for (const job of runner.config.jobs) {
        if (!job.schedule) {
          console.log(`Job '${job.id}' has no schedule (manual/CLI-only)`);
          continue;
        }
        if (!cron.validate(job.schedule)) {
          console.error(`Invalid cron expression for job '${job.id}': ${job.schedule}`);
          continue;
        }

        const task = cron.schedule(
          job.schedule,
          async () => {
            if (running.has(job.id)) {
              console.error(`[${new Date().toISOString()}] Job '${job.id}' is still running, tick skipped`);
              return;
            }
            running.add(job.id);
            console.log(`[${new Date().toISOString()}] Running scheduled job: ${job.id}`);
            try {
              const outcomes = await runner.run([job.id]);
              outcomes.forEach((outcome) => formatOutcome(outcome).forEach((line) => console.log(line)));
            } catch (error) {
              console.error(`[${new Date().toISOString()}] Error running job '${job.id}': ${describeError(error)}`);
            } finally {
              running.delete(job.id);
            }
          },
          {
            scheduled: true,
            timezone: "UTC",
          }
        );

        scheduledJobs.set(job.id, task);
        console.log(`Scheduled job '${job.id}' with cron: ${job.schedule}`);
      }

      if (scheduledJobs.size === 0) {
        console.log("\nNo jobs with schedules found. Use 'rowsync run' to run jobs manually.");
        process.exit(0);
      }

      console.log(`\n${scheduledJobs.size} job(s) scheduled. Press Ctrl+C to stop.`);

      process.on("SIGINT", () => {
        console.log("\nShutting down...");
        for (const [jobId, task] of scheduledJobs) {
          task.stop();
          console.log(`Stopped schedule for job '${jobId}'`);
        }
        process.exit(0);
      });
    } catch (error) {
      console.error(`Error starting scheduled jobs: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("validate")
  .description("Validate a configuration file without running jobs")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action(async (options: CommonOptions) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const config = expandEnvironmentVariables(await loadConfigFile(configPath));

      console.log(`✓ Configuration file is valid: ${configPath}`);
      console.log(`  Retry: ${config.retry?.strategy ?? "exponential_backoff (default)"}`);
      console.log(`  Rate limit: ${config.rate_limit?.strategy ?? "sliding_window (default)"}`);
      console.log(`  Jobs: ${config.jobs.length}`);

      for (const job of config.jobs) {
        const schedule = job.schedule ? `schedule: ${job.schedule}` : "manual";
        const kind = job.target.type === "grid" ? " grid" : "";
        console.log(
          `    - ${job.id}: ${job.policy} -> ${job.target.adapter}${kind}:${job.target.table} (${schedule})`
        );
      }

      process.exit(0);
    } catch (error) {
      console.error(`Configuration validation failed: ${describeError(error)}`);
      process.exit(1);
    }
  });

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  console.error(describeError(error));
  process.exit(1);
});
