/**
 * Human-readable lines for job outcomes, printed by the CLI.
 */

import type { SyncPlan } from "@rowsync/core";
import type { JobOutcome } from "./runner.js";

function describePlan(plan: SyncPlan): string {
  const parts = [
    `create ${plan.toCreate.length}`,
    `update ${plan.toUpdate.length}`,
    `delete ${plan.toDelete.length}`,
  ];
  if (plan.skipped > 0) {
    parts.push(`skip ${plan.skipped}`);
  }
  const downgraded = plan.downgraded ? ", downgraded to append" : "";
  return `${plan.policy}${downgraded}: ${parts.join(", ")}`;
}

export function formatOutcome(outcome: JobOutcome): string[] {
  switch (outcome.kind) {
    case "error":
      return [`Job '${outcome.jobId}' failed to start: ${outcome.error}`];

    case "plan":
      return [`Job '${outcome.jobId}' plan (dry run) - ${describePlan(outcome.plan)}`];

    case "run": {
      const { summary } = outcome;
      const { stats } = summary;
      const lines = [
        `Job '${outcome.jobId}' completed: ${summary.status} ` +
          `(created ${stats.created}, updated ${stats.updated}, deleted ${stats.deleted}, ` +
          `skipped ${stats.skipped}, retries ${stats.retries}, bisections ${stats.bisections}, ` +
          `${summary.durationMs}ms)`,
      ];
      for (const error of stats.errors) {
        lines.push(`  error: ${error}`);
      }
      return lines;
    }
  }
}
