/**
 * SyncEngine - one-way sync orchestration.
 * Implements the prepare-read-plan-push loop on top of the request controller
 * and the chunked transport. The loop itself lives in BaseSyncEngine and is
 * shared with the grid engine.
 */

import type { RequestController } from "./controller.js";
import { ConfigurationError, describeError, RemoteError } from "./errors.js";
import { collectColumns, inferFieldType, rowToFields, selectColumns } from "./fields.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  isSyncPolicy,
  needsRemoteRead,
  planSync,
  type PlannedRow,
  type PlannedUpdate,
  type SyncPlan,
  type SyncPolicy,
} from "./reconcile.js";
import { fetchAllRecords } from "./remote-index.js";
import { ChunkedTransport, describeChunk, type SendResult, type WriteOperation } from "./transport.js";
import type { LocalRow, RecordID, RemoteTable } from "./types.js";

/**
 * Settings shared by every kind of sync job.
 */
export interface JobOptions {
  jobId: string;
  rows: readonly LocalRow[];
  policy: SyncPolicy;
  /** Column used to match rows to records; full/incremental append everything without it */
  indexColumn?: string;
  /** Sync only these columns (plus the index column); not available with clone */
  columns?: readonly string[];
  /** Items per write call, clamped to the target's limits */
  batchSize?: number;
  /** Shared with every other engine talking to the same API */
  controller: RequestController;
  logger?: Logger;
}

/**
 * Full configuration for a sync job into a record table.
 */
export interface JobConfig extends JobOptions {
  table: RemoteTable;
  /** Create columns that exist locally but not remotely before writing */
  createMissingFields?: boolean;
}

/**
 * Default number of items per write call.
 */
export const DEFAULT_BATCH_SIZE = 500;

export type RunStatus = "success" | "partial" | "failed";

export interface RunStats {
  rows: number;
  created: number;
  updated: number;
  deleted: number;
  /** Rows left alone by the incremental policy */
  skipped: number;
  /** The policy fell back to append for lack of an index column */
  downgraded: boolean;
  fieldsCreated: string[];
  calls: number;
  retries: number;
  bisections: number;
  errors: string[];
}

/**
 * Summary of a sync run.
 */
export interface RunSummary {
  runId: string;
  jobId: string;
  policy: SyncPolicy;
  startedAt: Date;
  endedAt: Date;
  durationMs: number;
  status: RunStatus;
  /** Every chunk of every plan subset was written */
  ok: boolean;
  stats: RunStats;
  /** Per-operation transport results, in dispatch order */
  sends: SendResult[];
  fatalError?: string;
}

/**
 * The prepare-read-plan-push loop, independent of the kind of target.
 */
export abstract class BaseSyncEngine<C extends JobOptions> {
  protected readonly config: C;
  /** Rows after column selection */
  protected readonly rows: readonly LocalRow[];
  protected readonly batchSize: number;
  protected readonly logger: Logger;
  protected readonly transport: ChunkedTransport;

  constructor(config: C) {
    if (!isSyncPolicy(config.policy)) {
      throw new ConfigurationError(`Unknown sync policy '${String(config.policy)}'`);
    }
    const batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigurationError(`batchSize must be a positive integer, got ${batchSize}`);
    }
    this.config = { ...config };
    this.batchSize = batchSize;
    this.logger = (config.logger ?? silentLogger).child({ jobId: config.jobId });
    this.transport = new ChunkedTransport({
      controller: config.controller,
      logger: this.logger,
    });
    this.rows = this.selectRows();
  }

  /** Name of the target, for logs */
  protected abstract get targetName(): string;

  /**
   * Read the target and compute the change plan without writing anything.
   */
  abstract plan(logger?: Logger): Promise<SyncPlan>;

  /**
   * Steps 1 to 3 of a run. Sends are pushed to `sends` as they complete, so that
   * a failure part way still gets summarized.
   */
  protected abstract sync(stats: RunStats, sends: SendResult[], log: Logger): Promise<void>;

  /**
   * Execute one sync run:
   * 1. Prepare the target (optional)
   * 2. Read the target and plan
   * 3. Push deletes, updates and creates in bounded chunks
   * 4. Summarize
   */
  async run(): Promise<RunSummary> {
    const runId = this.generateRunId();
    const startedAt = new Date();
    const { jobId, policy, controller } = this.config;
    const { rows } = this;
    const log = this.logger.child({ runId });
    const before = controller.stats;

    const stats: RunStats = {
      rows: rows.length,
      created: 0,
      updated: 0,
      deleted: 0,
      skipped: 0,
      downgraded: false,
      fieldsCreated: [],
      calls: 0,
      retries: 0,
      bisections: 0,
      errors: [],
    };
    const sends: SendResult[] = [];

    log.info("Starting sync job", {
      policy,
      rows: rows.length,
      target: this.targetName,
    });

    let fatalError: string | undefined;
    try {
      await this.sync(stats, sends, log);
    } catch (error) {
      fatalError = describeError(error);
      stats.errors.push(fatalError);
      log.error("Sync job aborted", { error: fatalError });
    }

    // Step 4: Summarize
    const after = controller.stats;
    stats.calls = after.calls - before.calls;
    stats.retries = after.retries - before.retries;
    for (const send of sends) {
      stats.bisections += send.bisections.length;
      switch (send.operation) {
        case "create":
        case "append":
          stats.created += send.itemsSent;
          break;
        case "update":
          stats.updated += send.itemsSent;
          break;
        case "delete":
          stats.deleted += send.itemsSent;
          break;
        case "header":
          break;
      }
      for (const chunk of send.chunks) {
        if (chunk.status === "failed") {
          stats.errors.push(`${send.operation} ${describeChunk(chunk)}: ${chunk.error ?? "failed"}`);
        }
      }
    }

    const ok = fatalError === undefined && sends.every((send) => send.ok);
    const anyWritten = sends.some((send) => send.itemsSent > 0);
    const status: RunStatus = ok ? "success" : anyWritten ? "partial" : "failed";

    const summary = this.createRunSummary(runId, startedAt, status, ok, stats, sends, fatalError);
    log.info(`Sync job ${jobId} completed: ${status}`, {
      status,
      created: stats.created,
      updated: stats.updated,
      deleted: stats.deleted,
      skipped: stats.skipped,
      retries: stats.retries,
      bisections: stats.bisections,
      durationMs: summary.durationMs,
    });
    return summary;
  }

  private selectRows(): readonly LocalRow[] {
    const { rows, columns, indexColumn, policy } = this.config;
    if (columns === undefined) {
      return rows;
    }
    if (policy === "clone") {
      throw new ConfigurationError("Column selection cannot be combined with the clone policy");
    }
    if (columns.length === 0) {
      throw new ConfigurationError("Column selection must name at least one column");
    }
    const known = new Set(collectColumns(rows));
    const unknown = columns.filter((column) => !known.has(column));
    if (unknown.length > 0) {
      this.logger.warn("Selected columns are absent from the dataset", { columns: unknown });
    }
    return selectColumns(rows, columns, indexColumn);
  }

  /**
   * Generate a unique run ID.
   */
  private generateRunId(): string {
    return `run_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  /**
   * Create a RunSummary object.
   */
  private createRunSummary(
    runId: string,
    startedAt: Date,
    status: RunStatus,
    ok: boolean,
    stats: RunStats,
    sends: SendResult[],
    fatalError?: string
  ): RunSummary {
    const endedAt = new Date();
    const summary: RunSummary = {
      runId,
      jobId: this.config.jobId,
      policy: this.config.policy,
      startedAt,
      endedAt,
      durationMs: endedAt.getTime() - startedAt.getTime(),
      status,
      ok,
      stats,
      sends,
    };
    if (fatalError !== undefined) {
      summary.fatalError = fatalError;
    }
    return summary;
  }
}

/**
 * SyncEngine pushes a local dataset into a remote table.
 */
export class SyncEngine extends BaseSyncEngine<JobConfig> {
  protected get targetName(): string {
    return this.config.table.name;
  }

  async plan(logger: Logger = this.logger): Promise<SyncPlan> {
    const { table, policy, indexColumn, controller } = this.config;
    const remote = needsRemoteRead(policy, indexColumn)
      ? await fetchAllRecords(table, controller, logger)
      : [];
    return planSync(this.rows, remote, indexColumn, policy, logger);
  }

  protected async sync(stats: RunStats, sends: SendResult[], log: Logger): Promise<void> {
    // Step 1: Prepare columns
    if (this.config.createMissingFields) {
      stats.fieldsCreated = await this.ensureFields(log);
    }

    // Step 2: Read and plan
    const plan = await this.plan(log);
    stats.downgraded = plan.downgraded;
    stats.skipped = plan.skipped;

    // Step 3: Push
    await this.push(plan, sends, log);
  }

  /**
   * Create every local column missing from the remote table.
   * @returns the names of the created columns
   */
  private async ensureFields(log: Logger): Promise<string[]> {
    const { table, controller } = this.config;
    const { rows } = this;
    const existing = await controller.execute(`list fields of ${table.name}`, () =>
      table.listFields()
    );
    const known = new Set(existing.map((field) => field.name));
    const missing = collectColumns(rows).filter((column) => !known.has(column));

    if (missing.length === 0) {
      log.info("All fields exist", { fields: existing.length });
      return [];
    }

    log.info("Creating missing fields", { fields: missing });
    for (const name of missing) {
      const type = inferFieldType(rows.map((row) => row[name]));
      const created = await controller.execute(`create field ${name}`, () =>
        table.createField(name, type)
      );
      if (!created) {
        throw new RemoteError("permanent", `Could not create field '${name}' in ${table.name}`);
      }
      log.info("Field created", { field: name, type });
    }
    return missing;
  }

  /**
   * Dispatch the plan subsets in policy order.
   */
  private async push(plan: SyncPlan, sends: SendResult[], log: Logger): Promise<void> {
    if (plan.downgraded) {
      sends.push(await this.sendCreates("append", plan.toCreate));
      return;
    }

    switch (plan.policy) {
      case "full":
        if (plan.toUpdate.length > 0) {
          sends.push(await this.sendUpdates(plan.toUpdate));
        }
        if (plan.toCreate.length > 0) {
          sends.push(await this.sendCreates("create", plan.toCreate));
        }
        return;

      case "incremental":
        if (plan.toCreate.length === 0) {
          log.info("No new rows to sync");
          return;
        }
        sends.push(await this.sendCreates("create", plan.toCreate));
        return;

      case "overwrite":
      case "clone": {
        if (plan.toDelete.length > 0) {
          const deleted = await this.sendDeletes(plan.toDelete);
          sends.push(deleted);
          if (!deleted.ok) {
            log.error("Delete phase failed, rows are not recreated", {
              deleted: deleted.itemsSent,
              planned: plan.toDelete.length,
            });
            return;
          }
        }
        if (plan.toCreate.length > 0) {
          sends.push(await this.sendCreates("create", plan.toCreate));
        }
        return;
      }
    }
  }

  private sendCreates(operation: WriteOperation, rows: readonly PlannedRow[]): Promise<SendResult> {
    const { table } = this.config;
    return this.transport.send(
      operation,
      rows,
      (batch) => table.batchCreate(batch.map((planned) => rowToFields(planned.row))),
      { batchSize: this.batchSize, limit: table.limits.create, rowOf: (planned) => planned.rowNumber }
    );
  }

  private sendUpdates(rows: readonly PlannedUpdate[]): Promise<SendResult> {
    const { table } = this.config;
    return this.transport.send(
      "update",
      rows,
      (batch) =>
        table.batchUpdate(
          batch.map((planned) => ({ id: planned.recordId, fields: rowToFields(planned.row) }))
        ),
      { batchSize: this.batchSize, limit: table.limits.update, rowOf: (planned) => planned.rowNumber }
    );
  }

  private sendDeletes(ids: readonly RecordID[]): Promise<SendResult> {
    const { table } = this.config;
    return this.transport.send("delete", ids, (batch) => table.batchDelete(batch), {
      batchSize: this.batchSize,
      limit: table.limits.delete,
    });
  }
}
