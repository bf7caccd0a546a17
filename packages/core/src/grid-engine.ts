/**
 * GridSyncEngine - one-way sync into a spreadsheet-like grid.
 *
 * The block that starts at the origin cell is read as a header row followed by
 * data rows, and data rows are matched to local rows by the index column just
 * like records. Matched rows are rewritten in place, new rows are appended below
 * the last populated row, and clone clears the sheet before writing the whole
 * block again. Writes are rectangles of at most `batchSize` rows by
 * `columnBatchSize` columns; appends are flat row ranges.
 */

import { BaseSyncEngine, type JobOptions, type RunStats } from "./engine.js";
import { ConfigurationError } from "./errors.js";
import { collectColumns, isBlank, toCellValue } from "./fields.js";
import type { Logger } from "./logger.js";
import { hasIndexColumn, planSync, type PlannedRow, type PlannedUpdate, type SyncPlan } from "./reconcile.js";
import type { Chunk, SendResult } from "./transport.js";
import type { CellValue, Fields, GridOrigin, GridRange, RemoteGrid, RemoteRecord } from "./types.js";

export interface GridJobConfig extends JobOptions {
  grid: RemoteGrid;
  /** Cell holding the first column name; A1 when omitted */
  origin?: GridOrigin;
  /** Columns per write call, clamped to the grid's limits */
  columnBatchSize?: number;
}

export const DEFAULT_COLUMN_BATCH_SIZE = 80;

/**
 * The synced block as read from the grid.
 */
export interface GridSnapshot {
  /** Column names of the header row; empty for an empty block */
  header: string[];
  /** Data rows below the header, starting at the origin column */
  rows: CellValue[][];
}

/**
 * Cells bound for one grid row.
 */
interface CellRow {
  /** Source row, for reports */
  rowNumber: number;
  /** Absolute grid row */
  at: number;
  cells: CellValue[];
}

function headerNames(cells: readonly CellValue[]): string[] {
  const names = cells.map((cell) => (cell === null ? "" : String(cell)));
  while (names.length > 0 && names[names.length - 1].trim() === "") {
    names.pop();
  }
  return names;
}

/**
 * Read a data row as a record; the ID is its position below the header.
 */
function toRecord(header: readonly string[], row: readonly CellValue[], position: number): RemoteRecord {
  const fields: Fields = {};
  header.forEach((name, column) => {
    const value = row[column];
    if (value !== undefined && value !== null && !(name in fields)) {
      fields[name] = value;
    }
  });
  return { id: String(position), fields };
}

/**
 * Group rows that follow each other into one range each.
 */
function toRanges(rows: readonly CellRow[], chunk: Chunk, originColumn: number): GridRange[] {
  const colStart = chunk.colStart ?? 0;
  const blocks: { row: number; values: CellValue[][] }[] = [];
  for (const { at, cells } of rows) {
    const values = cells.slice(colStart, chunk.colEnd);
    const last = blocks[blocks.length - 1];
    if (last !== undefined && last.row + last.values.length === at) {
      last.values.push(values);
    } else {
      blocks.push({ row: at, values: [values] });
    }
  }
  return blocks.map((block) => ({ row: block.row, column: originColumn + colStart, values: block.values }));
}

/**
 * GridSyncEngine pushes a local dataset into a grid.
 */
export class GridSyncEngine extends BaseSyncEngine<GridJobConfig> {
  private readonly origin: GridOrigin;
  private readonly columnBatchSize: number;

  constructor(config: GridJobConfig) {
    super(config);
    const origin = config.origin ?? { row: 0, column: 0 };
    for (const coordinate of [origin.row, origin.column]) {
      if (!Number.isInteger(coordinate) || coordinate < 0) {
        throw new ConfigurationError(`Grid origin must be a cell position, got ${origin.row},${origin.column}`);
      }
    }
    const columnBatchSize = config.columnBatchSize ?? DEFAULT_COLUMN_BATCH_SIZE;
    if (!Number.isInteger(columnBatchSize) || columnBatchSize < 1) {
      throw new ConfigurationError(`columnBatchSize must be a positive integer, got ${columnBatchSize}`);
    }
    this.origin = { ...origin };
    this.columnBatchSize = columnBatchSize;
  }

  protected get targetName(): string {
    return this.config.grid.name;
  }

  async plan(logger: Logger = this.logger): Promise<SyncPlan> {
    return this.planAgainst(await this.read(logger), logger);
  }

  /**
   * Read the header and the data rows of the synced block.
   */
  async read(logger: Logger = this.logger): Promise<GridSnapshot> {
    const { grid, controller } = this.config;
    const values: CellValue[][] = await controller.execute(`read ${grid.name}`, () => grid.readValues());
    const block = values.slice(this.origin.row).map((row) => row.slice(this.origin.column));
    const header = headerNames(block[0] ?? []);
    const rows = block.slice(1);
    logger.info("Grid read", { grid: grid.name, columns: header.length, rows: rows.length });
    return { header, rows };
  }

  protected async sync(stats: RunStats, sends: SendResult[], log: Logger): Promise<void> {
    const { grid, controller, policy } = this.config;

    // Step 1: Read and plan
    const snapshot = await this.read(log);
    const plan = this.planAgainst(snapshot, log);
    stats.downgraded = plan.downgraded;
    stats.skipped = plan.skipped;

    // Step 2: Prepare the block
    const local = collectColumns(this.rows);
    let header: string[];
    if (policy === "clone") {
      await controller.execute(`clear ${grid.name}`, () => grid.clear());
      stats.deleted = plan.toDelete.length;
      log.info("Grid cleared", { grid: grid.name, rows: plan.toDelete.length });
      header = local;
    } else {
      header = [...snapshot.header, ...local.filter((name) => !snapshot.header.includes(name))];
    }
    stats.fieldsCreated = header.filter((name) => !snapshot.header.includes(name));

    if (header.length > 0 && (policy === "clone" || stats.fieldsCreated.length > 0)) {
      const headerRow: CellRow = { rowNumber: 0, at: this.origin.row, cells: header };
      const written = await this.sendWrites("header", [headerRow], header.length);
      sends.push(written);
      if (!written.ok) {
        log.error("Header could not be written, rows are not synced", { columns: header.length });
        return;
      }
    }

    // Step 3: Push
    if (plan.toUpdate.length > 0) {
      const rows = plan.toUpdate.map((planned) => this.updatedRow(planned, header, snapshot));
      sends.push(await this.sendWrites("update", rows, header.length));
    }
    if (plan.toCreate.length === 0) {
      return;
    }
    if (policy === "clone") {
      const rows = plan.toCreate.map((planned, i) => ({
        rowNumber: planned.rowNumber,
        at: this.origin.row + 1 + i,
        cells: this.newCells(planned, header),
      }));
      sends.push(await this.sendWrites("create", rows, header.length));
    } else {
      sends.push(await this.sendAppends(plan.toCreate, header));
    }
  }

  /**
   * Overwrite replaces matched rows in place instead of deleting and appending
   * them, so it is planned as full with the index column required.
   */
  private planAgainst(snapshot: GridSnapshot, logger: Logger): SyncPlan {
    const { policy, indexColumn } = this.config;
    const records = snapshot.rows.map((row, i) => toRecord(snapshot.header, row, i));
    if (policy !== "overwrite") {
      return planSync(this.rows, records, indexColumn, policy, logger);
    }
    if (!hasIndexColumn(indexColumn)) {
      throw new ConfigurationError("The overwrite policy requires an index column");
    }
    return { ...planSync(this.rows, records, indexColumn, "full", logger), policy };
  }

  private newCells(planned: PlannedRow, header: readonly string[]): CellValue[] {
    return header.map((name) => toCellValue(planned.row[name]));
  }

  /**
   * full keeps the grid's value wherever the local cell is blank; overwrite
   * writes every synced column and keeps only the columns the job does not sync.
   */
  private updatedRow(planned: PlannedUpdate, header: readonly string[], snapshot: GridSnapshot): CellRow {
    const position = Number(planned.recordId);
    const existing = snapshot.rows[position] ?? [];
    const synced = new Set(collectColumns(this.rows));
    const replace = this.config.policy === "overwrite";
    const cells = header.map((name, column) => {
      const value = planned.row[name];
      const keep = replace ? !synced.has(name) : isBlank(value);
      return keep ? (existing[column] ?? null) : toCellValue(value);
    });
    return { rowNumber: planned.rowNumber, at: this.origin.row + 1 + position, cells };
  }

  private sendWrites(
    operation: "header" | "update" | "create",
    rows: readonly CellRow[],
    width: number
  ): Promise<SendResult> {
    const { grid } = this.config;
    return this.transport.send(
      operation,
      rows,
      (batch, chunk) => grid.writeRanges(toRanges(batch, chunk, this.origin.column)),
      {
        batchSize: this.batchSize,
        limit: operation === "update" ? Math.min(grid.limits.rows, grid.limits.ranges) : grid.limits.rows,
        rowOf: operation === "header" ? undefined : (row) => row.rowNumber,
        columns: { count: width, batchSize: this.columnBatchSize, limit: grid.limits.columns },
      }
    );
  }

  private sendAppends(rows: readonly PlannedRow[], header: readonly string[]): Promise<SendResult> {
    const { grid } = this.config;
    return this.transport.send(
      "append",
      rows,
      (batch) => grid.appendRows(this.origin.column, batch.map((planned) => this.newCells(planned, header))),
      { batchSize: this.batchSize, limit: grid.limits.rows, rowOf: (planned) => planned.rowNumber }
    );
  }
}
