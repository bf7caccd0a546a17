/**
 * InMemoryGrid - An in-memory implementation of RemoteGrid for testing.
 * Keeps a ragged array of cells and enforces per-call row, column and range
 * limits like a spreadsheet values API.
 */

import {
  assertWithinLimit,
  RemoteError,
  type CellValue,
  type FailureKind,
  type GridLimits,
  type GridRange,
  type GridRow,
  type RemoteGrid,
} from "@rowsync/core";
import { FaultInjector } from "./faults.js";

export type GridOperation = "read" | "write" | "append" | "clear";

export interface GridCall {
  operation: GridOperation;
  /** Cells in the request; 0 for reads and clears */
  cells: number;
}

export interface InMemoryGridOptions {
  name?: string;
  /** Rows of the sheet, top to bottom, starting at A1 */
  initialValues?: CellValue[][];
  limits?: Partial<GridLimits>;
  /**
   * Writes and appends with more cells than this are rejected as payload_too_large.
   */
  oversizedAbove?: number;
}

export const DEFAULT_GRID_LIMITS: GridLimits = { rows: 5000, columns: 100, ranges: 10 };

function countCells(rows: readonly GridRow[]): number {
  return rows.reduce((total, row) => total + row.length, 0);
}

function widthOf(rows: readonly GridRow[]): number {
  return rows.reduce((width, row) => Math.max(width, row.length), 0);
}

function trimRow(row: readonly CellValue[]): CellValue[] {
  let end = row.length;
  while (end > 0 && row[end - 1] === null) {
    end--;
  }
  return row.slice(0, end);
}

export class InMemoryGrid implements RemoteGrid {
  readonly name: string;
  readonly limits: GridLimits;
  /** Every call made to the grid, in order */
  readonly calls: GridCall[] = [];

  private cells: CellValue[][] = [];
  private readonly faults = new FaultInjector<GridOperation>();
  private oversizedAbove?: number;

  constructor(options: InMemoryGridOptions = {}) {
    this.name = options.name ?? "grid";
    this.limits = { ...DEFAULT_GRID_LIMITS, ...options.limits };
    this.oversizedAbove = options.oversizedAbove;
    (options.initialValues ?? []).forEach((row, r) => {
      row.forEach((value, c) => this.set(r, c, value));
    });
  }

  failNext(operation: GridOperation, failure: FailureKind | RemoteError, times = 1): void {
    this.faults.add(operation, failure, times);
  }

  setOversizedAbove(threshold: number | undefined): void {
    this.oversizedAbove = threshold;
  }

  callCount(operation: GridOperation): number {
    return this.calls.filter((call) => call.operation === operation).length;
  }

  async readValues(): Promise<CellValue[][]> {
    this.begin("read", 0);
    return this.values;
  }

  async writeRanges(ranges: readonly GridRange[]): Promise<void> {
    assertWithinLimit("write ranges", ranges.length, this.limits.ranges);
    for (const range of ranges) {
      this.checkBlock("write", range.values);
    }
    this.beginWrite("write", ranges.reduce((total, range) => total + countCells(range.values), 0));
    for (const range of ranges) {
      range.values.forEach((row, i) => {
        row.forEach((value, j) => this.set(range.row + i, range.column + j, value));
      });
    }
  }

  async appendRows(column: number, rows: readonly GridRow[]): Promise<void> {
    this.checkBlock("append", rows);
    this.beginWrite("append", countCells(rows));
    const start = this.lastPopulatedRow() + 1;
    rows.forEach((row, i) => {
      row.forEach((value, j) => this.set(start + i, column + j, value));
    });
  }

  async clear(): Promise<void> {
    this.begin("clear", 0);
    this.cells = [];
  }

  /**
   * The sheet down to its last populated row, trailing empty cells trimmed
   * (useful for testing/debugging).
   */
  get values(): CellValue[][] {
    return this.cells.slice(0, this.lastPopulatedRow() + 1).map(trimRow);
  }

  /**
   * Value of one cell, 0-based; null when empty.
   */
  cell(row: number, column: number): CellValue {
    return this.cells[row]?.[column] ?? null;
  }

  /**
   * Empty the sheet, the call log and pending failures without going through the call log.
   */
  reset(): void {
    this.cells = [];
    this.faults.clear();
    this.calls.length = 0;
  }

  private set(row: number, column: number, value: CellValue): void {
    while (this.cells.length <= row) {
      this.cells.push([]);
    }
    const cells = this.cells[row];
    while (cells.length < column) {
      cells.push(null);
    }
    cells[column] = value;
  }

  private lastPopulatedRow(): number {
    for (let r = this.cells.length - 1; r >= 0; r--) {
      if (this.cells[r].some((value) => value !== null)) {
        return r;
      }
    }
    return -1;
  }

  private checkBlock(operation: "write" | "append", rows: readonly GridRow[]): void {
    assertWithinLimit(`${operation} rows`, rows.length, this.limits.rows);
    assertWithinLimit(`${operation} columns`, widthOf(rows), this.limits.columns);
  }

  private begin(operation: GridOperation, cells: number): void {
    this.calls.push({ operation, cells });
    const failure = this.faults.take(operation);
    if (failure) {
      throw failure;
    }
  }

  private beginWrite(operation: "write" | "append", cells: number): void {
    this.begin(operation, cells);
    if (this.oversizedAbove !== undefined && cells > this.oversizedAbove) {
      throw new RemoteError("payload_too_large", `Request body of ${cells} cells is too large`, {
        statusCode: 413,
        code: "REQUEST_TOO_LARGE",
      });
    }
  }
}
