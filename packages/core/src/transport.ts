/**
 * ChunkedTransport - bounded batching with recursive bisection.
 *
 * A payload is cut into windows of at most `batchSize` items which are sent one
 * after another through the request controller. Grid payloads are cut into
 * rectangles instead: a row window crossed with a column window. When the remote
 * rejects a window as too large, its rows are split in two (floor(n/2) first)
 * and each half is sent on its own, recursively. Windows are views over the
 * caller's array and are never mutated.
 */

import {
  classifyFailure,
  describeError,
  PayloadTooLargeError,
  RetryExhaustedError,
  type FailureKind,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { RequestController } from "./controller.js";

/**
 * Write operations. `append` adds rows after the existing ones without matching
 * them; `header` writes the column names of a grid.
 */
export type WriteOperation = "create" | "update" | "delete" | "append" | "header";

/**
 * Half-open window [start, end) over a payload, optionally restricted to the
 * columns [colStart, colEnd) of every item.
 */
export interface Chunk {
  readonly start: number;
  readonly end: number;
  readonly colStart?: number;
  readonly colEnd?: number;
  /** Number of bisections that produced this window */
  readonly depth: number;
}

export type ChunkStatus = "success" | "failed" | "skipped";

export interface ChunkReport {
  operation: WriteOperation;
  start: number;
  end: number;
  size: number;
  depth: number;
  colStart?: number;
  colEnd?: number;
  /** First and last source rows covered, when the payload can be located */
  firstRow?: number;
  lastRow?: number;
  status: ChunkStatus;
  /** Calls spent on this window (retries included) */
  attempts?: number;
  kind?: FailureKind;
  error?: string;
}

export interface BisectionEvent {
  operation: WriteOperation;
  start: number;
  end: number;
  size: number;
  depth: number;
  leftSize: number;
  rightSize: number;
}

export interface SendResult {
  operation: WriteOperation;
  /** Every window was written */
  ok: boolean;
  chunks: ChunkReport[];
  bisections: BisectionEvent[];
  /** Items written successfully; a grid row counts once all its columns are written */
  itemsSent: number;
  /** Remote calls issued, including rejected and retried ones */
  calls: number;
}

export interface SendOptions<T> {
  /** Requested window size */
  batchSize: number;
  /** Remote per-call maximum for this operation; the window size never exceeds it */
  limit?: number;
  /** Locate an item in the source data, for reports */
  rowOf?: (item: T) => number;
  /** Cut every item into column windows as well */
  columns?: ColumnOptions;
}

export interface ColumnOptions {
  /** Columns per item */
  count: number;
  /** Requested columns per window */
  batchSize: number;
  /** Remote per-call maximum of columns */
  limit?: number;
}

/**
 * Writes one window. Column-windowed sends receive the whole items and slice
 * them with the chunk's column bounds.
 */
export type Dispatch<T> = (items: readonly T[], chunk: Chunk) => Promise<void>;

export interface ChunkedTransportOptions {
  controller: RequestController;
  logger?: Logger;
}

/**
 * Cut [0, length) into consecutive windows of at most `batchSize` items.
 */
export function partition(length: number, batchSize: number): Chunk[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
  const chunks: Chunk[] = [];
  for (let start = 0; start < length; start += batchSize) {
    chunks.push({ start, end: Math.min(start + batchSize, length), depth: 0 });
  }
  return chunks;
}

/**
 * Cut a grid of `rows` × `columns` cells into rectangles, row window by row
 * window, each row window left to right.
 */
export function partitionGrid(
  rows: number,
  columns: number,
  rowBatchSize: number,
  columnBatchSize: number
): Chunk[] {
  if (!Number.isInteger(columnBatchSize) || columnBatchSize < 1) {
    throw new RangeError(`columnBatchSize must be a positive integer, got ${columnBatchSize}`);
  }
  const chunks: Chunk[] = [];
  for (const band of partition(rows, rowBatchSize)) {
    for (let colStart = 0; colStart < columns; colStart += columnBatchSize) {
      chunks.push({ ...band, colStart, colEnd: Math.min(colStart + columnBatchSize, columns) });
    }
  }
  return chunks;
}

/**
 * Split a window of two or more items into two siblings; the first holds floor(n/2) items.
 * A column window is kept by both halves.
 */
export function bisect(chunk: Chunk): [Chunk, Chunk] {
  const size = chunk.end - chunk.start;
  if (size < 2) {
    throw new RangeError("Cannot bisect a window of fewer than 2 items");
  }
  const mid = chunk.start + Math.floor(size / 2);
  return [
    { ...chunk, end: mid, depth: chunk.depth + 1 },
    { ...chunk, start: mid, depth: chunk.depth + 1 },
  ];
}

export type WindowBounds = Pick<ChunkReport, "start" | "end" | "firstRow" | "lastRow" | "colStart" | "colEnd">;

/**
 * Human readable location of a window, e.g. `rows 3-4` or `items 1-2, columns 1-80`.
 */
export function describeChunk(bounds: WindowBounds): string {
  const { start, end, firstRow, lastRow, colStart, colEnd } = bounds;
  let where: string;
  if (firstRow !== undefined && lastRow !== undefined) {
    where = firstRow === lastRow ? `row ${firstRow}` : `rows ${firstRow}-${lastRow}`;
  } else {
    where = `items ${start + 1}-${end}`;
  }
  if (colStart !== undefined && colEnd !== undefined) {
    where += colEnd - colStart === 1 ? `, column ${colEnd}` : `, columns ${colStart + 1}-${colEnd}`;
  }
  return where;
}

/**
 * Per-send bookkeeping.
 */
interface SendContext<T> {
  operation: WriteOperation;
  payload: readonly T[];
  dispatch: Dispatch<T>;
  rowOf?: (item: T) => number;
  /** Column count of a column-windowed send */
  columnCount?: number;
  result: SendResult;
}

export class ChunkedTransport {
  private readonly controller: RequestController;
  private readonly logger: Logger;

  constructor(options: ChunkedTransportOptions) {
    this.controller = options.controller;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Send a payload in bounded windows. Stops at the first window that cannot be
   * written; the remaining windows are reported as skipped.
   */
  async send<T>(
    operation: WriteOperation,
    payload: readonly T[],
    dispatch: Dispatch<T>,
    options: SendOptions<T>
  ): Promise<SendResult> {
    const batchSize = this.clamp(operation, "Batch size", options.batchSize, options.limit);
    const { columns } = options;
    const ctx: SendContext<T> = {
      operation,
      payload,
      dispatch,
      rowOf: options.rowOf,
      columnCount: columns?.count,
      result: { operation, ok: true, chunks: [], bisections: [], itemsSent: 0, calls: 0 },
    };

    let chunks: Chunk[];
    let columnBatchSize: number | undefined;
    if (columns) {
      columnBatchSize = this.clamp(operation, "Column batch size", columns.batchSize, columns.limit);
      chunks = partitionGrid(payload.length, columns.count, batchSize, columnBatchSize);
    } else {
      chunks = partition(payload.length, batchSize);
    }
    this.logger.info("Sending payload", {
      operation,
      items: payload.length,
      batchSize,
      columnBatchSize,
      chunks: chunks.length,
    });

    for (const chunk of chunks) {
      if (!ctx.result.ok) {
        this.skip(ctx, chunk);
        continue;
      }
      if (!(await this.sendChunk(ctx, chunk))) {
        ctx.result.ok = false;
      }
    }

    this.logger.info(ctx.result.ok ? "Payload sent" : "Payload failed", {
      operation,
      itemsSent: ctx.result.itemsSent,
      items: payload.length,
      calls: ctx.result.calls,
      bisections: ctx.result.bisections.length,
    });
    return ctx.result;
  }

  private clamp(operation: WriteOperation, what: string, requested: number, limit: number | undefined): number {
    if (limit !== undefined && requested > limit) {
      this.logger.warn(`${what} clamped to the remote limit`, {
        operation,
        requested,
        limit,
      });
      return limit;
    }
    return requested;
  }

  private async sendChunk<T>(ctx: SendContext<T>, chunk: Chunk): Promise<boolean> {
    const { operation, payload, dispatch } = ctx;
    const items = payload.slice(chunk.start, chunk.end);
    const report = this.baseReport(ctx, chunk);
    const label = `${operation} ${describeChunk(report)}`;
    let attempts = 0;

    try {
      await this.controller.execute(label, () => {
        attempts++;
        ctx.result.calls++;
        return dispatch(items, chunk);
      });
    } catch (error) {
      const kind = classifyFailure(error);
      if (kind === "payload_too_large") {
        return this.handleOversized(ctx, chunk, error);
      }
      ctx.result.chunks.push({
        ...report,
        status: "failed",
        attempts: error instanceof RetryExhaustedError ? error.attempts : attempts,
        kind,
        error: describeError(error),
      });
      this.logger.error("Chunk failed", {
        operation,
        window: describeChunk(report),
        size: report.size,
        kind,
        attempts: error instanceof RetryExhaustedError ? error.attempts : attempts,
        error: describeError(error),
      });
      return false;
    }

    ctx.result.chunks.push({ ...report, status: "success", attempts });
    if (chunk.colEnd === undefined || chunk.colEnd === ctx.columnCount) {
      ctx.result.itemsSent += report.size;
    }
    this.logger.info("Chunk sent", {
      operation,
      window: describeChunk(report),
      size: report.size,
      attempts,
    });
    return true;
  }

  private async handleOversized<T>(
    ctx: SendContext<T>,
    chunk: Chunk,
    error: unknown
  ): Promise<boolean> {
    const report = this.baseReport(ctx, chunk);

    if (report.size <= 1) {
      const fatal = new PayloadTooLargeError(ctx.operation, chunk.start, error);
      ctx.result.chunks.push({
        ...report,
        status: "failed",
        attempts: 1,
        kind: "payload_too_large",
        error: fatal.message,
      });
      this.logger.error("Single item exceeds the payload limit", {
        operation: ctx.operation,
        window: describeChunk(report),
        error: describeError(error),
      });
      return false;
    }

    const [left, right] = bisect(chunk);
    const event: BisectionEvent = {
      operation: ctx.operation,
      start: chunk.start,
      end: chunk.end,
      size: report.size,
      depth: chunk.depth,
      leftSize: left.end - left.start,
      rightSize: right.end - right.start,
    };
    ctx.result.bisections.push(event);
    this.logger.warn("Payload too large, bisecting", {
      operation: ctx.operation,
      window: describeChunk(report),
      size: event.size,
      leftSize: event.leftSize,
      rightSize: event.rightSize,
      depth: chunk.depth,
    });

    if (!(await this.sendChunk(ctx, left))) {
      this.skip(ctx, right);
      return false;
    }
    return this.sendChunk(ctx, right);
  }

  private skip<T>(ctx: SendContext<T>, chunk: Chunk): void {
    ctx.result.chunks.push({ ...this.baseReport(ctx, chunk), status: "skipped" });
  }

  private baseReport<T>(ctx: SendContext<T>, chunk: Chunk): Omit<ChunkReport, "status"> {
    const report: Omit<ChunkReport, "status"> = {
      operation: ctx.operation,
      start: chunk.start,
      end: chunk.end,
      size: chunk.end - chunk.start,
      depth: chunk.depth,
    };
    if (chunk.colStart !== undefined && chunk.colEnd !== undefined) {
      report.colStart = chunk.colStart;
      report.colEnd = chunk.colEnd;
    }
    if (ctx.rowOf && chunk.end > chunk.start) {
      report.firstRow = ctx.rowOf(ctx.payload[chunk.start]);
      report.lastRow = ctx.rowOf(ctx.payload[chunk.end - 1]);
    }
    return report;
  }
}
