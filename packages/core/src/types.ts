/**
 * Core type definitions and contracts for rowsync.
 * These interfaces define the protocol that remote table adapters must implement.
 */

/**
 * Identifier assigned to a record by the remote store.
 */
export type RecordID = string;

/**
 * Field name → value mapping of a record or a row.
 * Values are opaque to the core; adapters decide how to encode them.
 */
export type Fields = { [field: string]: unknown };

/**
 * A record as returned by the remote store.
 */
export interface RemoteRecord {
  id: RecordID;
  fields: Fields;
}

/**
 * One row of the local dataset, column name → value.
 */
export type LocalRow = Readonly<Fields>;

/**
 * An update addressed to an existing remote record.
 */
export interface RecordPatch {
  id: RecordID;
  fields: Fields;
}

/**
 * Column type hint used when a missing column has to be created remotely.
 */
export type FieldTypeHint = "text" | "number" | "checkbox" | "date";

/**
 * Description of a remote column.
 */
export interface FieldDescriptor {
  name: string;
  /** Remote type name, in the adapter's own vocabulary */
  type: string;
}

/**
 * One page of a paginated record search.
 */
export interface SearchPage {
  records: RemoteRecord[];
  /** Token for the next page, or null when the listing is exhausted */
  nextPageToken: string | null;
}

/**
 * Maximum number of items the remote store accepts per write call.
 */
export interface BatchLimits {
  create: number;
  update: number;
  delete: number;
}

/**
 * Adapter interface for a remote table reachable through a rate-limited API.
 *
 * Implementations throw {@link RemoteError} (see errors.ts) with a failure kind
 * the request controller and the transport can act upon, and reject oversized
 * batches locally with {@link BatchLimitError} before touching the network.
 */
export interface RemoteTable {
  /** Human readable name used in logs */
  readonly name: string;
  readonly limits: BatchLimits;

  listFields(): Promise<FieldDescriptor[]>;

  /**
   * Create a column.
   * @returns false when the remote refused the column permanently
   */
  createField(name: string, typeHint: FieldTypeHint): Promise<boolean>;

  /**
   * Fetch one page of records.
   * @param pageToken - null for the first page
   */
  search(pageToken: string | null): Promise<SearchPage>;

  batchCreate(records: readonly Fields[]): Promise<void>;
  batchUpdate(records: readonly RecordPatch[]): Promise<void>;
  batchDelete(ids: readonly RecordID[]): Promise<void>;
}

/**
 * Value of one grid cell; null is an empty cell.
 */
export type CellValue = string | number | boolean | null;

export type GridRow = readonly CellValue[];

/**
 * Position of a cell, both coordinates 0-based from the top-left of the sheet.
 */
export interface GridOrigin {
  row: number;
  column: number;
}

/**
 * A block of values whose top-left cell is at (row, column).
 */
export interface GridRange extends GridOrigin {
  values: readonly GridRow[];
}

/**
 * Per-call maximums of a grid API.
 */
export interface GridLimits {
  rows: number;
  columns: number;
  /** Ranges accepted by one writeRanges call */
  ranges: number;
}

/**
 * Adapter interface for a spreadsheet-like target: cells addressed by row and
 * column instead of records addressed by ID. The first row of the synced block
 * holds the column names.
 *
 * Failures follow the same contract as {@link RemoteTable}.
 */
export interface RemoteGrid {
  readonly name: string;
  readonly limits: GridLimits;

  /** Every row from the top of the sheet down to the last populated one; rows may be ragged */
  readValues(): Promise<CellValue[][]>;

  /** Overwrite every range in a single call */
  writeRanges(ranges: readonly GridRange[]): Promise<void>;

  /** Insert rows below the last populated row, the first value of each row at `column` */
  appendRows(column: number, rows: readonly GridRow[]): Promise<void>;

  /** Empty every cell */
  clear(): Promise<void>;
}

/**
 * Source of time for everything that waits.
 * Injected so that rate limiting and retries can be tested without real sleeps.
 */
export interface Clock {
  /** Milliseconds since an arbitrary, monotonic origin */
  now(): number;
  sleep(ms: number): Promise<void>;
}
