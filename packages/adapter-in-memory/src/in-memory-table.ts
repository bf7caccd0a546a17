/**
 * InMemoryTable - An in-memory implementation of RemoteTable for testing.
 * Stores records in memory, simulates offset-token pagination and can be told
 * to fail the way a rate-limited, size-constrained API does.
 */

import {
  assertWithinLimit,
  RemoteError,
  type BatchLimits,
  type FailureKind,
  type FieldDescriptor,
  type FieldTypeHint,
  type Fields,
  type RecordID,
  type RecordPatch,
  type RemoteRecord,
  type RemoteTable,
  type SearchPage,
} from "@rowsync/core";
import { FaultInjector } from "./faults.js";

/**
 * Remote operations that can be observed and failed.
 */
export type TableOperation =
  | "listFields"
  | "createField"
  | "search"
  | "create"
  | "update"
  | "delete";

/**
 * One invocation of the table, successful or not.
 */
export interface TableCall {
  operation: TableOperation;
  /** Items in the batch; 0 for reads */
  size: number;
}

/**
 * Configuration options for InMemoryTable.
 */
export interface InMemoryTableOptions {
  name?: string;
  /**
   * Initial records to populate the table with. Ids are generated.
   */
  initialRecords?: Fields[];
  /**
   * Initial columns. Columns of the initial records are added as text.
   */
  fields?: FieldDescriptor[];
  /** Records per search page, default 100 */
  pageSize?: number;
  limits?: Partial<BatchLimits>;
  /**
   * Write batches with more items than this are rejected as payload_too_large.
   */
  oversizedAbove?: number;
  /**
   * Hand out the same page token forever, like a broken paginator.
   */
  repeatPageToken?: boolean;
}

export const DEFAULT_LIMITS: BatchLimits = { create: 500, update: 500, delete: 500 };

const FIELD_TYPES: Record<FieldTypeHint, string> = {
  text: "text",
  number: "number",
  checkbox: "checkbox",
  date: "date",
};

/**
 * In-memory remote table with fault injection.
 * Useful for testing and development without external API dependencies.
 */
export class InMemoryTable implements RemoteTable {
  readonly name: string;
  readonly limits: BatchLimits;
  /** Every call made to the table, in order */
  readonly calls: TableCall[] = [];

  private readonly records = new Map<RecordID, Fields>();
  private readonly fields = new Map<string, FieldDescriptor>();
  private readonly faults = new FaultInjector<TableOperation>();
  private readonly pageSize: number;
  private oversizedAbove?: number;
  private repeatPageToken: boolean;
  private nextId = 1;

  constructor(options: InMemoryTableOptions = {}) {
    this.name = options.name ?? "memory";
    this.limits = { ...DEFAULT_LIMITS, ...options.limits };
    this.pageSize = options.pageSize ?? 100;
    if (!Number.isInteger(this.pageSize) || this.pageSize < 1) {
      throw new RangeError(`pageSize must be a positive integer, got ${this.pageSize}`);
    }
    this.oversizedAbove = options.oversizedAbove;
    this.repeatPageToken = options.repeatPageToken ?? false;

    for (const field of options.fields ?? []) {
      this.fields.set(field.name, { ...field });
    }
    for (const fields of options.initialRecords ?? []) {
      this.addRecord(fields);
    }
  }

  /**
   * Make the next `times` calls of an operation fail.
   * Failures queued for the same operation are consumed in order.
   */
  failNext(operation: TableOperation, failure: FailureKind | RemoteError, times = 1): void {
    this.faults.add(operation, failure, times);
  }

  /**
   * Reject write batches above this size as oversized; undefined disables the check.
   */
  setOversizedAbove(threshold: number | undefined): void {
    this.oversizedAbove = threshold;
  }

  setRepeatPageToken(repeat: boolean): void {
    this.repeatPageToken = repeat;
  }

  /**
   * Number of calls made for an operation.
   */
  callCount(operation: TableOperation): number {
    return this.calls.filter((call) => call.operation === operation).length;
  }

  async listFields(): Promise<FieldDescriptor[]> {
    this.begin("listFields", 0);
    return Array.from(this.fields.values(), (field) => ({ ...field }));
  }

  async createField(name: string, typeHint: FieldTypeHint): Promise<boolean> {
    const failure = this.faults.take("createField");
    this.calls.push({ operation: "createField", size: 0 });
    if (failure) {
      if (!failure.retryable) {
        return false;
      }
      throw failure;
    }
    if (name.trim() === "" || this.fields.has(name)) {
      return false;
    }
    this.fields.set(name, { name, type: FIELD_TYPES[typeHint] });
    return true;
  }

  async search(pageToken: string | null): Promise<SearchPage> {
    this.begin("search", 0);
    const ids = Array.from(this.records.keys());
    const offset = pageToken === null || this.repeatPageToken ? 0 : Number(pageToken);
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RemoteError("permanent", `Invalid page token '${pageToken}'`, {
        statusCode: 422,
        code: "INVALID_OFFSET_VALUE",
      });
    }

    const records: RemoteRecord[] = ids
      .slice(offset, offset + this.pageSize)
      .map((id) => ({ id, fields: { ...this.fieldsOf(id) } }));

    if (this.repeatPageToken) {
      return { records, nextPageToken: "repeat" };
    }
    const next = offset + this.pageSize;
    return { records, nextPageToken: next < ids.length ? String(next) : null };
  }

  async batchCreate(records: readonly Fields[]): Promise<void> {
    this.beginWrite("create", records.length);
    for (const fields of records) {
      this.addRecord(fields);
    }
  }

  async batchUpdate(records: readonly RecordPatch[]): Promise<void> {
    this.beginWrite("update", records.length);
    const missing = records.find((patch) => !this.records.has(patch.id));
    if (missing) {
      throw new RemoteError("permanent", `Record ${missing.id} not found`, {
        statusCode: 404,
        code: "NOT_FOUND",
      });
    }
    for (const patch of records) {
      this.records.set(patch.id, { ...this.fieldsOf(patch.id), ...patch.fields });
    }
  }

  async batchDelete(ids: readonly RecordID[]): Promise<void> {
    this.beginWrite("delete", ids.length);
    const missing = ids.find((id) => !this.records.has(id));
    if (missing !== undefined) {
      throw new RemoteError("permanent", `Record ${missing} not found`, {
        statusCode: 404,
        code: "NOT_FOUND",
      });
    }
    for (const id of ids) {
      this.records.delete(id);
    }
  }

  /**
   * Get all current records (useful for testing/debugging).
   */
  getAllRecords(): RemoteRecord[] {
    return Array.from(this.records.keys(), (id) => ({ id, fields: { ...this.fieldsOf(id) } }));
  }

  /**
   * Get a specific record by ID (useful for testing/debugging).
   */
  getRecord(id: RecordID): RemoteRecord | undefined {
    const fields = this.records.get(id);
    return fields === undefined ? undefined : { id, fields: { ...fields } };
  }

  /**
   * Manually add a record without going through the call log.
   * @returns the generated record ID
   */
  addRecord(fields: Fields): RecordID {
    const id = `rec${String(this.nextId++).padStart(5, "0")}`;
    this.records.set(id, { ...fields });
    for (const column of Object.keys(fields)) {
      if (!this.fields.has(column)) {
        this.fields.set(column, { name: column, type: "text" });
      }
    }
    return id;
  }

  /**
   * Clear all records, the call log and pending failures.
   */
  clear(): void {
    this.records.clear();
    this.faults.clear();
    this.calls.length = 0;
  }

  get size(): number {
    return this.records.size;
  }

  private fieldsOf(id: RecordID): Fields {
    return this.records.get(id) ?? {};
  }

  private begin(operation: TableOperation, size: number): void {
    this.calls.push({ operation, size });
    const failure = this.faults.take(operation);
    if (failure) {
      throw failure;
    }
  }

  private beginWrite(operation: "create" | "update" | "delete", size: number): void {
    assertWithinLimit(operation, size, this.limits[operation]);
    this.begin(operation, size);
    if (this.oversizedAbove !== undefined && size > this.oversizedAbove) {
      throw new RemoteError("payload_too_large", `Request body of ${size} items is too large`, {
        statusCode: 413,
        code: "REQUEST_TOO_LARGE",
      });
    }
  }
}
