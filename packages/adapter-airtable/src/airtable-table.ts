/**
 * AirtableTable - An Airtable implementation of RemoteTable.
 * Records go through the Airtable Web API with the official client; columns go
 * through the metadata API, which the client does not cover.
 */

import Airtable from "airtable";
import {
  assertWithinLimit,
  ConfigurationError,
  describeError,
  ProtocolError,
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

/**
 * One call to the records API, relative to the base.
 */
export interface AirtableRequest {
  method: "GET" | "POST" | "PATCH" | "DELETE";
  path: string;
  qs?: { [key: string]: unknown };
  body?: { [key: string]: unknown };
}

export interface AirtableResponse {
  statusCode: number;
  body: unknown;
}

/**
 * Performs a records API call. Rejects with the client's error on non-2xx answers.
 */
export type AirtableRequester = (request: AirtableRequest) => Promise<AirtableResponse>;

/**
 * Configuration options for AirtableTable.
 */
export interface AirtableTableOptions {
  /**
   * Airtable personal access token.
   */
  apiKey: string;
  /**
   * Airtable base ID (e.g., "app123").
   */
  baseId: string;
  /**
   * Table name or ID within the base.
   */
  table: string;
  /** Defaults to https://api.airtable.com */
  endpointUrl?: string;
  /** Let Airtable convert string values to the column type */
  typecast?: boolean;
  /** Replaces the client, for tests */
  requester?: AirtableRequester;
  /** Replaces the global fetch used by the metadata API, for tests */
  fetch?: typeof fetch;
}

/**
 * Airtable accepts at most 10 records per write call.
 */
export const AIRTABLE_LIMITS: BatchLimits = { create: 10, update: 10, delete: 10 };

export const AIRTABLE_PAGE_SIZE = 100;

const DEFAULT_ENDPOINT = "https://api.airtable.com";

/**
 * Airtable column types and their required options, per type hint.
 */
const FIELD_TYPES: Record<FieldTypeHint, { type: string; options?: { [key: string]: unknown } }> = {
  text: { type: "multilineText" },
  number: { type: "number", options: { precision: 8 } },
  checkbox: { type: "checkbox", options: { icon: "check", color: "greenBright" } },
  date: { type: "date", options: { dateFormat: { name: "iso" } } },
};

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readProperty(value: unknown, key: string): unknown {
  return isObject(value) ? value[key] : undefined;
}

/**
 * Map an HTTP status (or its absence) to a failure kind.
 */
export function failureKindOf(statusCode: number | null | undefined, code?: string): FailureKind {
  if (code === "CONNECTION_ERROR" || statusCode === null || statusCode === undefined) {
    return "network";
  }
  if (statusCode === 429) {
    return "rate_limited";
  }
  if (statusCode === 413 || code === "REQUEST_TOO_LARGE") {
    return "payload_too_large";
  }
  if (statusCode >= 500) {
    return "server_error";
  }
  return "permanent";
}

/**
 * Convert anything the Airtable client throws into a classified RemoteError.
 * The client rejects with an object carrying `error` (a code), `message` and `statusCode`.
 */
export function toRemoteError(error: unknown, context: string): RemoteError {
  if (error instanceof RemoteError) {
    return error;
  }
  const rawStatus = readProperty(error, "statusCode");
  const rawCode = readProperty(error, "error");
  const statusCode = typeof rawStatus === "number" ? rawStatus : undefined;
  const code = typeof rawCode === "string" ? rawCode : undefined;

  if (statusCode === undefined && code === undefined) {
    // Not a client error: a bug or an unexpected value, never retried
    return new RemoteError("permanent", `${context}: ${describeError(error)}`, { cause: error });
  }
  const message = readProperty(error, "message");
  return new RemoteError(
    failureKindOf(statusCode, code),
    `${context}: ${typeof message === "string" ? message : (code ?? "request failed")}`,
    { statusCode, code, cause: error }
  );
}

function parseRecord(value: unknown, context: string): RemoteRecord {
  const id = readProperty(value, "id");
  const fields = readProperty(value, "fields");
  if (typeof id !== "string" || !isObject(fields)) {
    throw new ProtocolError(`${context}: malformed record in response`);
  }
  return { id, fields: { ...fields } };
}

/**
 * Airtable table reachable through a base.
 */
export class AirtableTable implements RemoteTable {
  readonly name: string;
  readonly limits: BatchLimits = AIRTABLE_LIMITS;

  private readonly apiKey: string;
  private readonly baseId: string;
  private readonly table: string;
  private readonly endpointUrl: string;
  private readonly typecast: boolean;
  private readonly request: AirtableRequester;
  private readonly fetchFn: typeof fetch;
  private tableId?: string;

  constructor(options: AirtableTableOptions) {
    // Validate required options
    if (!options.apiKey) {
      throw new ConfigurationError("AirtableTable requires apiKey");
    }
    if (!options.baseId) {
      throw new ConfigurationError("AirtableTable requires baseId");
    }
    if (!options.table) {
      throw new ConfigurationError("AirtableTable requires table");
    }

    this.apiKey = options.apiKey;
    this.baseId = options.baseId;
    this.table = options.table;
    this.name = `${options.baseId}/${options.table}`;
    this.endpointUrl = (options.endpointUrl ?? DEFAULT_ENDPOINT).replace(/\/+$/, "");
    this.typecast = options.typecast ?? false;
    this.fetchFn = options.fetch ?? fetch;
    this.request = options.requester ?? this.createRequester();
  }

  /**
   * Build the default requester on the Airtable client. The client's own retry on
   * 429 is turned off: retries belong to the request controller.
   */
  private createRequester(): AirtableRequester {
    const base = new Airtable({
      apiKey: this.apiKey,
      endpointUrl: this.endpointUrl,
      noRetryIfRateLimited: true,
    }).base(this.baseId);

    return async (request) => {
      const response = await base.makeRequest({
        method: request.method,
        path: request.path,
        qs: request.qs,
        body: request.body,
      });
      const body: unknown = response.body;
      return { statusCode: response.statusCode, body };
    };
  }

  private get recordsPath(): string {
    return `/${encodeURIComponent(this.table)}`;
  }

  private async call(request: AirtableRequest, context: string): Promise<unknown> {
    try {
      const response = await this.request(request);
      return response.body;
    } catch (error) {
      throw toRemoteError(error, context);
    }
  }

  async search(pageToken: string | null): Promise<SearchPage> {
    const qs: { [key: string]: unknown } = { pageSize: AIRTABLE_PAGE_SIZE };
    if (pageToken !== null) {
      qs.offset = pageToken;
    }
    const context = `list ${this.name}`;
    const body = await this.call({ method: "GET", path: this.recordsPath, qs }, context);

    const records = readProperty(body, "records");
    const offset = readProperty(body, "offset");
    if (!Array.isArray(records)) {
      throw new ProtocolError(`${context}: response has no records array`);
    }
    if (offset !== undefined && typeof offset !== "string") {
      throw new ProtocolError(`${context}: offset is not a string`);
    }
    return {
      records: records.map((record) => parseRecord(record, context)),
      nextPageToken: offset ?? null,
    };
  }

  async batchCreate(records: readonly Fields[]): Promise<void> {
    assertWithinLimit("create", records.length, this.limits.create);
    if (records.length === 0) {
      return;
    }
    await this.call(
      {
        method: "POST",
        path: this.recordsPath,
        body: { records: records.map((fields) => ({ fields })), typecast: this.typecast },
      },
      `create ${records.length} record(s) in ${this.name}`
    );
  }

  async batchUpdate(records: readonly RecordPatch[]): Promise<void> {
    assertWithinLimit("update", records.length, this.limits.update);
    if (records.length === 0) {
      return;
    }
    await this.call(
      {
        method: "PATCH",
        path: this.recordsPath,
        body: {
          records: records.map((patch) => ({ id: patch.id, fields: patch.fields })),
          typecast: this.typecast,
        },
      },
      `update ${records.length} record(s) in ${this.name}`
    );
  }

  async batchDelete(ids: readonly RecordID[]): Promise<void> {
    assertWithinLimit("delete", ids.length, this.limits.delete);
    if (ids.length === 0) {
      return;
    }
    await this.call(
      { method: "DELETE", path: this.recordsPath, qs: { records: [...ids] } },
      `delete ${ids.length} record(s) in ${this.name}`
    );
  }

  async listFields(): Promise<FieldDescriptor[]> {
    const schema = await this.readTableSchema();
    return schema.fields;
  }

  /**
   * Create a column through the metadata API.
   * Transient failures throw so the controller can retry; refusals return false.
   */
  async createField(name: string, typeHint: FieldTypeHint): Promise<boolean> {
    const id = this.tableId ?? (await this.readTableSchema()).id;
    const column = FIELD_TYPES[typeHint];
    const body: JsonObject = { name, type: column.type };
    if (column.options) {
      body.options = column.options;
    }

    const context = `create field ${name} in ${this.name}`;
    const response = await this.meta(`/tables/${encodeURIComponent(id)}/fields`, context, {
      method: "POST",
      body: JSON.stringify(body),
    });
    if (response.ok) {
      return true;
    }
    const kind = failureKindOf(response.status);
    if (kind === "permanent") {
      return false;
    }
    throw new RemoteError(kind, `${context}: HTTP ${response.status}`, {
      statusCode: response.status,
    });
  }

  /**
   * Find this table in the base schema. The table ID is cached for field creation.
   */
  private async readTableSchema(): Promise<{ id: string; fields: FieldDescriptor[] }> {
    const context = `read schema of ${this.name}`;
    const response = await this.meta("/tables", context, { method: "GET" });
    if (!response.ok) {
      throw new RemoteError(failureKindOf(response.status), `${context}: HTTP ${response.status}`, {
        statusCode: response.status,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new ProtocolError(`${context}: response is not JSON`, error);
    }
    const tables = readProperty(payload, "tables");
    if (!Array.isArray(tables)) {
      throw new ProtocolError(`${context}: response has no tables array`);
    }

    const match = tables.find(
      (table) =>
        readProperty(table, "name") === this.table || readProperty(table, "id") === this.table
    );
    const id = readProperty(match, "id");
    const fields = readProperty(match, "fields");
    if (match === undefined) {
      throw new RemoteError("permanent", `${context}: table not found`, { statusCode: 404 });
    }
    if (typeof id !== "string" || !Array.isArray(fields)) {
      throw new ProtocolError(`${context}: malformed table description`);
    }

    this.tableId = id;
    return {
      id,
      fields: fields.flatMap((field): FieldDescriptor[] => {
        const name = readProperty(field, "name");
        const type = readProperty(field, "type");
        return typeof name === "string" && typeof type === "string" ? [{ name, type }] : [];
      }),
    };
  }

  private async meta(path: string, context: string, init: RequestInit): Promise<Response> {
    const url = `${this.endpointUrl}/v0/meta/bases/${encodeURIComponent(this.baseId)}${path}`;
    try {
      return await this.fetchFn(url, {
        ...init,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
      });
    } catch (error) {
      throw new RemoteError("network", `${context}: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * The table ID resolved by the last schema read, if any.
   */
  get resolvedTableId(): string | undefined {
    return this.tableId;
  }
}
