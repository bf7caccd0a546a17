/**
 * Tests for AirtableTable with the records API and the metadata API replaced
 * by in-process fakes.
 */

import { BatchLimitError, ConfigurationError, ProtocolError, RemoteError } from "@rowsync/core";
import {
  AirtableTable,
  failureKindOf,
  toRemoteError,
  type AirtableRequest,
  type AirtableRequester,
  type AirtableTableOptions,
} from "../src/airtable-table";

interface MetaCall {
  url: string;
  method: string | undefined;
  body: string | undefined;
  authorization: string | undefined;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const schema = {
  tables: [
    { id: "tblOther", name: "Other", fields: [] },
    {
      id: "tblContacts",
      name: "Contacts",
      fields: [
        { id: "fld1", name: "email", type: "email" },
        { id: "fld2", name: "notes", type: "multilineText" },
      ],
    },
  ],
};

function createTable(
  options: {
    respond?: (request: AirtableRequest) => Promise<unknown>;
    meta?: (call: MetaCall) => Promise<Response>;
  } & Partial<AirtableTableOptions> = {}
) {
  const requests: AirtableRequest[] = [];
  const metaCalls: MetaCall[] = [];
  const respond = options.respond ?? (async () => ({ records: [] }));
  const meta = options.meta ?? (async () => json(schema));

  const requester: AirtableRequester = async (request) => {
    requests.push(request);
    return { statusCode: 200, body: await respond(request) };
  };
  const fetchFn: typeof fetch = async (input, init) => {
    const headers = new Headers(init?.headers);
    const call: MetaCall = {
      url: String(input),
      method: init?.method,
      body: typeof init?.body === "string" ? init.body : undefined,
      authorization: headers.get("Authorization") ?? undefined,
    };
    metaCalls.push(call);
    return meta(call);
  };

  const table = new AirtableTable({
    apiKey: "test-secret",
    baseId: "appTest",
    table: "Contacts",
    requester,
    fetch: fetchFn,
    ...options,
  });
  return { table, requests, metaCalls };
}

describe("failureKindOf", () => {
  it("classifies HTTP statuses", () => {
    expect(failureKindOf(429)).toBe("rate_limited");
    expect(failureKindOf(413)).toBe("payload_too_large");
    expect(failureKindOf(422, "REQUEST_TOO_LARGE")).toBe("payload_too_large");
    expect(failureKindOf(500)).toBe("server_error");
    expect(failureKindOf(503)).toBe("server_error");
    expect(failureKindOf(404)).toBe("permanent");
    expect(failureKindOf(undefined)).toBe("network");
    expect(failureKindOf(500, "CONNECTION_ERROR")).toBe("network");
  });
});

describe("toRemoteError", () => {
  it("classifies client errors by status and code", () => {
    const error = toRemoteError(
      { error: "RATE_LIMIT_REACHED", message: "Rate limit exceeded", statusCode: 429 },
      "list appTest/Contacts"
    );

    expect(error.kind).toBe("rate_limited");
    expect(error.code).toBe("RATE_LIMIT_REACHED");
    expect(error.statusCode).toBe(429);
    expect(error.message).toBe("list appTest/Contacts: Rate limit exceeded");
  });

  it("treats anything else as permanent", () => {
    const error = toRemoteError(new TypeError("boom"), "list appTest/Contacts");

    expect(error.kind).toBe("permanent");
    expect(error.message).toBe("list appTest/Contacts: boom");
  });

  it("passes RemoteErrors through", () => {
    const original = new RemoteError("server_error", "down");
    expect(toRemoteError(original, "ignored")).toBe(original);
  });
});

describe("AirtableTable", () => {
  describe("constructor", () => {
    it("should validate required options", () => {
      expect(() => new AirtableTable({ apiKey: "", baseId: "appTest", table: "Contacts" })).toThrow(
        "AirtableTable requires apiKey"
      );
      expect(() => new AirtableTable({ apiKey: "test-secret", baseId: "", table: "Contacts" })).toThrow(
        ConfigurationError
      );
      expect(() => new AirtableTable({ apiKey: "test-secret", baseId: "appTest", table: "" })).toThrow(
        "AirtableTable requires table"
      );
    });

    it("should name the table after its base and enforce Airtable's batch limits", () => {
      const { table } = createTable();
      expect(table.name).toBe("appTest/Contacts");
      expect(table.limits).toEqual({ create: 10, update: 10, delete: 10 });
    });
  });

  describe("search", () => {
    it("should request a page and return the offset token", async () => {
      const { table, requests } = createTable({
        respond: async () => ({
          records: [{ id: "rec1", fields: { email: "ada@example.com" }, createdTime: "2024-01-01T00:00:00.000Z" }],
          offset: "itr1/rec1",
        }),
      });

      const page = await table.search(null);

      expect(requests).toEqual([{ method: "GET", path: "/Contacts", qs: { pageSize: 100 } }]);
      expect(page).toEqual({
        records: [{ id: "rec1", fields: { email: "ada@example.com" } }],
        nextPageToken: "itr1/rec1",
      });
    });

    it("should pass the page token and end the listing without an offset", async () => {
      const { table, requests } = createTable({ table: "My Contacts" });

      const page = await table.search("itr1/rec1");

      expect(requests[0]).toEqual({
        method: "GET",
        path: "/My%20Contacts",
        qs: { pageSize: 100, offset: "itr1/rec1" },
      });
      expect(page.nextPageToken).toBeNull();
    });

    it("should reject a response without records as a protocol error", async () => {
      const { table } = createTable({ respond: async () => ({ records: "nope" }) });

      const failure = table.search(null);
      await expect(failure).rejects.toBeInstanceOf(ProtocolError);
      await expect(failure).rejects.toThrow("list appTest/Contacts: response has no records array");
    });

    it("should reject a malformed record", async () => {
      const { table } = createTable({ respond: async () => ({ records: [{ fields: {} }] }) });

      await expect(table.search(null)).rejects.toThrow("list appTest/Contacts: malformed record in response");
    });
  });

  describe("writes", () => {
    it("should create records with typecast", async () => {
      const { table, requests } = createTable({ typecast: true });

      await table.batchCreate([{ email: "ada@example.com" }, { email: "bob@example.com" }]);

      expect(requests).toEqual([
        {
          method: "POST",
          path: "/Contacts",
          body: {
            records: [{ fields: { email: "ada@example.com" } }, { fields: { email: "bob@example.com" } }],
            typecast: true,
          },
        },
      ]);
    });

    it("should update records by ID", async () => {
      const { table, requests } = createTable();

      await table.batchUpdate([{ id: "rec1", fields: { name: "Ada" } }]);

      expect(requests[0].method).toBe("PATCH");
      expect(requests[0].body).toEqual({
        records: [{ id: "rec1", fields: { name: "Ada" } }],
        typecast: false,
      });
    });

    it("should delete records through the query string", async () => {
      const { table, requests } = createTable();

      await table.batchDelete(["rec1", "rec2"]);

      expect(requests).toEqual([{ method: "DELETE", path: "/Contacts", qs: { records: ["rec1", "rec2"] } }]);
    });

    it("should reject more than 10 records without calling the API", async () => {
      const { table, requests } = createTable();
      const records = Array.from({ length: 11 }, (_, i) => ({ n: i }));

      await expect(table.batchCreate(records)).rejects.toBeInstanceOf(BatchLimitError);
      expect(requests).toEqual([]);
    });

    it("should skip empty batches", async () => {
      const { table, requests } = createTable();

      await table.batchCreate([]);
      await table.batchUpdate([]);
      await table.batchDelete([]);

      expect(requests).toEqual([]);
    });

    it("should classify client failures", async () => {
      const { table } = createTable({
        respond: async () => {
          throw { error: "REQUEST_TOO_LARGE", message: "Request body too large", statusCode: 413 };
        },
      });

      await expect(table.batchUpdate([{ id: "rec1", fields: {} }])).rejects.toMatchObject({
        kind: "payload_too_large",
        statusCode: 413,
        message: "update 1 record(s) in appTest/Contacts: Request body too large",
      });
    });
  });

  describe("fields", () => {
    it("should list the fields of the table from the base schema", async () => {
      const { table, metaCalls } = createTable();

      expect(await table.listFields()).toEqual([
        { name: "email", type: "email" },
        { name: "notes", type: "multilineText" },
      ]);
      expect(metaCalls).toEqual([
        {
          url: "https://api.airtable.com/v0/meta/bases/appTest/tables",
          method: "GET",
          body: undefined,
          authorization: "Bearer test-secret",
        },
      ]);
      expect(table.resolvedTableId).toBe("tblContacts");
    });

    it("should find the table by ID", async () => {
      const { table } = createTable({ table: "tblContacts" });

      await table.listFields();
      expect(table.resolvedTableId).toBe("tblContacts");
    });

    it("should report a missing table as permanent", async () => {
      const { table } = createTable({ table: "Missing" });

      await expect(table.listFields()).rejects.toMatchObject({
        kind: "permanent",
        message: "read schema of appTest/Missing: table not found",
      });
    });

    it("should create a field with Airtable's type options", async () => {
      const { table, metaCalls } = createTable({
        meta: async (call) => (call.method === "POST" ? json({ id: "fld3" }) : json(schema)),
        endpointUrl: "https://airtable.test/",
      });

      expect(await table.createField("age", "number")).toBe(true);
      expect(await table.createField("active", "checkbox")).toBe(true);

      expect(metaCalls.map((call) => call.url)).toEqual([
        "https://airtable.test/v0/meta/bases/appTest/tables",
        "https://airtable.test/v0/meta/bases/appTest/tables/tblContacts/fields",
        "https://airtable.test/v0/meta/bases/appTest/tables/tblContacts/fields",
      ]);
      expect(metaCalls[1].body).toBe('{"name":"age","type":"number","options":{"precision":8}}');
      expect(metaCalls[2].body).toBe(
        '{"name":"active","type":"checkbox","options":{"icon":"check","color":"greenBright"}}'
      );
    });

    it("should return false when Airtable refuses the field", async () => {
      const { table } = createTable({
        meta: async (call) => (call.method === "POST" ? json({ error: "DUPLICATE" }, 422) : json(schema)),
      });

      expect(await table.createField("notes", "text")).toBe(false);
    });

    it("should throw transient failures so they can be retried", async () => {
      const { table } = createTable({
        meta: async (call) => (call.method === "POST" ? new Response(null, { status: 503 }) : json(schema)),
      });

      await expect(table.createField("age", "number")).rejects.toMatchObject({
        kind: "server_error",
        message: "create field age in appTest/Contacts: HTTP 503",
      });
    });

    it("should turn a fetch failure into a network error", async () => {
      const { table } = createTable({
        meta: async () => {
          throw new TypeError("fetch failed");
        },
      });

      await expect(table.listFields()).rejects.toMatchObject({
        kind: "network",
        message: "read schema of appTest/Contacts: fetch failed",
      });
    });
  });
});
