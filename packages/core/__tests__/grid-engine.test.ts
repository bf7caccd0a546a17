/**
 * Tests for GridSyncEngine against an in-memory grid: header handling, the
 * policies, column windows and failures.
 */

import { InMemoryGrid } from "@rowsync/adapter-in-memory";
import { ManualClock } from "../src/clock";
import { RequestController } from "../src/controller";
import { ConfigurationError } from "../src/errors";
import { FixedWaitRateLimit } from "../src/rate-limit";
import { FixedWaitRetry } from "../src/retry";
import { GridSyncEngine, type GridJobConfig } from "../src/grid-engine";
import type { LocalRow } from "../src/types";

function createEngine(grid: InMemoryGrid, rows: LocalRow[], overrides: Partial<GridJobConfig> = {}) {
  const clock = new ManualClock();
  const controller = new RequestController({
    retry: new FixedWaitRetry({ initialDelayMs: 10, maxRetries: 3 }),
    rateLimit: new FixedWaitRateLimit({ minIntervalMs: 0 }, clock),
    clock,
  });
  return new GridSyncEngine({
    jobId: "grid-job",
    grid,
    rows,
    policy: "full",
    indexColumn: "email",
    batchSize: 2,
    controller,
    ...overrides,
  });
}

const contacts: LocalRow[] = [
  { email: "ada@example.com", name: "Ada" },
  { email: "bob@example.com", name: "Bob" },
  { email: "cy@example.com", name: "Cy" },
];

describe("GridSyncEngine", () => {
  describe("constructor", () => {
    it("rejects an origin outside the grid", () => {
      expect(() => createEngine(new InMemoryGrid(), [], { origin: { row: -1, column: 0 } })).toThrow(
        new ConfigurationError("Grid origin must be a cell position, got -1,0")
      );
    });

    it("rejects a column batch size below one", () => {
      expect(() => createEngine(new InMemoryGrid(), [], { columnBatchSize: 0 })).toThrow(
        "columnBatchSize must be a positive integer, got 0"
      );
    });
  });

  describe("full policy", () => {
    it("writes the header and appends every row to an empty grid", async () => {
      const grid = new InMemoryGrid();
      const summary = await createEngine(grid, contacts).run();

      expect(summary.status).toBe("success");
      expect(summary.stats.created).toBe(3);
      expect(summary.stats.fieldsCreated).toEqual(["email", "name"]);
      expect(summary.sends.map((send) => send.operation)).toEqual(["header", "append"]);
      expect(grid.values).toEqual([
        ["email", "name"],
        ["ada@example.com", "Ada"],
        ["bob@example.com", "Bob"],
        ["cy@example.com", "Cy"],
      ]);
      expect(grid.calls.map((call) => call.operation)).toEqual(["read", "write", "append", "append"]);
      expect(summary.stats.calls).toBe(4);
    });

    it("rewrites matched rows in place and extends the header", async () => {
      const grid = new InMemoryGrid({
        initialValues: [
          ["email", "name", "phone"],
          ["bob@example.com", "Old Bob", "555"],
          ["zed@example.com", "Zed", "777"],
        ],
      });
      const rows: LocalRow[] = [
        { email: "bob@example.com", name: "Bob", phone: "", team: "core" },
        { email: "ada@example.com", name: "Ada", team: "ops" },
      ];
      const summary = await createEngine(grid, rows).run();

      expect(summary.status).toBe("success");
      expect(summary.stats.updated).toBe(1);
      expect(summary.stats.created).toBe(1);
      expect(summary.stats.fieldsCreated).toEqual(["team"]);
      expect(summary.sends.map((send) => send.operation)).toEqual(["header", "update", "append"]);
      expect(grid.values).toEqual([
        ["email", "name", "phone", "team"],
        ["bob@example.com", "Bob", "555", "core"],
        ["zed@example.com", "Zed", "777"],
        ["ada@example.com", "Ada", null, "ops"],
      ]);
    });

    it("writes only the selected columns", async () => {
      const grid = new InMemoryGrid({
        initialValues: [
          ["email", "name", "phone"],
          ["ada@example.com", "Old", "555"],
        ],
      });
      const rows: LocalRow[] = [
        { email: "ada@example.com", name: "Ada", phone: "111" },
        { email: "bob@example.com", name: "Bob", phone: "222" },
      ];
      const summary = await createEngine(grid, rows, { columns: ["name"] }).run();

      expect(summary.sends.map((send) => send.operation)).toEqual(["update", "append"]);
      expect(grid.values).toEqual([
        ["email", "name", "phone"],
        ["ada@example.com", "Ada", "555"],
        ["bob@example.com", "Bob"],
      ]);
    });
  });

  describe("incremental policy", () => {
    it("appends only unmatched rows", async () => {
      const grid = new InMemoryGrid({
        initialValues: [
          ["email", "name"],
          ["ada@example.com", "Old Ada"],
        ],
      });
      const summary = await createEngine(grid, contacts, { policy: "incremental" }).run();

      expect(summary.stats.skipped).toBe(1);
      expect(summary.stats.created).toBe(2);
      expect(summary.sends.map((send) => send.operation)).toEqual(["append"]);
      expect(grid.callCount("append")).toBe(1);
      expect(grid.values).toEqual([
        ["email", "name"],
        ["ada@example.com", "Old Ada"],
        ["bob@example.com", "Bob"],
        ["cy@example.com", "Cy"],
      ]);
    });
  });

  describe("overwrite policy", () => {
    const initialValues = [
      ["email", "name", "phone"],
      ["ada@example.com", "Old", "555"],
    ];

    it("replaces every synced cell and keeps the other columns", async () => {
      const grid = new InMemoryGrid({ initialValues });
      const summary = await createEngine(grid, [{ email: "ada@example.com", name: "" }], {
        policy: "overwrite",
      }).run();

      expect(summary.policy).toBe("overwrite");
      expect(summary.stats.updated).toBe(1);
      expect(summary.sends.map((send) => send.operation)).toEqual(["update"]);
      expect(grid.values).toEqual([
        ["email", "name", "phone"],
        ["ada@example.com", null, "555"],
      ]);
    });

    it("plans matched rows as updates", async () => {
      const grid = new InMemoryGrid({ initialValues });
      const plan = await createEngine(grid, contacts, { policy: "overwrite" }).plan();

      expect(plan.policy).toBe("overwrite");
      expect(plan.toUpdate.map((planned) => planned.recordId)).toEqual(["0"]);
      expect(plan.toCreate.map((planned) => planned.rowNumber)).toEqual([2, 3]);
      expect(plan.toDelete).toEqual([]);
    });

    it("requires an index column", async () => {
      const grid = new InMemoryGrid({ initialValues });
      const summary = await createEngine(grid, contacts, { policy: "overwrite", indexColumn: undefined }).run();

      expect(summary.status).toBe("failed");
      expect(summary.fatalError).toBe("The overwrite policy requires an index column");
      expect(grid.calls.map((call) => call.operation)).toEqual(["read"]);
    });
  });

  describe("clone policy", () => {
    it("clears the grid and writes the block at the origin", async () => {
      const grid = new InMemoryGrid({
        initialValues: [["Report"], [null, null, "email"], [null, null, "old@example.com"]],
      });
      const summary = await createEngine(grid, contacts, {
        policy: "clone",
        origin: { row: 1, column: 2 },
      }).run();

      expect(summary.status).toBe("success");
      expect(summary.stats.deleted).toBe(1);
      expect(summary.stats.created).toBe(3);
      expect(summary.stats.fieldsCreated).toEqual(["name"]);
      expect(summary.sends.map((send) => send.operation)).toEqual(["header", "create"]);
      expect(grid.calls.map((call) => call.operation)).toEqual(["read", "clear", "write", "write", "write"]);
      expect(grid.values).toEqual([
        [],
        [null, null, "email", "name"],
        [null, null, "ada@example.com", "Ada"],
        [null, null, "bob@example.com", "Bob"],
        [null, null, "cy@example.com", "Cy"],
      ]);
    });

    it("writes rectangles and bisects oversized ones by rows", async () => {
      const grid = new InMemoryGrid({ oversizedAbove: 4 });
      const rows: LocalRow[] = [1, 2, 3, 4].map((n) => ({ a: `a${n}`, b: `b${n}`, c: `c${n}` }));
      const summary = await createEngine(grid, rows, {
        policy: "clone",
        indexColumn: undefined,
        batchSize: 4,
        columnBatchSize: 2,
      }).run();

      expect(summary.status).toBe("success");
      expect(summary.stats.created).toBe(4);
      expect(summary.stats.bisections).toBe(1);
      const create = summary.sends[1];
      expect(create.chunks.map((c) => [c.firstRow, c.lastRow, c.colStart, c.colEnd, c.depth])).toEqual([
        [1, 2, 0, 2, 1],
        [3, 4, 0, 2, 1],
        [1, 4, 2, 3, 0],
      ]);
      expect(grid.calls.map((call) => call.cells)).toEqual([0, 0, 2, 1, 8, 4, 4, 4]);
      expect(grid.values).toEqual([
        ["a", "b", "c"],
        ["a1", "b1", "c1"],
        ["a2", "b2", "c2"],
        ["a3", "b3", "c3"],
        ["a4", "b4", "c4"],
      ]);
    });
  });

  describe("without an index column", () => {
    it("downgrades to appending every row", async () => {
      const grid = new InMemoryGrid({
        initialValues: [
          ["email", "name"],
          ["ada@example.com", "Ada"],
        ],
      });
      const summary = await createEngine(grid, contacts, { indexColumn: undefined }).run();

      expect(summary.stats.downgraded).toBe(true);
      expect(summary.stats.created).toBe(3);
      expect(grid.values.length).toBe(5);
      expect(grid.values[4]).toEqual(["cy@example.com", "Cy"]);
    });
  });

  describe("failures", () => {
    it("stops before the rows when the header cannot be written", async () => {
      const grid = new InMemoryGrid();
      grid.failNext("write", "permanent");
      const summary = await createEngine(grid, contacts).run();

      expect(summary.status).toBe("failed");
      expect(summary.sends.map((send) => send.operation)).toEqual(["header"]);
      expect(summary.stats.errors).toEqual([
        "header items 1-1, columns 1-2: Injected permanent failure on write",
      ]);
      expect(grid.callCount("append")).toBe(0);
    });

    it("reports the rows a failed append covered", async () => {
      const grid = new InMemoryGrid({ initialValues: [["email", "name"]] });
      grid.failNext("append", "permanent");
      const summary = await createEngine(grid, contacts).run();

      expect(summary.status).toBe("failed");
      expect(summary.stats.errors).toEqual(["append rows 1-2: Injected permanent failure on append"]);
      expect(grid.values).toEqual([["email", "name"]]);
    });
  });
});
