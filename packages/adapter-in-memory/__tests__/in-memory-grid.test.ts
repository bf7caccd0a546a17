/**
 * Tests for InMemoryGrid: cell storage, appends, limits and fault injection.
 */

import { BatchLimitError, RemoteError } from "@rowsync/core";
import { InMemoryGrid } from "../src/in-memory-grid";

describe("InMemoryGrid", () => {
  it("writes ranges and reads the sheet back", async () => {
    const grid = new InMemoryGrid();
    await grid.writeRanges([
      { row: 0, column: 0, values: [["email", "name"]] },
      { row: 2, column: 1, values: [["Ada"], ["Bob"]] },
    ]);

    expect(await grid.readValues()).toEqual([["email", "name"], [], [null, "Ada"], [null, "Bob"]]);
    expect(grid.cell(2, 1)).toBe("Ada");
    expect(grid.cell(9, 9)).toBeNull();
    expect(grid.calls).toEqual([
      { operation: "write", cells: 4 },
      { operation: "read", cells: 0 },
    ]);
  });

  it("appends below the last populated row", async () => {
    const grid = new InMemoryGrid({
      initialValues: [
        ["email", "name"],
        ["ada@example.com", "Ada"],
        [null, null],
      ],
    });
    await grid.appendRows(1, [["Bob"], ["Cy"]]);

    expect(grid.values).toEqual([
      ["email", "name"],
      ["ada@example.com", "Ada"],
      [null, "Bob"],
      [null, "Cy"],
    ]);
  });

  it("appends to the first row of an empty sheet", async () => {
    const grid = new InMemoryGrid();
    await grid.appendRows(0, [["a", "b"]]);

    expect(grid.values).toEqual([["a", "b"]]);
  });

  describe("limits", () => {
    it("rejects too many ranges before the call is made", async () => {
      const grid = new InMemoryGrid({ limits: { ranges: 1 } });
      const range = { row: 0, column: 0, values: [["a"]] };

      await expect(grid.writeRanges([range, range])).rejects.toThrow(
        new BatchLimitError("write ranges", 2, 1)
      );
      expect(grid.calls).toEqual([]);
    });

    it("rejects blocks wider than the column limit", async () => {
      const grid = new InMemoryGrid({ limits: { columns: 2 } });

      await expect(grid.appendRows(0, [["a", "b", "c"]])).rejects.toThrow(
        "append columns batch of 3 exceeds the limit of 2 items per call"
      );
      expect(grid.values).toEqual([]);
    });

    it("rejects blocks taller than the row limit", async () => {
      const grid = new InMemoryGrid({ limits: { rows: 1 } });

      await expect(grid.writeRanges([{ row: 0, column: 0, values: [["a"], ["b"]] }])).rejects.toBeInstanceOf(
        BatchLimitError
      );
    });
  });

  describe("oversized requests", () => {
    it("rejects requests with more cells than the threshold", async () => {
      const grid = new InMemoryGrid({ oversizedAbove: 3 });

      await expect(grid.appendRows(0, [["a", "b"], ["c", "d"]])).rejects.toMatchObject({
        kind: "payload_too_large",
        statusCode: 413,
        message: "Request body of 4 cells is too large",
      });
      expect(grid.calls).toEqual([{ operation: "append", cells: 4 }]);
      expect(grid.values).toEqual([]);

      grid.setOversizedAbove(undefined);
      await grid.appendRows(0, [["a", "b"], ["c", "d"]]);
      expect(grid.values).toEqual([
        ["a", "b"],
        ["c", "d"],
      ]);
    });
  });

  describe("fault injection", () => {
    it("fails the next calls of an operation, then recovers", async () => {
      const grid = new InMemoryGrid({ initialValues: [["a"]] });
      grid.failNext("read", "server_error", 2);

      await expect(grid.readValues()).rejects.toMatchObject({ kind: "server_error", statusCode: 503 });
      await expect(grid.readValues()).rejects.toBeInstanceOf(RemoteError);
      expect(await grid.readValues()).toEqual([["a"]]);
      expect(grid.callCount("read")).toBe(3);
    });

    it("throws a given error as is", async () => {
      const grid = new InMemoryGrid();
      grid.failNext("clear", new RemoteError("network", "socket hang up"));

      await expect(grid.clear()).rejects.toThrow("socket hang up");
    });
  });

  it("clears cells through a call and resets without one", async () => {
    const grid = new InMemoryGrid({ initialValues: [["a", "b"]] });
    await grid.clear();

    expect(grid.values).toEqual([]);
    expect(grid.callCount("clear")).toBe(1);

    await grid.writeRanges([{ row: 0, column: 0, values: [["c"]] }]);
    grid.failNext("write", "permanent");
    grid.reset();

    expect(grid.values).toEqual([]);
    expect(grid.calls).toEqual([]);
    await grid.writeRanges([{ row: 0, column: 0, values: [["d"]] }]);
    expect(grid.values).toEqual([["d"]]);
  });
});
