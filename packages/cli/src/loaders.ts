/**
 * Loading of remote tables, grids and local datasets.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { AirtableTable } from "@rowsync/adapter-airtable";
import { InMemoryGrid, InMemoryTable } from "@rowsync/adapter-in-memory";
import {
  ConfigurationError,
  describeError,
  type GridOrigin,
  type LocalRow,
  type RemoteGrid,
  type RemoteTable,
} from "@rowsync/core";
import type { AdapterName, TargetConfigRaw } from "./config.js";
import { parseJsoncText } from "./parser.js";

/**
 * Builds the remote table of a target.
 */
export type TableFactory = (target: TargetConfigRaw) => RemoteTable;

/**
 * Creates remote tables by adapter name. Memory tables and grids are kept per
 * name, so that every job and every scheduled run writing to one sees the same data.
 */
export class TableLoader {
  private readonly memoryTables = new Map<string, InMemoryTable>();
  private readonly memoryGrids = new Map<string, InMemoryGrid>();
  private readonly factories: Record<AdapterName, TableFactory>;

  constructor(overrides: Partial<Record<AdapterName, TableFactory>> = {}) {
    this.factories = {
      airtable: (target) => createAirtableTable(target),
      memory: (target) => this.memoryTable(target.table),
      ...overrides,
    };
  }

  /**
   * Load the table a job writes to.
   * @throws ConfigurationError if the adapter rejects its options
   */
  load(target: TargetConfigRaw): RemoteTable {
    try {
      return this.factories[target.adapter](target);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load adapter '${target.adapter}' for table '${target.table}': ${describeError(error)}`
      );
    }
  }

  /**
   * Load the grid a job writes to. Only the memory adapter has grids.
   * @throws ConfigurationError for any other adapter
   */
  loadGrid(target: TargetConfigRaw): RemoteGrid {
    if (target.adapter !== "memory") {
      throw new ConfigurationError(`The ${target.adapter} adapter has no grid targets`);
    }
    return this.memoryGrid(target.table);
  }

  /**
   * The in-memory grid of that name, created on first use.
   */
  memoryGrid(name: string): InMemoryGrid {
    let grid = this.memoryGrids.get(name);
    if (!grid) {
      grid = new InMemoryGrid({ name });
      this.memoryGrids.set(name, grid);
    }
    return grid;
  }

  /**
   * The in-memory table of that name, created on first use.
   */
  memoryTable(name: string): InMemoryTable {
    let table = this.memoryTables.get(name);
    if (!table) {
      table = new InMemoryTable({ name });
      this.memoryTables.set(name, table);
    }
    return table;
  }
}

function createAirtableTable(target: TargetConfigRaw): AirtableTable {
  const creds = target.creds ?? {};
  for (const key of ["api_key", "base_id"]) {
    const value = creds[key] ?? "";
    if (value === "" || value.startsWith("${")) {
      throw new ConfigurationError(`creds.${key} is not set`);
    }
  }
  return new AirtableTable({
    apiKey: creds.api_key,
    baseId: creds.base_id,
    table: target.table,
    endpointUrl: creds.endpoint_url,
    typecast: target.typecast,
  });
}

/**
 * Convert column letters to a 0-based index: A is 0, Z is 25, AA is 26.
 */
export function columnIndex(letters: string): number {
  let index = 0;
  for (const letter of letters.toUpperCase()) {
    index = index * 26 + (letter.charCodeAt(0) - 64);
  }
  return index - 1;
}

/**
 * Header cell of a grid target, 0-based.
 */
export function gridOrigin(target: TargetConfigRaw): GridOrigin {
  return {
    row: (target.start_row ?? 1) - 1,
    column: columnIndex(target.start_column ?? "A"),
  };
}

/**
 * Load the rows of a local dataset: a JSON or JSONC file holding an array of objects.
 * @param sourcePath - Path to the dataset (relative to the config file or absolute)
 * @param configFilePath - Path to the config file (for resolving relative paths)
 * @throws ConfigurationError if the file cannot be read or is not an array of objects
 */
export async function loadRows(sourcePath: string, configFilePath: string): Promise<LocalRow[]> {
  const resolvedPath = path.isAbsolute(sourcePath)
    ? sourcePath
    : path.resolve(path.dirname(configFilePath), sourcePath);

  let content: string;
  try {
    content = await fs.readFile(resolvedPath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Dataset not found: ${resolvedPath} (${describeError(error)})`);
  }

  let data: unknown;
  try {
    data = parseJsoncText(content);
  } catch (error) {
    throw new ConfigurationError(`Dataset ${resolvedPath}: ${describeError(error)}`);
  }
  if (!Array.isArray(data)) {
    throw new ConfigurationError(`Dataset ${resolvedPath} must contain an array of rows`);
  }

  return data.map((row: unknown, i: number): LocalRow => {
    if (typeof row !== "object" || row === null || Array.isArray(row)) {
      throw new ConfigurationError(`Dataset ${resolvedPath}: row ${i + 1} is not an object`);
    }
    return { ...row };
  });
}
