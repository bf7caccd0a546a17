/**
 * @rowsync/adapter-in-memory - In-process RemoteTable and RemoteGrid for tests and local runs
 */

export {
  InMemoryTable,
  DEFAULT_LIMITS,
  type InMemoryTableOptions,
  type TableOperation,
  type TableCall,
} from "./in-memory-table.js";

export {
  InMemoryGrid,
  DEFAULT_GRID_LIMITS,
  type InMemoryGridOptions,
  type GridOperation,
  type GridCall,
} from "./in-memory-grid.js";
