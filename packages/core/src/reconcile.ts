/**
 * Reconciliation of local rows against remote records.
 * Every policy is built from the same primitive: classify each row by its index key.
 */

import { createHash } from "node:crypto";
import { ConfigurationError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { LocalRow, RecordID, RemoteRecord } from "./types.js";

/**
 * Reconciliation policy.
 *
 * - `full`: update matched rows, create the others
 * - `incremental`: create unmatched rows only
 * - `overwrite`: delete matched records, then create every row
 * - `clone`: delete every record, then create every row
 */
export type SyncPolicy = "full" | "incremental" | "overwrite" | "clone";

export const SYNC_POLICIES: readonly SyncPolicy[] = ["full", "incremental", "overwrite", "clone"];

export function isSyncPolicy(value: unknown): value is SyncPolicy {
  return typeof value === "string" && SYNC_POLICIES.some((policy) => policy === value);
}

/**
 * Digest of an index column value.
 */
export type IndexKey = string;

/**
 * A local row and its 1-based position in the dataset.
 */
export interface PlannedRow {
  rowNumber: number;
  row: LocalRow;
}

export interface PlannedUpdate extends PlannedRow {
  recordId: RecordID;
}

export interface SyncPlan {
  policy: SyncPolicy;
  toCreate: PlannedRow[];
  toUpdate: PlannedUpdate[];
  toDelete: RecordID[];
  /** full/incremental ran without an index column and became a pure append */
  downgraded: boolean;
  /** Matched rows dropped by the incremental policy */
  skipped: number;
  /** Remote records hidden by a later record with the same key */
  duplicateRemoteKeys: number;
  /** Keys shared by more than one local row that matched a record */
  duplicateLocalKeys: IndexKey[];
}

/**
 * Compute the index key of a value.
 * Missing, null and blank values have no key; such rows never match.
 */
export function indexKeyOf(value: unknown): IndexKey | null {
  if (value === null || value === undefined) {
    return null;
  }
  let text: string;
  if (typeof value === "string") {
    text = value;
  } else if (Array.isArray(value)) {
    text = value.map((item) => String(item)).join(",");
  } else if (typeof value === "object") {
    text = JSON.stringify(value);
  } else {
    text = String(value);
  }
  if (text.trim() === "") {
    return null;
  }
  return createHash("md5").update(text, "utf8").digest("hex");
}

/**
 * Index of remote records by key. When several records share a key the last one wins.
 */
export interface RemoteIndex {
  byKey: Map<IndexKey, RemoteRecord>;
  /** Records overwritten by a later record with the same key */
  duplicates: number;
}

export function buildRemoteIndex(records: readonly RemoteRecord[], indexColumn: string): RemoteIndex {
  const byKey = new Map<IndexKey, RemoteRecord>();
  let duplicates = 0;
  for (const record of records) {
    const key = indexKeyOf(record.fields[indexColumn]);
    if (key === null) {
      continue;
    }
    if (byKey.has(key)) {
      duplicates++;
    }
    byKey.set(key, record);
  }
  return { byKey, duplicates };
}

export function hasIndexColumn(indexColumn: string | undefined): indexColumn is string {
  return indexColumn !== undefined && indexColumn.trim() !== "";
}

/**
 * Whether the plan for this policy depends on the remote record set.
 * A downgraded full/incremental plan does not.
 */
export function needsRemoteRead(policy: SyncPolicy, indexColumn: string | undefined): boolean {
  return policy === "clone" || hasIndexColumn(indexColumn);
}

/**
 * Classify local rows into create/update/delete sets.
 *
 * @param localRows - Dataset rows, in source order
 * @param remoteRecords - The complete remote record set
 * @param indexColumn - Column used to match rows to records
 * @throws ConfigurationError for `overwrite` without an index column
 */
export function planSync(
  localRows: readonly LocalRow[],
  remoteRecords: readonly RemoteRecord[],
  indexColumn: string | undefined,
  policy: SyncPolicy,
  logger: Logger = silentLogger
): SyncPlan {
  const plan: SyncPlan = {
    policy,
    toCreate: [],
    toUpdate: [],
    toDelete: [],
    downgraded: false,
    skipped: 0,
    duplicateRemoteKeys: 0,
    duplicateLocalKeys: [],
  };
  const rows: PlannedRow[] = localRows.map((row, i) => ({ rowNumber: i + 1, row }));

  if (policy === "clone") {
    plan.toDelete = remoteRecords.map((record) => record.id);
    plan.toCreate = rows;
    return logPlan(plan, logger);
  }

  if (!hasIndexColumn(indexColumn)) {
    if (policy === "overwrite") {
      throw new ConfigurationError("The overwrite policy requires an index column");
    }
    logger.warn("No index column configured, policy downgraded to append", {
      policy,
      rows: rows.length,
    });
    plan.downgraded = true;
    plan.toCreate = rows;
    return logPlan(plan, logger);
  }

  const index = buildRemoteIndex(remoteRecords, indexColumn);
  plan.duplicateRemoteKeys = index.duplicates;
  if (index.duplicates > 0) {
    logger.warn("Remote records share index keys, the last one read is used", {
      indexColumn,
      duplicates: index.duplicates,
    });
  }

  const matchedKeys = new Set<IndexKey>();
  const duplicateKeys = new Set<IndexKey>();
  const deleteIds = new Set<RecordID>();

  for (const planned of rows) {
    const key = indexKeyOf(planned.row[indexColumn]);
    const match = key === null ? undefined : index.byKey.get(key);

    if (key === null || match === undefined) {
      if (policy !== "overwrite") {
        plan.toCreate.push(planned);
      }
      continue;
    }

    if (matchedKeys.has(key)) {
      duplicateKeys.add(key);
    }
    matchedKeys.add(key);

    switch (policy) {
      case "full":
        plan.toUpdate.push({ ...planned, recordId: match.id });
        break;
      case "incremental":
        plan.skipped++;
        break;
      case "overwrite":
        deleteIds.add(match.id);
        break;
    }
  }

  if (policy === "overwrite") {
    plan.toDelete = [...deleteIds];
    plan.toCreate = rows;
  }

  plan.duplicateLocalKeys = [...duplicateKeys];
  if (duplicateKeys.size > 0) {
    logger.warn("Several local rows share an index key and target the same record", {
      indexColumn,
      keys: duplicateKeys.size,
    });
  }

  return logPlan(plan, logger);
}

function logPlan(plan: SyncPlan, logger: Logger): SyncPlan {
  logger.info("Sync plan ready", {
    policy: plan.policy,
    downgraded: plan.downgraded,
    create: plan.toCreate.length,
    update: plan.toUpdate.length,
    delete: plan.toDelete.length,
    skipped: plan.skipped,
  });
  return plan;
}
