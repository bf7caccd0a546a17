/**
 * Helpers that turn local rows into remote fields.
 */

import type { CellValue, FieldTypeHint, Fields, LocalRow } from "./types.js";

/**
 * Cells that are not sent: the remote keeps them empty.
 */
export function isBlank(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    (typeof value === "number" && Number.isNaN(value)) ||
    (typeof value === "string" && value.trim() === "")
  );
}

/**
 * Copy a row into a fields object, dropping blank cells.
 */
export function rowToFields(row: LocalRow): Fields {
  const fields: Fields = {};
  for (const [column, value] of Object.entries(row)) {
    if (!isBlank(value)) {
      fields[column] = value;
    }
  }
  return fields;
}

/**
 * Keep the selected columns of every row, in source order. The index column is
 * always kept so that rows can still be matched.
 */
export function selectColumns(
  rows: readonly LocalRow[],
  columns: readonly string[],
  indexColumn?: string
): LocalRow[] {
  const keep = new Set(columns);
  if (indexColumn !== undefined && indexColumn.trim() !== "") {
    keep.add(indexColumn);
  }
  return rows.map((row) => {
    const projected: Fields = {};
    for (const [column, value] of Object.entries(row)) {
      if (keep.has(column)) {
        projected[column] = value;
      }
    }
    return projected;
  });
}

/**
 * Encode a value for a grid cell. Blank values become empty cells.
 */
export function toCellValue(value: unknown): CellValue {
  if (isBlank(value)) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Every column name used by the rows, in first-seen order.
 */
export function collectColumns(rows: readonly LocalRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const column of Object.keys(row)) {
      columns.add(column);
    }
  }
  return [...columns];
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function looksLikeDate(value: unknown): boolean {
  return typeof value === "string" && ISO_DATE.test(value.trim());
}

function looksLikeNumber(value: unknown): boolean {
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  return typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value));
}

/**
 * Pick a column type from the non-blank values of a column.
 * Falls back to text whenever the values disagree.
 */
export function inferFieldType(values: readonly unknown[]): FieldTypeHint {
  const present = values.filter((value) => !isBlank(value));
  if (present.length === 0) {
    return "text";
  }
  if (present.every((value) => typeof value === "boolean")) {
    return "checkbox";
  }
  if (present.every(looksLikeNumber)) {
    return "number";
  }
  if (present.every(looksLikeDate)) {
    return "date";
  }
  return "text";
}
