import path from "node:path";
import type { CellValue, NamedTable, TableRow } from "../summary/types.js";
import { log } from "../utils/logger.js";

export const FILENAME_COLUMN = "filename";

/** Suffixes the per-file writers have used; the configured one is tried first. */
export const KNOWN_TABLE_SUFFIXES = ["_analysis", "_summary"] as const;

export type AggregateRow = TableRow & { filename: string };

export interface ConsolidatedTable {
  columns: string[];
  rows: AggregateRow[];
}

const aggregateLog = log.child({ component: "aggregate" });

export function filenameFor(
  tableName: string,
  suffixes: readonly string[] = KNOWN_TABLE_SUFFIXES
): string {
  const base = path.basename(tableName);
  const stem = base.slice(0, base.length - path.extname(base).length);
  for (const suffix of suffixes) {
    if (suffix !== "" && stem.endsWith(suffix) && stem.length > suffix.length) {
      return stem.slice(0, -suffix.length);
    }
  }
  return stem;
}

export function selectedColumns(columns: readonly string[]): string[] {
  return [...new Set(columns)].filter((c) => c !== FILENAME_COLUMN);
}

// Tagged by type so Infinity, NaN and null, or 1 and "1", stay apart.
function tupleKey(values: readonly CellValue[]): string {
  return JSON.stringify(
    values.map((v) => (v === null ? ["null"] : [typeof v, String(v)]))
  );
}

/** Distinct tuples of the selected columns, in first-seen order. */
export function distinctRows(
  table: NamedTable,
  columns: readonly string[]
): CellValue[][] {
  const seen = new Set<string>();
  const distinct: CellValue[][] = [];
  for (const row of table.rows) {
    const values = columns.map((c) => row[c] ?? null);
    const key = tupleKey(values);
    if (seen.has(key)) continue;
    seen.add(key);
    distinct.push(values);
  }
  return distinct;
}

/**
 * One row for one table: the first distinct tuple of the selected columns,
 * or all nulls when the table has no rows. Columns the table lacks are null.
 */
export function toAggregateRow(
  table: NamedTable,
  columns: readonly string[],
  suffixes?: readonly string[]
): AggregateRow {
  const selected = selectedColumns(columns);
  const distinct = distinctRows(table, selected);
  if (distinct.length > 1) {
    aggregateLog.warn(
      { table: table.name, distinct: distinct.length },
      "summary values differ between rows; using the first"
    );
  }
  const missing = selected.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    aggregateLog.debug({ table: table.name, missing }, "columns filled with null");
  }

  const values = distinct[0] ?? selected.map(() => null);
  const row: AggregateRow = { filename: filenameFor(table.name, suffixes) };
  selected.forEach((c, i) => {
    row[c] = values[i] ?? null;
  });
  return row;
}

function byFilename(a: AggregateRow, b: AggregateRow): number {
  if (a.filename < b.filename) return -1;
  if (a.filename > b.filename) return 1;
  return 0;
}

export function aggregate(
  tables: readonly NamedTable[],
  columns: readonly string[],
  suffixes?: readonly string[]
): ConsolidatedTable {
  const selected = selectedColumns(columns);
  const rows = tables
    .map((t) => toAggregateRow(t, selected, suffixes))
    .sort(byFilename);
  return { columns: [FILENAME_COLUMN, ...selected], rows };
}
