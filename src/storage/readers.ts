import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { parseFloatText } from "../extract/attributes.js";
import type { CellValue, NamedTable, TableRow } from "../summary/types.js";
import { errorMessage } from "../utils/errors.js";

const csvRecords = z.array(z.array(z.string()));

export type TableLoad =
  | { ok: true; table: NamedTable }
  | { ok: false; source: string; reason: string };

/** Empty → null, numbers and true/false to their own types, else the text. */
export function parseCell(text: string): CellValue {
  if (text.trim() === "") return null;
  if (/^\s*true\s*$/i.test(text)) return true;
  if (/^\s*false\s*$/i.test(text)) return false;
  const n = parseFloatText(text);
  if (n === null) return text;
  return Number.isNaN(n) ? null : n;
}

export function parseTable(csv: string, name: string): NamedTable {
  const records = csvRecords.parse(
    parse(csv, { bom: true, skip_empty_lines: true })
  );
  const [header, ...body] = records;
  if (header === undefined) throw new Error("no header row");

  const columns: string[] = [];
  const positions: number[] = [];
  header.forEach((col, i) => {
    if (columns.includes(col)) return;
    columns.push(col);
    positions.push(i);
  });

  const rows = body.map((cells) => {
    const row: TableRow = {};
    columns.forEach((col, j) => {
      row[col] = parseCell(cells[positions[j] ?? j] ?? "");
    });
    return row;
  });

  return { name, columns, rows };
}

export async function readTable(filePath: string): Promise<TableLoad> {
  const source = path.basename(filePath);
  try {
    const csv = await fs.promises.readFile(filePath, "utf8");
    return { ok: true, table: parseTable(csv, source) };
  } catch (err) {
    return { ok: false, source, reason: errorMessage(err) };
  }
}
