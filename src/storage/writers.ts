import fs from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import ExcelJS from "exceljs";
import type { TableRow } from "../summary/types.js";

export function toCsv(columns: readonly string[], rows: readonly object[]): string {
  return stringify([...rows], {
    header: true,
    columns: [...columns],
    cast: { boolean: (v) => (v ? "true" : "false") },
  });
}

export async function writeCsv(
  filePath: string,
  columns: readonly string[],
  rows: readonly object[]
) {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, toCsv(columns, rows), "utf8");
  return filePath;
}

export async function writeXlsx(
  filePath: string,
  columns: readonly string[],
  rows: readonly TableRow[],
  sheetName = "summary"
) {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  sheet.columns = columns.map((c) => ({ header: c, key: c }));
  for (const row of rows) {
    sheet.addRow(columns.map((c) => row[c] ?? null));
  }
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}
