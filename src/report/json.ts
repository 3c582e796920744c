import fs from "node:fs";
import path from "node:path";
import type { RunReport } from "./types.js";

export async function writeJsonReport(filePath: string, report: RunReport) {
  const json = JSON.stringify(report, null, 2);
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, json, "utf8");
}
