import fs from "node:fs";
import path from "node:path";
import {
  aggregate,
  filenameFor,
  KNOWN_TABLE_SUFFIXES,
} from "../aggregate/aggregator.js";
import {
  failedTracks,
  readTrackFile,
  trackRecords,
} from "../extract/trackReader.js";
import type {
  AggregationReport,
  BatchReport,
  ExtractionReport,
  FileOutcome,
  TableOutcome,
} from "../report/types.js";
import {
  discoverFiles,
  perFileTablePath,
  resolveOutputDir,
  statInput,
} from "../storage/discover.js";
import { readTable } from "../storage/readers.js";
import { writeCsv, writeXlsx } from "../storage/writers.js";
import { buildPerFileTable, summarize } from "../summary/summarize.js";
import { PER_FILE_COLUMNS, type NamedTable } from "../summary/types.js";
import { tablePatternFor, type PipelineConfig } from "../utils/config.js";
import { errorMessage } from "../utils/errors.js";
import { log } from "../utils/logger.js";

const runLog = log.child({ component: "pipeline" });

/** Extract, summarize and write the per-file table for one XML file. */
export async function processXmlFile(
  file: string,
  outDir: string | undefined,
  suffix: string
): Promise<FileOutcome> {
  const name = path.basename(file);
  const extracted = await readTrackFile(file);
  if (!extracted.ok) {
    runLog.warn({ file: name, reason: extracted.reason }, "XML parse failed");
    return {
      status: "skipped",
      file,
      reason: "parse-error",
      detail: extracted.reason,
    };
  }

  const failed = failedTracks(extracted.tracks);
  const records = trackRecords(extracted.tracks);
  const summary = summarize(records);
  if (summary === null) {
    runLog.warn({ file: name, failedTracks: failed }, "no usable tracks");
    return {
      status: "skipped",
      file,
      reason: "no-tracks",
      detail:
        failed > 0 ? `all ${failed} tracks failed to parse` : "no Track elements",
    };
  }

  const output = perFileTablePath(file, outDir, suffix);
  try {
    await writeCsv(output, PER_FILE_COLUMNS, buildPerFileTable(records, summary));
  } catch (err) {
    runLog.error({ file: name, output, err: errorMessage(err) }, "write failed");
    return {
      status: "skipped",
      file,
      reason: "write-error",
      detail: errorMessage(err),
    };
  }

  runLog.info({ file: name, output, tracks: records.length }, "saved");
  return { status: "processed", file, output, summary, failedTracks: failed };
}

export async function runExtraction(
  config: PipelineConfig
): Promise<ExtractionReport> {
  const started = Date.now();
  const outDir = resolveOutputDir(config.output);
  const files = await discoverFiles(
    config.input,
    config.pattern,
    config.recursive
  );
  if (outDir !== undefined) await fs.promises.mkdir(outDir, { recursive: true });
  if (files.length === 0) {
    runLog.info(
      { input: config.input, pattern: config.pattern, recursive: config.recursive },
      "no XML files found"
    );
  } else {
    runLog.info({ count: files.length }, "processing XML files");
  }

  const outcomes: FileOutcome[] = [];
  for (const [i, file] of files.entries()) {
    runLog.debug({ file, n: i + 1, of: files.length }, "next file");
    outcomes.push(await processXmlFile(file, outDir, config.suffix));
  }

  const processed = outcomes.filter((o) => o.status === "processed").length;
  const finished = Date.now();
  runLog.info(
    { processed, skipped: outcomes.length - processed },
    "extraction finished"
  );

  return {
    kind: "extraction",
    input: config.input,
    outputDir: outDir,
    files: outcomes,
    processed,
    skipped: outcomes.length - processed,
    failedTracks: outcomes.reduce(
      (n, o) => n + (o.status === "processed" ? o.failedTracks : 0),
      0
    ),
    startedAt: new Date(started).toISOString(),
    finishedAt: new Date(finished).toISOString(),
    durationMs: finished - started,
  };
}

async function defaultOutputDir(input: string, output?: string) {
  const stat = await statInput(input);
  const dir = resolveOutputDir(output);
  if (dir !== undefined) return dir;
  return stat.isDirectory() ? input : path.dirname(input);
}

export async function runAggregation(
  config: PipelineConfig
): Promise<AggregationReport> {
  const started = Date.now();
  const pattern = tablePatternFor(config);
  const outDir = await defaultOutputDir(config.input, config.output);
  const csvPath = path.join(outDir, config.consolidatedName);
  const xlsxPath = path.join(outDir, config.xlsxName);
  const inputs = await discoverFiles(
    config.input,
    pattern,
    config.recursive,
    [csvPath, xlsxPath]
  );

  const tables: NamedTable[] = [];
  const outcomes: TableOutcome[] = [];
  const suffixes = [config.suffix, ...KNOWN_TABLE_SUFFIXES];
  for (const file of inputs) {
    const loaded = await readTable(file);
    if (!loaded.ok) {
      runLog.warn({ file: loaded.source, reason: loaded.reason }, "read failed");
      outcomes.push({ status: "failed", file, detail: loaded.reason });
      continue;
    }
    tables.push(loaded.table);
    outcomes.push({
      status: "loaded",
      file,
      filename: filenameFor(loaded.table.name, suffixes),
    });
  }

  const consolidated = aggregate(tables, config.columns, suffixes);

  let output: string | null = null;
  let xlsx: string | null = null;
  if (consolidated.rows.length === 0) {
    runLog.info({ input: config.input, pattern }, "no summary tables collected");
  } else {
    output = await writeCsv(csvPath, consolidated.columns, consolidated.rows);
    runLog.info({ output, rows: consolidated.rows.length }, "consolidated CSV saved");
    if (config.xlsx) {
      xlsx = await writeXlsx(xlsxPath, consolidated.columns, consolidated.rows);
      runLog.info({ output: xlsx }, "consolidated XLSX saved");
    }
  }

  const finished = Date.now();
  return {
    kind: "aggregation",
    input: config.input,
    columns: consolidated.columns,
    tables: outcomes,
    processed: consolidated.rows.length,
    skipped: outcomes.length - tables.length,
    output,
    xlsx,
    startedAt: new Date(started).toISOString(),
    finishedAt: new Date(finished).toISOString(),
    durationMs: finished - started,
  };
}

/**
 * Extraction followed by aggregation over the folder the per-file tables were
 * written to.
 */
export async function runBatch(config: PipelineConfig): Promise<BatchReport> {
  const extraction = await runExtraction(config);
  const tablesDir =
    extraction.outputDir ?? (await defaultOutputDir(config.input));
  const aggregation = await runAggregation({
    ...config,
    input: tablesDir,
    output: tablesDir,
  });
  return { kind: "batch", extraction, aggregation };
}
