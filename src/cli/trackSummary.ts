#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { runAggregation, runBatch, runExtraction } from "../app/pipeline.js";
import { writeJsonReport } from "../report/json.js";
import { printRun } from "../report/printer.js";
import type { RunReport } from "../report/types.js";
import { SUMMARY_COLUMNS } from "../summary/types.js";
import {
  loadConfig,
  type ConfigOverrides,
  type PipelineConfig,
} from "../utils/config.js";
import { FatalError, errorMessage } from "../utils/errors.js";
import { log } from "../utils/logger.js";

interface CommonFlags {
  input?: string;
  output?: string;
  pattern?: string;
  recursive?: boolean;
  suffix?: string;
  report?: string;
}

interface AggregateFlags extends CommonFlags {
  tablePattern?: string;
  columns?: string;
  xlsx?: boolean;
  name?: string;
  xlsxName?: string;
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("-i, --input <path>", "XML file or folder (TRACKSUM_INPUT)")
    .option("-o, --output <dir>", "output folder (TRACKSUM_OUTPUT)")
    .option("--pattern <glob>", "XML file pattern (default *.xml)")
    .option("--recursive", "search sub-folders too")
    .option("--suffix <suffix>", "per-file table name suffix (default _analysis)")
    .option("--report <file>", "also write the run report as JSON");
}

function withAggregateOptions(cmd: Command): Command {
  return cmd
    .option("--table-pattern <glob>", "per-file table pattern (default *<suffix>.csv)")
    .option(
      "--columns <list>",
      `comma-separated summary columns (default ${SUMMARY_COLUMNS.join(",")})`
    )
    .option("--xlsx", "also write the consolidated table as XLSX")
    .option("--name <file>", "consolidated CSV name (default tracking_summary.csv)")
    .option("--xlsx-name <file>", "XLSX name (default tracking_summary.xlsx)");
}

function overrides(flags: AggregateFlags): ConfigOverrides {
  return {
    input: flags.input,
    output: flags.output,
    pattern: flags.pattern,
    tablePattern: flags.tablePattern,
    recursive: flags.recursive,
    suffix: flags.suffix,
    columns: flags.columns,
    xlsx: flags.xlsx,
    consolidatedName: flags.name,
    xlsxName: flags.xlsxName,
    report: flags.report,
  };
}

async function execute(
  flags: AggregateFlags,
  run: (config: PipelineConfig) => Promise<RunReport>
) {
  try {
    const config = loadConfig(process.env, overrides(flags));
    const report = await run(config);
    printRun(report);
    if (config.report) {
      await writeJsonReport(config.report, report);
      console.log(`Report written: ${config.report}`);
    }
    process.exit(0);
  } catch (err) {
    if (err instanceof FatalError) {
      log.error({ code: err.code }, err.message);
    } else {
      log.error({ err }, "unexpected failure");
    }
    console.error("Error:", errorMessage(err));
    process.exit(1);
  }
}

const program = new Command();

program
  .name("track-summary")
  .description(
    "Per-track tables and per-sample summaries from TrackMate simple XML exports"
  );

withCommonOptions(
  program
    .command("extract")
    .description("write <name><suffix>.csv for every XML file")
).action((flags: CommonFlags) => execute(flags, runExtraction));

withAggregateOptions(
  withCommonOptions(
    program
      .command("aggregate")
      .description("consolidate per-file tables into one summary table")
  )
).action((flags: AggregateFlags) => execute(flags, runAggregation));

withAggregateOptions(
  withCommonOptions(
    program
      .command("run")
      .description("extract every XML file, then consolidate the results")
  )
).action((flags: AggregateFlags) => execute(flags, runBatch));

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
