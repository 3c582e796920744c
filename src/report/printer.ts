import type {
  AggregationReport,
  ExtractionReport,
  RunReport,
} from "./types.js";

type Print = (line: string) => void;

const pad = (s: string, n = 22) => (s + "...").padEnd(n, ".");

function printExtraction(report: ExtractionReport, print: Print) {
  print(`[EXTRACT] ${report.input}`);
  if (report.outputDir) print(`  ${pad("output dir")}${report.outputDir}`);
  print(`  ${pad("files")}${report.files.length}`);
  print(`  ${pad("processed")}${report.processed}`);
  print(`  ${pad("skipped")}${report.skipped}`);
  if (report.failedTracks > 0) {
    print(`  ${pad("tracks skipped")}${report.failedTracks}`);
  }
  for (const f of report.files) {
    if (f.status === "skipped") {
      print(`  skipped ${f.file}: ${f.reason} (${f.detail})`);
    }
  }
}

function printAggregation(report: AggregationReport, print: Print) {
  print(`[AGGREGATE] ${report.input}`);
  print(`  ${pad("columns")}${report.columns.join(", ")}`);
  print(`  ${pad("tables")}${report.tables.length}`);
  print(`  ${pad("rows written")}${report.processed}`);
  print(`  ${pad("skipped")}${report.skipped}`);
  for (const t of report.tables) {
    if (t.status === "failed") print(`  failed ${t.file}: ${t.detail}`);
  }
  print(`  ${pad("csv")}${report.output ?? "-"}`);
  if (report.xlsx) print(`  ${pad("xlsx")}${report.xlsx}`);
}

export function printRun(report: RunReport, print: Print = console.log) {
  switch (report.kind) {
    case "extraction":
      printExtraction(report, print);
      break;
    case "aggregation":
      printAggregation(report, print);
      break;
    case "batch":
      printExtraction(report.extraction, print);
      print("");
      printAggregation(report.aggregation, print);
      break;
  }
}
