import type { FileSummary } from "../summary/types.js";

export type SkipReason = "parse-error" | "no-tracks" | "write-error";

export type FileOutcome =
  | {
      status: "processed";
      file: string;
      output: string;
      summary: FileSummary;
      failedTracks: number;
    }
  | { status: "skipped"; file: string; reason: SkipReason; detail: string };

export interface ExtractionReport {
  kind: "extraction";
  input: string;
  outputDir?: string;
  files: FileOutcome[];
  processed: number;
  skipped: number;
  failedTracks: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export type TableOutcome =
  | { status: "loaded"; file: string; filename: string }
  | { status: "failed"; file: string; detail: string };

export interface AggregationReport {
  kind: "aggregation";
  input: string;
  columns: string[];
  tables: TableOutcome[];
  processed: number;
  skipped: number;
  output: string | null;
  xlsx: string | null;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface BatchReport {
  kind: "batch";
  extraction: ExtractionReport;
  aggregation: AggregationReport;
}

export type RunReport = ExtractionReport | AggregationReport | BatchReport;
