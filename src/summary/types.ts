export interface TrackRecord {
  readonly track_id: number;
  readonly n_spots: number;
  readonly n_merges: number;
  readonly has_merging: boolean;
  readonly mean_speed: number;
  readonly max_speed: number;
}

export interface FileSummary {
  readonly total_tracks: number;
  readonly total_merges: number;
  readonly avg_speed_all: number;
  readonly avg_speed_merging: number;
  readonly avg_speed_nonmerge: number;
}

export const TRACK_COLUMNS = [
  "track_id",
  "n_spots",
  "n_merges",
  "has_merging",
  "mean_speed",
  "max_speed",
] as const satisfies readonly (keyof TrackRecord)[];

export const SUMMARY_COLUMNS = [
  "total_tracks",
  "total_merges",
  "avg_speed_all",
  "avg_speed_merging",
  "avg_speed_nonmerge",
] as const satisfies readonly (keyof FileSummary)[];

export const PER_FILE_COLUMNS = [...TRACK_COLUMNS, ...SUMMARY_COLUMNS] as const;

export type CellValue = number | string | boolean | null;
export type TableRow = Record<string, CellValue>;

/** A table with its source name, as loaded from disk or built in memory. */
export interface NamedTable {
  name: string;
  columns: string[];
  rows: TableRow[];
}

export type PerFileRow = TrackRecord & FileSummary;

export type TrackOutcome =
  | { ok: true; record: TrackRecord }
  | { ok: false; index: number; trackId?: string; reason: string };
