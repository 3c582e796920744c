import type { FileSummary, PerFileRow, TrackRecord } from "./types.js";

/** Mean ignoring NaN; 0 when nothing is left, for every caller. */
export function meanOrZero(values: readonly number[]): number {
  let sum = 0;
  let count = 0;
  for (const v of values) {
    if (Number.isNaN(v)) continue;
    sum += v;
    count++;
  }
  return count === 0 ? 0 : sum / count;
}

/**
 * Five file-level statistics over every track of one file, or `null` when the
 * file has no tracks (the caller treats that file as skipped).
 */
export function summarize(records: readonly TrackRecord[]): FileSummary | null {
  if (records.length === 0) return null;

  const merging: number[] = [];
  const nonMerging: number[] = [];
  let totalMerges = 0;
  for (const r of records) {
    totalMerges += r.n_merges;
    (r.has_merging ? merging : nonMerging).push(r.mean_speed);
  }

  return Object.freeze({
    total_tracks: records.length,
    total_merges: totalMerges,
    avg_speed_all: meanOrZero(records.map((r) => r.mean_speed)),
    avg_speed_merging: meanOrZero(merging),
    avg_speed_nonmerge: meanOrZero(nonMerging),
  });
}

// Track records and the summary live apart; the broadcast only happens here,
// for output.
export function buildPerFileTable(
  records: readonly TrackRecord[],
  summary: FileSummary
): PerFileRow[] {
  return records.map((r) => ({ ...r, ...summary }));
}
