import { CratesDailyTotal, WeeklyStat } from "../types";
import { weekBucket } from "./week";

const SOURCE_TABLE = "crates_downloads";

/**
 * Sums daily crates.io downloads into Monday-Sunday buckets per crate.
 *
 * Rows are already per-day deltas, so this is a plain sum and the input
 * order does not matter. Any malformed date aborts the whole computation.
 */
export function aggregateCratesWeekly(rows: CratesDailyTotal[]): WeeklyStat[] {
  const weekly = new Map<string, WeeklyStat>();

  for (const row of rows) {
    const weekStart = weekBucket(row.date, SOURCE_TABLE);
    const key = `${weekStart}\u0000${row.crateName}`;

    const existing = weekly.get(key);
    if (existing) {
      existing.downloads += row.downloads;
    } else {
      weekly.set(key, {
        weekStart,
        source: "crates",
        identifier: row.crateName,
        downloads: row.downloads,
      });
    }
  }

  return sortWeeklyStats(Array.from(weekly.values()));
}

export function sortWeeklyStats(stats: WeeklyStat[]): WeeklyStat[] {
  return stats.sort(
    (a, b) =>
      a.weekStart.localeCompare(b.weekStart) ||
      a.source.localeCompare(b.source) ||
      a.identifier.localeCompare(b.identifier)
  );
}
