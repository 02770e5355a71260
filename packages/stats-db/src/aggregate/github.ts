import { GITHUB_RELEASES_IDENTIFIER, GithubSnapshotRecord, WeeklyStat } from "../types";
import { sortWeeklyStats } from "./crates";
import { parseDay, weekBucket } from "./week";

const SOURCE_TABLE = "github_snapshots";

export interface ClampedDelta {
  releaseTag: string;
  assetName: string;
  previousDate: string;
  previousCount: number;
  date: string;
  count: number;
}

export interface GithubAggregationOptions {
  /** Called whenever a cumulative counter went down between snapshots. */
  onClamp?: (event: ClampedDelta) => void;
}

interface PreviousSnapshot {
  date: string;
  count: number;
}

/**
 * Reconstructs weekly GitHub release downloads from cumulative snapshots.
 *
 * `snapshots` must be ordered by (releaseTag, assetName, date). Each
 * snapshot after the first for an asset contributes
 * `max(0, count - previousCount)` to the week of its own date; the first
 * snapshot only seeds the baseline. Deltas are summed across every asset
 * into a single "releases" total per week.
 */
export function aggregateGithubWeekly(
  snapshots: GithubSnapshotRecord[],
  options: GithubAggregationOptions = {}
): WeeklyStat[] {
  const previous = new Map<string, PreviousSnapshot>();
  const weekly = new Map<string, number>();

  for (const snapshot of snapshots) {
    // Validate every date, including ones that only seed a baseline.
    parseDay(snapshot.date, SOURCE_TABLE);

    const key = `${snapshot.releaseTag}\u0000${snapshot.assetName}`;
    const prev = previous.get(key);

    if (prev) {
      const diff = snapshot.downloadCount - prev.count;
      if (diff < 0) {
        options.onClamp?.({
          releaseTag: snapshot.releaseTag,
          assetName: snapshot.assetName,
          previousDate: prev.date,
          previousCount: prev.count,
          date: snapshot.date,
          count: snapshot.downloadCount,
        });
      }

      const weekStart = weekBucket(snapshot.date, SOURCE_TABLE);
      weekly.set(weekStart, (weekly.get(weekStart) ?? 0) + Math.max(0, diff));
    }

    previous.set(key, { date: snapshot.date, count: snapshot.downloadCount });
  }

  return sortWeeklyStats(
    Array.from(weekly, ([weekStart, downloads]) => ({
      weekStart,
      source: "github" as const,
      identifier: GITHUB_RELEASES_IDENTIFIER,
      downloads,
    }))
  );
}
