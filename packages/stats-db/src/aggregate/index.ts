import { AggregationError, AggregationStage } from "../errors";
import { RawStatsSource, WeeklyStatsSink } from "../store";
import { WeeklyStat } from "../types";
import { aggregateCratesWeekly } from "./crates";
import { aggregateGithubWeekly, ClampedDelta } from "./github";

export { aggregateCratesWeekly } from "./crates";
export { aggregateGithubWeekly } from "./github";
export type { ClampedDelta, GithubAggregationOptions } from "./github";
export { formatDay, getWeekStart, parseDay, todayUtc, weekBucket } from "./week";

export type AggregationStore = RawStatsSource & WeeklyStatsSink;

export interface AggregationOptions {
  onClamp?: (event: ClampedDelta) => void;
}

export interface AggregationSummary {
  crates: number;
  github: number;
}

function logClamp(event: ClampedDelta): void {
  console.warn(
    `  ⚠️  ${event.releaseTag}/${event.assetName}: download count went from ${event.previousCount} (${event.previousDate}) to ${event.count} (${event.date}), counting 0`
  );
}

async function runStage(
  stage: AggregationStage,
  compute: () => Promise<WeeklyStat[]>,
  sink: WeeklyStatsSink
): Promise<number> {
  try {
    // Every row is computed in memory before anything is written.
    const stats = await compute();
    await sink.putWeeklyStats(stats);
    return stats.length;
  } catch (error) {
    throw new AggregationError(stage, error);
  }
}

/**
 * Computes weekly crates.io totals from the daily download table.
 */
export async function computeCratesWeekly(store: AggregationStore): Promise<number> {
  return runStage(
    "crates",
    async () => aggregateCratesWeekly(await store.listCratesDailyTotals()),
    store
  );
}

/**
 * Computes weekly GitHub totals from cumulative snapshots. Deltas between
 * snapshots are attributed to the week of the later snapshot.
 */
export async function computeGithubWeekly(
  store: AggregationStore,
  options: AggregationOptions = {}
): Promise<number> {
  return runStage(
    "github",
    async () =>
      aggregateGithubWeekly(await store.listGithubSnapshots(), {
        onClamp: options.onClamp ?? logClamp,
      }),
    store
  );
}

/**
 * Recomputes every weekly aggregate from the raw tables. Stops at the first
 * failing stage.
 */
export async function computeAllWeekly(
  store: AggregationStore,
  options: AggregationOptions = {}
): Promise<AggregationSummary> {
  const crates = await computeCratesWeekly(store);
  const github = await computeGithubWeekly(store, options);
  return { crates, github };
}
