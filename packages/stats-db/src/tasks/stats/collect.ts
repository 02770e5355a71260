import { AggregationSummary, computeAllWeekly } from "../../aggregate";
import { todayUtc } from "../../aggregate/week";
import { StatsConfig } from "../../config";
import { CratesRegistry } from "../../crates-client";
import { ReleaseSource } from "../../github-client";
import { StatsStore } from "../../store";
import { collectCratesStats } from "../crates/fetch-downloads";
import { collectGithubStats } from "../github/fetch-releases";

export interface CollectOptions {
  skipGithub?: boolean;
  skipCrates?: boolean;
  skipAggregation?: boolean;
  /** Collection date, YYYY-MM-DD. Defaults to today in UTC. */
  today?: string;
}

export interface CollectClients {
  github: ReleaseSource;
  crates: CratesRegistry;
}

/**
 * Recomputes the weekly table from everything in the raw tables.
 */
export async function runAggregate(store: StatsStore): Promise<AggregationSummary> {
  console.log("\nComputing weekly aggregates...");
  const summary = await computeAllWeekly(store);
  console.log(`  ✅ ${summary.crates} crates.io and ${summary.github} GitHub weekly rows`);
  return summary;
}

/**
 * Collects every configured source and refreshes the weekly aggregates.
 * The first failure aborts the run.
 */
export async function runCollect(
  store: StatsStore,
  config: StatsConfig,
  clients: CollectClients,
  options: CollectOptions = {}
): Promise<void> {
  const today = options.today ?? todayUtc();

  if (!options.skipGithub) {
    console.log("\nCollecting GitHub release statistics...");
    for (const source of config.githubSources) {
      console.log(`  ${source.owner}/${source.repo}`);
      await collectGithubStats(store, clients.github, today, source);
    }
  }

  if (!options.skipCrates) {
    console.log("\nCollecting crates.io statistics...");
    for (const crateName of config.cratesSources) {
      console.log(`  ${crateName}`);
      await collectCratesStats(store, clients.crates, today, crateName);
    }
  }

  if (!options.skipAggregation) {
    await runAggregate(store);
  }

  console.log("\n✓ Collection complete!");
}
