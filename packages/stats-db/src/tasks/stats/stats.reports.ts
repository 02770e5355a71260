import { StatsStore } from "../../store";
import { SourceFilter } from "../../types";

const SOURCE_DESCRIPTIONS: Record<SourceFilter, string> = {
  github: "GitHub releases (tracked period)",
  crates: "crates.io (last year)",
  all: "All sources",
};

/** Formats a number with thousands separators. */
export function formatNumber(n: number): string {
  return n.toLocaleString("en-US");
}

function weekLine(week: string, downloads: string): string {
  return `${week.padEnd(12)} ${downloads.padStart(15)}`;
}

export async function weeklyReport(
  store: Pick<StatsStore, "getWeeklyTotals">,
  limit: number,
  filter: SourceFilter
): Promise<string> {
  const rows = await store.getWeeklyTotals(filter, limit);

  const lines = ["", weekLine("Week", "Downloads"), "=".repeat(30)];
  for (const row of rows) {
    lines.push(weekLine(row.weekStart, formatNumber(row.downloads)));
  }
  return lines.join("\n");
}

export async function totalReport(
  store: Pick<StatsStore, "getTotalDownloads">,
  filter: SourceFilter
): Promise<string> {
  const total = await store.getTotalDownloads(filter);

  return [
    "",
    "Total downloads",
    `  Source: ${SOURCE_DESCRIPTIONS[filter]}`,
    `  Total:  ${formatNumber(total)}`,
  ].join("\n");
}

export async function latestReport(
  store: Pick<
    StatsStore,
    "getLatestCratesWeek" | "getLatestGithubCumulative" | "getWeeklyCoverage"
  >
): Promise<string> {
  const cratesWeek = await store.getLatestCratesWeek();
  const github = await store.getLatestGithubCumulative();
  const coverage = await store.getWeeklyCoverage();

  if (!cratesWeek && !github && !coverage) {
    return "\nNo weekly statistics available yet.";
  }

  const lines = ["", "Latest statistics", ""];

  if (cratesWeek) {
    lines.push(`Latest week: ${cratesWeek.weekStart}`);
    lines.push(`  crates.io: ${formatNumber(cratesWeek.downloads)}`);
  }

  if (github) {
    if (!cratesWeek) lines.push(`Latest snapshot: ${github.date}`);
    lines.push(`  GitHub (cumulative): ${formatNumber(github.downloads)}`);
  }

  if (coverage) {
    lines.push("");
    lines.push(`Data coverage: ${coverage.firstWeek} to ${coverage.lastWeek}`);
  }

  return lines.join("\n");
}
