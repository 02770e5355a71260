export const STATS_SOURCES = ["github", "crates"] as const;

export type StatsSource = (typeof STATS_SOURCES)[number];

/** Source filter accepted by the query commands. */
export type SourceFilter = StatsSource | "all";

/** Identifier under which all GitHub release downloads are reported. */
export const GITHUB_RELEASES_IDENTIFIER = "releases";

export interface WeeklyStat {
  /** Monday of the week, YYYY-MM-DD */
  weekStart: string;
  source: StatsSource;
  identifier: string;
  downloads: number;
}

/** Daily crates.io downloads for one crate, summed over all versions. */
export interface CratesDailyTotal {
  date: string;
  crateName: string;
  downloads: number;
}

export interface GithubSnapshotRecord {
  date: string;
  releaseTag: string;
  assetName: string;
  downloadCount: number;
}

export interface CratesDownloadRecord {
  date: string;
  crateName: string;
  /** null for the registry-wide bucket */
  version: string | null;
  downloads: number;
}

export interface CratesMetadataRecord {
  date: string;
  crateName: string;
  totalDownloads: number;
  recentDownloads: number;
}

export function parseSourceFilter(value: string): SourceFilter {
  return value === "github" || value === "crates" ? value : "all";
}
