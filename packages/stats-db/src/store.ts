import { Database } from "@download-stats/client";
import { asc, desc, eq, sql } from "drizzle-orm";
import { createDrizzle, DbConnection, initDb } from "./db";
import { StoreError } from "./errors";
import { cratesDownloads, cratesMetadata, githubSnapshots, weeklyStats } from "./schema";
import {
  CratesDailyTotal,
  CratesDownloadRecord,
  CratesMetadataRecord,
  GithubSnapshotRecord,
  SourceFilter,
  StatsSource,
  WeeklyStat,
} from "./types";

/**
 * Read side of the raw observation tables, as consumed by aggregation.
 */
export interface RawStatsSource {
  /** Daily crates.io downloads summed per (date, crate), ordered by date. */
  listCratesDailyTotals(): Promise<CratesDailyTotal[]>;
  /** All GitHub snapshots ordered by (releaseTag, assetName, date). */
  listGithubSnapshots(): Promise<GithubSnapshotRecord[]>;
}

export interface WeeklyStatsSink {
  /** Inserts or overwrites weekly rows by (weekStart, source, identifier). */
  putWeeklyStats(stats: WeeklyStat[]): Promise<void>;
}

export type ExportTable = "weekly" | "daily" | "github";

const EXPORT_QUERIES: Record<ExportTable, string> = {
  weekly: "SELECT * FROM weekly_stats ORDER BY week_start, source, identifier",
  daily: "SELECT * FROM crates_downloads ORDER BY date, crate_name, version",
  github: "SELECT * FROM github_snapshots ORDER BY date, release_tag, asset_name",
};

export type ExportValue = string | number | null;

export interface TableDump {
  columns: string[];
  rows: Record<string, ExportValue>[];
}

export interface WeekTotal {
  weekStart: string;
  downloads: number;
}

export interface DayTotal {
  date: string;
  downloads: number;
}

export interface SourceWeekTotal extends WeekTotal {
  source: StatsSource;
}

export interface TagDayTotal extends DayTotal {
  releaseTag: string;
}

export class StatsStore implements RawStatsSource, WeeklyStatsSink {
  readonly database: Database;
  private db: DbConnection;

  constructor(database: Database) {
    this.database = database;
    this.db = createDrizzle(database);
  }

  static open(path: string): StatsStore {
    return new StatsStore(initDb(path));
  }

  async close(): Promise<void> {
    await this.database.shutdown();
  }

  private async run<T>(operation: string, fn: () => Promise<T> | T): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StoreError(operation, error);
    }
  }

  // Collector writes

  async putGithubSnapshots(records: GithubSnapshotRecord[]): Promise<void> {
    await this.run("insert GitHub snapshot", () =>
      this.database.withTransaction(() => {
        for (const record of records) {
          this.db
            .insert(githubSnapshots)
            .values(record)
            .onConflictDoUpdate({
              target: [
                githubSnapshots.date,
                githubSnapshots.releaseTag,
                githubSnapshots.assetName,
              ],
              set: { downloadCount: sql`excluded.download_count` },
            })
            .run();
        }
      })
    );
  }

  async putCratesDownloads(records: CratesDownloadRecord[]): Promise<void> {
    await this.run("insert crates.io download", () =>
      this.database.withTransaction(() => {
        for (const record of records) {
          this.db
            .insert(cratesDownloads)
            .values({ ...record, version: record.version ?? "" })
            .onConflictDoUpdate({
              target: [
                cratesDownloads.date,
                cratesDownloads.crateName,
                cratesDownloads.version,
              ],
              set: { downloads: sql`excluded.downloads` },
            })
            .run();
        }
      })
    );
  }

  async putCratesMetadata(record: CratesMetadataRecord): Promise<void> {
    await this.run("insert crates.io metadata", () =>
      this.db
        .insert(cratesMetadata)
        .values(record)
        .onConflictDoUpdate({
          target: [cratesMetadata.date, cratesMetadata.crateName],
          set: {
            totalDownloads: sql`excluded.total_downloads`,
            recentDownloads: sql`excluded.recent_downloads`,
          },
        })
        .run()
    );
  }

  // Aggregation input and output

  async listCratesDailyTotals(): Promise<CratesDailyTotal[]> {
    return this.run("read crates_downloads", () =>
      this.db
        .select({
          date: cratesDownloads.date,
          crateName: cratesDownloads.crateName,
          downloads: sql<number>`sum(${cratesDownloads.downloads})`.mapWith(Number),
        })
        .from(cratesDownloads)
        .groupBy(cratesDownloads.date, cratesDownloads.crateName)
        .orderBy(cratesDownloads.date, cratesDownloads.crateName)
        .all()
    );
  }

  async listGithubSnapshots(): Promise<GithubSnapshotRecord[]> {
    return this.run("read github_snapshots", () =>
      this.db
        .select()
        .from(githubSnapshots)
        .orderBy(
          githubSnapshots.releaseTag,
          githubSnapshots.assetName,
          githubSnapshots.date
        )
        .all()
    );
  }

  async putWeeklyStats(stats: WeeklyStat[]): Promise<void> {
    await this.run("insert weekly stat", () =>
      this.database.withTransaction(() => {
        for (const stat of stats) {
          this.db
            .insert(weeklyStats)
            .values(stat)
            .onConflictDoUpdate({
              target: [weeklyStats.weekStart, weeklyStats.source, weeklyStats.identifier],
              set: { downloads: sql`excluded.downloads` },
            })
            .run();
        }
      })
    );
  }

  async listWeeklyStats(): Promise<WeeklyStat[]> {
    return this.run("read weekly_stats", () =>
      this.db
        .select()
        .from(weeklyStats)
        .orderBy(weeklyStats.weekStart, weeklyStats.source, weeklyStats.identifier)
        .all()
    );
  }

  // Reporting reads

  /** Weekly totals for a source, newest first. */
  async getWeeklyTotals(filter: SourceFilter, limit: number): Promise<WeekTotal[]> {
    return this.run("query weekly totals", () =>
      this.db
        .select({
          weekStart: weeklyStats.weekStart,
          downloads: sql<number>`sum(${weeklyStats.downloads})`.mapWith(Number),
        })
        .from(weeklyStats)
        .where(filter === "all" ? undefined : eq(weeklyStats.source, filter))
        .groupBy(weeklyStats.weekStart)
        .orderBy(desc(weeklyStats.weekStart))
        .limit(limit)
        .all()
    );
  }

  async getTotalDownloads(filter: SourceFilter): Promise<number> {
    const result = await this.run("query total downloads", () =>
      this.db
        .select({
          total: sql<number>`coalesce(sum(${weeklyStats.downloads}), 0)`.mapWith(Number),
        })
        .from(weeklyStats)
        .where(filter === "all" ? undefined : eq(weeklyStats.source, filter))
        .all()
    );
    return result[0]?.total ?? 0;
  }

  async getLatestCratesWeek(): Promise<WeekTotal | null> {
    const result = await this.getWeeklyTotals("crates", 1);
    return result[0] ?? null;
  }

  /** Sum of all cumulative counters on the most recent snapshot date. */
  async getLatestGithubCumulative(): Promise<DayTotal | null> {
    const result = await this.run("query latest GitHub snapshot", () =>
      this.db
        .select({
          date: githubSnapshots.date,
          downloads: sql<number>`sum(${githubSnapshots.downloadCount})`.mapWith(Number),
        })
        .from(githubSnapshots)
        .where(
          sql`${githubSnapshots.date} = (select max(${githubSnapshots.date}) from ${githubSnapshots})`
        )
        .groupBy(githubSnapshots.date)
        .all()
    );
    return result[0] ?? null;
  }

  async getWeeklyCoverage(): Promise<{ firstWeek: string; lastWeek: string } | null> {
    const result = await this.run("query weekly coverage", () =>
      this.db
        .select({
          firstWeek: sql<string | null>`min(${weeklyStats.weekStart})`,
          lastWeek: sql<string | null>`max(${weeklyStats.weekStart})`,
        })
        .from(weeklyStats)
        .all()
    );
    const row = result[0];
    if (!row?.firstWeek || !row.lastWeek) {
      return null;
    }
    return { firstWeek: row.firstWeek, lastWeek: row.lastWeek };
  }

  // Chart reads

  async getCratesWeeklyTotals(): Promise<WeekTotal[]> {
    return this.run("query crates.io weekly totals", () =>
      this.db
        .select({
          weekStart: weeklyStats.weekStart,
          downloads: sql<number>`sum(${weeklyStats.downloads})`.mapWith(Number),
        })
        .from(weeklyStats)
        .where(eq(weeklyStats.source, "crates"))
        .groupBy(weeklyStats.weekStart)
        .orderBy(asc(weeklyStats.weekStart))
        .all()
    );
  }

  async getWeeklyTotalsBySource(): Promise<SourceWeekTotal[]> {
    return this.run("query weekly totals by source", () =>
      this.db
        .select({
          weekStart: weeklyStats.weekStart,
          source: weeklyStats.source,
          downloads: sql<number>`sum(${weeklyStats.downloads})`.mapWith(Number),
        })
        .from(weeklyStats)
        .groupBy(weeklyStats.weekStart, weeklyStats.source)
        .orderBy(asc(weeklyStats.weekStart), asc(weeklyStats.source))
        .all()
    );
  }

  async getGithubCumulativeByDate(): Promise<DayTotal[]> {
    return this.run("query GitHub cumulative totals", () =>
      this.db
        .select({
          date: githubSnapshots.date,
          downloads: sql<number>`sum(${githubSnapshots.downloadCount})`.mapWith(Number),
        })
        .from(githubSnapshots)
        .groupBy(githubSnapshots.date)
        .orderBy(asc(githubSnapshots.date))
        .all()
    );
  }

  async getGithubCumulativeByDateAndTag(): Promise<TagDayTotal[]> {
    return this.run("query GitHub cumulative totals by release", () =>
      this.db
        .select({
          date: githubSnapshots.date,
          releaseTag: githubSnapshots.releaseTag,
          downloads: sql<number>`sum(${githubSnapshots.downloadCount})`.mapWith(Number),
        })
        .from(githubSnapshots)
        .groupBy(githubSnapshots.date, githubSnapshots.releaseTag)
        .orderBy(asc(githubSnapshots.date), asc(githubSnapshots.releaseTag))
        .all()
    );
  }

  // Export

  async dumpTable(table: ExportTable): Promise<TableDump> {
    return this.run(`read ${table} export`, () => {
      const statement = this.database
        .getDB()
        .prepare<[], Record<string, ExportValue>>(EXPORT_QUERIES[table]);
      return {
        columns: statement.columns().map((column) => column.name),
        rows: statement.all(),
      };
    });
  }
}
