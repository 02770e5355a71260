import { sqliteTable, text, integer, primaryKey } from "drizzle-orm/sqlite-core";

/**
 * Cumulative download counter per release asset, one row per collection day.
 */
export const githubSnapshots = sqliteTable(
  "github_snapshots",
  {
    date: text("date").notNull(),
    releaseTag: text("release_tag").notNull(),
    assetName: text("asset_name").notNull(),
    downloadCount: integer("download_count").notNull(),
  },
  (table) => {
    return {
      pk: primaryKey({
        columns: [table.date, table.releaseTag, table.assetName],
      }),
    };
  }
);
