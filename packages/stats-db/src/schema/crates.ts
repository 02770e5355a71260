import { sqliteTable, text, integer, primaryKey } from "drizzle-orm/sqlite-core";

export const cratesDownloads = sqliteTable(
  "crates_downloads",
  {
    date: text("date").notNull(),
    crateName: text("crate_name").notNull(),
    // Empty for the registry-wide bucket of versions without their own rows
    version: text("version").notNull().default(""),
    downloads: integer("downloads").notNull(),
  },
  (table) => {
    return {
      pk: primaryKey({
        columns: [table.date, table.crateName, table.version],
      }),
    };
  }
);

export const cratesMetadata = sqliteTable(
  "crates_metadata",
  {
    date: text("date").notNull(),
    crateName: text("crate_name").notNull(),
    totalDownloads: integer("total_downloads").notNull(),
    recentDownloads: integer("recent_downloads").notNull(),
  },
  (table) => {
    return {
      pk: primaryKey({ columns: [table.date, table.crateName] }),
    };
  }
);
