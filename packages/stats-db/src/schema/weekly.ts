import { sqliteTable, text, integer, primaryKey } from "drizzle-orm/sqlite-core";

export const weeklyStats = sqliteTable(
  "weekly_stats",
  {
    weekStart: text("week_start").notNull(),
    source: text("source", { enum: ["github", "crates"] }).notNull(),
    identifier: text("identifier").notNull(),
    downloads: integer("downloads").notNull(),
  },
  (table) => {
    return {
      pk: primaryKey({
        columns: [table.weekStart, table.source, table.identifier],
      }),
    };
  }
);
