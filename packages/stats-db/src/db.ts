import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { Database } from "@download-stats/client";
import { drizzle, BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

export type DbConnection = BetterSQLite3Database<typeof schema>;

const SCHEMA_PATH = fileURLToPath(new URL("../sql/schema.sql", import.meta.url));

/**
 * Opens (or creates) the statistics database and makes sure every table
 * exists.
 */
export function initDb(path: string): Database {
  const database = new Database(path);

  try {
    database.exec(readFileSync(SCHEMA_PATH, "utf8"));
  } catch (error) {
    database.close();
    throw new Error("failed to initialize database schema", { cause: error });
  }

  return database;
}

export function createDrizzle(database: Database): DbConnection {
  return drizzle(database.getDB(), { schema });
}
