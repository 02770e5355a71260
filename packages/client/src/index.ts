import BetterSqlite3 from "better-sqlite3";
import env from "./env";

type SqliteTransactionCallback<T> = (connection: BetterSqlite3.Database) => T;

export interface DatabaseOptions {
  /** Open an existing database file without creating it. */
  fileMustExist?: boolean;
}

// Persistent pragmas (journal_mode, synchronous) are stored in the database
// file; the rest are per connection and must be set on every open.
const CONNECTION_PRAGMAS = [
  "journal_mode = WAL",
  "synchronous = NORMAL",
  "foreign_keys = ON",
  "cache_size = -64000",
  "temp_store = MEMORY",
];

export class Database {
  readonly path: string;
  private db: BetterSqlite3.Database;

  constructor(path: string = env.STATS_DB_PATH, options: DatabaseOptions = {}) {
    this.path = path;

    try {
      this.db = new BetterSqlite3(path, {
        fileMustExist: options.fileMustExist ?? false,
      });
    } catch (error) {
      throw new Error(`failed to open database at ${path}`, { cause: error });
    }

    for (const pragma of CONNECTION_PRAGMAS) {
      this.db.pragma(pragma);
    }
  }

  /**
   * Provides direct access to the better-sqlite3 connection for queries.
   */
  getDB(): BetterSqlite3.Database {
    return this.db;
  }

  /**
   * Runs a batch of SQL statements, e.g. schema DDL.
   */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Executes a callback inside a database transaction. The transaction is
   * committed when the callback returns and rolled back if it throws.
   * better-sqlite3 transactions are synchronous, so the callback must not
   * return a promise.
   */
  withTransaction<T>(fn: SqliteTransactionCallback<T>): T {
    const run = this.db.transaction(() => fn(this.db));
    return run();
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Closes the connection. Safe to call more than once.
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  async shutdown(): Promise<void> {
    this.close();
  }
}

export { env };
