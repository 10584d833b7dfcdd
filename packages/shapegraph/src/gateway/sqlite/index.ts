/**
 * SQLite gateway entry point.
 *
 * @example Quick start with in-memory database
 * ```typescript
 * import { createLocalSqliteGateway } from "shapegraph/sqlite";
 *
 * const { gateway } = createLocalSqliteGateway();
 * const model = await DataModel.load(gateway, project);
 * ```
 *
 * @example File-based database for persistent local development
 * ```typescript
 * const { gateway, db } = createLocalSqliteGateway({ path: "./schema.db" });
 * ```
 */
import Database from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";

import { generateSqliteDDL } from "../drizzle/ddl";
import {
  type SqliteTables,
  tables as defaultTables,
} from "../drizzle/schema/sqlite";
import { createSqliteGateway } from "../drizzle/sqlite";
import { type StoreGateway } from "../types";

// ============================================================
// Types
// ============================================================

/**
 * Options for creating a local SQLite gateway.
 */
export type LocalSqliteGatewayOptions = Readonly<{
  /**
   * Path to the SQLite database file.
   * Defaults to ":memory:" for an in-memory database.
   */
  path?: string;

  /**
   * Custom table definitions.
   */
  tables?: SqliteTables;
}>;

export type LocalSqliteGatewayResult = Readonly<{
  gateway: StoreGateway;
  /** The underlying Drizzle database instance */
  db: BetterSQLite3Database;
}>;

// ============================================================
// Factory Function
// ============================================================

/**
 * Creates a SQLite gateway with its tables in place.
 *
 * For custom setups, call createSqliteGateway with your own Drizzle
 * database instance.
 */
export function createLocalSqliteGateway(
  options: LocalSqliteGatewayOptions = {},
): LocalSqliteGatewayResult {
  const path = options.path ?? ":memory:";
  const tables = options.tables ?? defaultTables;

  const sqlite = new Database(path);
  const db = drizzle(sqlite);

  for (const statement of generateSqliteDDL(tables)) {
    sqlite.exec(statement);
  }

  let isClosed = false;

  function close(): Promise<void> {
    if (isClosed) return Promise.resolve();
    isClosed = true;
    sqlite.close();
    return Promise.resolve();
  }

  const gateway: StoreGateway = {
    ...createSqliteGateway(db, { tables }),
    close,
  };

  return { gateway, db };
}

// ============================================================
// Re-exports
// ============================================================

export {
  createSqliteGateway,
  type SqliteGatewayOptions,
  type SyncSqliteDatabase,
} from "../drizzle/sqlite";

export {
  createSqliteTables,
  type SqliteTableNames,
  type SqliteTables,
  statements,
  tables,
} from "../drizzle/schema/sqlite";

export { generateSqliteDDL, getSqliteMigrationSQL } from "../drizzle/ddl";
