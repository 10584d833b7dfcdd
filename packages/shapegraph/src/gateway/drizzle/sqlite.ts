/**
 * SQLite gateway.
 *
 * Works with any synchronous Drizzle SQLite database instance
 * such as better-sqlite3.
 *
 * @example
 * ```typescript
 * import { drizzle } from "drizzle-orm/better-sqlite3";
 * import Database from "better-sqlite3";
 * import { createSqliteGateway, getSqliteMigrationSQL } from "shapegraph/sqlite";
 *
 * const sqlite = new Database("schema.db");
 * sqlite.exec(getSqliteMigrationSQL());
 * const gateway = createSqliteGateway(drizzle(sqlite));
 * ```
 */
import { and, eq } from "drizzle-orm";
import { type BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";

import { err, ok } from "../../utils/result";
import { failureReason, type StoreGateway } from "../types";
import { chunk, fromRow, type StatementRow, toRow } from "./rows";
import { type SqliteTables, tables as defaultTables } from "./schema/sqlite";

// ============================================================
// Types
// ============================================================

export type SyncSqliteDatabase = BaseSQLiteDatabase<"sync", unknown>;

/**
 * Options for creating a SQLite gateway.
 */
export type SqliteGatewayOptions = Readonly<{
  /**
   * Custom table definitions. Use createSqliteTables() to customize table names.
   */
  tables?: SqliteTables;
}>;

const SQLITE_MAX_BIND_PARAMETERS = 999;
const STATEMENT_PARAM_COUNT = 4;
const SQLITE_INSERT_BATCH_SIZE = Math.floor(
  SQLITE_MAX_BIND_PARAMETERS / STATEMENT_PARAM_COUNT,
);

// ============================================================
// Factory
// ============================================================

/**
 * Creates a gateway storing statements in one SQLite table.
 * Each delta runs in its own transaction.
 */
export function createSqliteGateway(
  db: SyncSqliteDatabase,
  options: SqliteGatewayOptions = {},
): StoreGateway {
  const table = (options.tables ?? defaultTables).statements;

  const matches = (row: StatementRow) =>
    and(
      eq(table.graph, row.graph),
      eq(table.subject, row.subject),
      eq(table.predicate, row.predicate),
      eq(table.object, row.object),
    );

  return {
    kind: "sqlite",

    readGraph(graph) {
      try {
        const rows = db
          .select({
            subject: table.subject,
            predicate: table.predicate,
            object: table.object,
          })
          .from(table)
          .where(eq(table.graph, graph))
          .all();
        return Promise.resolve(ok(rows.map((row) => fromRow(row))));
      } catch (error) {
        return Promise.resolve(
          err({ reason: failureReason(error), cause: error }),
        );
      }
    },

    applyDelta(graph, removals, additions) {
      try {
        db.transaction((tx) => {
          for (const value of removals) {
            tx.delete(table).where(matches(toRow(graph, value))).run();
          }
          const rows = additions.map((value) => toRow(graph, value));
          for (const batch of chunk(rows, SQLITE_INSERT_BATCH_SIZE)) {
            tx.insert(table).values(batch).onConflictDoNothing().run();
          }
        });
        return Promise.resolve(ok(undefined));
      } catch (error) {
        return Promise.resolve(
          err({ reason: failureReason(error), cause: error }),
        );
      }
    },
  };
}
