/**
 * Drizzle SQLite schema for stored schema graphs.
 *
 * One row per statement; terms are stored in N-Triples form.
 *
 * @example
 * ```typescript
 * // Custom table name
 * import { createSqliteTables } from "shapegraph/sqlite";
 * const tables = createSqliteTables({ statements: "myapp_statements" });
 * ```
 */
import {
  index,
  primaryKey,
  sqliteTable,
  text,
} from "drizzle-orm/sqlite-core";

/**
 * Table name configuration.
 */
export type SqliteTableNames = Readonly<{
  statements: string;
}>;

const DEFAULT_TABLE_NAMES: SqliteTableNames = {
  statements: "shapegraph_statements",
};

/**
 * Creates SQLite table definitions with customizable table names.
 * Index names are derived from table names.
 */
export function createSqliteTables(names: Partial<SqliteTableNames> = {}) {
  const n: SqliteTableNames = { ...DEFAULT_TABLE_NAMES, ...names };

  const statements = sqliteTable(
    n.statements,
    {
      graph: text("graph").notNull(),
      subject: text("subject").notNull(),
      predicate: text("predicate").notNull(),
      object: text("object").notNull(),
    },
    (t) => [
      primaryKey({ columns: [t.graph, t.subject, t.predicate, t.object] }),
      index(`${n.statements}_subject_idx`).on(t.graph, t.subject),
    ],
  );

  return { statements } as const;
}

/**
 * Default tables with standard names.
 */
export const tables = createSqliteTables();

export const statements = tables.statements;

export type SqliteTables = ReturnType<typeof createSqliteTables>;

export type StatementsTable = SqliteTables["statements"];
