/**
 * Drizzle PostgreSQL schema for stored schema graphs.
 *
 * @example
 * ```typescript
 * import { createPostgresTables } from "shapegraph/postgres";
 * const tables = createPostgresTables({ statements: "myapp_statements" });
 * ```
 */
import { index, pgTable, primaryKey, text } from "drizzle-orm/pg-core";

/**
 * Table name configuration.
 */
export type PostgresTableNames = Readonly<{
  statements: string;
}>;

const DEFAULT_TABLE_NAMES: PostgresTableNames = {
  statements: "shapegraph_statements",
};

/**
 * Creates PostgreSQL table definitions with customizable table names.
 */
export function createPostgresTables(names: Partial<PostgresTableNames> = {}) {
  const n: PostgresTableNames = { ...DEFAULT_TABLE_NAMES, ...names };

  const statements = pgTable(
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

export const tables = createPostgresTables();

export const statements = tables.statements;

export type PostgresTables = ReturnType<typeof createPostgresTables>;

export type StatementsTable = PostgresTables["statements"];
