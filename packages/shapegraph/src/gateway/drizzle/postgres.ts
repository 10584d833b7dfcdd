/**
 * PostgreSQL gateway.
 *
 * Works with any Drizzle PostgreSQL database instance.
 *
 * @example
 * ```typescript
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { createPostgresGateway } from "shapegraph/postgres";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const gateway = createPostgresGateway(drizzle(pool));
 * ```
 */
import { and, eq } from "drizzle-orm";
import { type PgDatabase, type PgQueryResultHKT } from "drizzle-orm/pg-core";

import { err, ok } from "../../utils/result";
import { failureReason, type StoreGateway } from "../types";
import { chunk, fromRow, type StatementRow, toRow } from "./rows";
import {
  type PostgresTables,
  tables as defaultTables,
} from "./schema/postgres";

export type AnyPgDatabase = PgDatabase<
  PgQueryResultHKT,
  Record<string, unknown>
>;

/**
 * Options for creating a PostgreSQL gateway.
 */
export type PostgresGatewayOptions = Readonly<{
  /**
   * Custom table definitions. Use createPostgresTables() to customize table names.
   */
  tables?: PostgresTables;
}>;

const POSTGRES_INSERT_BATCH_SIZE = 1000;

/**
 * Creates a gateway storing statements in one PostgreSQL table.
 * Each delta runs in its own transaction.
 */
export function createPostgresGateway(
  db: AnyPgDatabase,
  options: PostgresGatewayOptions = {},
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
    kind: "postgres",

    async readGraph(graph) {
      try {
        const rows = await db
          .select({
            subject: table.subject,
            predicate: table.predicate,
            object: table.object,
          })
          .from(table)
          .where(eq(table.graph, graph));
        return ok(rows.map((row) => fromRow(row)));
      } catch (error) {
        return err({ reason: failureReason(error), cause: error });
      }
    },

    async applyDelta(graph, removals, additions) {
      try {
        await db.transaction(async (tx) => {
          for (const value of removals) {
            await tx.delete(table).where(matches(toRow(graph, value)));
          }
          const rows = additions.map((value) => toRow(graph, value));
          for (const batch of chunk(rows, POSTGRES_INSERT_BATCH_SIZE)) {
            await tx.insert(table).values(batch).onConflictDoNothing();
          }
        });
        return ok(undefined);
      } catch (error) {
        return err({ reason: failureReason(error), cause: error });
      }
    },
  };
}
