/**
 * PostgreSQL gateway entry point.
 *
 * Provides the Drizzle-based PostgreSQL gateway and DDL generation.
 *
 * @example
 * ```typescript
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import {
 *   createPostgresGateway,
 *   getPostgresMigrationSQL,
 * } from "shapegraph/postgres";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * await pool.query(getPostgresMigrationSQL());
 * const gateway = createPostgresGateway(drizzle(pool));
 * ```
 */

export {
  type AnyPgDatabase,
  createPostgresGateway,
  type PostgresGatewayOptions,
} from "../drizzle/postgres";

export {
  createPostgresTables,
  type PostgresTableNames,
  type PostgresTables,
  statements,
  tables,
} from "../drizzle/schema/postgres";

export { generatePostgresDDL, getPostgresMigrationSQL } from "../drizzle/ddl";
