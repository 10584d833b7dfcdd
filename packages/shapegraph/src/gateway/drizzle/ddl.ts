/**
 * DDL generation for the statement tables.
 *
 * Builds CREATE TABLE / CREATE INDEX statements from the Drizzle table
 * definitions, so created tables always match the schema the gateways
 * query.
 */
import { getTableConfig as getPgTableConfig } from "drizzle-orm/pg-core";
import { getTableConfig as getSqliteTableConfig } from "drizzle-orm/sqlite-core";

import {
  type PostgresTables,
  tables as postgresTables,
} from "./schema/postgres";
import { type SqliteTables, tables as sqliteTables } from "./schema/sqlite";

type ColumnInfo = Readonly<{ name: string; notNull: boolean }>;

type IndexInfo = Readonly<{
  name?: string | undefined;
  unique: boolean;
  columns: readonly unknown[];
}>;

type TableInfo = Readonly<{
  name: string;
  columns: readonly ColumnInfo[];
  primaryKey: readonly string[];
  indexes: readonly IndexInfo[];
}>;

function renderIndexColumn(column: unknown, index: string): string {
  if (
    typeof column === "object" &&
    column !== null &&
    "name" in column &&
    typeof column.name === "string"
  ) {
    return `"${column.name}"`;
  }
  throw new Error(`Index "${index}" uses an expression, which is not supported`);
}

function createTableSQL(table: TableInfo): string {
  const definitions = table.columns.map(
    (column) => `"${column.name}" TEXT${column.notNull ? " NOT NULL" : ""}`,
  );
  if (table.primaryKey.length > 0) {
    const columns = table.primaryKey.map((name) => `"${name}"`).join(", ");
    definitions.push(`PRIMARY KEY (${columns})`);
  }
  return `CREATE TABLE IF NOT EXISTS "${table.name}" (\n  ${definitions.join(",\n  ")}\n);`;
}

function createIndexSQL(table: TableInfo): string[] {
  return table.indexes.map((index, position) => {
    const name = index.name ?? `${table.name}_idx_${position}`;
    const columns = index.columns
      .map((column) => renderIndexColumn(column, name))
      .join(", ");
    const unique = index.unique ? "UNIQUE " : "";
    return `CREATE ${unique}INDEX IF NOT EXISTS "${name}" ON "${table.name}" (${columns});`;
  });
}

function generateDDL(infos: readonly TableInfo[]): string[] {
  // Tables first, then indexes
  return [...infos.map(createTableSQL), ...infos.flatMap(createIndexSQL)];
}

// ============================================================
// SQLite
// ============================================================

/**
 * Generates all DDL statements for the given SQLite tables.
 */
export function generateSqliteDDL(
  tables: SqliteTables = sqliteTables,
): string[] {
  return generateDDL(
    Object.values(tables).map((table) => {
      const config = getSqliteTableConfig(table);
      return {
        name: config.name,
        columns: config.columns,
        primaryKey:
          config.primaryKeys[0]?.columns.map((column) => column.name) ?? [],
        indexes: config.indexes.map((index) => index.config),
      };
    }),
  );
}

/**
 * Generates a single SQL string for SQLite migrations.
 */
export function getSqliteMigrationSQL(
  tables: SqliteTables = sqliteTables,
): string {
  return generateSqliteDDL(tables).join("\n\n");
}

// ============================================================
// PostgreSQL
// ============================================================

/**
 * Generates all DDL statements for the given PostgreSQL tables.
 */
export function generatePostgresDDL(
  tables: PostgresTables = postgresTables,
): string[] {
  return generateDDL(
    Object.values(tables).map((table) => {
      const config = getPgTableConfig(table);
      return {
        name: config.name,
        columns: config.columns,
        primaryKey:
          config.primaryKeys[0]?.columns.map((column) => column.name) ?? [],
        indexes: config.indexes.map((index) => index.config),
      };
    }),
  );
}

/**
 * Generates a single SQL string for PostgreSQL migrations.
 */
export function getPostgresMigrationSQL(
  tables: PostgresTables = postgresTables,
): string {
  return generatePostgresDDL(tables).join("\n\n");
}
