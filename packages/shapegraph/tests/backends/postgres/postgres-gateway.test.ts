/**
 * PostgreSQL Gateway Integration Tests
 *
 * Tests the PostgreSQL gateway against a real database named by
 * POSTGRES_URL. The database tests are skipped when it is not set.
 */
import { sql } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import {
  afterAll,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
} from "vitest";

import {
  createPostgresGateway,
  createPostgresTables,
  generatePostgresDDL,
  getPostgresMigrationSQL,
} from "../../../src/gateway/postgres";
import { constraintMarkerStatements } from "../../../src/rdf";
import { CONSTRAINT_GRAPH, graphKeys, PROJECT } from "../../test-utils";
import { createGatewayTestSuite } from "../gateway-test-suite";

const TEST_DATABASE_URL = process.env.POSTGRES_URL ?? "";

// ============================================================
// DDL
// ============================================================

describe("PostgreSQL DDL", () => {
  it("creates the statements table and its subject index", () => {
    expect(generatePostgresDDL()).toEqual([
      [
        'CREATE TABLE IF NOT EXISTS "shapegraph_statements" (',
        '  "graph" TEXT NOT NULL,',
        '  "subject" TEXT NOT NULL,',
        '  "predicate" TEXT NOT NULL,',
        '  "object" TEXT NOT NULL,',
        '  PRIMARY KEY ("graph", "subject", "predicate", "object")',
        ");",
      ].join("\n"),
      'CREATE INDEX IF NOT EXISTS "shapegraph_statements_subject_idx" ON "shapegraph_statements" ("graph", "subject");',
    ]);
  });

  it("derives index names from custom table names", () => {
    const tables = createPostgresTables({ statements: "library_statements" });

    expect(generatePostgresDDL(tables)[1]).toBe(
      'CREATE INDEX IF NOT EXISTS "library_statements_subject_idx" ON "library_statements" ("graph", "subject");',
    );
  });
});

// ============================================================
// Database
// ============================================================

describe.runIf(TEST_DATABASE_URL)(
  "PostgreSQL Gateway - Database",
  () => {
    let pool: Pool;
    let db: NodePgDatabase;

    beforeAll(async () => {
      pool = new Pool({ connectionString: TEST_DATABASE_URL });
      db = drizzle(pool);
      await pool.query(getPostgresMigrationSQL());
    });

    beforeEach(async () => {
      await db.execute(sql`DELETE FROM shapegraph_statements`);
    });

    afterAll(async () => {
      await pool.end();
    });

    createGatewayTestSuite("PostgreSQL", () => createPostgresGateway(db));

    it("reports itself as a postgres gateway without a close hook", async () => {
      const gateway = createPostgresGateway(db);

      await gateway.applyDelta(
        CONSTRAINT_GRAPH,
        [],
        constraintMarkerStatements(PROJECT, "1:abc"),
      );

      expect(gateway.kind).toBe("postgres");
      expect(gateway.close).toBeUndefined();
      expect(await graphKeys(gateway, CONSTRAINT_GRAPH)).toHaveLength(1);
    });
  },
);
