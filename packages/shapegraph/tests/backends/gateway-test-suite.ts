/**
 * Shared Gateway Test Suite
 *
 * Validates that a StoreGateway implementation conforms to the interface
 * contract. Every gateway (memory, SQLite, PostgreSQL) must pass these tests.
 *
 * @example
 * ```typescript
 * import { createGatewayTestSuite } from "./gateway-test-suite";
 *
 * createGatewayTestSuite("Memory", () => createMemoryGateway());
 * ```
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { type StoreGateway } from "../../src/gateway/types";
import { modelsEqual } from "../../src/model/equality";
import { RDF, RDFS, SH } from "../../src/ontology/constants";
import {
  derivedBlankNode,
  iriTerm,
  langLiteral,
  nonNegativeIntegerLiteral,
  type Statement,
  statement,
  statementKey,
  stringLiteral,
} from "../../src/rdf/terms";
import {
  addTitleAndBook,
  CONSTRAINT_GRAPH,
  EX,
  graphKeys,
  INFERENCE_GRAPH,
  loadModel,
} from "../test-utils";

// ============================================================
// Types
// ============================================================

/**
 * Factory function that creates a fresh gateway for each test.
 */
type GatewayFactory = () => StoreGateway;

// ============================================================
// Fixtures
// ============================================================

const titleShape = iriTerm(`${EX}titleShape`);
const bookShape = iriTerm(`${EX}BookShape`);
const binding = derivedBlankNode("hp", `${EX}Book`, `${EX}title`);

const SHAPES: readonly Statement[] = [
  statement(titleShape, RDF.type, iriTerm(SH.PropertyShape)),
  statement(titleShape, SH.path, iriTerm(`${EX}title`)),
  statement(bookShape, SH.property, binding),
  statement(binding, SH.minCount, nonNegativeIntegerLiteral(1)),
];

function keys(statements: readonly Statement[]): string[] {
  return statements.map((value) => statementKey(value)).sort();
}

// ============================================================
// Test Suite
// ============================================================

/**
 * Creates a test suite for a StoreGateway implementation.
 *
 * @param name - Display name for the gateway (e.g., "SQLite", "Memory")
 * @param createGateway - Factory function that returns a fresh gateway
 */
export function createGatewayTestSuite(
  name: string,
  createGateway: GatewayFactory,
): void {
  describe(`${name} Gateway`, () => {
    let gateway: StoreGateway;

    beforeEach(() => {
      gateway = createGateway();
    });

    afterEach(async () => {
      await gateway.close?.();
    });

    // ============================================================
    // Reads
    // ============================================================

    describe("readGraph", () => {
      it("reads an unknown graph as empty", async () => {
        const result = await gateway.readGraph(`${EX}nothing`);

        expect(result).toEqual({ success: true, data: [] });
      });

      it("reads back what was added", async () => {
        await gateway.applyDelta(CONSTRAINT_GRAPH, [], SHAPES);

        expect(await graphKeys(gateway, CONSTRAINT_GRAPH)).toEqual(keys(SHAPES));
      });

      it("keeps graphs apart", async () => {
        const [first, ...rest] = SHAPES;
        if (first === undefined) return;
        await gateway.applyDelta(CONSTRAINT_GRAPH, [], [first]);
        await gateway.applyDelta(INFERENCE_GRAPH, [], rest);

        expect(await graphKeys(gateway, CONSTRAINT_GRAPH)).toEqual(
          keys([first]),
        );
        expect(await graphKeys(gateway, INFERENCE_GRAPH)).toEqual(keys(rest));
      });

      it("preserves literal text and tags", async () => {
        const literals = [
          statement(titleShape, SH.name, langLiteral("Titel", "de")),
          statement(
            titleShape,
            RDFS.comment,
            stringLiteral('Quoted "text"\nwith a \\ backslash'),
          ),
        ];
        await gateway.applyDelta(CONSTRAINT_GRAPH, [], literals);

        expect(await graphKeys(gateway, CONSTRAINT_GRAPH)).toEqual(
          keys(literals),
        );
      });
    });

    // ============================================================
    // Writes
    // ============================================================

    describe("applyDelta", () => {
      it("removes before adding", async () => {
        await gateway.applyDelta(CONSTRAINT_GRAPH, [], SHAPES);
        const replacement = statement(
          binding,
          SH.minCount,
          nonNegativeIntegerLiteral(2),
        );

        const result = await gateway.applyDelta(
          CONSTRAINT_GRAPH,
          SHAPES.slice(3),
          [replacement],
        );

        expect(result).toEqual({ success: true, data: undefined });
        expect(await graphKeys(gateway, CONSTRAINT_GRAPH)).toEqual(
          keys([...SHAPES.slice(0, 3), replacement]),
        );
      });

      it("ignores statements already present or already absent", async () => {
        await gateway.applyDelta(CONSTRAINT_GRAPH, [], SHAPES);

        await gateway.applyDelta(CONSTRAINT_GRAPH, [], SHAPES.slice(0, 2));
        await gateway.applyDelta(INFERENCE_GRAPH, SHAPES.slice(0, 2), []);

        expect(await graphKeys(gateway, CONSTRAINT_GRAPH)).toEqual(keys(SHAPES));
      });

      it("writes deltas larger than one insert batch", async () => {
        const many = Array.from({ length: 1200 }, (_, index) =>
          statement(
            iriTerm(`${EX}p${index}Shape`),
            RDF.type,
            iriTerm(SH.PropertyShape),
          ),
        );

        await gateway.applyDelta(CONSTRAINT_GRAPH, [], many);

        expect(await graphKeys(gateway, CONSTRAINT_GRAPH)).toHaveLength(1200);
      });
    });

    // ============================================================
    // Data Model
    // ============================================================

    describe("data model", () => {
      it("loads what a commit stored", async () => {
        const model = await loadModel(gateway);
        addTitleAndBook(model);
        const { marker } = await model.commit();

        const reloaded = await loadModel(gateway);

        expect(reloaded.marker).toBe(marker);
        expect(modelsEqual(reloaded.model, model.model)).toBe(true);
      });

      it("applies a second commit as a delta", async () => {
        const model = await loadModel(gateway);
        addTitleAndBook(model);
        await model.commit();
        model.updateProperty("ex:title", "maxLength", 100);

        const { marker } = await model.commit();

        const reloaded = await loadModel(gateway);
        expect(marker).toMatch(/^2:/);
        expect(reloaded.getProperty("ex:title")?.restrictions.maxLength).toBe(
          100,
        );
      });
    });
  });
}
