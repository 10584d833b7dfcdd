/**
 * Property-based tests for data model mutations.
 *
 * Random operation sequences run against a fresh model; the checks hold
 * whatever subset of them the model accepted.
 */
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { createMemoryGateway } from "../../src/gateway";
import { type Iri } from "../../src/identifier";
import { type DataModel } from "../../src/model/data-model";
import { modelsEqual } from "../../src/model/equality";
import { type ResourceClass } from "../../src/model/types";
import {
  deserializeModel,
  diffStatements,
  serializeModel,
  statementKey,
} from "../../src/rdf";
import { addTitleAndBook, loadModel, PROJECT } from "../test-utils";
import { applyOperations, operationsArb } from "./arbitraries";

// ============================================================
// Helpers
// ============================================================

function hasCycle(classes: ReadonlyMap<Iri, ResourceClass>): boolean {
  for (const start of classes.keys()) {
    const seen = new Set<Iri>();
    let current: Iri | undefined = start;
    while (current !== undefined) {
      if (seen.has(current)) return true;
      seen.add(current);
      current = classes.get(current)?.superclass;
    }
  }
  return false;
}

async function committedLibrary(): Promise<DataModel> {
  const model = await loadModel(createMemoryGateway());
  addTitleAndBook(model);
  await model.commit();
  return model;
}

// ============================================================
// Property Tests - Inheritance
// ============================================================

describe("Inheritance Properties", () => {
  it("superclass chains never loop", async () => {
    await fc.assert(
      fc.asyncProperty(operationsArb, async (operations) => {
        const model = await loadModel(createMemoryGateway());

        applyOperations(model, operations);

        expect(hasCycle(model.model.resourceClasses)).toBe(false);
      }),
      { numRuns: 100 },
    );
  });

  it("every superclass is a class of the model", async () => {
    await fc.assert(
      fc.asyncProperty(operationsArb, async (operations) => {
        const model = await loadModel(createMemoryGateway());

        applyOperations(model, operations);

        for (const resourceClass of model.resourceClasses()) {
          if (resourceClass.superclass === undefined) continue;
          expect(
            model.model.resourceClasses.has(resourceClass.superclass),
          ).toBe(true);
        }
      }),
      { numRuns: 100 },
    );
  });
});

// ============================================================
// Property Tests - Serialization
// ============================================================

describe("Serialization Properties", () => {
  it("reading back the written graphs yields the same model", async () => {
    await fc.assert(
      fc.asyncProperty(operationsArb, async (operations) => {
        const model = await loadModel(createMemoryGateway());
        applyOperations(model, operations);

        const { constraint, inference } = serializeModel(model.model);
        const result = deserializeModel(constraint, inference, PROJECT);

        expect(modelsEqual(result.model, model.model)).toBe(true);
      }),
      { numRuns: 100 },
    );
  });

  it("serializing twice yields identical statements", async () => {
    await fc.assert(
      fc.asyncProperty(operationsArb, async (operations) => {
        const model = await loadModel(createMemoryGateway());
        applyOperations(model, operations);

        const first = serializeModel(model.model);
        const second = serializeModel(model.model);

        expect(second.constraint.map(statementKey)).toEqual(
          first.constraint.map(statementKey),
        );
        expect(second.inference.map(statementKey)).toEqual(
          first.inference.map(statementKey),
        );
      }),
      { numRuns: 50 },
    );
  });
});

// ============================================================
// Property Tests - Deltas
// ============================================================

describe("Delta Properties", () => {
  it("the scoped delta equals the delta of full serializations", async () => {
    await fc.assert(
      fc.asyncProperty(operationsArb, async (operations) => {
        const model = await committedLibrary();
        const before = serializeModel(model.model);
        applyOperations(model, operations);

        const after = serializeModel(model.model);
        const delta = model.computeDelta();

        for (const graph of ["constraint", "inference"] as const) {
          const full = diffStatements(before[graph], after[graph]);
          expect(delta[graph].removals.map(statementKey)).toEqual(
            full.removals.map(statementKey),
          );
          expect(delta[graph].additions.map(statementKey)).toEqual(
            full.additions.map(statementKey),
          );
        }
      }),
      { numRuns: 100 },
    );
  });

  it("a committed model reloads unchanged", async () => {
    await fc.assert(
      fc.asyncProperty(operationsArb, async (operations) => {
        const gateway = createMemoryGateway();
        const model = await loadModel(gateway);
        addTitleAndBook(model);
        await model.commit();
        applyOperations(model, operations);
        if (model.validate().length > 0) return;

        await model.commit();
        const reloaded = await loadModel(gateway);

        expect(reloaded.marker).toBe(model.marker);
        expect(modelsEqual(reloaded.model, model.model)).toBe(true);
      }),
      { numRuns: 50 },
    );
  });
});
