import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
  computeTransitiveClosure,
  invertClosure,
  isReachable,
} from "../../src/ontology/closures";
import { classIriArb } from "./arbitraries";

// ============================================================
// Arbitrary Generators
// ============================================================

/**
 * A single subclass → superclass link.
 */
const relationArb: fc.Arbitrary<readonly [string, string]> = fc
  .tuple(classIriArb, classIriArb)
  .filter(([from, to]) => from !== to);

const relationsArb = fc.array(relationArb, { minLength: 0, maxLength: 15 });

/**
 * A chain of links (A→B→C→...) over distinct classes.
 */
const chainArb = fc.uniqueArray(classIriArb, { minLength: 2, maxLength: 6 });

function chainRelations(nodes: readonly string[]): (readonly [string, string])[] {
  return nodes.slice(1).map((to, index) => [nodes[index] ?? to, to] as const);
}

function countRelations(closure: ReadonlyMap<string, ReadonlySet<string>>) {
  let count = 0;
  for (const tos of closure.values()) count += tos.size;
  return count;
}

// ============================================================
// Property Tests - Transitive Closure
// ============================================================

describe("Transitive Closure Properties", () => {
  it("computing closure twice yields same result", () => {
    fc.assert(
      fc.property(relationsArb, (relations) => {
        const first = computeTransitiveClosure(relations);
        const again: (readonly [string, string])[] = [];
        for (const [from, tos] of first) {
          for (const to of tos) again.push([from, to]);
        }
        const second = computeTransitiveClosure(again);

        expect(countRelations(second)).toBe(countRelations(first));
        for (const [from, to] of again) {
          expect(isReachable(second, from, to)).toBe(true);
        }
      }),
      { numRuns: 100 },
    );
  });

  it("if A→B and B→C then A→C", () => {
    fc.assert(
      fc.property(relationsArb, (relations) => {
        const closure = computeTransitiveClosure(relations);

        for (const [a, bs] of closure) {
          for (const b of bs) {
            for (const c of closure.get(b) ?? []) {
              expect(isReachable(closure, a, c)).toBe(true);
            }
          }
        }
      }),
      { numRuns: 100 },
    );
  });

  it("the head of a chain reaches every later class", () => {
    fc.assert(
      fc.property(chainArb, (nodes) => {
        const closure = computeTransitiveClosure(chainRelations(nodes));
        const [head, ...rest] = nodes;
        if (head === undefined) return;

        for (const node of rest) {
          expect(isReachable(closure, head, node)).toBe(true);
        }
        expect(closure.get(head)?.size).toBe(rest.length);
      }),
      { numRuns: 50 },
    );
  });

  it("all input relations appear in closure", () => {
    fc.assert(
      fc.property(relationsArb, (relations) => {
        const closure = computeTransitiveClosure(relations);

        for (const [from, to] of relations) {
          expect(isReachable(closure, from, to)).toBe(true);
        }
      }),
      { numRuns: 100 },
    );
  });

  it("empty relations produce empty closure", () => {
    expect(computeTransitiveClosure([]).size).toBe(0);
  });
});

// ============================================================
// Property Tests - Closure Inversion
// ============================================================

describe("Closure Inversion Properties", () => {
  it("inversion swaps from and to", () => {
    fc.assert(
      fc.property(relationsArb, (relations) => {
        const closure = computeTransitiveClosure(relations);
        const inverted = invertClosure(closure);

        for (const [from, tos] of closure) {
          for (const to of tos) {
            expect(inverted.get(to)?.has(from)).toBe(true);
          }
        }
        expect(countRelations(inverted)).toBe(countRelations(closure));
      }),
      { numRuns: 100 },
    );
  });

  it("double inversion preserves all relations", () => {
    fc.assert(
      fc.property(relationsArb, (relations) => {
        const closure = computeTransitiveClosure(relations);
        const restored = invertClosure(invertClosure(closure));

        for (const [from, tos] of restored) {
          for (const to of tos) {
            expect(closure.get(from)?.has(to)).toBe(true);
          }
        }
        expect(countRelations(restored)).toBe(countRelations(closure));
      }),
      { numRuns: 100 },
    );
  });
});

// ============================================================
// Property Tests - Reachability
// ============================================================

describe("Reachability Properties", () => {
  it("isReachable returns true iff target is in source's set", () => {
    fc.assert(
      fc.property(
        relationsArb,
        classIriArb,
        classIriArb,
        (relations, source, target) => {
          const closure = computeTransitiveClosure(relations);

          expect(isReachable(closure, source, target)).toBe(
            closure.get(source)?.has(target) ?? false,
          );
        },
      ),
      { numRuns: 100 },
    );
  });
});
