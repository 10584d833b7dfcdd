/**
 * Shared Arbitrary Generators for Property-Based Tests
 *
 * Reusable fast-check arbitraries for data model operations. Identifiers
 * come from small pools so that generated operations collide often.
 */
import fc from "fast-check";

import { isShapeGraphError } from "../../src/errors";
import { type DataModel } from "../../src/model/data-model";
import { type RestrictionInput } from "../../src/restrictions";
import { EX } from "../test-utils";

// ============================================================
// Identifier Arbitraries
// ============================================================

export const classIriArb = fc.constantFrom(
  `${EX}Book`,
  `${EX}Novel`,
  `${EX}Person`,
  `${EX}Author`,
  `${EX}Publisher`,
  `${EX}Series`,
);

const propertyNameArb = fc.constantFrom(
  "ex:title",
  "ex:pages",
  "ex:subtitle",
  "ex:note",
);

const classNameArb = fc.constantFrom("ex:Book", "ex:Novel", "ex:Person");

const privateNameArb = fc.constantFrom("ex:edition", "ex:shelf");

// ============================================================
// Restriction Arbitraries
// ============================================================

export const restrictionArb: fc.Arbitrary<RestrictionInput> = fc.oneof(
  fc.constant({}),
  fc
    .nat({ max: 500 })
    .map((maxLength) => ({ datatype: "xsd:string", maxLength })),
  fc
    .integer({ min: -100, max: 100 })
    .map((minInclusive) => ({ datatype: "xsd:integer", minInclusive })),
  fc.constant({ datatype: "xsd:boolean" }),
);

const countArb = fc.option(fc.nat({ max: 4 }), { nil: undefined });

// ============================================================
// Operation Arbitraries
// ============================================================

/**
 * One mutation of a data model, described as data so failing runs
 * print what was applied.
 */
export type Operation =
  | Readonly<{
      kind: "createProperty";
      iri: string;
      restrictions: RestrictionInput;
    }>
  | Readonly<{ kind: "updateMaxLength"; iri: string; value: number }>
  | Readonly<{ kind: "deleteProperty"; iri: string }>
  | Readonly<{ kind: "createResourceClass"; iri: string; closed: boolean }>
  | Readonly<{
      kind: "setSuperclass";
      iri: string;
      superclass: string | undefined;
    }>
  | Readonly<{ kind: "deleteResourceClass"; iri: string }>
  | Readonly<{
      kind: "attachProperty";
      classIri: string;
      property: string;
      minCount: number | undefined;
      maxCount: number | undefined;
    }>
  | Readonly<{
      kind: "attachPrivateProperty";
      classIri: string;
      iri: string;
      restrictions: RestrictionInput;
    }>
  | Readonly<{
      kind: "updateBinding";
      classIri: string;
      property: string;
      maxCount: number | undefined;
    }>
  | Readonly<{ kind: "detachProperty"; classIri: string; property: string }>;

export const operationArb: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({
    kind: fc.constant("createProperty" as const),
    iri: propertyNameArb,
    restrictions: restrictionArb,
  }),
  fc.record({
    kind: fc.constant("updateMaxLength" as const),
    iri: fc.oneof(propertyNameArb, privateNameArb),
    value: fc.nat({ max: 500 }),
  }),
  fc.record({
    kind: fc.constant("deleteProperty" as const),
    iri: propertyNameArb,
  }),
  fc.record({
    kind: fc.constant("createResourceClass" as const),
    iri: classNameArb,
    closed: fc.boolean(),
  }),
  fc.record({
    kind: fc.constant("setSuperclass" as const),
    iri: classNameArb,
    superclass: fc.option(classNameArb, { nil: undefined }),
  }),
  fc.record({
    kind: fc.constant("deleteResourceClass" as const),
    iri: classNameArb,
  }),
  fc.record({
    kind: fc.constant("attachProperty" as const),
    classIri: classNameArb,
    property: propertyNameArb,
    minCount: countArb,
    maxCount: countArb,
  }),
  fc.record({
    kind: fc.constant("attachPrivateProperty" as const),
    classIri: classNameArb,
    iri: privateNameArb,
    restrictions: restrictionArb,
  }),
  fc.record({
    kind: fc.constant("updateBinding" as const),
    classIri: classNameArb,
    property: fc.oneof(propertyNameArb, privateNameArb),
    maxCount: countArb,
  }),
  fc.record({
    kind: fc.constant("detachProperty" as const),
    classIri: classNameArb,
    property: fc.oneof(propertyNameArb, privateNameArb),
  }),
);

export const operationsArb = fc.array(operationArb, {
  minLength: 1,
  maxLength: 25,
});

// ============================================================
// Applying Operations
// ============================================================

function applyOperation(model: DataModel, operation: Operation): void {
  switch (operation.kind) {
    case "createProperty": {
      model.createProperty({
        iri: operation.iri,
        restrictions: operation.restrictions,
      });
      return;
    }
    case "updateMaxLength": {
      model.updateProperty(operation.iri, "maxLength", operation.value);
      return;
    }
    case "deleteProperty": {
      model.deleteProperty(operation.iri);
      return;
    }
    case "createResourceClass": {
      model.createResourceClass({
        iri: operation.iri,
        closed: operation.closed,
      });
      return;
    }
    case "setSuperclass": {
      model.setSuperclass(operation.iri, operation.superclass);
      return;
    }
    case "deleteResourceClass": {
      model.deleteResourceClass(operation.iri);
      return;
    }
    case "attachProperty": {
      model.attachProperty(operation.classIri, operation.property, {
        ...(operation.minCount !== undefined && {
          minCount: operation.minCount,
        }),
        ...(operation.maxCount !== undefined && {
          maxCount: operation.maxCount,
        }),
      });
      return;
    }
    case "attachPrivateProperty": {
      model.attachProperty(operation.classIri, {
        iri: operation.iri,
        restrictions: operation.restrictions,
      });
      return;
    }
    case "updateBinding": {
      model.updateBinding(operation.classIri, operation.property, {
        maxCount: operation.maxCount ?? null,
      });
      return;
    }
    case "detachProperty": {
      model.detachProperty(operation.classIri, operation.property);
      return;
    }
  }
}

/**
 * Applies every operation in turn. Operations the model refuses are
 * skipped; anything other than a model error fails the run.
 *
 * @returns How many operations were applied
 */
export function applyOperations(
  model: DataModel,
  operations: readonly Operation[],
): number {
  let applied = 0;
  for (const operation of operations) {
    try {
      applyOperation(model, operation);
      applied++;
    } catch (error) {
      if (!isShapeGraphError(error)) throw error;
    }
  }
  return applied;
}
