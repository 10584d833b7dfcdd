import { type Iri } from "../identifier";
import { langStringsEqual, typedValuesEqual } from "../literal";
import {
  type InValue,
  RESTRICTION_FACETS,
  type RestrictionSet,
} from "../restrictions";
import { bindingPropertyIri } from "./has-property";
import { provenanceEqual } from "./provenance";
import {
  type HasProperty,
  type Model,
  type Property,
  type ResourceClass,
} from "./types";

// ============================================================
// Structural Equality
// ============================================================

function inValuesEqual(left: InValue, right: InValue): boolean {
  if (typeof left === "string" || typeof right === "string") {
    return left === right;
  }
  return typedValuesEqual(left, right);
}

function listsEqual<T>(
  left: readonly T[] | undefined,
  right: readonly T[] | undefined,
  equal: (a: T, b: T) => boolean,
): boolean {
  if (left === undefined || right === undefined) return left === right;
  if (left.length !== right.length) return false;
  return left.every((value, index) => {
    const other = right[index];
    return other !== undefined && equal(value, other);
  });
}

export function restrictionsEqual(
  left: RestrictionSet,
  right: RestrictionSet,
): boolean {
  return RESTRICTION_FACETS.every((facet) => {
    switch (facet) {
      case "in": {
        return listsEqual(left.in, right.in, inValuesEqual);
      }
      case "languageIn": {
        return listsEqual(left.languageIn, right.languageIn, (a, b) => a === b);
      }
      default: {
        return left[facet] === right[facet];
      }
    }
  });
}

export function propertiesEqual(left: Property, right: Property): boolean {
  return (
    left.iri === right.iri &&
    left.origin === right.origin &&
    left.subPropertyOf === right.subPropertyOf &&
    langStringsEqual(left.name, right.name) &&
    langStringsEqual(left.description, right.description) &&
    restrictionsEqual(left.restrictions, right.restrictions) &&
    provenanceEqual(left.provenance, right.provenance)
  );
}

function bindingsEqual(left: HasProperty, right: HasProperty): boolean {
  if (
    left.minCount !== right.minCount ||
    left.maxCount !== right.maxCount ||
    left.order !== right.order
  ) {
    return false;
  }
  const a = left.property;
  const b = right.property;
  if (a.kind === "standalone" || b.kind === "standalone") {
    return a.kind === b.kind && bindingPropertyIri(left) === bindingPropertyIri(right);
  }
  return propertiesEqual(a.property, b.property);
}

/**
 * Compares two classes, bindings in declaration sequence.
 */
export function resourceClassesEqual(
  left: ResourceClass,
  right: ResourceClass,
): boolean {
  return (
    left.iri === right.iri &&
    left.superclass === right.superclass &&
    left.closed === right.closed &&
    langStringsEqual(left.label, right.label) &&
    langStringsEqual(left.comment, right.comment) &&
    provenanceEqual(left.provenance, right.provenance) &&
    listsEqual(left.bindings, right.bindings, bindingsEqual)
  );
}

function mapsEqual<T>(
  left: ReadonlyMap<Iri, T>,
  right: ReadonlyMap<Iri, T>,
  equal: (a: T, b: T) => boolean,
): boolean {
  if (left.size !== right.size) return false;
  for (const [key, value] of left) {
    const other = right.get(key);
    if (other === undefined || !equal(value, other)) return false;
  }
  return true;
}

/**
 * Whether two models hold the same properties, classes, restrictions,
 * bindings (in sequence) and provenance.
 */
export function modelsEqual(left: Model, right: Model): boolean {
  return (
    mapsEqual(left.properties, right.properties, propertiesEqual) &&
    mapsEqual(left.resourceClasses, right.resourceClasses, resourceClassesEqual)
  );
}
