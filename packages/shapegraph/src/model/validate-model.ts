import { type ValidationIssue } from "../errors";
import { type Iri } from "../identifier";
import { validateRestrictionReferences } from "../restrictions";
import { bindingPropertyIri, findCardinalityConflict } from "./has-property";
import { allProperties, findProperty, resolveReference } from "./operations";
import { propertyIssues } from "./property";
import { inheritedCardinalityViolations } from "./resource-class";
import { type Model, type Property, type ResourceClass } from "./types";

// ============================================================
// Whole-model Validation
// ============================================================

/**
 * Checks every invariant of a model: restriction sets, identifier
 * uniqueness, superclass chains, binding targets and cardinalities.
 *
 * Operations on DataModel keep these invariants; this check catches
 * models read from the store that do not.
 *
 * @returns Every issue found, in a stable order
 */
export function validateModel(model: Model): readonly ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  checkIdentifiers(model, issues);
  for (const property of allProperties(model)) {
    checkProperty(model, property, issues);
  }

  const acyclic = new Set<Iri>();
  for (const resourceClass of model.resourceClasses.values()) {
    if (checkSuperclassChain(model, resourceClass, issues)) {
      acyclic.add(resourceClass.iri);
    }
    checkBindings(model, resourceClass, issues);
  }

  for (const iri of acyclic) {
    for (const violation of inheritedCardinalityViolations(model, iri)) {
      issues.push({
        path: `${iri}.${violation.property}`,
        message: `${violation.facet} ${violation.local} loosens the ${violation.facet} ${violation.inherited} inherited from ${violation.inheritedFrom}`,
        code: "INHERITED_CARDINALITY_VIOLATION",
      });
    }
  }

  return issues;
}

function checkIdentifiers(model: Model, issues: ValidationIssue[]): void {
  const seen = new Map<Iri, string>();
  const claim = (iri: Iri, holder: string) => {
    const previous = seen.get(iri);
    if (previous === undefined) {
      seen.set(iri, holder);
      return;
    }
    issues.push({
      path: iri,
      message: `identifier is used by both ${previous} and ${holder}`,
      code: "DUPLICATE_IDENTIFIER",
    });
  };

  for (const iri of model.properties.keys()) claim(iri, "a standalone property");
  for (const resourceClass of model.resourceClasses.values()) {
    claim(resourceClass.iri, "a resource class");
  }
  for (const resourceClass of model.resourceClasses.values()) {
    for (const binding of resourceClass.bindings) {
      if (binding.property.kind === "private") {
        claim(
          binding.property.property.iri,
          `a private property of ${resourceClass.iri}`,
        );
      }
    }
  }
}

function checkProperty(
  model: Model,
  property: Property,
  issues: ValidationIssue[],
): void {
  const prefix = (issue: ValidationIssue): ValidationIssue => ({
    ...issue,
    path: `${property.iri}.${issue.path}`,
  });
  issues.push(
    ...propertyIssues(property.origin, property.restrictions).map(prefix),
    ...validateRestrictionReferences(
      property.iri,
      property.restrictions,
      (iri) => findProperty(model, iri)?.restrictions,
    ).map(prefix),
  );
}

/**
 * @returns true when the chain ends without looping
 */
function checkSuperclassChain(
  model: Model,
  resourceClass: ResourceClass,
  issues: ValidationIssue[],
): boolean {
  const visited = new Set<Iri>([resourceClass.iri]);
  let current: ResourceClass = resourceClass;
  while (current.superclass !== undefined) {
    const superclass = current.superclass;
    if (visited.has(superclass)) {
      issues.push({
        path: resourceClass.iri,
        message: `superclass chain loops through ${superclass}`,
        code: "CYCLIC_INHERITANCE",
      });
      return false;
    }
    const next = model.resourceClasses.get(superclass);
    if (next === undefined) {
      issues.push({
        path: current.iri,
        message: `superclass ${superclass} is not defined`,
        code: "UNKNOWN_SUPERCLASS",
      });
      return true;
    }
    visited.add(superclass);
    current = next;
  }
  return true;
}

function checkBindings(
  model: Model,
  resourceClass: ResourceClass,
  issues: ValidationIssue[],
): void {
  const bound = new Set<Iri>();
  for (const binding of resourceClass.bindings) {
    const propertyIri = bindingPropertyIri(binding);
    const path = `${resourceClass.iri}.${propertyIri}`;

    if (bound.has(propertyIri)) {
      issues.push({
        path,
        message: "property is bound twice",
        code: "DUPLICATE_IDENTIFIER",
      });
    }
    bound.add(propertyIri);

    const property = resolveReference(model, binding.property);
    if (property === undefined) {
      issues.push({
        path,
        message: `binding references undefined property ${propertyIri}`,
        code: "ENTITY_NOT_FOUND",
      });
      continue;
    }

    const conflict = findCardinalityConflict(
      resourceClass.iri,
      property,
      binding,
    );
    if (conflict !== undefined) {
      issues.push({
        path,
        message: `${conflict.facet} ${conflict.local} conflicts with the property's cardinality (${conflict.declared})`,
        code: "CARDINALITY_CONFLICT",
      });
    }
  }
}
