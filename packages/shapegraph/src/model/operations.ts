/**
 * Pure model transitions.
 *
 * Each function takes a Model and returns a new one, or throws without
 * touching its input. DataModel applies them to its working copy.
 */

import {
  CyclicInheritanceError,
  DuplicateIdentifierError,
  EntityNotFoundError,
  InheritedCardinalityViolationError,
  PropertyInUseError,
  PropertyNotReusableError,
  ResourceClassInUseError,
  UnknownSuperclassError,
} from "../errors";
import { assertNoRestrictionIssues } from "../errors/validation";
import { type Iri } from "../identifier";
import { validateRestrictionReferences } from "../restrictions";
import {
  applyBindingUpdate,
  bindingPropertyIri,
  checkBindingCardinality,
  defineBinding,
} from "./has-property";
import {
  cyclePath,
  descendantsOf,
  inheritedCardinalityViolations,
  wouldCreateCycle,
} from "./resource-class";
import {
  type BindingOverrides,
  type BindingUpdate,
  type HasProperty,
  type IdentifierOwner,
  type Model,
  type Property,
  type PropertyReference,
  type ResourceClass,
} from "./types";

// ============================================================
// Lookup
// ============================================================

/**
 * Finds who holds an identifier: a standalone property, a private
 * property (with its owning class), or a resource class.
 */
export function findIdentifierOwner(
  model: Model,
  iri: Iri,
): IdentifierOwner | undefined {
  const property = model.properties.get(iri);
  if (property !== undefined) return { kind: "property", property };

  const resourceClass = model.resourceClasses.get(iri);
  if (resourceClass !== undefined) {
    return { kind: "resourceClass", resourceClass };
  }

  for (const owner of model.resourceClasses.values()) {
    for (const binding of owner.bindings) {
      if (
        binding.property.kind === "private" &&
        binding.property.property.iri === iri
      ) {
        return {
          kind: "privateProperty",
          property: binding.property.property,
          owner: owner.iri,
        };
      }
    }
  }
  return undefined;
}

/**
 * Looks up a standalone or private property.
 */
export function findProperty(model: Model, iri: Iri): Property | undefined {
  const owner = findIdentifierOwner(model, iri);
  if (owner === undefined || owner.kind === "resourceClass") return undefined;
  return owner.property;
}

/**
 * Resolves the property a binding points at, if the model holds it.
 */
export function resolveReference(
  model: Model,
  reference: PropertyReference,
): Property | undefined {
  return reference.kind === "private" ?
      reference.property
    : model.properties.get(reference.iri);
}

export function requireResourceClass(model: Model, iri: Iri): ResourceClass {
  const resourceClass = model.resourceClasses.get(iri);
  if (resourceClass === undefined) {
    throw new EntityNotFoundError("resourceClass", iri);
  }
  return resourceClass;
}

function assertIdentifierFree(model: Model, iri: Iri): void {
  const owner = findIdentifierOwner(model, iri);
  if (owner === undefined) return;
  throw new DuplicateIdentifierError({
    iri,
    existing: owner.kind,
    ...(owner.kind === "privateProperty" && { owner: owner.owner }),
  });
}

function assertReferencesResolve(model: Model, property: Property): void {
  assertNoRestrictionIssues(
    validateRestrictionReferences(property.iri, property.restrictions, (iri) =>
      iri === property.iri ?
        property.restrictions
      : findProperty(model, iri)?.restrictions,
    ),
    { entity: "property", iri: property.iri },
  );
}

function withProperties(
  model: Model,
  properties: ReadonlyMap<Iri, Property>,
): Model {
  return Object.freeze({
    properties,
    resourceClasses: model.resourceClasses,
  });
}

function withClass(model: Model, resourceClass: ResourceClass): Model {
  const resourceClasses = new Map(model.resourceClasses);
  resourceClasses.set(resourceClass.iri, resourceClass);
  return Object.freeze({ properties: model.properties, resourceClasses });
}

function withBindings(
  resourceClass: ResourceClass,
  bindings: readonly HasProperty[],
): ResourceClass {
  return Object.freeze({
    ...resourceClass,
    bindings: Object.freeze([...bindings]),
  });
}

/**
 * Throws for the first class in `classes` (or their descendants) whose
 * bindings loosen an inherited cardinality.
 */
function assertInheritedCardinality(
  model: Model,
  classes: readonly Iri[],
): void {
  const toCheck = new Set<Iri>();
  for (const iri of classes) {
    toCheck.add(iri);
    for (const descendant of descendantsOf(model.resourceClasses, iri)) {
      toCheck.add(descendant);
    }
  }
  for (const iri of toCheck) {
    const [violation] = inheritedCardinalityViolations(model, iri);
    if (violation !== undefined) {
      throw new InheritedCardinalityViolationError(violation);
    }
  }
}

// ============================================================
// Properties
// ============================================================

/**
 * Adds a standalone property.
 *
 * @throws DuplicateIdentifierError when the identifier is taken
 * @throws InconsistentRestrictionsError when a `lessThan` reference does not resolve
 */
export function addProperty(model: Model, property: Property): Model {
  assertIdentifierFree(model, property.iri);
  assertReferencesResolve(model, property);
  const properties = new Map(model.properties);
  properties.set(
    property.iri,
    Object.freeze({ ...property, origin: "standalone" }),
  );
  return withProperties(model, properties);
}

/**
 * Replaces a property (standalone or private) with an updated version,
 * re-checking references and every binding that uses it.
 *
 * @throws EntityNotFoundError when the model does not hold the property
 * @throws InconsistentRestrictionsError when a reference stops resolving
 * @throws CardinalityConflictError when a binding is now wider than the property
 */
export function replaceProperty(model: Model, updated: Property): Model {
  const owner = findIdentifierOwner(model, updated.iri);
  if (owner === undefined || owner.kind === "resourceClass") {
    throw new EntityNotFoundError("property", updated.iri);
  }

  let next: Model;
  if (owner.kind === "property") {
    const properties = new Map(model.properties);
    properties.set(updated.iri, updated);
    next = withProperties(model, properties);
  } else {
    const resourceClass = requireResourceClass(model, owner.owner);
    next = withClass(
      model,
      withBindings(
        resourceClass,
        resourceClass.bindings.map((binding): HasProperty =>
          bindingPropertyIri(binding) === updated.iri ?
            Object.freeze<HasProperty>({
              ...binding,
              property: { kind: "private", property: updated },
            })
          : binding,
        ),
      ),
    );
  }

  assertReferencesResolve(next, updated);
  for (const other of allProperties(next)) {
    const { lessThan, lessThanOrEquals } = other.restrictions;
    if (lessThan === updated.iri || lessThanOrEquals === updated.iri) {
      assertReferencesResolve(next, other);
    }
  }
  for (const resourceClass of next.resourceClasses.values()) {
    for (const binding of resourceClass.bindings) {
      if (bindingPropertyIri(binding) === updated.iri) {
        checkBindingCardinality(resourceClass.iri, updated, binding);
      }
    }
  }
  return next;
}

/**
 * Every property in the model, standalone first.
 */
export function allProperties(model: Model): readonly Property[] {
  const result: Property[] = [...model.properties.values()];
  for (const resourceClass of model.resourceClasses.values()) {
    for (const binding of resourceClass.bindings) {
      if (binding.property.kind === "private") {
        result.push(binding.property.property);
      }
    }
  }
  return result;
}

/**
 * Lists what still references a property: binding classes and
 * properties naming it in `subPropertyOf` or an ordering facet.
 */
export function propertyReferrers(model: Model, iri: Iri): readonly Iri[] {
  const referrers: Iri[] = [];
  for (const resourceClass of model.resourceClasses.values()) {
    if (
      resourceClass.bindings.some(
        (binding) => bindingPropertyIri(binding) === iri,
      )
    ) {
      referrers.push(resourceClass.iri);
    }
  }
  for (const property of allProperties(model)) {
    if (property.iri === iri) continue;
    const { lessThan, lessThanOrEquals } = property.restrictions;
    if (
      property.subPropertyOf === iri ||
      lessThan === iri ||
      lessThanOrEquals === iri
    ) {
      referrers.push(property.iri);
    }
  }
  return referrers;
}

/**
 * Removes a standalone property.
 *
 * @throws EntityNotFoundError when the model does not hold it
 * @throws PropertyInUseError when anything still references it
 */
export function removeProperty(model: Model, iri: Iri): Model {
  const owner = findIdentifierOwner(model, iri);
  if (owner === undefined || owner.kind === "resourceClass") {
    throw new EntityNotFoundError("property", iri);
  }
  const referencedBy = propertyReferrers(model, iri);
  if (referencedBy.length > 0) {
    throw new PropertyInUseError({ iri, referencedBy });
  }
  const properties = new Map(model.properties);
  properties.delete(iri);
  return withProperties(model, properties);
}

// ============================================================
// Bindings
// ============================================================

/**
 * Binds a property to a class.
 *
 * `property` is either the identifier of a standalone property or a
 * private property defined for this class.
 *
 * @throws EntityNotFoundError when the class or standalone property is unknown
 * @throws PropertyNotReusableError when the property is private to another class
 * @throws DuplicateIdentifierError when the class already binds it, or a private
 *   property's identifier is taken
 * @throws CardinalityConflictError when the local cardinality widens the property's
 * @throws InheritedCardinalityViolationError when it loosens an inherited binding
 */
export function attachProperty(
  model: Model,
  classIri: Iri,
  property: Iri | Property,
  overrides?: BindingOverrides,
): Model {
  const resourceClass = requireResourceClass(model, classIri);
  const propertyIri = typeof property === "string" ? property : property.iri;
  const owner = findIdentifierOwner(model, propertyIri);

  if (owner?.kind === "privateProperty" && owner.owner !== classIri) {
    throw new PropertyNotReusableError({
      property: propertyIri,
      owner: owner.owner,
      resourceClass: classIri,
    });
  }
  if (
    resourceClass.bindings.some(
      (binding) => bindingPropertyIri(binding) === propertyIri,
    )
  ) {
    throw new DuplicateIdentifierError({
      iri: propertyIri,
      existing: owner?.kind === "privateProperty" ? "privateProperty" : "property",
      owner: classIri,
    });
  }

  let reference: PropertyReference;
  let target: Property;
  if (typeof property === "string") {
    if (owner?.kind !== "property") {
      throw new EntityNotFoundError("property", propertyIri);
    }
    reference = { kind: "standalone", iri: propertyIri };
    target = owner.property;
  } else {
    if (owner !== undefined) {
      throw new DuplicateIdentifierError({
        iri: propertyIri,
        existing: owner.kind,
      });
    }
    target = Object.freeze({ ...property, origin: "private" });
    reference = { kind: "private", property: target };
  }

  const binding = defineBinding(reference, overrides, resourceClass.bindings);
  checkBindingCardinality(classIri, target, binding);

  const next = withClass(
    model,
    withBindings(resourceClass, [...resourceClass.bindings, binding]),
  );
  if (reference.kind === "private") {
    assertReferencesResolve(next, target);
  }
  assertInheritedCardinality(next, [classIri]);
  return next;
}

/**
 * Changes the local cardinality or order of an existing binding.
 */
export function updateBinding(
  model: Model,
  classIri: Iri,
  propertyIri: Iri,
  update: BindingUpdate,
): Model {
  const resourceClass = requireResourceClass(model, classIri);
  const existing = resourceClass.bindings.find(
    (binding) => bindingPropertyIri(binding) === propertyIri,
  );
  if (existing === undefined) {
    throw new EntityNotFoundError("property", propertyIri);
  }

  const updated = applyBindingUpdate(existing, update);
  const target = resolveReference(model, updated.property);
  if (target === undefined) {
    throw new EntityNotFoundError("property", propertyIri);
  }
  checkBindingCardinality(classIri, target, updated);

  const next = withClass(
    model,
    withBindings(
      resourceClass,
      resourceClass.bindings.map((binding) =>
        binding === existing ? updated : binding,
      ),
    ),
  );
  assertInheritedCardinality(next, [classIri]);
  return next;
}

/**
 * Removes a binding. The underlying standalone property stays; a
 * private property goes with its binding.
 */
export function detachProperty(
  model: Model,
  classIri: Iri,
  propertyIri: Iri,
): Model {
  const resourceClass = requireResourceClass(model, classIri);
  const remaining = resourceClass.bindings.filter(
    (binding) => bindingPropertyIri(binding) !== propertyIri,
  );
  if (remaining.length === resourceClass.bindings.length) {
    throw new EntityNotFoundError("property", propertyIri);
  }
  return withClass(model, withBindings(resourceClass, remaining));
}

// ============================================================
// Resource Classes
// ============================================================

/**
 * Adds a resource class, running every binding through the attach checks.
 *
 * @throws DuplicateIdentifierError when the identifier is taken
 * @throws UnknownSuperclassError when the superclass is not in the model
 * @throws CyclicInheritanceError when the class names itself as superclass
 */
export function addResourceClass(
  model: Model,
  resourceClass: ResourceClass,
): Model {
  assertIdentifierFree(model, resourceClass.iri);
  if (resourceClass.superclass !== undefined) {
    assertSuperclassAllowed(model, resourceClass.iri, resourceClass.superclass);
  }

  let next = withClass(model, withBindings(resourceClass, []));
  for (const binding of resourceClass.bindings) {
    const { property } = binding;
    next = attachProperty(
      next,
      resourceClass.iri,
      property.kind === "standalone" ? property.iri : property.property,
      {
        ...(binding.minCount !== undefined && { minCount: binding.minCount }),
        ...(binding.maxCount !== undefined && { maxCount: binding.maxCount }),
        order: binding.order,
      },
    );
  }
  return next;
}

function assertSuperclassAllowed(
  model: Model,
  classIri: Iri,
  superclass: Iri,
): void {
  if (superclass !== classIri && !model.resourceClasses.has(superclass)) {
    throw new UnknownSuperclassError({
      resourceClass: classIri,
      superclass,
    });
  }
  if (wouldCreateCycle(model.resourceClasses, classIri, superclass)) {
    throw new CyclicInheritanceError({
      resourceClass: classIri,
      superclass,
      cycle: cyclePath(model.resourceClasses, classIri, superclass),
    });
  }
}

/**
 * Sets or clears a class's superclass.
 *
 * @throws UnknownSuperclassError when the superclass is not in the model
 * @throws CyclicInheritanceError when the class is already an ancestor of it
 * @throws InheritedCardinalityViolationError when a binding of the class or a
 *   descendant now loosens an inherited cardinality
 */
export function setSuperclass(
  model: Model,
  classIri: Iri,
  superclass: Iri | undefined,
): Model {
  const resourceClass = requireResourceClass(model, classIri);
  if (superclass === undefined) {
    const next: { -readonly [K in keyof ResourceClass]: ResourceClass[K] } = {
      ...resourceClass,
    };
    delete next.superclass;
    return withClass(model, Object.freeze(next));
  }

  assertSuperclassAllowed(model, classIri, superclass);
  const next = withClass(model, Object.freeze({ ...resourceClass, superclass }));
  assertInheritedCardinality(next, [classIri]);
  return next;
}

/**
 * Replaces a resource class's descriptive attributes or closed flag.
 */
export function replaceResourceClass(
  model: Model,
  updated: ResourceClass,
): Model {
  const current = requireResourceClass(model, updated.iri);
  return withClass(
    model,
    Object.freeze({
      ...updated,
      bindings: current.bindings,
      ...(current.superclass !== undefined && {
        superclass: current.superclass,
      }),
    }),
  );
}

/**
 * Removes a resource class and its private properties.
 *
 * @throws ResourceClassInUseError when another class names it as superclass
 */
export function removeResourceClass(model: Model, classIri: Iri): Model {
  requireResourceClass(model, classIri);
  const subclasses = [...model.resourceClasses.values()]
    .filter((candidate) => candidate.superclass === classIri)
    .map((candidate) => candidate.iri);
  if (subclasses.length > 0) {
    throw new ResourceClassInUseError({ iri: classIri, subclasses });
  }
  const resourceClasses = new Map(model.resourceClasses);
  resourceClasses.delete(classIri);
  return Object.freeze({ properties: model.properties, resourceClasses });
}
