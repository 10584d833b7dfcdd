import { z } from "zod";

import { DuplicateIdentifierError } from "../errors";
import { validateInput } from "../errors/validation";
import { type Iri, type PrefixMap, resolveIri } from "../identifier";
import { langString } from "../literal";
import { STANDARD_PREFIXES } from "../ontology/constants";
import {
  computeTransitiveClosure,
  invertClosure,
  isReachable,
} from "../ontology/closures";
import { bindingPropertyIri, defineBinding } from "./has-property";
import { defineProperty } from "./property";
import {
  type EffectiveBinding,
  type HasProperty,
  type Model,
  type PropertyReference,
  type ResourceClass,
  type ResourceClassAttribute,
  type ResourceClassAttributeValues,
  type ResourceClassDefinition,
} from "./types";

// ============================================================
// Schemas
// ============================================================

const langStringInputSchema = z.record(z.string(), z.string());

export const resourceClassDefinitionSchema = z.strictObject({
  iri: z.string().min(1),
  superclass: z.string().min(1).optional(),
  closed: z.boolean().optional(),
  label: langStringInputSchema.optional(),
  comment: langStringInputSchema.optional(),
  properties: z
    .array(
      z.object({
        property: z.union([z.string().min(1), z.object({ iri: z.string() })]),
      }),
    )
    .optional(),
});

export type DefineResourceClassOptions = Readonly<{
  prefixes?: PrefixMap;
}>;

// ============================================================
// Resource Class Factory
// ============================================================

/**
 * Creates a resource class from its definition.
 *
 * String entries in `properties` reference standalone properties by
 * identifier; object entries define private properties inline. Checks
 * that need the surrounding model (superclass, cardinality conflicts)
 * happen when the class is added to a data model.
 *
 * @example
 * ```typescript
 * const book = defineResourceClass({
 *   iri: "ex:Book",
 *   label: { en: "Book" },
 *   properties: [{ property: "ex:title", minCount: 1, maxCount: 1 }],
 * }, { prefixes: { ex: "http://example.org/" } });
 * ```
 */
export function defineResourceClass(
  definition: ResourceClassDefinition,
  options: DefineResourceClassOptions = {},
): ResourceClass {
  const prefixes = options.prefixes ?? STANDARD_PREFIXES;
  const parsed = validateInput(resourceClassDefinitionSchema, definition, {
    entity: "resourceClass",
    iri: definition.iri,
  });
  const iri = resolveIri(parsed.iri, prefixes);

  const bindings: HasProperty[] = [];
  for (const entry of definition.properties ?? []) {
    const { property, ...overrides } = entry;
    const reference: PropertyReference =
      typeof property === "string" ?
        { kind: "standalone", iri: resolveIri(property, prefixes) }
      : {
          kind: "private",
          property: defineProperty(property, { origin: "private", prefixes }),
        };
    const propertyIri =
      reference.kind === "standalone" ? reference.iri : reference.property.iri;
    if (bindings.some((binding) => bindingPropertyIri(binding) === propertyIri)) {
      throw new DuplicateIdentifierError({
        iri: propertyIri,
        existing:
          reference.kind === "standalone" ? "property" : "privateProperty",
        owner: iri,
      });
    }
    bindings.push(defineBinding(reference, overrides, bindings));
  }

  const label =
    parsed.label === undefined ? undefined : langString(parsed.label, "label");
  const comment =
    parsed.comment === undefined ? undefined : (
      langString(parsed.comment, "comment")
    );

  return Object.freeze({
    iri,
    ...(parsed.superclass !== undefined && {
      superclass: resolveIri(parsed.superclass, prefixes),
    }),
    bindings: Object.freeze(bindings),
    closed: parsed.closed ?? false,
    ...(label !== undefined && { label }),
    ...(comment !== undefined && { comment }),
  });
}

// ============================================================
// Attribute Update
// ============================================================

type MutableResourceClass = {
  -readonly [K in keyof ResourceClass]: ResourceClass[K];
};

/**
 * Returns a copy of the class with its label, comment or closed flag
 * replaced. `undefined` removes a label or comment and reopens the class.
 *
 * @throws ValidationError when the value does not fit the attribute
 */
export function updateResourceClassAttribute<
  K extends ResourceClassAttribute,
>(
  resourceClass: ResourceClass,
  attribute: K,
  value: ResourceClassAttributeValues[K] | undefined,
): ResourceClass;
export function updateResourceClassAttribute(
  resourceClass: ResourceClass,
  attribute: ResourceClassAttribute,
  value: unknown,
): ResourceClass {
  const context = {
    entity: "resourceClass",
    iri: resourceClass.iri,
  } as const;
  const next: MutableResourceClass = { ...resourceClass };

  if (attribute === "closed") {
    next.closed =
      value === undefined ? false : validateInput(z.boolean(), value, context);
    return Object.freeze(next);
  }

  if (value === undefined) {
    delete next[attribute];
  } else {
    next[attribute] = langString(
      validateInput(langStringInputSchema, value, context),
      attribute,
    );
  }
  return Object.freeze(next);
}

// ============================================================
// Superclass Chain
// ============================================================

/**
 * Whether making `superclass` the superclass of `resourceClass` would
 * close a cycle, i.e. `resourceClass` is `superclass` or one of its ancestors.
 */
export function wouldCreateCycle(
  classes: ReadonlyMap<Iri, ResourceClass>,
  resourceClass: Iri,
  superclass: Iri,
): boolean {
  if (resourceClass === superclass) return true;
  const others = new Map(classes);
  others.delete(resourceClass);
  return isReachable(superclassClosure(others), superclass, resourceClass);
}

function superclassClosure(
  classes: ReadonlyMap<Iri, ResourceClass>,
): ReadonlyMap<Iri, ReadonlySet<Iri>> {
  const relations: (readonly [Iri, Iri])[] = [];
  for (const candidate of classes.values()) {
    if (candidate.superclass !== undefined) {
      relations.push([candidate.iri, candidate.superclass]);
    }
  }
  return computeTransitiveClosure(relations);
}

/**
 * Ancestors of a class, nearest first. Stops at an unknown superclass
 * or when the chain loops.
 */
export function ancestorsOf(
  classes: ReadonlyMap<Iri, ResourceClass>,
  resourceClass: Iri,
): readonly Iri[] {
  const chain: Iri[] = [];
  const seen = new Set<Iri>([resourceClass]);
  let current = classes.get(resourceClass)?.superclass;
  while (current !== undefined && !seen.has(current)) {
    chain.push(current);
    seen.add(current);
    current = classes.get(current)?.superclass;
  }
  return chain;
}

/**
 * The chain from `superclass` up to `resourceClass`, for error reports.
 */
export function cyclePath(
  classes: ReadonlyMap<Iri, ResourceClass>,
  resourceClass: Iri,
  superclass: Iri,
): readonly Iri[] {
  const path: Iri[] = [resourceClass, superclass];
  if (resourceClass === superclass) return path;
  for (const ancestor of ancestorsOf(classes, superclass)) {
    path.push(ancestor);
    if (ancestor === resourceClass) break;
  }
  return path;
}

/**
 * Every class whose superclass chain contains `resourceClass`.
 */
export function descendantsOf(
  classes: ReadonlyMap<Iri, ResourceClass>,
  resourceClass: Iri,
): readonly Iri[] {
  const descendants = invertClosure(superclassClosure(classes)).get(
    resourceClass,
  );
  return [...(descendants ?? [])].filter(
    (candidate) => candidate !== resourceClass,
  );
}

// ============================================================
// Effective Bindings
// ============================================================

/**
 * Own bindings plus inherited ones from the full superclass chain.
 * A subclass binding for the same property replaces the inherited
 * cardinality where it sets one; unset bounds stay inherited.
 *
 * Inherited bindings come first, root class first.
 */
export function computeEffectiveBindings(
  model: Model,
  resourceClass: Iri,
): readonly EffectiveBinding[] {
  const chain = [
    ...ancestorsOf(model.resourceClasses, resourceClass),
  ].reverse();
  chain.push(resourceClass);

  const merged = new Map<Iri, EffectiveBinding>();
  for (const classIri of chain) {
    const current = model.resourceClasses.get(classIri);
    if (current === undefined) continue;
    for (const binding of current.bindings) {
      const propertyIri = bindingPropertyIri(binding);
      const inherited = merged.get(propertyIri);
      const minCount = binding.minCount ?? inherited?.minCount;
      const maxCount = binding.maxCount ?? inherited?.maxCount;
      merged.set(
        propertyIri,
        Object.freeze({
          propertyIri,
          property: binding.property,
          declaredIn: classIri,
          ...(minCount !== undefined && { minCount }),
          ...(maxCount !== undefined && { maxCount }),
          order: binding.order,
        }),
      );
    }
  }
  return [...merged.values()];
}

/**
 * A subclass binding that loosens an inherited cardinality.
 */
export type InheritedCardinalityViolation = Readonly<{
  resourceClass: Iri;
  property: Iri;
  inheritedFrom: Iri;
  facet: "minCount" | "maxCount";
  local: number;
  inherited: number;
}>;

/**
 * Checks the own bindings of one class against what it inherits.
 */
export function inheritedCardinalityViolations(
  model: Model,
  resourceClass: Iri,
): readonly InheritedCardinalityViolation[] {
  const current = model.resourceClasses.get(resourceClass);
  if (current?.superclass === undefined) return [];

  const inherited = new Map(
    computeEffectiveBindings(model, current.superclass).map((binding) => [
      binding.propertyIri,
      binding,
    ]),
  );

  const violations: InheritedCardinalityViolation[] = [];
  for (const binding of current.bindings) {
    const property = bindingPropertyIri(binding);
    const parent = inherited.get(property);
    if (parent === undefined) continue;
    const base = { resourceClass, property, inheritedFrom: parent.declaredIn };

    if (
      binding.minCount !== undefined &&
      parent.minCount !== undefined &&
      binding.minCount < parent.minCount
    ) {
      violations.push({
        ...base,
        facet: "minCount",
        local: binding.minCount,
        inherited: parent.minCount,
      });
      continue;
    }
    if (
      binding.maxCount !== undefined &&
      parent.maxCount !== undefined &&
      binding.maxCount > parent.maxCount
    ) {
      violations.push({
        ...base,
        facet: "maxCount",
        local: binding.maxCount,
        inherited: parent.maxCount,
      });
      continue;
    }

    const min = binding.minCount ?? parent.minCount;
    const max = binding.maxCount ?? parent.maxCount;
    if (min !== undefined && max !== undefined && min > max) {
      const facet = binding.minCount === undefined ? "maxCount" : "minCount";
      violations.push({
        ...base,
        facet,
        local: facet === "minCount" ? min : max,
        inherited: facet === "minCount" ? max : min,
      });
    }
  }
  return violations;
}
