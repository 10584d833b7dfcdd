import { z } from "zod";

import { CardinalityConflictError } from "../errors";
import { validateInput } from "../errors/validation";
import { type Iri } from "../identifier";
import {
  type BindingOverrides,
  type BindingUpdate,
  type HasProperty,
  type Property,
  type PropertyReference,
} from "./types";

// ============================================================
// Schemas
// ============================================================

const countSchema = z.number().int().nonnegative();

export const bindingOverridesSchema = z.strictObject({
  minCount: countSchema.optional(),
  maxCount: countSchema.optional(),
  order: z.number().int().optional(),
});

export const bindingUpdateSchema = z.strictObject({
  minCount: countSchema.nullable().optional(),
  maxCount: countSchema.nullable().optional(),
  order: z.number().int().optional(),
});

// ============================================================
// Accessors
// ============================================================

export function referenceIri(reference: PropertyReference): Iri {
  return reference.kind === "standalone" ?
      reference.iri
    : reference.property.iri;
}

export function bindingPropertyIri(binding: HasProperty): Iri {
  return referenceIri(binding.property);
}

/**
 * Order for a new binding: one past the highest order on the class.
 */
export function nextOrder(bindings: readonly HasProperty[]): number {
  let highest = 0;
  for (const binding of bindings) {
    if (binding.order > highest) highest = binding.order;
  }
  return highest + 1;
}

// ============================================================
// Construction
// ============================================================

/**
 * Builds a binding from a property reference and caller overrides.
 *
 * @throws ValidationError when a count is not a non-negative integer
 */
export function defineBinding(
  reference: PropertyReference,
  overrides: BindingOverrides | undefined,
  existing: readonly HasProperty[],
): HasProperty {
  const parsed = validateInput(bindingOverridesSchema, overrides ?? {}, {
    entity: "binding",
    iri: referenceIri(reference),
  });
  return Object.freeze({
    property: reference,
    ...(parsed.minCount !== undefined && { minCount: parsed.minCount }),
    ...(parsed.maxCount !== undefined && { maxCount: parsed.maxCount }),
    order: parsed.order ?? nextOrder(existing),
  });
}

/**
 * Applies an update to a binding. `null` clears a cardinality.
 */
export function applyBindingUpdate(
  binding: HasProperty,
  update: BindingUpdate,
): HasProperty {
  const parsed = validateInput(bindingUpdateSchema, update, {
    entity: "binding",
    iri: bindingPropertyIri(binding),
  });
  const minCount =
    parsed.minCount === undefined ? binding.minCount
    : parsed.minCount === null ? undefined
    : parsed.minCount;
  const maxCount =
    parsed.maxCount === undefined ? binding.maxCount
    : parsed.maxCount === null ? undefined
    : parsed.maxCount;
  return Object.freeze({
    property: binding.property,
    ...(minCount !== undefined && { minCount }),
    ...(maxCount !== undefined && { maxCount }),
    order: parsed.order ?? binding.order,
  });
}

// ============================================================
// Cardinality
// ============================================================

/**
 * A binding cardinality that widens or contradicts its property's.
 */
export type CardinalityConflict = Readonly<{
  resourceClass: Iri;
  property: Iri;
  facet: "minCount" | "maxCount";
  local: number;
  declared: number;
}>;

/**
 * Compares a binding's local cardinality with the property it binds.
 *
 * The local bounds may narrow the property's own `minCount` / `maxCount`
 * but never widen them, and the resulting range must not be empty.
 */
export function findCardinalityConflict(
  resourceClass: Iri,
  property: Property,
  binding: Pick<HasProperty, "minCount" | "maxCount">,
): CardinalityConflict | undefined {
  const declared = property.restrictions;
  const base = { resourceClass, property: property.iri };

  if (
    binding.minCount !== undefined &&
    declared.minCount !== undefined &&
    binding.minCount < declared.minCount
  ) {
    return {
      ...base,
      facet: "minCount",
      local: binding.minCount,
      declared: declared.minCount,
    };
  }
  if (
    binding.maxCount !== undefined &&
    declared.maxCount !== undefined &&
    binding.maxCount > declared.maxCount
  ) {
    return {
      ...base,
      facet: "maxCount",
      local: binding.maxCount,
      declared: declared.maxCount,
    };
  }

  const min = binding.minCount ?? declared.minCount;
  const max = binding.maxCount ?? declared.maxCount;
  if (min !== undefined && max !== undefined && min > max) {
    return { ...base, facet: "minCount", local: min, declared: max };
  }
  return undefined;
}

/**
 * @throws CardinalityConflictError when `findCardinalityConflict` reports one
 */
export function checkBindingCardinality(
  resourceClass: Iri,
  property: Property,
  binding: Pick<HasProperty, "minCount" | "maxCount">,
): void {
  const conflict = findCardinalityConflict(resourceClass, property, binding);
  if (conflict !== undefined) {
    throw new CardinalityConflictError(conflict);
  }
}

// ============================================================
// Display
// ============================================================

/**
 * Bindings in display order. For equal orders the binding declared
 * later is shown later.
 */
export function displayBindings(
  bindings: readonly HasProperty[],
): readonly HasProperty[] {
  return bindings
    .map((binding, index) => ({ binding, index }))
    .sort((left, right) => {
      if (left.binding.order !== right.binding.order) {
        return left.binding.order - right.binding.order;
      }
      return left.index - right.index;
    })
    .map(({ binding }) => binding);
}
