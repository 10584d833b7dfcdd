import { type Iri } from "../identifier";
import { type LangString } from "../literal";
import { type RestrictionInput, type RestrictionSet } from "../restrictions";

// ============================================================
// Provenance
// ============================================================

/**
 * When an entity was created and last changed, and by whom.
 * Timestamps are `xsd:dateTime` lexical forms.
 */
export type Provenance = Readonly<{
  created: string;
  modified: string;
  creator?: Iri;
  contributor?: Iri;
}>;

// ============================================================
// Property
// ============================================================

/**
 * Whether a property may be bound by several resource classes
 * (`standalone`) or belongs to exactly one (`private`).
 */
export type PropertyOrigin = "standalone" | "private";

/**
 * A named, constrained predicate.
 *
 * Created via `defineProperty()`.
 */
export type Property = Readonly<{
  iri: Iri;
  origin: PropertyOrigin;
  restrictions: RestrictionSet;
  name?: LangString;
  description?: LangString;
  subPropertyOf?: Iri;
  /** Set by the data model that created or last changed the property */
  provenance?: Provenance;
}>;

/**
 * Property as callers describe it.
 */
export type PropertyDefinition = Readonly<{
  iri: string;
  restrictions?: RestrictionInput;
  name?: Readonly<Record<string, string>>;
  description?: Readonly<Record<string, string>>;
  subPropertyOf?: string;
}>;

/**
 * Values accepted by `updateProperty()` for each attribute.
 * Passing `undefined` removes the attribute.
 */
export type PropertyAttributeValues = Readonly<
  {
    [K in keyof RestrictionInput]-?: Exclude<RestrictionInput[K], undefined>;
  } & {
    name: Readonly<Record<string, string>>;
    description: Readonly<Record<string, string>>;
    subPropertyOf: string;
  }
>;

export type PropertyAttribute = keyof PropertyAttributeValues;

// ============================================================
// HasProperty
// ============================================================

/**
 * How a binding refers to its property: by identifier for standalone
 * properties, by value for private ones.
 */
export type PropertyReference =
  | Readonly<{ kind: "standalone"; iri: Iri }>
  | Readonly<{ kind: "private"; property: Property }>;

/**
 * The resource-local association of a Property to a ResourceClass.
 */
export type HasProperty = Readonly<{
  property: PropertyReference;
  minCount?: number;
  maxCount?: number;
  /** Display position; duplicates are allowed */
  order: number;
}>;

/**
 * Resource-local facets given when attaching a property.
 */
export type BindingOverrides = Readonly<{
  minCount?: number;
  maxCount?: number;
  order?: number;
}>;

/**
 * Changes given to `updateBinding()`. `null` clears a cardinality.
 */
export type BindingUpdate = Readonly<{
  minCount?: number | null;
  maxCount?: number | null;
  order?: number;
}>;

/**
 * A binding inside a resource class definition: a standalone property
 * identifier, or an inline definition for a private property.
 */
export type BindingDefinition = BindingOverrides &
  Readonly<{
    property: string | PropertyDefinition;
  }>;

// ============================================================
// ResourceClass
// ============================================================

/**
 * A named entity type composed of property bindings.
 */
export type ResourceClass = Readonly<{
  iri: Iri;
  superclass?: Iri;
  bindings: readonly HasProperty[];
  closed: boolean;
  label?: LangString;
  comment?: LangString;
  provenance?: Provenance;
}>;

export type ResourceClassDefinition = Readonly<{
  iri: string;
  superclass?: string;
  closed?: boolean;
  label?: Readonly<Record<string, string>>;
  comment?: Readonly<Record<string, string>>;
  properties?: readonly BindingDefinition[];
}>;

/**
 * Values accepted by `updateResourceClass()` for each attribute.
 */
export type ResourceClassAttributeValues = Readonly<{
  label: Readonly<Record<string, string>>;
  comment: Readonly<Record<string, string>>;
  closed: boolean;
}>;

export type ResourceClassAttribute = keyof ResourceClassAttributeValues;

/**
 * A binding as seen from a class, after merging the superclass chain.
 */
export type EffectiveBinding = Readonly<{
  propertyIri: Iri;
  property: PropertyReference;
  /** Class whose binding supplied the current cardinality */
  declaredIn: Iri;
  minCount?: number;
  maxCount?: number;
  order: number;
}>;

// ============================================================
// Model
// ============================================================

/**
 * The immutable content of a data model: standalone properties and
 * resource classes keyed by identifier. Private properties live inside
 * their class's bindings.
 */
export type Model = Readonly<{
  properties: ReadonlyMap<Iri, Property>;
  resourceClasses: ReadonlyMap<Iri, ResourceClass>;
}>;

export const EMPTY_MODEL: Model = Object.freeze({
  properties: new Map<Iri, Property>(),
  resourceClasses: new Map<Iri, ResourceClass>(),
});

/**
 * Who holds an identifier in a model.
 */
export type IdentifierOwner =
  | Readonly<{ kind: "property"; property: Property }>
  | Readonly<{ kind: "privateProperty"; property: Property; owner: Iri }>
  | Readonly<{ kind: "resourceClass"; resourceClass: ResourceClass }>;
