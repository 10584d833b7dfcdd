import { type Iri } from "../identifier";
import { replaceResourceClass, requireResourceClass } from "./operations";
import {
  type HasProperty,
  type Model,
  type Property,
  type Provenance,
  type ResourceClass,
} from "./types";

// ============================================================
// Stamps
// ============================================================

/**
 * Time and agent of one mutation.
 */
export type ProvenanceStamp = Readonly<{
  /** `xsd:dateTime` lexical form */
  at: string;
  agent?: Iri;
}>;

export function provenanceStamp(
  date: Date,
  agent: Iri | undefined,
): ProvenanceStamp {
  return Object.freeze({
    at: date.toISOString(),
    ...(agent !== undefined && { agent }),
  });
}

function createdProvenance(stamp: ProvenanceStamp): Provenance {
  return Object.freeze({
    created: stamp.at,
    modified: stamp.at,
    ...(stamp.agent !== undefined && {
      creator: stamp.agent,
      contributor: stamp.agent,
    }),
  });
}

/**
 * Advances `modified`; the agent, when known, becomes the contributor.
 * An entity read from a graph without provenance starts one here.
 */
function touchedProvenance(
  previous: Provenance | undefined,
  stamp: ProvenanceStamp,
): Provenance {
  if (previous === undefined) return createdProvenance(stamp);
  const contributor = stamp.agent ?? previous.contributor;
  return Object.freeze({
    created: previous.created,
    modified: stamp.at,
    ...(previous.creator !== undefined && { creator: previous.creator }),
    ...(contributor !== undefined && { contributor }),
  });
}

export function provenanceEqual(
  left: Provenance | undefined,
  right: Provenance | undefined,
): boolean {
  if (left === undefined || right === undefined) return left === right;
  return (
    left.created === right.created &&
    left.modified === right.modified &&
    left.creator === right.creator &&
    left.contributor === right.contributor
  );
}

// ============================================================
// Entities
// ============================================================

export function stampCreated<T extends Property | ResourceClass>(
  entity: T,
  stamp: ProvenanceStamp,
): T {
  const stamped: T = { ...entity, provenance: createdProvenance(stamp) };
  Object.freeze(stamped);
  return stamped;
}

export function stampTouched<T extends Property | ResourceClass>(
  entity: T,
  stamp: ProvenanceStamp,
): T {
  const stamped: T = {
    ...entity,
    provenance: touchedProvenance(entity.provenance, stamp),
  };
  Object.freeze(stamped);
  return stamped;
}

/**
 * A new class with its inline private properties, all created now.
 */
export function stampNewResourceClass(
  resourceClass: ResourceClass,
  stamp: ProvenanceStamp,
): ResourceClass {
  const bindings = resourceClass.bindings.map((binding): HasProperty =>
    binding.property.kind === "private" ?
      Object.freeze<HasProperty>({
        ...binding,
        property: {
          kind: "private",
          property: stampCreated(binding.property.property, stamp),
        },
      })
    : binding,
  );
  return stampCreated(
    { ...resourceClass, bindings: Object.freeze(bindings) },
    stamp,
  );
}

/**
 * Marks a class of the model as changed.
 */
export function touchResourceClass(
  model: Model,
  classIri: Iri,
  stamp: ProvenanceStamp,
): Model {
  return replaceResourceClass(
    model,
    stampTouched(requireResourceClass(model, classIri), stamp),
  );
}
