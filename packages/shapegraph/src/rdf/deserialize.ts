import { DataFactory, Store, type Term } from "n3";

import { CrossGraphMismatchError, ModelInconsistentError } from "../errors";
import { compareIri, fromShapeIri, type Iri } from "../identifier";
import { isValidLexical, type LangString, numericValue } from "../literal";
import { provenanceEqual } from "../model/provenance";
import {
  type HasProperty,
  type Model,
  type Property,
  type PropertyReference,
  type Provenance,
  type ResourceClass,
} from "../model/types";
import { DCTERMS, OWL, RDF, RDFS, SG, SH, XSD_NS } from "../ontology/constants";
import {
  type InValue,
  NUMERIC_BOUND_FACETS,
  type RestrictionSet,
} from "../restrictions";
import { readMarker, type SnapshotMarker } from "./marker";
import { type Project } from "./project";
import {
  asIri,
  literalBoolean,
  literalInteger,
  literalText,
  literalValue,
  type Statement,
} from "./terms";

const { namedNode } = DataFactory;

// ============================================================
// Types
// ============================================================

export type DeserializedModel = Readonly<{
  model: Model;
  /** Marker both graphs agree on; undefined for a never-committed project */
  marker: SnapshotMarker | undefined;
}>;

type MutableRestrictionSet = {
  -readonly [K in keyof RestrictionSet]: RestrictionSet[K];
};

type ConstraintProperty = Readonly<{
  iri: Iri;
  restrictions: RestrictionSet;
  name?: LangString;
  description?: LangString;
  provenance?: Provenance;
}>;

type ConstraintBinding = Readonly<{
  propertyIri: Iri;
  /** Present for private bindings */
  definition?: ConstraintProperty;
  minCount?: number;
  maxCount?: number;
  order: number;
  /** Declaration index; absent in graphs written without one */
  position?: number;
}>;

type ConstraintClass = Readonly<{
  iri: Iri;
  superclass?: Iri;
  closed: boolean;
  label?: LangString;
  comment?: LangString;
  provenance?: Provenance;
  bindings: readonly ConstraintBinding[];
}>;

type InferenceProperty = Readonly<{
  iri: Iri;
  type: string;
  range?: Iri;
  subPropertyOf?: Iri;
  domains: ReadonlySet<Iri>;
  provenance?: Provenance;
}>;

type InferenceCardinality = Readonly<{ minCount?: number; maxCount?: number }>;

type InferenceClass = Readonly<{
  iri: Iri;
  superclass?: Iri;
  restrictions: ReadonlyMap<Iri, InferenceCardinality>;
  provenance?: Provenance;
}>;

const XSD_DATE_TIME = `${XSD_NS}dateTime`;

// ============================================================
// Graph Index
// ============================================================

/**
 * Pattern lookups over one graph's statements.
 */
class GraphIndex {
  readonly #store: Store;

  constructor(statements: readonly Statement[]) {
    this.#store = new Store([...statements]);
  }

  objects(subject: Term, predicate: string): Term[] {
    return this.#store.getObjects(subject, namedNode(predicate), null);
  }

  object(subject: Term, predicate: string): Term | undefined {
    return this.objects(subject, predicate)[0];
  }

  instancesOf(type: string): Term[] {
    return this.#store.getSubjects(namedNode(RDF.type), namedNode(type), null);
  }

  /**
   * Members of the RDF collection starting at `head`.
   */
  list(head: Term): Term[] {
    const members: Term[] = [];
    const seen = new Set<string>();
    let node: Term | undefined = head;
    while (node !== undefined && node.value !== RDF.nil) {
      if (seen.has(node.value)) {
        throw malformed(head.value, "RDF collection loops");
      }
      seen.add(node.value);
      const first = this.object(node, RDF.first);
      if (first === undefined) {
        throw malformed(head.value, "RDF collection node without rdf:first");
      }
      members.push(first);
      node = this.object(node, RDF.rest);
    }
    return members;
  }
}

function malformed(subject: string, message: string): ModelInconsistentError {
  return new ModelInconsistentError([
    { path: subject, message, code: "MALFORMED_STATEMENT" },
  ]);
}

// ============================================================
// Term Readers
// ============================================================

function iriAt(
  index: GraphIndex,
  node: Term,
  predicate: string,
): Iri | undefined {
  const term = index.object(node, predicate);
  if (term === undefined) return undefined;
  const iri = asIri(term);
  if (iri === undefined) {
    throw malformed(node.value, `${predicate} must be an identifier`);
  }
  return iri;
}

function integerAt(
  index: GraphIndex,
  node: Term,
  predicate: string,
): number | undefined {
  const term = index.object(node, predicate);
  if (term === undefined) return undefined;
  const value = literalInteger(term);
  if (value === undefined) {
    throw malformed(node.value, `${predicate} must be an integer`);
  }
  return value;
}

function booleanAt(
  index: GraphIndex,
  node: Term,
  predicate: string,
): boolean | undefined {
  const term = index.object(node, predicate);
  if (term === undefined) return undefined;
  const value = literalBoolean(term);
  if (value === undefined) {
    throw malformed(node.value, `${predicate} must be a boolean`);
  }
  return value;
}

function langStringAt(
  index: GraphIndex,
  node: Term,
  predicate: string,
): LangString | undefined {
  const entries: [string, string][] = [];
  for (const term of index.objects(node, predicate)) {
    if (term.termType !== "Literal" || term.language === "") {
      throw malformed(node.value, `${predicate} must be language-tagged text`);
    }
    entries.push([term.language.toLowerCase(), term.value]);
  }
  if (entries.length === 0) return undefined;
  return Object.freeze(Object.fromEntries(entries));
}

function dateTimeAt(
  index: GraphIndex,
  node: Term,
  predicate: string,
): string | undefined {
  const term = index.object(node, predicate);
  if (term === undefined) return undefined;
  const lexical = literalText(term);
  if (lexical === undefined || !isValidLexical(lexical, XSD_DATE_TIME)) {
    throw malformed(node.value, `${predicate} must be an xsd:dateTime`);
  }
  return lexical;
}

/**
 * Dublin Core provenance of a node. Without `dcterms:created` the node
 * has none; a missing `dcterms:modified` reads as the creation time.
 */
function provenanceAt(index: GraphIndex, node: Term): Provenance | undefined {
  const created = dateTimeAt(index, node, DCTERMS.created);
  if (created === undefined) return undefined;
  const creator = iriAt(index, node, DCTERMS.creator);
  const contributor = iriAt(index, node, DCTERMS.contributor);
  return Object.freeze({
    created,
    modified: dateTimeAt(index, node, DCTERMS.modified) ?? created,
    ...(creator !== undefined && { creator }),
    ...(contributor !== undefined && { contributor }),
  });
}

function inMember(node: Term, term: Term): InValue {
  const iri = asIri(term);
  if (iri !== undefined) return iri;
  const value = literalValue(term);
  if (value === undefined || value.language !== undefined) {
    throw malformed(
      node.value,
      "sh:in members must be identifiers or typed literals",
    );
  }
  return Object.freeze({ lexical: value.lexical, datatype: value.datatype });
}

// ============================================================
// Constraint Graph
// ============================================================

/**
 * Reads restriction facets from a property shape or a private binding
 * node. Counts on a binding node belong to the binding.
 */
function readFacets(
  index: GraphIndex,
  node: Term,
  withCounts: boolean,
): RestrictionSet {
  const set: MutableRestrictionSet = {};
  const assign = <K extends keyof RestrictionSet>(
    facet: K,
    value: RestrictionSet[K] | undefined,
  ) => {
    if (value !== undefined) set[facet] = value;
  };

  assign("datatype", iriAt(index, node, SH.datatype));
  assign("targetClass", iriAt(index, node, SH.class));
  if (withCounts) {
    assign("minCount", integerAt(index, node, SH.minCount));
    assign("maxCount", integerAt(index, node, SH.maxCount));
  }
  assign("minLength", integerAt(index, node, SH.minLength));
  assign("maxLength", integerAt(index, node, SH.maxLength));

  const pattern = index.object(node, SH.pattern);
  if (pattern !== undefined) assign("pattern", literalText(pattern));

  for (const facet of NUMERIC_BOUND_FACETS) {
    const term = index.object(node, SH[facet]);
    if (term === undefined) continue;
    const literal = literalValue(term);
    const bound = literal === undefined ? undefined : numericValue(literal);
    if (bound === undefined) {
      throw malformed(node.value, `${SH[facet]} must be a number`);
    }
    assign(facet, bound);
  }

  const members = index.object(node, SH.in);
  if (members !== undefined) {
    assign(
      "in",
      Object.freeze(index.list(members).map((term) => inMember(node, term))),
    );
  }
  const languages = index.object(node, SH.languageIn);
  if (languages !== undefined) {
    assign(
      "languageIn",
      Object.freeze(
        index.list(languages).map((term) => {
          const tag = literalText(term);
          if (tag === undefined) {
            throw malformed(
              node.value,
              "sh:languageIn members must be literals",
            );
          }
          return tag.toLowerCase();
        }),
      ),
    );
  }
  assign("uniqueLang", booleanAt(index, node, SH.uniqueLang));
  assign("lessThan", iriAt(index, node, SH.lessThan));
  assign("lessThanOrEquals", iriAt(index, node, SH.lessThanOrEquals));

  return Object.freeze(set);
}

function readConstraintProperty(
  index: GraphIndex,
  node: Term,
  iri: Iri,
  withCounts: boolean,
): ConstraintProperty {
  const name = langStringAt(index, node, SH.name);
  const description = langStringAt(index, node, SH.description);
  const provenance = provenanceAt(index, node);
  return {
    iri,
    restrictions: readFacets(index, node, withCounts),
    ...(name !== undefined && { name }),
    ...(description !== undefined && { description }),
    ...(provenance !== undefined && { provenance }),
  };
}

function readPropertyShapes(index: GraphIndex): Map<Iri, ConstraintProperty> {
  const properties = new Map<Iri, ConstraintProperty>();
  for (const node of index.instancesOf(SH.PropertyShape)) {
    const iri =
      node.termType === "NamedNode" ? fromShapeIri(node.value) : undefined;
    if (iri === undefined) {
      throw malformed(
        node.value,
        "property shape is not named after its property",
      );
    }
    const path = iriAt(index, node, SH.path);
    if (path !== iri) {
      throw malformed(node.value, `sh:path must be ${iri}`);
    }
    properties.set(iri, readConstraintProperty(index, node, iri, true));
  }
  return properties;
}

function readBinding(
  index: GraphIndex,
  classIri: Iri,
  node: Term,
): ConstraintBinding {
  const propertyIri = iriAt(index, node, SH.path);
  if (propertyIri === undefined) {
    throw malformed(classIri, "binding without sh:path");
  }
  const minCount = integerAt(index, node, SH.minCount);
  const maxCount = integerAt(index, node, SH.maxCount);
  const position = integerAt(index, node, SG.position);
  const base = {
    propertyIri,
    ...(minCount !== undefined && { minCount }),
    ...(maxCount !== undefined && { maxCount }),
    order: integerAt(index, node, SH.order) ?? 0,
    ...(position !== undefined && { position }),
  };

  const link = iriAt(index, node, SH.property);
  if (link !== undefined) {
    if (fromShapeIri(link) !== propertyIri) {
      throw malformed(classIri, `binding of ${propertyIri} links ${link}`);
    }
    return base;
  }
  return {
    ...base,
    definition: readConstraintProperty(index, node, propertyIri, false),
  };
}

function readNodeShapes(index: GraphIndex): Map<Iri, ConstraintClass> {
  const classes = new Map<Iri, ConstraintClass>();
  for (const node of index.instancesOf(SH.NodeShape)) {
    const iri =
      iriAt(index, node, SH.targetClass) ??
      (node.termType === "NamedNode" ? fromShapeIri(node.value) : undefined);
    if (iri === undefined) {
      throw malformed(node.value, "node shape without sh:targetClass");
    }

    const parentShape = iriAt(index, node, SH.node);
    const superclass =
      parentShape === undefined ? undefined : fromShapeIri(parentShape);
    if (parentShape !== undefined && superclass === undefined) {
      throw malformed(
        node.value,
        `sh:node ${parentShape} is not a class shape`,
      );
    }

    const label = langStringAt(index, node, RDFS.label);
    const comment = langStringAt(index, node, RDFS.comment);
    const provenance = provenanceAt(index, node);
    classes.set(iri, {
      iri,
      ...(superclass !== undefined && { superclass }),
      closed: booleanAt(index, node, SH.closed) ?? false,
      ...(label !== undefined && { label }),
      ...(comment !== undefined && { comment }),
      ...(provenance !== undefined && { provenance }),
      bindings: index
        .objects(node, SH.property)
        .map((binding) => readBinding(index, iri, binding)),
    });
  }
  return classes;
}

// ============================================================
// Inference Graph
// ============================================================

const PROPERTY_TYPES = [OWL.DatatypeProperty, OWL.ObjectProperty, RDF.Property];

function readOwlProperties(index: GraphIndex): Map<Iri, InferenceProperty> {
  const properties = new Map<Iri, InferenceProperty>();
  for (const type of PROPERTY_TYPES) {
    for (const node of index.instancesOf(type)) {
      const iri = asIri(node);
      if (iri === undefined) continue;
      const domains = new Set<Iri>();
      for (const term of index.objects(node, RDFS.domain)) {
        const domain = asIri(term);
        if (domain !== undefined) domains.add(domain);
      }
      const range = iriAt(index, node, RDFS.range);
      const subPropertyOf = iriAt(index, node, RDFS.subPropertyOf);
      const provenance = provenanceAt(index, node);
      properties.set(iri, {
        iri,
        type,
        ...(range !== undefined && { range }),
        ...(subPropertyOf !== undefined && { subPropertyOf }),
        domains,
        ...(provenance !== undefined && { provenance }),
      });
    }
  }
  return properties;
}

function readOwlCardinality(
  index: GraphIndex,
  node: Term,
): InferenceCardinality {
  const exact =
    integerAt(index, node, OWL.qualifiedCardinality) ??
    integerAt(index, node, OWL.cardinality);
  if (exact !== undefined) return { minCount: exact, maxCount: exact };
  const minCount =
    integerAt(index, node, OWL.minQualifiedCardinality) ??
    integerAt(index, node, OWL.minCardinality);
  const maxCount =
    integerAt(index, node, OWL.maxQualifiedCardinality) ??
    integerAt(index, node, OWL.maxCardinality);
  return {
    ...(minCount !== undefined && { minCount }),
    ...(maxCount !== undefined && { maxCount }),
  };
}

function readOwlClasses(index: GraphIndex): Map<Iri, InferenceClass> {
  const classes = new Map<Iri, InferenceClass>();
  for (const node of index.instancesOf(OWL.Class)) {
    const iri = asIri(node);
    if (iri === undefined) continue;
    let superclass: Iri | undefined;
    const restrictions = new Map<Iri, InferenceCardinality>();
    for (const parent of index.objects(node, RDFS.subClassOf)) {
      const named = asIri(parent);
      if (named !== undefined) {
        superclass = named;
        continue;
      }
      const onProperty = iriAt(index, parent, OWL.onProperty);
      if (onProperty === undefined) continue;
      restrictions.set(onProperty, readOwlCardinality(index, parent));
    }
    const provenance = provenanceAt(index, node);
    classes.set(iri, {
      iri,
      ...(superclass !== undefined && { superclass }),
      restrictions,
      ...(provenance !== undefined && { provenance }),
    });
  }
  return classes;
}

// ============================================================
// Cross-graph Checks
// ============================================================

function expectedType(restrictions: RestrictionSet): string {
  if (restrictions.datatype !== undefined) return OWL.DatatypeProperty;
  if (restrictions.targetClass !== undefined) return OWL.ObjectProperty;
  return RDF.Property;
}

function describe(value: string | undefined): string {
  return value ?? "(none)";
}

/**
 * Compares what the two graphs say about each entity.
 */
class CrossGraphCheck {
  readonly #project: string;

  constructor(project: string) {
    this.#project = project;
  }

  mismatch(
    message: string,
    subject: string,
    presentIn?: "constraint" | "inference",
  ): CrossGraphMismatchError {
    return new CrossGraphMismatchError(message, {
      project: this.#project,
      subject,
      ...(presentIn !== undefined && { presentIn }),
    });
  }

  property(
    constraint: ConstraintProperty,
    inference: InferenceProperty | undefined,
    domain: Iri | undefined,
  ): void {
    const iri = constraint.iri;
    if (inference === undefined) {
      throw this.mismatch(
        `Property ${iri} is missing from the inference graph`,
        iri,
        "constraint",
      );
    }
    const type = expectedType(constraint.restrictions);
    if (inference.type !== type) {
      throw this.mismatch(
        `Property ${iri} is typed ${inference.type} but its restrictions need ${type}`,
        iri,
      );
    }
    const range =
      constraint.restrictions.datatype ?? constraint.restrictions.targetClass;
    if (inference.range !== range) {
      throw this.mismatch(
        `Property ${iri} has range ${describe(inference.range)} but restricts values to ${describe(range)}`,
        iri,
      );
    }
    if (domain === undefined && inference.domains.size > 0) {
      throw this.mismatch(
        `Standalone property ${iri} has a domain in the inference graph`,
        iri,
      );
    }
    if (domain !== undefined && !inference.domains.has(domain)) {
      throw this.mismatch(
        `Private property ${iri} of ${domain} lacks its domain in the inference graph`,
        iri,
      );
    }
    this.provenance("Property", iri, constraint.provenance, inference.provenance);
  }

  provenance(
    entity: "Property" | "Resource class",
    iri: Iri,
    constraint: Provenance | undefined,
    inference: Provenance | undefined,
  ): void {
    if (provenanceEqual(constraint, inference)) return;
    throw this.mismatch(
      `${entity} ${iri} was created ${describe(constraint?.created)} and modified ${describe(constraint?.modified)} in the constraint graph but created ${describe(inference?.created)} and modified ${describe(inference?.modified)} in the inference graph`,
      iri,
    );
  }

  resourceClass(
    constraint: ConstraintClass,
    inference: InferenceClass | undefined,
  ): void {
    const iri = constraint.iri;
    if (inference === undefined) {
      throw this.mismatch(
        `Resource class ${iri} is missing from the inference graph`,
        iri,
        "constraint",
      );
    }
    if (inference.superclass !== constraint.superclass) {
      throw this.mismatch(
        `Resource class ${iri} has superclass ${describe(constraint.superclass)} in the constraint graph but ${describe(inference.superclass)} in the inference graph`,
        iri,
      );
    }
    this.provenance(
      "Resource class",
      iri,
      constraint.provenance,
      inference.provenance,
    );

    const bound = new Set<Iri>();
    for (const binding of constraint.bindings) {
      bound.add(binding.propertyIri);
      const cardinality = inference.restrictions.get(binding.propertyIri);
      if (cardinality === undefined) {
        throw this.mismatch(
          `Binding of ${binding.propertyIri} on ${iri} is missing from the inference graph`,
          iri,
          "constraint",
        );
      }
      if (
        cardinality.minCount !== binding.minCount ||
        cardinality.maxCount !== binding.maxCount
      ) {
        throw this.mismatch(
          `Binding of ${binding.propertyIri} on ${iri} has different cardinalities in the two graphs`,
          iri,
        );
      }
    }
    for (const property of inference.restrictions.keys()) {
      if (!bound.has(property)) {
        throw this.mismatch(
          `Binding of ${property} on ${iri} is missing from the constraint graph`,
          iri,
          "inference",
        );
      }
    }
  }

  markers(
    project: Project,
    constraint: SnapshotMarker | undefined,
    inference: SnapshotMarker | undefined,
  ): void {
    if (constraint === inference) return;
    throw this.mismatch(
      `Snapshot markers differ: ${describe(constraint)} in the constraint graph, ${describe(inference)} in the inference graph`,
      constraint === undefined ? project.ontologySubject : project.shapesSubject,
      constraint === undefined ? "inference"
      : inference === undefined ? "constraint"
      : undefined,
    );
  }
}

// ============================================================
// Model Assembly
// ============================================================

function assembleProperty(
  constraint: ConstraintProperty,
  origin: Property["origin"],
  inference: InferenceProperty | undefined,
): Property {
  const subPropertyOf = inference?.subPropertyOf;
  return Object.freeze({
    iri: constraint.iri,
    origin,
    restrictions: constraint.restrictions,
    ...(constraint.name !== undefined && { name: constraint.name }),
    ...(constraint.description !== undefined && {
      description: constraint.description,
    }),
    ...(subPropertyOf !== undefined && { subPropertyOf }),
    ...(constraint.provenance !== undefined && {
      provenance: constraint.provenance,
    }),
  });
}

function assembleClass(
  shape: ConstraintClass,
  owlProperties: ReadonlyMap<Iri, InferenceProperty>,
): ResourceClass {
  const bindings = [...shape.bindings]
    .sort(compareDeclared)
    .map((binding): HasProperty => {
      const reference: PropertyReference =
        binding.definition === undefined ?
          { kind: "standalone", iri: binding.propertyIri }
        : {
            kind: "private",
            property: assembleProperty(
              binding.definition,
              "private",
              owlProperties.get(binding.propertyIri),
            ),
          };
      return Object.freeze({
        property: reference,
        ...(binding.minCount !== undefined && { minCount: binding.minCount }),
        ...(binding.maxCount !== undefined && { maxCount: binding.maxCount }),
        order: binding.order,
      });
    });

  return Object.freeze({
    iri: shape.iri,
    ...(shape.superclass !== undefined && { superclass: shape.superclass }),
    bindings: Object.freeze(bindings),
    closed: shape.closed,
    ...(shape.label !== undefined && { label: shape.label }),
    ...(shape.comment !== undefined && { comment: shape.comment }),
    ...(shape.provenance !== undefined && { provenance: shape.provenance }),
  });
}

/**
 * Declaration order; bindings without a stored position follow, in
 * display order.
 */
function compareDeclared(
  left: ConstraintBinding,
  right: ConstraintBinding,
): number {
  const a = left.position ?? Number.POSITIVE_INFINITY;
  const b = right.position ?? Number.POSITIVE_INFINITY;
  if (a !== b) return a < b ? -1 : 1;
  if (left.order !== right.order) return left.order - right.order;
  return compareIri(left.propertyIri, right.propertyIri);
}

function sortedValues<T>(map: ReadonlyMap<Iri, T>): T[] {
  return [...map.entries()]
    .sort(([left], [right]) => compareIri(left, right))
    .map(([, value]) => value);
}

// ============================================================
// Entry Point
// ============================================================

/**
 * Rebuilds a model from the statements of its two graphs.
 *
 * Every property and class must be described in both graphs and the
 * descriptions must agree; the super-property is read from the
 * inference graph.
 *
 * @throws CrossGraphMismatchError when the graphs disagree
 * @throws ModelInconsistentError when a statement has an unusable value
 */
export function deserializeModel(
  constraintStatements: readonly Statement[],
  inferenceStatements: readonly Statement[],
  project: Project,
): DeserializedModel {
  const check = new CrossGraphCheck(project.shortName);
  const marker = readMarker(project, constraintStatements);
  check.markers(project, marker, readMarker(project, inferenceStatements));

  const shacl = new GraphIndex(constraintStatements);
  const onto = new GraphIndex(inferenceStatements);
  const shapes = readPropertyShapes(shacl);
  const nodeShapes = readNodeShapes(shacl);
  const owlProperties = readOwlProperties(onto);
  const owlClasses = readOwlClasses(onto);

  const privateOwners = new Map<Iri, Set<Iri>>();
  for (const shape of nodeShapes.values()) {
    for (const binding of shape.bindings) {
      if (binding.definition === undefined) continue;
      check.property(
        binding.definition,
        owlProperties.get(binding.propertyIri),
        shape.iri,
      );
      const owners = privateOwners.get(binding.propertyIri) ?? new Set<Iri>();
      owners.add(shape.iri);
      privateOwners.set(binding.propertyIri, owners);
    }
  }
  for (const shape of shapes.values()) {
    check.property(shape, owlProperties.get(shape.iri), undefined);
  }
  for (const owl of owlProperties.values()) {
    if (owl.domains.size === 0 && !shapes.has(owl.iri)) {
      throw check.mismatch(
        `Property ${owl.iri} is missing from the constraint graph`,
        owl.iri,
        "inference",
      );
    }
    for (const domain of owl.domains) {
      if (privateOwners.get(owl.iri)?.has(domain) !== true) {
        throw check.mismatch(
          `Private property ${owl.iri} of ${domain} is missing from the constraint graph`,
          owl.iri,
          "inference",
        );
      }
    }
  }

  for (const shape of nodeShapes.values()) {
    check.resourceClass(shape, owlClasses.get(shape.iri));
  }
  for (const owl of owlClasses.values()) {
    if (!nodeShapes.has(owl.iri)) {
      throw check.mismatch(
        `Resource class ${owl.iri} is missing from the constraint graph`,
        owl.iri,
        "inference",
      );
    }
  }

  const properties = new Map<Iri, Property>();
  for (const shape of sortedValues(shapes)) {
    properties.set(
      shape.iri,
      assembleProperty(shape, "standalone", owlProperties.get(shape.iri)),
    );
  }
  const resourceClasses = new Map<Iri, ResourceClass>();
  for (const shape of sortedValues(nodeShapes)) {
    resourceClasses.set(shape.iri, assembleClass(shape, owlProperties));
  }

  return {
    model: Object.freeze({ properties, resourceClasses }),
    marker,
  };
}
