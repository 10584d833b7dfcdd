import { type BlankNode, type NamedNode } from "n3";

import { type Iri, resolveIri, toShapeIri } from "../identifier";
import { isNumeric, type LangString, lexicalForm } from "../literal";
import { bindingPropertyIri } from "../model/has-property";
import { resolveReference } from "../model/operations";
import {
  type HasProperty,
  type Model,
  type Property,
  type Provenance,
  type ResourceClass,
} from "../model/types";
import {
  DCTERMS,
  DEFAULT_SYSTEM_PREDICATES,
  OWL,
  RDF,
  RDFS,
  SG,
  SH,
} from "../ontology/constants";
import { NUMERIC_BOUND_FACETS, type RestrictionSet } from "../restrictions";
import {
  booleanLiteral,
  dateTimeLiteral,
  derivedBlankNode,
  integerLiteral,
  iriTerm,
  langLiteral,
  nonNegativeIntegerLiteral,
  sortStatements,
  type Statement,
  statement,
  type StatementObject,
  type StatementSubject,
  stringLiteral,
  typedLiteral,
} from "./terms";

// ============================================================
// Types
// ============================================================

export type SerializeOptions = Readonly<{
  /** Predicates listed in `sh:ignoredProperties` of closed classes */
  systemPredicates?: readonly string[];
  /**
   * Limits output to these properties and classes. A class's statements
   * include those of its private properties.
   */
  scope?: ReadonlySet<Iri>;
}>;

/**
 * Statements of a model, split by the graph they belong to.
 */
export type SerializedModel = Readonly<{
  constraint: readonly Statement[];
  inference: readonly Statement[];
}>;

type Sink = (
  subject: StatementSubject,
  predicate: string,
  object: StatementObject,
) => void;

const FALLBACK_BOUND_DATATYPE = resolveIri("xsd:decimal");

const COUNT_FACETS = [
  "minCount",
  "maxCount",
  "minLength",
  "maxLength",
] as const satisfies readonly (keyof RestrictionSet)[];

// ============================================================
// Entry Point
// ============================================================

/**
 * Writes a model as constraint-graph and inference-graph statements.
 *
 * Output is sorted and deterministic: blank nodes are named after the
 * identifiers that own them, so unchanged entities produce identical
 * statements across calls.
 */
export function serializeModel(
  model: Model,
  options: SerializeOptions = {},
): SerializedModel {
  const constraint: Statement[] = [];
  const inference: Statement[] = [];
  const shacl: Sink = (s, p, o) => constraint.push(statement(s, p, o));
  const owl: Sink = (s, p, o) => inference.push(statement(s, p, o));
  const inScope = (iri: Iri) =>
    options.scope === undefined || options.scope.has(iri);
  const systemPredicates =
    options.systemPredicates ?? DEFAULT_SYSTEM_PREDICATES;

  for (const property of model.properties.values()) {
    if (!inScope(property.iri)) continue;
    writePropertyShape(property, shacl);
    writeOwlProperty(property, undefined, owl);
  }

  for (const resourceClass of model.resourceClasses.values()) {
    if (!inScope(resourceClass.iri)) continue;
    writeNodeShape(resourceClass, systemPredicates, shacl);
    writeOwlClass(model, resourceClass, owl);
    for (const binding of resourceClass.bindings) {
      if (binding.property.kind === "private") {
        writeOwlProperty(binding.property.property, resourceClass.iri, owl);
      }
    }
  }

  return {
    constraint: sortStatements(constraint),
    inference: sortStatements(inference),
  };
}

// ============================================================
// Constraint Graph
// ============================================================

function writePropertyShape(property: Property, out: Sink): void {
  const subject = iriTerm(toShapeIri(property.iri));
  out(subject, RDF.type, iriTerm(SH.PropertyShape));
  out(subject, SH.path, iriTerm(property.iri));
  writeFacets(subject, property.iri, property.restrictions, out);
  writeLangString(subject, SH.name, property.name, out);
  writeLangString(subject, SH.description, property.description, out);
  writeProvenance(subject, property.provenance, out);
}

function writeNodeShape(
  resourceClass: ResourceClass,
  systemPredicates: readonly string[],
  out: Sink,
): void {
  const shapeIri = toShapeIri(resourceClass.iri);
  const subject = iriTerm(shapeIri);
  out(subject, RDF.type, iriTerm(SH.NodeShape));
  out(subject, SH.targetClass, iriTerm(resourceClass.iri));
  out(subject, SH.closed, booleanLiteral(resourceClass.closed));
  if (resourceClass.closed) {
    out(
      subject,
      SH.ignoredProperties,
      writeList(
        shapeIri,
        "ignoredProperties",
        systemPredicates.map((predicate) => iriTerm(predicate)),
        out,
      ),
    );
  }
  writeLangString(subject, RDFS.label, resourceClass.label, out);
  writeLangString(subject, RDFS.comment, resourceClass.comment, out);
  if (resourceClass.superclass !== undefined) {
    out(subject, SH.node, iriTerm(toShapeIri(resourceClass.superclass)));
  }
  writeProvenance(subject, resourceClass.provenance, out);

  resourceClass.bindings.forEach((binding, position) => {
    const propertyIri = bindingPropertyIri(binding);
    const node = bindingNode(resourceClass.iri, propertyIri);
    out(subject, SH.property, node);
    out(node, SH.path, iriTerm(propertyIri));
    writeCounts(node, binding, out);
    out(node, SH.order, integerLiteral(binding.order));
    out(node, SG.position, integerLiteral(position));

    const reference = binding.property;
    if (reference.kind === "standalone") {
      out(node, SH.property, iriTerm(toShapeIri(reference.iri)));
      return;
    }
    writeFacets(
      node,
      `${resourceClass.iri}|${propertyIri}`,
      reference.property.restrictions,
      out,
    );
    writeLangString(node, SH.name, reference.property.name, out);
    writeLangString(node, SH.description, reference.property.description, out);
    writeProvenance(node, reference.property.provenance, out);
  });
}

function bindingNode(classIri: Iri, propertyIri: Iri): BlankNode {
  return derivedBlankNode("hp", classIri, propertyIri);
}

function writeCounts(node: BlankNode, binding: HasProperty, out: Sink): void {
  if (binding.minCount !== undefined) {
    out(node, SH.minCount, integerLiteral(binding.minCount));
  }
  if (binding.maxCount !== undefined) {
    out(node, SH.maxCount, integerLiteral(binding.maxCount));
  }
}

function writeFacets(
  subject: StatementSubject,
  owner: string,
  set: RestrictionSet,
  out: Sink,
): void {
  const boundDatatype =
    set.datatype !== undefined && isNumeric(set.datatype) ?
      set.datatype
    : FALLBACK_BOUND_DATATYPE;

  if (set.datatype !== undefined) {
    out(subject, SH.datatype, iriTerm(set.datatype));
  }
  if (set.targetClass !== undefined) {
    out(subject, SH.class, iriTerm(set.targetClass));
  }
  for (const facet of COUNT_FACETS) {
    const count = set[facet];
    if (count !== undefined) out(subject, SH[facet], integerLiteral(count));
  }
  if (set.pattern !== undefined) {
    out(subject, SH.pattern, stringLiteral(set.pattern));
  }

  for (const facet of NUMERIC_BOUND_FACETS) {
    const bound = set[facet];
    if (bound === undefined) continue;
    out(
      subject,
      SH[facet],
      typedLiteral({ lexical: lexicalForm(bound), datatype: boundDatatype }),
    );
  }

  if (set.in !== undefined) {
    const members = set.in.map((value) =>
      typeof value === "string" ? iriTerm(value) : typedLiteral(value),
    );
    out(subject, SH.in, writeList(owner, "in", members, out));
  }
  if (set.languageIn !== undefined) {
    const tags = set.languageIn.map((tag) => stringLiteral(tag));
    out(subject, SH.languageIn, writeList(owner, "languageIn", tags, out));
  }
  if (set.uniqueLang !== undefined) {
    out(subject, SH.uniqueLang, booleanLiteral(set.uniqueLang));
  }
  if (set.lessThan !== undefined) {
    out(subject, SH.lessThan, iriTerm(set.lessThan));
  }
  if (set.lessThanOrEquals !== undefined) {
    out(subject, SH.lessThanOrEquals, iriTerm(set.lessThanOrEquals));
  }
}

/**
 * Writes an RDF collection and returns its head.
 */
function writeList(
  owner: string,
  facet: string,
  members: readonly StatementObject[],
  out: Sink,
): NamedNode | BlankNode {
  const nodes = members.map((_, index) =>
    derivedBlankNode("l", owner, facet, String(index)),
  );
  members.forEach((member, index) => {
    const node = nodes[index];
    if (node === undefined) return;
    out(node, RDF.first, member);
    out(node, RDF.rest, nodes[index + 1] ?? iriTerm(RDF.nil));
  });
  return nodes[0] ?? iriTerm(RDF.nil);
}

/**
 * Dublin Core creation and modification statements, written alike in
 * both graphs.
 */
function writeProvenance(
  subject: StatementSubject,
  provenance: Provenance | undefined,
  out: Sink,
): void {
  if (provenance === undefined) return;
  out(subject, DCTERMS.created, dateTimeLiteral(provenance.created));
  out(subject, DCTERMS.modified, dateTimeLiteral(provenance.modified));
  if (provenance.creator !== undefined) {
    out(subject, DCTERMS.creator, iriTerm(provenance.creator));
  }
  if (provenance.contributor !== undefined) {
    out(subject, DCTERMS.contributor, iriTerm(provenance.contributor));
  }
}

function writeLangString(
  subject: StatementSubject,
  predicate: string,
  value: LangString | undefined,
  out: Sink,
): void {
  for (const [language, text] of Object.entries(value ?? {})) {
    out(subject, predicate, langLiteral(text, language));
  }
}

// ============================================================
// Inference Graph
// ============================================================

function writeOwlProperty(
  property: Property,
  domain: Iri | undefined,
  out: Sink,
): void {
  const subject = iriTerm(property.iri);
  const { datatype, targetClass } = property.restrictions;
  const type =
    datatype !== undefined ? OWL.DatatypeProperty
    : targetClass !== undefined ? OWL.ObjectProperty
    : RDF.Property;
  out(subject, RDF.type, iriTerm(type));

  const range = datatype ?? targetClass;
  if (range !== undefined) out(subject, RDFS.range, iriTerm(range));
  if (property.subPropertyOf !== undefined) {
    out(subject, RDFS.subPropertyOf, iriTerm(property.subPropertyOf));
  }
  if (domain !== undefined) out(subject, RDFS.domain, iriTerm(domain));
  writeProvenance(subject, property.provenance, out);
}

function restrictionNode(classIri: Iri, propertyIri: Iri): BlankNode {
  return derivedBlankNode("r", classIri, propertyIri);
}

function writeOwlClass(
  model: Model,
  resourceClass: ResourceClass,
  out: Sink,
): void {
  const subject = iriTerm(resourceClass.iri);
  out(subject, RDF.type, iriTerm(OWL.Class));
  if (resourceClass.superclass !== undefined) {
    out(subject, RDFS.subClassOf, iriTerm(resourceClass.superclass));
  }
  writeProvenance(subject, resourceClass.provenance, out);

  for (const binding of resourceClass.bindings) {
    const propertyIri = bindingPropertyIri(binding);
    const node = restrictionNode(resourceClass.iri, propertyIri);
    out(subject, RDFS.subClassOf, node);
    out(node, RDF.type, iriTerm(OWL.Restriction));
    out(node, OWL.onProperty, iriTerm(propertyIri));

    const property = resolveReference(model, binding.property);
    const qualifier =
      property?.restrictions.datatype !== undefined ?
        { predicate: OWL.onDataRange, value: property.restrictions.datatype }
      : property?.restrictions.targetClass !== undefined ?
        { predicate: OWL.onClass, value: property.restrictions.targetClass }
      : undefined;
    writeOwlCardinality(node, binding, qualifier, out);
  }
}

function writeOwlCardinality(
  node: BlankNode,
  binding: HasProperty,
  qualifier: Readonly<{ predicate: string; value: Iri }> | undefined,
  out: Sink,
): void {
  const { minCount, maxCount } = binding;
  if (minCount === undefined && maxCount === undefined) return;

  const exact = qualifier ? OWL.qualifiedCardinality : OWL.cardinality;
  const min = qualifier ? OWL.minQualifiedCardinality : OWL.minCardinality;
  const max = qualifier ? OWL.maxQualifiedCardinality : OWL.maxCardinality;

  if (qualifier) out(node, qualifier.predicate, iriTerm(qualifier.value));
  if (minCount !== undefined && minCount === maxCount) {
    out(node, exact, nonNegativeIntegerLiteral(minCount));
    return;
  }
  if (minCount !== undefined) {
    out(node, min, nonNegativeIntegerLiteral(minCount));
  }
  if (maxCount !== undefined) {
    out(node, max, nonNegativeIntegerLiteral(maxCount));
  }
}
