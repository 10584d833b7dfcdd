/**
 * Named constants for the vocabularies the two schema graphs are written in.
 *
 * Use these constants instead of string literals for type safety
 * and IDE support.
 */

// ============================================================
// Namespaces
// ============================================================

export const RDF_NS = "http://www.w3.org/1999/02/22-rdf-syntax-ns#" as const;
export const RDFS_NS = "http://www.w3.org/2000/01/rdf-schema#" as const;
export const OWL_NS = "http://www.w3.org/2002/07/owl#" as const;
export const XSD_NS = "http://www.w3.org/2001/XMLSchema#" as const;
export const SH_NS = "http://www.w3.org/ns/shacl#" as const;
export const DCTERMS_NS = "http://purl.org/dc/terms/" as const;
/** Terms of this library that no standard vocabulary covers. */
export const SG_NS = "urn:shapegraph:" as const;

/**
 * Prefixes every data model understands without configuration.
 */
export const STANDARD_PREFIXES = Object.freeze({
  rdf: RDF_NS,
  rdfs: RDFS_NS,
  owl: OWL_NS,
  xsd: XSD_NS,
  sh: SH_NS,
  dcterms: DCTERMS_NS,
});

// ============================================================
// RDF / RDFS
// ============================================================

export const RDF = Object.freeze({
  type: `${RDF_NS}type`,
  first: `${RDF_NS}first`,
  rest: `${RDF_NS}rest`,
  nil: `${RDF_NS}nil`,
  Property: `${RDF_NS}Property`,
  langString: `${RDF_NS}langString`,
});

export const RDFS = Object.freeze({
  label: `${RDFS_NS}label`,
  comment: `${RDFS_NS}comment`,
  domain: `${RDFS_NS}domain`,
  range: `${RDFS_NS}range`,
  subClassOf: `${RDFS_NS}subClassOf`,
  subPropertyOf: `${RDFS_NS}subPropertyOf`,
});

// ============================================================
// OWL (inference graph)
// ============================================================

export const OWL = Object.freeze({
  Ontology: `${OWL_NS}Ontology`,
  versionInfo: `${OWL_NS}versionInfo`,
  Class: `${OWL_NS}Class`,
  DatatypeProperty: `${OWL_NS}DatatypeProperty`,
  ObjectProperty: `${OWL_NS}ObjectProperty`,
  Restriction: `${OWL_NS}Restriction`,
  onProperty: `${OWL_NS}onProperty`,
  onClass: `${OWL_NS}onClass`,
  onDataRange: `${OWL_NS}onDataRange`,
  cardinality: `${OWL_NS}cardinality`,
  minCardinality: `${OWL_NS}minCardinality`,
  maxCardinality: `${OWL_NS}maxCardinality`,
  qualifiedCardinality: `${OWL_NS}qualifiedCardinality`,
  minQualifiedCardinality: `${OWL_NS}minQualifiedCardinality`,
  maxQualifiedCardinality: `${OWL_NS}maxQualifiedCardinality`,
});

// ============================================================
// SHACL (constraint graph)
// ============================================================

export const SH = Object.freeze({
  NodeShape: `${SH_NS}NodeShape`,
  PropertyShape: `${SH_NS}PropertyShape`,
  targetClass: `${SH_NS}targetClass`,
  property: `${SH_NS}property`,
  path: `${SH_NS}path`,
  node: `${SH_NS}node`,
  closed: `${SH_NS}closed`,
  ignoredProperties: `${SH_NS}ignoredProperties`,
  order: `${SH_NS}order`,
  name: `${SH_NS}name`,
  description: `${SH_NS}description`,
  datatype: `${SH_NS}datatype`,
  class: `${SH_NS}class`,
  minCount: `${SH_NS}minCount`,
  maxCount: `${SH_NS}maxCount`,
  minLength: `${SH_NS}minLength`,
  maxLength: `${SH_NS}maxLength`,
  pattern: `${SH_NS}pattern`,
  minInclusive: `${SH_NS}minInclusive`,
  minExclusive: `${SH_NS}minExclusive`,
  maxInclusive: `${SH_NS}maxInclusive`,
  maxExclusive: `${SH_NS}maxExclusive`,
  in: `${SH_NS}in`,
  languageIn: `${SH_NS}languageIn`,
  uniqueLang: `${SH_NS}uniqueLang`,
  lessThan: `${SH_NS}lessThan`,
  lessThanOrEquals: `${SH_NS}lessThanOrEquals`,
});

export const DCTERMS = Object.freeze({
  hasVersion: `${DCTERMS_NS}hasVersion`,
  creator: `${DCTERMS_NS}creator`,
  created: `${DCTERMS_NS}created`,
  contributor: `${DCTERMS_NS}contributor`,
  modified: `${DCTERMS_NS}modified`,
});

export const SG = Object.freeze({
  /** Zero-based declaration index of a binding within its class */
  position: `${SG_NS}position`,
});

// ============================================================
// Naming conventions
// ============================================================

/** Appended to an identifier to name its node in the constraint graph. */
export const SHAPE_SUFFIX = "Shape" as const;

/** Local names of the per-project graphs and marker subjects. */
export const CONSTRAINT_GRAPH_NAME = "shacl" as const;
export const INFERENCE_GRAPH_NAME = "onto" as const;
export const SHAPES_SUBJECT_NAME = "shapes" as const;
export const ONTOLOGY_SUBJECT_NAME = "ontology" as const;

/**
 * Predicates always permitted on instances of a closed resource class.
 */
export const DEFAULT_SYSTEM_PREDICATES = Object.freeze([
  RDF.type,
  RDFS.label,
  DCTERMS.creator,
  DCTERMS.created,
  DCTERMS.contributor,
  DCTERMS.modified,
]);
