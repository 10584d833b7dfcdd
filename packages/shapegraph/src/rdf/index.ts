export {
  deserializeModel,
  type DeserializedModel,
} from "./deserialize";
export {
  describeDelta,
  diffStatements,
  EMPTY_DELTA,
  invertDelta,
  isEmptyDelta,
  mergeDeltas,
  type StatementDelta,
} from "./delta";
export {
  constraintMarkerStatements,
  formatMarker,
  inferenceMarkerStatements,
  isMarkerStatement,
  nextMarker,
  type ParsedMarker,
  parseMarker,
  readMarker,
  type SnapshotMarker,
} from "./marker";
export {
  defineProject,
  type Project,
  type ProjectDefinition,
  projectDefinitionSchema,
  toProject,
} from "./project";
export {
  serializeModel,
  type SerializedModel,
  type SerializeOptions,
} from "./serialize";
export {
  decodeStatement,
  decodeTerm,
  encodeTerm,
  type Statement,
  statementKey,
  sortStatements,
} from "./terms";
