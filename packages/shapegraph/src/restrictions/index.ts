export {
  convertEnumeration,
  type NormalizedRestrictions,
  normalizeRestrictions,
  reconvertEnumeration,
  restrictionInputSchema,
} from "./normalize";
export {
  type InValue,
  NUMERIC_BOUND_FACETS,
  type NumericBoundFacet,
  type PropertyLookup,
  RESTRICTION_FACETS,
  type RestrictionFacet,
  type RestrictionInput,
  type RestrictionSet,
} from "./types";
export {
  patternError,
  validateRestrictionReferences,
  validateRestrictions,
} from "./validate";
