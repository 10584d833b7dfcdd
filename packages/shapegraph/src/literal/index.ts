export {
  areComparable,
  datatypeCategory,
  type DatatypeCategory,
  type DatatypeInfo,
  getDatatype,
  isLangString,
  isNumeric,
  isStringLike,
  supportedDatatypes,
} from "./datatypes";
export {
  isLanguageTag,
  type LangString,
  langString,
  langStringsEqual,
} from "./lang-string";
export {
  formatTypedValue,
  isValidLexical,
  lexicalForm,
  type LiteralInput,
  numericValue,
  parseTypedValue,
  type TypedValue,
  typedValuesEqual,
} from "./typed-value";
