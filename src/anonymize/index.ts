export { UrlAnonymizer } from "./url.js";
export { maskString, anonymizeCsv, anonymizeList, isTrustedKey, DEFAULT_TRUSTED_KEY_DOMAINS } from "./strings.js";
export { loadVocabulary, DEFAULT_VOCABULARY_FILE } from "./vocabulary.js";
export {
  AnonymizedObject,
  ObjectEncoder,
  type AnonymizeOptions,
  type KindObjects,
  type ObjectKind,
} from "./encoders.js";
