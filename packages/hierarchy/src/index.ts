// Types
export type {
  AnchoredResolutionOptions,
  FieldSubset,
  ResolutionOptions,
  ResolutionResult,
  SubsetExtractionOptions,
  UnanchoredResolutionOptions,
} from "./types";

// Resolution entry points
export {
  DEFAULT_CAPABILITY_MARKER,
  DEFAULT_TYPE_NAME_PREFIX,
  resolveAnchoredTypes,
  resolveTypeHierarchy,
  synthesizeAnchoredTypes,
  synthesizeForestTypes,
} from "./type-synthesizer";

// Building blocks
export {
  DEFAULT_MAX_FIELDS_PER_COLUMN_SET,
  DEFAULT_MIN_SUBSET_SIZE,
  enumerateSubsets,
  findRecurringSubsets,
  MAX_ENUMERABLE_FIELDS,
} from "./subset-extractor";
export {
  type BaseTypeMatch,
  findClosestBaseType,
  matchBaseType,
  rankCandidates,
} from "./base-type-matcher";
export {
  type AnchoredMatch,
  resolveAnchoredMatches,
  resolveUnanchoredForest,
  type UnanchoredForest,
} from "./hierarchy-resolver";
export { type SubsetInfo, SubsetForest } from "./subset-forest";
export { createIdSequence, type IdSequence } from "./id-sequence";
export { distinctFields, fieldSetKey } from "./field-sets";
export { parseColumnSets } from "./column-set-input";

// Type registry
export { InMemoryTypeRegistry } from "./type-registry";
