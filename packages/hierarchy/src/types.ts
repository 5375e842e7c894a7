import type { TypeDescriptor } from "@typeforest/shared-types";
import type { Logger } from "pino";

import type { IdSequence } from "./id-sequence";

/** A distinct field collection discovered in the input. */
export interface FieldSubset {
  /** Fields in the order of the column set they were first found in. */
  fields: string[];
  /** Order-insensitive identity, see `fieldSetKey`. */
  key: string;
}

export interface SubsetExtractionOptions {
  /** Smallest subset worth sharing. Defaults to 2. */
  minSubsetSize?: number;
  /**
   * Widest column set that will be enumerated. Enumeration visits 2^k
   * subsets, so this is capped at MAX_ENUMERABLE_FIELDS. Defaults to 20.
   */
  maxFieldsPerColumnSet?: number;
}

export interface ResolutionOptions extends SubsetExtractionOptions {
  /** Generated types are named `${typeNamePrefix}${id}`. */
  typeNamePrefix?: string;
  /** Explicit id source; a fresh sequence starting at 1 otherwise. */
  ids?: IdSequence;
  logger?: Logger;
}

export interface UnanchoredResolutionOptions extends ResolutionOptions {
  /** Marker every root type implements. Defaults to `IColumnSubset`. */
  capabilityMarker?: string;
  /**
   * Also turn every input column set into a node, so each input is
   * represented by a type. Defaults to true.
   */
  includeColumnSets?: boolean;
}

export interface AnchoredResolutionOptions extends ResolutionOptions {
  /**
   * Restricts registry candidates to types satisfying this marker, and is
   * the anchor used when no candidate matches. Without it an unmatched
   * column set fails with UNRESOLVED_ANCHOR.
   */
  capabilityMarker?: string;
}

export interface ResolutionResult {
  /** Parents always precede their children. */
  descriptors: TypeDescriptor[];
  /**
   * Name of the type representing each input column set, by input index.
   * `null` for an input no type represents (an empty column set, or any
   * column set when `includeColumnSets` is off and it is not itself a
   * recurring subset).
   */
  columnSetTypes: Array<string | null>;
  /**
   * Distinct subsets shared by two or more inputs, smallest first. Always
   * empty in anchored mode.
   */
  recurringSubsets: string[][];
}
