/**
 * Column set fixtures shared by resolver, emitter and CLI tests.
 */

import type { ColumnSet } from "@typeforest/shared-types";

import { getNextColumnSetId } from "../setup/reset";

/** Three shapes with two recurring pairs: {Id,DateCreated} and {Id,Name}. */
export const PERSON_COLUMN_SETS: ColumnSet[] = [
  ["Id", "DateCreated", "DateDeleted"],
  ["Id", "DateCreated", "Name"],
  ["Id", "Name"],
];

/** Every pair except {B,C}, {B,D} and {C,D} recurs. */
export const OVERLAPPING_TRIPLES: ColumnSet[] = [
  ["A", "B", "C"],
  ["A", "B", "D"],
  ["A", "C", "D"],
];

/**
 * A column set of `width` generated field names, unique across calls until
 * resetFactories() runs.
 */
export function createColumnSet(width: number, prefix = "Field"): ColumnSet {
  const id = getNextColumnSetId();
  return Array.from({ length: width }, (_, index) => `${prefix}${id}_${index}`);
}
