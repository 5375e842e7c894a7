import { AppError, formatZodIssues } from "@typeforest/runtime-shared";
import { type ColumnSet, ErrorCode } from "@typeforest/shared-types";
import { z } from "zod";

import { distinctFields, fieldSetKey } from "./field-sets";
import type { FieldSubset, SubsetExtractionOptions } from "./types";

export const DEFAULT_MIN_SUBSET_SIZE = 2;
export const DEFAULT_MAX_FIELDS_PER_COLUMN_SET = 20;

/** Bitmask enumeration stops being representable past this width. */
export const MAX_ENUMERABLE_FIELDS = 30;

const ExtractionLimitsSchema = z.object({
  minSubsetSize: z.number().int().min(1).default(DEFAULT_MIN_SUBSET_SIZE),
  maxFieldsPerColumnSet: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_MAX_FIELDS_PER_COLUMN_SET),
});

function parseLimits(
  options: SubsetExtractionOptions,
): z.infer<typeof ExtractionLimitsSchema> {
  const result = ExtractionLimitsSchema.safeParse(options);
  if (!result.success) {
    throw new AppError(ErrorCode.INVALID_INPUT, result.error, {
      operation: "findRecurringSubsets",
      violations: formatZodIssues(result.error),
    });
  }
  return result.data;
}

/**
 * Every subset of the column set's distinct fields with at least `minSize`
 * members. Subset `n` holds field `i` when bit `i` of `n` is set, so the
 * result order is fixed for a fixed column set.
 *
 * For k distinct fields and minSize 2 this yields 2^k - k - 1 subsets.
 *
 * @throws AppError INVALID_INPUT when the column set has more than
 *   MAX_ENUMERABLE_FIELDS distinct fields
 */
export function enumerateSubsets(
  columnSet: ColumnSet,
  minSize: number = DEFAULT_MIN_SUBSET_SIZE,
): string[][] {
  const fields = distinctFields(columnSet);
  if (fields.length > MAX_ENUMERABLE_FIELDS) {
    throw new AppError(ErrorCode.INVALID_INPUT, undefined, {
      operation: "enumerateSubsets",
      fieldCount: fields.length,
      limit: MAX_ENUMERABLE_FIELDS,
    });
  }
  const subsets: string[][] = [];

  for (let mask = 1; mask < 1 << fields.length; mask++) {
    const subset = fields.filter((_, index) => (mask & (1 << index)) !== 0);
    if (subset.length >= minSize) {
      subsets.push(subset);
    }
  }
  return subsets;
}

interface PoolEntry {
  subset: FieldSubset;
  occurrences: number;
}

/**
 * Finds the field subsets shared by at least two distinct column sets.
 *
 * Result is ordered by size ascending; equal sizes keep discovery order
 * (input order, then enumeration order).
 *
 * @throws AppError INVALID_INPUT when a column set is wider than the
 *   enumeration limit, or when a limit is not a positive integer
 */
export function findRecurringSubsets(
  columnSets: readonly ColumnSet[],
  options: SubsetExtractionOptions = {},
): FieldSubset[] {
  const limits = parseLimits(options);
  const minSize = limits.minSubsetSize;
  const limit = Math.min(limits.maxFieldsPerColumnSet, MAX_ENUMERABLE_FIELDS);

  const pool = new Map<string, PoolEntry>();

  columnSets.forEach((columnSet, columnSetIndex) => {
    const fieldCount = distinctFields(columnSet).length;
    if (fieldCount > limit) {
      throw new AppError(ErrorCode.INVALID_INPUT, undefined, {
        operation: "findRecurringSubsets",
        columnSetIndex,
        fieldCount,
        limit,
      });
    }

    // distinct fields give distinct subsets, so each input counts once
    for (const fields of enumerateSubsets(columnSet, minSize)) {
      const key = fieldSetKey(fields);
      const entry = pool.get(key);
      if (entry) {
        entry.occurrences++;
      } else {
        pool.set(key, { subset: { fields, key }, occurrences: 1 });
      }
    }
  });

  return [...pool.values()]
    .filter((entry) => entry.occurrences > 1)
    .map((entry) => entry.subset)
    .sort((a, b) => a.fields.length - b.fields.length);
}
