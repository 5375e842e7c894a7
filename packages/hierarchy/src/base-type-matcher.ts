import type {
  BaseTypeDescriptor,
  ColumnSet,
  TypeParent,
} from "@typeforest/shared-types";

import { isSubsetOf } from "./field-sets";

/**
 * Orders candidates most specific first: descending full field count, ties
 * in registry order.
 */
export function rankCandidates(
  candidates: readonly BaseTypeDescriptor[],
): BaseTypeDescriptor[] {
  return [...candidates].sort(
    (a, b) => b.fullFields().size - a.fullFields().size,
  );
}

/**
 * The first ranked candidate whose every field, own or inherited, is present
 * in the column set. With ranked input that is the closest ancestor.
 */
export function findClosestBaseType(
  columnSet: ColumnSet,
  rankedCandidates: readonly BaseTypeDescriptor[],
): BaseTypeDescriptor | null {
  const fields = new Set(columnSet);
  return (
    rankedCandidates.find((candidate) =>
      isSubsetOf(candidate.fullFields(), fields),
    ) ?? null
  );
}

export interface BaseTypeMatch {
  parent: TypeParent;
  /** Fields the derived type inherits and must not redeclare. */
  inheritedFields: ReadonlySet<string>;
}

const NO_FIELDS: ReadonlySet<string> = new Set();

/**
 * Closest base type for the column set, falling back to the capability
 * marker. Returns null only when nothing matched and no marker was given.
 */
export function matchBaseType(
  columnSet: ColumnSet,
  rankedCandidates: readonly BaseTypeDescriptor[],
  capabilityMarker: string | undefined,
): BaseTypeMatch | null {
  const base = findClosestBaseType(columnSet, rankedCandidates);
  if (base) {
    return {
      parent: { kind: "type", name: base.name },
      inheritedFields: base.fullFields(),
    };
  }
  if (capabilityMarker === undefined) {
    return null;
  }
  return {
    parent: { kind: "marker", name: capabilityMarker },
    inheritedFields: NO_FIELDS,
  };
}
