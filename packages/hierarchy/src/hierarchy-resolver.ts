import { AppError } from "@typeforest/runtime-shared";
import {
  type ColumnSet,
  ErrorCode,
  type TypeParent,
  type TypeRegistry,
} from "@typeforest/shared-types";

import { matchBaseType, rankCandidates } from "./base-type-matcher";
import { distinctFields, fieldSetKey } from "./field-sets";
import type { IdSequence } from "./id-sequence";
import { SubsetForest } from "./subset-forest";
import { findRecurringSubsets } from "./subset-extractor";
import type { FieldSubset, SubsetExtractionOptions } from "./types";

export interface UnanchoredForest {
  forest: SubsetForest;
  /** Node representing each input column set, by input index. */
  columnSetNodeIds: Array<number | null>;
  recurringSubsets: FieldSubset[];
}

/**
 * Builds the inheritance forest from recurring subsets (and, when asked,
 * the column sets themselves).
 *
 * Nodes are visited largest first. Each takes as parent the first later node
 * whose fields it fully contains, scanning by size descending and, within a
 * size, in discovery order. Nodes are added to the forest smallest first, so
 * ids follow that ascending order.
 */
export function resolveUnanchoredForest(
  columnSets: readonly ColumnSet[],
  ids: IdSequence,
  options: SubsetExtractionOptions & { includeColumnSets: boolean },
): UnanchoredForest {
  const recurring = findRecurringSubsets(columnSets, options);

  // discovery order: recurring subsets, then column sets not already known
  const discovered = recurring.map((subset) => subset.fields);
  const indexByKey = new Map(
    recurring.map((subset, index) => [subset.key, index]),
  );
  const columnSetEntries = columnSets.map((columnSet) => {
    const fields = distinctFields(columnSet);
    if (fields.length === 0) {
      return null;
    }
    const key = fieldSetKey(fields);
    const known = indexByKey.get(key);
    if (known !== undefined) {
      return known;
    }
    if (!options.includeColumnSets) {
      return null;
    }
    discovered.push(fields);
    indexByKey.set(key, discovered.length - 1);
    return discovered.length - 1;
  });

  const ascending = discovered
    .map((fields, discoveryIndex) => ({ fields, discoveryIndex }))
    .sort((a, b) => a.fields.length - b.fields.length);

  const forest = new SubsetForest(ids);
  const nodeIdByDiscovery = new Map<number, number>();
  for (const entry of ascending) {
    nodeIdByDiscovery.set(entry.discoveryIndex, forest.add(entry.fields).id);
  }

  // ids ascend with insertion, so id order is discovery order within a size
  const scanOrder = forest
    .list()
    .sort((a, b) => b.fields.length - a.fields.length || a.id - b.id);

  scanOrder.forEach((node, position) => {
    const parent = scanOrder
      .slice(position + 1)
      .find(
        (candidate) =>
          candidate.fields.length < node.fields.length &&
          forest.contains(candidate.id, node.id),
      );
    if (parent) {
      forest.setParent(node.id, parent.id);
    }
  });

  return {
    forest,
    columnSetNodeIds: columnSetEntries.map((discoveryIndex) =>
      discoveryIndex === null
        ? null
        : (nodeIdByDiscovery.get(discoveryIndex) ?? null),
    ),
    recurringSubsets: recurring,
  };
}

export interface AnchoredMatch {
  /** The column set's distinct fields, in input order. */
  fields: string[];
  parent: TypeParent;
  inheritedFields: ReadonlySet<string>;
}

/**
 * Matches every column set on its own against the registry. Results sit one
 * level below a registry type or the capability marker.
 *
 * @throws AppError UNRESOLVED_ANCHOR when a column set matches no candidate
 *   and no capability marker was supplied
 */
export function resolveAnchoredMatches(
  columnSets: readonly ColumnSet[],
  registry: TypeRegistry,
  capabilityMarker: string | undefined,
): AnchoredMatch[] {
  const ranked = rankCandidates(registry.enumerateCandidates(capabilityMarker));

  return columnSets.map((columnSet, columnSetIndex) => {
    const match = matchBaseType(columnSet, ranked, capabilityMarker);
    if (!match) {
      throw new AppError(ErrorCode.UNRESOLVED_ANCHOR, undefined, {
        operation: "resolveAnchoredMatches",
        columnSetIndex,
        fieldCount: columnSet.length,
      });
    }
    return { fields: distinctFields(columnSet), ...match };
  });
}
