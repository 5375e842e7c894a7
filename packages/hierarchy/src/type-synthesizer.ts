import { silentLogger } from "@typeforest/runtime-shared";
import type {
  ColumnSet,
  TypeDescriptor,
  TypeRegistry,
} from "@typeforest/shared-types";

import { parseColumnSets } from "./column-set-input";
import { withoutFields } from "./field-sets";
import {
  type AnchoredMatch,
  resolveAnchoredMatches,
  resolveUnanchoredForest,
} from "./hierarchy-resolver";
import { createIdSequence, type IdSequence } from "./id-sequence";
import type { SubsetForest } from "./subset-forest";
import type {
  AnchoredResolutionOptions,
  ResolutionResult,
  UnanchoredResolutionOptions,
} from "./types";

export const DEFAULT_TYPE_NAME_PREFIX = "ColumnSubset";
export const DEFAULT_CAPABILITY_MARKER = "IColumnSubset";

/**
 * Turns a resolved forest into descriptors, parents first. Roots anchor to
 * the capability marker.
 */
export function synthesizeForestTypes(
  forest: SubsetForest,
  typeNamePrefix: string,
  capabilityMarker: string,
): TypeDescriptor[] {
  const typeName = (id: number) => `${typeNamePrefix}${id}`;

  return forest.topologicalOrder().map((node): TypeDescriptor => ({
    name: typeName(node.id),
    parent:
      node.parentId === null
        ? { kind: "marker", name: capabilityMarker }
        : { kind: "type", name: typeName(node.parentId) },
    ownFields: [...node.ownFields],
  }));
}

/**
 * One descriptor per match, in input order. Own fields are the column set
 * minus everything the matched base already declares.
 */
export function synthesizeAnchoredTypes(
  matches: readonly AnchoredMatch[],
  typeNamePrefix: string,
  ids: IdSequence,
): TypeDescriptor[] {
  return matches.map((match) => ({
    name: `${typeNamePrefix}${ids.next()}`,
    parent: match.parent,
    ownFields: withoutFields(match.fields, match.inheritedFields),
  }));
}

/**
 * Derives a fresh type hierarchy from the column sets alone.
 *
 * @throws AppError INVALID_INPUT when the input is absent, malformed or has
 *   a column set too wide to enumerate
 */
export function resolveTypeHierarchy(
  columnSets: readonly ColumnSet[] | null | undefined,
  options: UnanchoredResolutionOptions = {},
): ResolutionResult {
  const logger = options.logger ?? silentLogger;
  const input = parseColumnSets(columnSets, "resolveTypeHierarchy");
  const typeNamePrefix = options.typeNamePrefix ?? DEFAULT_TYPE_NAME_PREFIX;

  const { forest, columnSetNodeIds, recurringSubsets } =
    resolveUnanchoredForest(input, options.ids ?? createIdSequence(), {
      minSubsetSize: options.minSubsetSize,
      maxFieldsPerColumnSet: options.maxFieldsPerColumnSet,
      includeColumnSets: options.includeColumnSets ?? true,
    });

  const descriptors = synthesizeForestTypes(
    forest,
    typeNamePrefix,
    options.capabilityMarker ?? DEFAULT_CAPABILITY_MARKER,
  );

  logger.debug(
    {
      columnSets: input.length,
      recurringSubsets: recurringSubsets.length,
      types: descriptors.length,
      roots: descriptors.filter((d) => d.parent.kind === "marker").length,
    },
    "type hierarchy resolved",
  );

  return {
    descriptors,
    columnSetTypes: columnSetNodeIds.map((id) =>
      id === null ? null : `${typeNamePrefix}${id}`,
    ),
    recurringSubsets: recurringSubsets.map((subset) => [...subset.fields]),
  };
}

/**
 * Derives one type per column set, each anchored to its closest registry
 * base type or to the capability marker.
 *
 * @throws AppError INVALID_INPUT when the input is absent or malformed
 * @throws AppError UNRESOLVED_ANCHOR when a column set matches nothing and
 *   no capability marker was supplied
 */
export function resolveAnchoredTypes(
  columnSets: readonly ColumnSet[] | null | undefined,
  registry: TypeRegistry,
  options: AnchoredResolutionOptions = {},
): ResolutionResult {
  const logger = options.logger ?? silentLogger;
  const input = parseColumnSets(columnSets, "resolveAnchoredTypes");

  const matches = resolveAnchoredMatches(
    input,
    registry,
    options.capabilityMarker,
  );
  const descriptors = synthesizeAnchoredTypes(
    matches,
    options.typeNamePrefix ?? DEFAULT_TYPE_NAME_PREFIX,
    options.ids ?? createIdSequence(),
  );

  logger.debug(
    {
      columnSets: input.length,
      anchoredToRegistry: matches.filter((m) => m.parent.kind === "type")
        .length,
      types: descriptors.length,
    },
    "anchored types resolved",
  );

  return {
    descriptors,
    columnSetTypes: descriptors.map((descriptor) => descriptor.name),
    recurringSubsets: [],
  };
}
