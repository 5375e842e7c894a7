import { ErrorCode } from "@typeforest/shared-types";
import {
  createRegistryStub,
  expectAppError,
  PERSON_COLUMN_SETS,
} from "@typeforest/test-utils";
import { describe, expect, it } from "vitest";

import {
  resolveAnchoredMatches,
  resolveUnanchoredForest,
} from "../hierarchy-resolver";
import { createIdSequence } from "../id-sequence";
import type { SubsetForest } from "../subset-forest";

const CHAIN_COLUMN_SETS = [
  ["A", "B", "C", "D"],
  ["A", "B", "C", "E"],
  ["A", "B", "F"],
];

/** The column sets used by the original demonstration run. */
const DEMO_COLUMN_SETS = [
  ["Id", "DateCreated", "DateDeleted"],
  ["Id", "DateCreated", "Name"],
  ["Id", "DateCreated", "DateDeleted", "Name", "Gender"],
  ["Id", "DateCreated", "DateDeleted", "Name", "State"],
  ["Id", "Position", "Gender"],
  ["Id", "OrderID", "OrderDate"],
  ["Id", "Name"],
];

function resolve(columnSets: string[][], includeColumnSets = true) {
  return resolveUnanchoredForest(columnSets, createIdSequence(), {
    includeColumnSets,
  });
}

function parentsById(forest: SubsetForest): Record<number, number | null> {
  return Object.fromEntries(
    forest.list().map((node) => [node.id, node.parentId]),
  );
}

describe("HierarchyResolver", () => {
  describe("resolveUnanchoredForest", () => {
    it("chains column sets under the recurring subsets they contain", () => {
      const { forest, columnSetNodeIds, recurringSubsets } =
        resolve(PERSON_COLUMN_SETS);

      expect(recurringSubsets.map((subset) => subset.fields)).toEqual([
        ["Id", "DateCreated"],
        ["Id", "Name"],
      ]);
      expect(forest.list()).toEqual([
        { id: 1, fields: ["Id", "DateCreated"], ownFields: ["Id", "DateCreated"], parentId: null },
        { id: 2, fields: ["Id", "Name"], ownFields: ["Id", "Name"], parentId: null },
        { id: 3, fields: ["Id", "DateCreated", "DateDeleted"], ownFields: ["DateDeleted"], parentId: 1 },
        { id: 4, fields: ["Id", "DateCreated", "Name"], ownFields: ["Name"], parentId: 1 },
      ]);
      expect(columnSetNodeIds).toEqual([3, 4, 2]);
    });

    it("keeps only recurring subsets when column sets are excluded", () => {
      const { forest, columnSetNodeIds } = resolve(PERSON_COLUMN_SETS, false);

      expect(forest.list().map((node) => node.fields)).toEqual([
        ["Id", "DateCreated"],
        ["Id", "Name"],
      ]);
      expect(columnSetNodeIds).toEqual([null, null, 2]);
    });

    it("builds multi-level chains", () => {
      const { forest, columnSetNodeIds } = resolve(CHAIN_COLUMN_SETS);

      expect(forest.list().map((node) => node.fields.join(""))).toEqual([
        "AB",
        "AC",
        "BC",
        "ABC",
        "ABF",
        "ABCD",
        "ABCE",
      ]);
      expect(parentsById(forest)).toEqual({
        1: null,
        2: null,
        3: null,
        4: 1,
        5: 1,
        6: 4,
        7: 4,
      });
      expect(forest.get(6)?.ownFields).toEqual(["D"]);
      expect(forest.ancestorIds(6)).toEqual([4, 1]);
      expect(columnSetNodeIds).toEqual([6, 7, 5]);
    });

    it("leaves empty column sets unrepresented", () => {
      const { forest, columnSetNodeIds } = resolve([[], ["Id", "Name"]]);

      expect(forest.size).toBe(1);
      expect(columnSetNodeIds).toEqual([null, 1]);
    });

    it("never redeclares a field along an ancestor chain", () => {
      const { forest } = resolve(DEMO_COLUMN_SETS);

      for (const node of forest.list()) {
        const chain = [node.id, ...forest.ancestorIds(node.id)].flatMap(
          (id) => forest.get(id)?.ownFields ?? [],
        );
        expect(new Set(chain).size).toBe(chain.length);
        expect([...chain].sort()).toEqual([...node.fields].sort());
      }
    });

    it("produces the same forest on every run", () => {
      const first = resolve(DEMO_COLUMN_SETS);
      const second = resolve(DEMO_COLUMN_SETS);

      expect(second.forest.list()).toEqual(first.forest.list());
      expect(second.columnSetNodeIds).toEqual(first.columnSetNodeIds);
    });
  });

  describe("resolveAnchoredMatches", () => {
    it("matches each column set on its own", () => {
      const registry = createRegistryStub([
        { name: "Base1", fields: ["Id", "DateCreated"], markers: ["IColumnSubset"] },
        { name: "Base2", fields: ["Id"], markers: ["IColumnSubset"] },
      ]);

      const matches = resolveAnchoredMatches(
        [
          ["Id", "DateCreated", "Name"],
          ["Id", "Name"],
          ["Code"],
        ],
        registry,
        "IColumnSubset",
      );

      expect(matches.map((match) => match.parent)).toEqual([
        { kind: "type", name: "Base1" },
        { kind: "type", name: "Base2" },
        { kind: "marker", name: "IColumnSubset" },
      ]);
      expect(registry.enumerateCandidates).toHaveBeenCalledTimes(1);
      expect(registry.enumerateCandidates).toHaveBeenCalledWith(
        "IColumnSubset",
      );
    });

    it("fails when nothing matches and no marker was given", () => {
      const registry = createRegistryStub([{ name: "Base2", fields: ["Id"] }]);

      const error = expectAppError(
        () => resolveAnchoredMatches([["Id", "Name"], ["Code"]], registry, undefined),
        ErrorCode.UNRESOLVED_ANCHOR,
      );

      expect(error.context).toEqual({
        operation: "resolveAnchoredMatches",
        columnSetIndex: 1,
        fieldCount: 1,
      });
    });
  });
});
