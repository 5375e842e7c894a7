import type {
  BaseTypeDescriptor,
  ColumnSet,
  TypeDescriptor,
} from "@typeforest/shared-types";

const RULE = "-------------------------------------------";

function section(title: string, lines: string[]): string[] {
  return [title, RULE, ...lines, ""];
}

function fieldList(fields: Iterable<string>): string {
  return [...fields].join(",");
}

/**
 * One line per type: its own fields, then each ancestor's, up to the first
 * parent outside the sequence. A registry parent listed in `baseTypes` is
 * shown with its full field set, inherited fields included.
 *
 * @example
 * "ColumnSubset3(DateDeleted) -> ColumnSubset1(Id,DateCreated) -> IColumnSubset"
 */
export function formatTypeChains(
  descriptors: readonly TypeDescriptor[],
  baseTypes: readonly BaseTypeDescriptor[] = [],
): string[] {
  const byName = new Map(descriptors.map((d) => [d.name, d]));
  const baseByName = new Map(baseTypes.map((base) => [base.name, base]));

  const external = (parent: TypeDescriptor["parent"]): string => {
    const base =
      parent.kind === "type" ? baseByName.get(parent.name) : undefined;
    return base ? `${base.name}(${fieldList(base.fullFields())})` : parent.name;
  };

  return descriptors.map((descriptor) => {
    const links = [`${descriptor.name}(${fieldList(descriptor.ownFields)})`];
    const visited = new Set([descriptor.name]);
    let parent = descriptor.parent;
    for (;;) {
      const known =
        parent.kind === "type" ? byName.get(parent.name) : undefined;
      if (!known) {
        links.push(external(parent));
        break;
      }
      if (visited.has(known.name)) {
        links.push(parent.name);
        break;
      }
      links.push(`${known.name}(${fieldList(known.ownFields)})`);
      visited.add(known.name);
      parent = known.parent;
    }
    return links.join(" -> ");
  });
}

export interface HierarchyReportInput {
  columnSets: readonly ColumnSet[];
  /** Type representing each column set, by input index. */
  columnSetTypes: ReadonlyArray<string | null>;
  descriptors: readonly TypeDescriptor[];
  /** Unanchored runs: printed as their own section when given. */
  recurringSubsets?: ReadonlyArray<readonly string[]>;
  /** Anchored runs: the registry types, printed with their full fields. */
  baseTypes?: readonly BaseTypeDescriptor[];
}

/**
 * Full textual report: the input column sets and the type chosen for each,
 * the recurring subsets or registry types the hierarchy was built from, and
 * the resolved hierarchy.
 */
export function formatHierarchyReport(input: HierarchyReportInput): string {
  const { columnSets, columnSetTypes, descriptors } = input;
  const inputs = columnSets.map(
    (columnSet, index) =>
      `[${columnSet.join(", ")}] => ${columnSetTypes[index] ?? "(none)"}`,
  );

  return [
    ...section("Input column sets:", inputs),
    ...(input.recurringSubsets
      ? section(
          "Distinct subsets of recurring column names:",
          input.recurringSubsets.map((fields) => `(${fieldList(fields)})`),
        )
      : []),
    ...(input.baseTypes
      ? section(
          "Existing types:",
          input.baseTypes.map(
            (base) => `${base.name}(${fieldList(base.fullFields())})`,
          ),
        )
      : []),
    ...section(
      "Type hierarchy:",
      formatTypeChains(descriptors, input.baseTypes),
    ),
  ].join("\n");
}
