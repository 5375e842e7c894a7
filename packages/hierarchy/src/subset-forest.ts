import { AppError } from "@typeforest/runtime-shared";
import { ErrorCode } from "@typeforest/shared-types";

import { isSubsetOf, withoutFields } from "./field-sets";
import type { IdSequence } from "./id-sequence";

/** One node of the resolved hierarchy. */
export interface SubsetInfo {
  readonly id: number;
  /** Own and inherited fields; never changes. */
  readonly fields: readonly string[];
  /** Fields declared on this node once inherited ones are removed. */
  readonly ownFields: readonly string[];
  readonly parentId: number | null;
}

interface SubsetNode {
  id: number;
  fields: readonly string[];
  fieldSet: ReadonlySet<string>;
  ownFields: readonly string[];
  parentId: number | null;
}

function toInfo(node: SubsetNode): SubsetInfo {
  return {
    id: node.id,
    fields: node.fields,
    ownFields: node.ownFields,
    parentId: node.parentId,
  };
}

/**
 * Arena of SubsetInfo nodes keyed by id. Parent links are ids into the same
 * arena and can be set exactly once per node.
 */
export class SubsetForest {
  private readonly nodes = new Map<number, SubsetNode>();

  constructor(private readonly ids: IdSequence) {}

  get size(): number {
    return this.nodes.size;
  }

  /** Adds a parentless node whose own fields are all of `fields`. */
  add(fields: readonly string[]): SubsetInfo {
    const id = this.ids.next();
    const node: SubsetNode = {
      id,
      fields: [...fields],
      fieldSet: new Set(fields),
      ownFields: [...fields],
      parentId: null,
    };
    this.nodes.set(id, node);
    return toInfo(node);
  }

  get(id: number): SubsetInfo | undefined {
    const node = this.nodes.get(id);
    return node ? toInfo(node) : undefined;
  }

  /** All nodes in insertion order. */
  list(): SubsetInfo[] {
    return [...this.nodes.values()].map(toInfo);
  }

  contains(ancestorId: number, descendantId: number): boolean {
    const ancestor = this.require(ancestorId);
    return isSubsetOf(ancestor.fields, this.require(descendantId).fieldSet);
  }

  /**
   * Links `childId` under `parentId` and strips the parent's full field set
   * from the child's own fields.
   *
   * @throws AppError DOMAIN_VIOLATION when the child already has a parent,
   *   when the link would form a cycle, or when the parent declares a field
   *   the child lacks. The existing link is left untouched.
   */
  setParent(childId: number, parentId: number): void {
    const child = this.require(childId);
    const parent = this.require(parentId);

    if (child.parentId !== null) {
      throw new AppError(ErrorCode.DOMAIN_VIOLATION, undefined, {
        operation: "setParent",
        nodeId: childId,
        parentId,
        existingParentId: child.parentId,
        violations: ["subset already has a parent"],
      });
    }
    if (this.ancestorIds(parentId).includes(childId) || childId === parentId) {
      throw new AppError(ErrorCode.DOMAIN_VIOLATION, undefined, {
        operation: "setParent",
        nodeId: childId,
        parentId,
        violations: ["parent link would form a cycle"],
      });
    }
    if (!isSubsetOf(parent.fields, child.fieldSet)) {
      throw new AppError(ErrorCode.DOMAIN_VIOLATION, undefined, {
        operation: "setParent",
        nodeId: childId,
        parentId,
        violations: ["parent declares fields the child does not have"],
      });
    }

    child.parentId = parentId;
    child.ownFields = withoutFields(child.ownFields, parent.fieldSet);
  }

  /** Ids from the direct parent up to the root. */
  ancestorIds(id: number): number[] {
    const chain: number[] = [];
    let current = this.require(id).parentId;
    while (current !== null) {
      chain.push(current);
      current = this.require(current).parentId;
    }
    return chain;
  }

  /**
   * Every node, each placed after all of its ancestors. Roots and siblings
   * keep insertion order.
   */
  topologicalOrder(): SubsetInfo[] {
    const ordered: SubsetInfo[] = [];
    const placed = new Set<number>();

    for (const node of this.nodes.values()) {
      const pending = [node.id, ...this.ancestorIds(node.id)]
        .filter((id) => !placed.has(id))
        .reverse();
      for (const id of pending) {
        placed.add(id);
        ordered.push(toInfo(this.require(id)));
      }
    }
    return ordered;
  }

  private require(id: number): SubsetNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new AppError(ErrorCode.DOMAIN_VIOLATION, undefined, {
        operation: "lookupSubset",
        nodeId: id,
        violations: ["unknown subset id"],
      });
    }
    return node;
  }
}
