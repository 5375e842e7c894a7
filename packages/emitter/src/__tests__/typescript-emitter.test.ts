import { resolveTypeHierarchy } from "@typeforest/hierarchy";
import { ErrorCode, type TypeDescriptor } from "@typeforest/shared-types";
import { expectAppError, PERSON_COLUMN_SETS } from "@typeforest/test-utils";
import { describe, expect, it } from "vitest";

import { TypeScriptEmitter } from "../typescript-emitter";

const ANCHORED: TypeDescriptor[] = [
  {
    name: "ColumnSubset1",
    parent: { kind: "type", name: "Base1" },
    ownFields: ["Name"],
  },
  {
    name: "ColumnSubset2",
    parent: { kind: "marker", name: "IColumnSubset" },
    ownFields: ["Id", "Position", "Gender"],
  },
];

describe("TypeScriptEmitter", () => {
  it("renders a resolved hierarchy as interfaces", () => {
    const { descriptors } = resolveTypeHierarchy(PERSON_COLUMN_SETS);

    expect(new TypeScriptEmitter().emit(descriptors)).toBe(
      [
        "export interface IColumnSubset {}",
        "",
        "export interface ColumnSubset1 extends IColumnSubset {",
        "  Id: string;",
        "  DateCreated: string;",
        "}",
        "",
        "export interface ColumnSubset2 extends IColumnSubset {",
        "  Id: string;",
        "  Name: string;",
        "}",
        "",
        "export interface ColumnSubset3 extends ColumnSubset1 {",
        "  DateDeleted: string;",
        "}",
        "",
        "export interface ColumnSubset4 extends ColumnSubset1 {",
        "  Name: string;",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("accepts parents declared as external types", () => {
    const emitter = new TypeScriptEmitter({
      externalTypes: ["Base1"],
      declareMarkers: false,
      header: ["Generated from column sets"],
    });

    expect(emitter.emit(ANCHORED)).toBe(
      [
        "// Generated from column sets",
        "",
        "export interface ColumnSubset1 extends Base1 {",
        "  Name: string;",
        "}",
        "",
        "export interface ColumnSubset2 extends IColumnSubset {",
        "  Id: string;",
        "  Position: string;",
        "  Gender: string;",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("quotes field names that are not identifiers and applies the field type", () => {
    const emitter = new TypeScriptEmitter({ fieldType: "string | null" });

    expect(
      emitter.emit([
        {
          name: "Row",
          parent: { kind: "marker", name: "IRow" },
          ownFields: ["Order ID", "total"],
        },
        { name: "Empty", parent: { kind: "type", name: "Row" }, ownFields: [] },
      ]),
    ).toBe(
      [
        "export interface IRow {}",
        "",
        "export interface Row extends IRow {",
        '  "Order ID": string | null;',
        "  total: string | null;",
        "}",
        "",
        "export interface Empty extends Row {}",
        "",
      ].join("\n"),
    );
  });

  it("fails when a parent is neither emitted nor external", () => {
    const error = expectAppError(
      () => new TypeScriptEmitter().emit(ANCHORED),
      ErrorCode.EMIT_FAILED,
    );

    expect(error.context).toEqual({
      operation: "emitTypeScript",
      typeName: "ColumnSubset1",
      parentName: "Base1",
    });
  });

  it("fails when a child precedes its parent", () => {
    const [root, child] = resolveTypeHierarchy([
      ["Id", "Name"],
      ["Id", "Name", "Code"],
      ["Id", "Name", "Label"],
    ]).descriptors;
    if (!root || !child) {
      throw new Error("Expected at least two descriptors");
    }

    expectAppError(
      () => new TypeScriptEmitter().emit([child, root]),
      ErrorCode.EMIT_FAILED,
    );
  });

  it("fails on repeated type names", () => {
    const descriptor: TypeDescriptor = {
      name: "Row",
      parent: { kind: "marker", name: "IRow" },
      ownFields: ["Id"],
    };

    const error = expectAppError(
      () => new TypeScriptEmitter().emit([descriptor, descriptor]),
      ErrorCode.EMIT_FAILED,
    );
    expect(error.context?.violations).toEqual(["type name emitted twice"]);
  });

  it("emits nothing for an empty sequence", () => {
    expect(new TypeScriptEmitter().emit([])).toBe("");
  });
});
