import { TypeDescriptorsSchema } from "@typeforest/shared-types";
import { describe, expect, it } from "vitest";

import { JsonDescriptorEmitter } from "../json-emitter";

describe("JsonDescriptorEmitter", () => {
  const descriptors = [
    {
      name: "ColumnSubset1",
      parent: { kind: "marker" as const, name: "IColumnSubset" },
      ownFields: ["Id"],
    },
  ];

  it("wraps descriptors in a types document", () => {
    const output = new JsonDescriptorEmitter().emit(descriptors);
    expect(TypeDescriptorsSchema.parse(JSON.parse(output).types)).toEqual(
      descriptors,
    );
    expect(output.endsWith("}\n")).toBe(true);
  });

  it("uses the configured indentation", () => {
    expect(new JsonDescriptorEmitter(0).emit([])).toBe('{"types":[]}\n');
  });
});
