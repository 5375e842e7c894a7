import type { TypeDescriptor, TypeEmitter } from "@typeforest/shared-types";

/** Serializes descriptors as `{ "types": [...] }`. */
export class JsonDescriptorEmitter implements TypeEmitter<string> {
  constructor(private readonly indent = 2) {}

  emit(descriptors: readonly TypeDescriptor[]): string {
    return `${JSON.stringify({ types: descriptors }, null, this.indent)}\n`;
  }
}
