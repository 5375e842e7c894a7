/**
 * Type registry stubs
 */

import type {
  BaseTypeDescriptor,
  TypeRegistry,
} from "@typeforest/shared-types";
import { type Mock, vi } from "vitest";

import { getNextBaseTypeId } from "../setup/reset";

export interface BaseTypeStubSpec {
  name?: string;
  fields: string[];
  markers?: string[];
}

/**
 * Creates a BaseTypeDescriptor from a flat field list. Unnamed types get
 * `Base<n>` names.
 */
export function createBaseTypeStub(spec: BaseTypeStubSpec): BaseTypeDescriptor {
  const fields: ReadonlySet<string> = new Set(spec.fields);
  const markers = new Set(spec.markers ?? []);
  return {
    name: spec.name ?? `Base${getNextBaseTypeId()}`,
    fullFields: () => fields,
    satisfies: (marker: string) => markers.has(marker),
  };
}

export interface TypeRegistryStub extends TypeRegistry {
  enumerateCandidates: Mock<(marker?: string) => BaseTypeDescriptor[]>;
}

/**
 * Creates a TypeRegistry stub over fixed descriptors. `enumerateCandidates`
 * is a spy that filters by marker the way a real registry does.
 */
export function createRegistryStub(
  types: BaseTypeStubSpec[],
  overrides?: Partial<TypeRegistryStub>,
): TypeRegistryStub {
  const descriptors = types.map(createBaseTypeStub);
  return {
    enumerateCandidates: vi.fn((marker?: string) =>
      marker === undefined
        ? descriptors
        : descriptors.filter((descriptor) => descriptor.satisfies(marker)),
    ),
    ...overrides,
  };
}
