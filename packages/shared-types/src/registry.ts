import { z } from "zod";

import { FieldNameSchema } from "./column-sets";

/**
 * A pre-existing type offered as an anchor. `fields` are the type's own
 * fields; inherited ones come from `parent`, which must name another
 * definition in the same registry.
 */
export const RegistryTypeDefinitionSchema = z.object({
  name: z.string().min(1),
  fields: z.array(FieldNameSchema),
  parent: z.string().min(1).optional(),
  markers: z.array(z.string().min(1)).default([]),
});

export const RegistryFileSchema = z.object({
  types: z.array(RegistryTypeDefinitionSchema),
});

export type RegistryTypeDefinition = z.input<typeof RegistryTypeDefinitionSchema>;

/** A candidate base type as seen by the anchored matcher. */
export interface BaseTypeDescriptor {
  readonly name: string;
  /** Own and inherited fields. */
  fullFields(): ReadonlySet<string>;
  satisfies(marker: string): boolean;
}

export interface TypeRegistry {
  /** All candidates, or only those satisfying `marker` when one is given. */
  enumerateCandidates(marker?: string): BaseTypeDescriptor[];
}
