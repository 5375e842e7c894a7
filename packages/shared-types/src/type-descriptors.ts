import { z } from "zod";

import { FieldNameSchema } from "./column-sets";

/**
 * What a synthesized type inherits from: either a concrete type (one produced
 * in the same run or one from the registry) or the capability marker itself.
 */
export const TypeParentSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("type"), name: z.string().min(1) }),
  z.object({ kind: z.literal("marker"), name: z.string().min(1) }),
]);

export const TypeDescriptorSchema = z.object({
  name: z.string().min(1),
  parent: TypeParentSchema,
  ownFields: z.array(FieldNameSchema),
});

export const TypeDescriptorsSchema = z.array(TypeDescriptorSchema);

export type TypeParent = z.infer<typeof TypeParentSchema>;
export type TypeDescriptor = z.infer<typeof TypeDescriptorSchema>;

/**
 * Consumes an ordered descriptor sequence (parents before children) and turns
 * it into whatever artifact the caller needs.
 */
export interface TypeEmitter<TArtifact> {
  emit(descriptors: readonly TypeDescriptor[]): TArtifact;
}
