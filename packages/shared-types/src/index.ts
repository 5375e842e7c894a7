// Column set input
export type { ColumnSet } from "./column-sets";
export {
  ColumnSetSchema,
  ColumnSetsSchema,
  FieldNameSchema,
} from "./column-sets";

// Type descriptors
export type {
  TypeDescriptor,
  TypeEmitter,
  TypeParent,
} from "./type-descriptors";
export {
  TypeDescriptorSchema,
  TypeDescriptorsSchema,
  TypeParentSchema,
} from "./type-descriptors";

// Type registry
export type {
  BaseTypeDescriptor,
  RegistryTypeDefinition,
  TypeRegistry,
} from "./registry";
export {
  RegistryFileSchema,
  RegistryTypeDefinitionSchema,
} from "./registry";

// Error handling
export { ErrorCode, ErrorMessages } from "./errors/index";
