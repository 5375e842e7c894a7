export {
  TypeScriptEmitter,
  type TypeScriptEmitterOptions,
} from "./typescript-emitter";
export { JsonDescriptorEmitter } from "./json-emitter";
export {
  formatHierarchyReport,
  formatTypeChains,
  type HierarchyReportInput,
} from "./hierarchy-report";
export { isIdentifier, propertyKey } from "./identifiers";
