export { expectAppError } from "./assertions/app-error";
export {
  createColumnSet,
  OVERLAPPING_TRIPLES,
  PERSON_COLUMN_SETS,
} from "./factories/column-set.factory";
export {
  getNextBaseTypeId,
  getNextColumnSetId,
  resetBaseTypeCounter,
  resetColumnSetCounter,
  resetFactories,
} from "./setup/reset";
export {
  type BaseTypeStubSpec,
  createBaseTypeStub,
  createRegistryStub,
  type TypeRegistryStub,
} from "./stubs/registry.stub";
