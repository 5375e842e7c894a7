import { ErrorCode } from "./error-codes";

/**
 * Human-readable message for each error code.
 *
 * Messages stay generic: the specifics (offending column set, node ids,
 * violations) travel in the error's context instead.
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_INPUT]:
    "Column set input is missing or malformed. Check the input collection.",

  [ErrorCode.DOMAIN_VIOLATION]:
    "Hierarchy invariant violated.",
  [ErrorCode.UNRESOLVED_ANCHOR]:
    "No base type matched the column set and no capability marker was supplied.",

  [ErrorCode.REGISTRY_INVALID]: "Type registry definitions are invalid.",
  [ErrorCode.EMIT_FAILED]:
    "Type descriptors could not be emitted. A parent type is missing or out of order.",

  [ErrorCode.CONFIG_ERROR]: "Configuration error.",
  [ErrorCode.UNKNOWN]: "An unexpected error occurred.",
};
