import { AppError, formatZodIssues } from "@typeforest/runtime-shared";
import {
  type ColumnSet,
  ColumnSetsSchema,
  ErrorCode,
} from "@typeforest/shared-types";

/**
 * Validates the column-set collection handed to a resolution call.
 *
 * @throws AppError INVALID_INPUT when the collection is absent or malformed
 */
export function parseColumnSets(
  input: unknown,
  operation: string,
): ColumnSet[] {
  if (input === null || input === undefined) {
    throw new AppError(ErrorCode.INVALID_INPUT, undefined, {
      operation,
      violations: ["column sets are required"],
    });
  }

  const result = ColumnSetsSchema.safeParse(input);
  if (!result.success) {
    throw new AppError(ErrorCode.INVALID_INPUT, result.error, {
      operation,
      violations: formatZodIssues(result.error),
    });
  }
  return result.data;
}
