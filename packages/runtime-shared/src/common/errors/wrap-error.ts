import { ErrorCode } from "@typeforest/shared-types";
import { ZodError } from "zod";

import { AppError } from "./app-error";

/**
 * Renders zod issues as `path: message` lines for ErrorContext.violations.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message,
  );
}

/**
 * Converts unknown errors to AppError for domain error handling.
 *
 * A ZodError that escapes a boundary is treated as invalid input.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof ZodError) {
    return new AppError(ErrorCode.INVALID_INPUT, error, {
      violations: formatZodIssues(error),
    });
  }

  return new AppError(ErrorCode.UNKNOWN, error);
}
