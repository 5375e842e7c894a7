import { AppError } from "@typeforest/runtime-shared";
import type { ErrorCode } from "@typeforest/shared-types";
import { expect } from "vitest";

/**
 * Runs `fn`, asserts it throws an AppError with `code`, and returns the error
 * so tests can inspect its context.
 */
export function expectAppError(fn: () => unknown, code: ErrorCode): AppError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(AppError);
  if (!(caught instanceof AppError)) {
    throw new Error("Expected an AppError to be thrown");
  }
  expect(caught.code).toBe(code);
  return caught;
}
