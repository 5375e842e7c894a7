import { AppError } from "@typeforest/runtime-shared";
import { ErrorCode } from "@typeforest/shared-types";

export type ReadFile = (path: string) => Promise<string>;

/**
 * Reads and parses a JSON document. Unparseable content is reported as
 * invalid input naming the file.
 */
export async function readJsonFile(
  readFile: ReadFile,
  path: string,
): Promise<unknown> {
  const text = await readFile(path);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new AppError(ErrorCode.INVALID_INPUT, error, {
      operation: "readJsonFile",
      violations: [
        `${path}: ${error instanceof Error ? error.message : "invalid JSON"}`,
      ],
    });
  }
}
