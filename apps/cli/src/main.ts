import { readFile } from "node:fs/promises";

import {
  createLogger,
  silentLogger,
  toAppError,
  validateEnv,
} from "@typeforest/runtime-shared";

import { createProgram } from "./program";

async function bootstrap(): Promise<void> {
  let logger = silentLogger;
  try {
    const env = validateEnv(process.env);
    logger = createLogger(env, "typeforest");

    await createProgram({
      env,
      logger,
      readFile: (path) => readFile(path, "utf8"),
      write: (text) => {
        process.stdout.write(text);
      },
    }).parseAsync(process.argv);
  } catch (error) {
    const appError = toAppError(error);
    // the logger may not exist yet when configuration itself is invalid
    process.stderr.write(`${appError.code}: ${appError.message}\n`);
    for (const violation of appError.context?.violations ?? []) {
      process.stderr.write(`  - ${violation}\n`);
    }
    logger.debug({ err: appError, context: appError.context }, "command failed");
    process.exitCode = 1;
  }
}

void bootstrap();
