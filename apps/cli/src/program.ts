import type { Env } from "@typeforest/runtime-shared";
import { Command } from "commander";
import type { Logger } from "pino";

import { registerResolve } from "./commands/resolve";
import type { ReadFile } from "./io";

/** Everything the commands touch outside their own process state. */
export interface CliDeps {
  env: Env;
  logger: Logger;
  readFile: ReadFile;
  write: (text: string) => void;
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command();
  program
    .name("typeforest")
    .description("Derive minimal-redundancy type hierarchies from column sets");

  registerResolve(program, deps);

  return program;
}
