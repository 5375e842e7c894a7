import {
  formatHierarchyReport,
  JsonDescriptorEmitter,
  TypeScriptEmitter,
} from "@typeforest/emitter";
import {
  createIdSequence,
  InMemoryTypeRegistry,
  parseColumnSets,
  type ResolutionResult,
  resolveAnchoredTypes,
  resolveTypeHierarchy,
} from "@typeforest/hierarchy";
import {
  AppError,
  formatZodIssues,
  IDENTIFIER_PATTERN,
} from "@typeforest/runtime-shared";
import {
  type BaseTypeDescriptor,
  type ColumnSet,
  ErrorCode,
} from "@typeforest/shared-types";
import { type Command, Option } from "commander";
import { z } from "zod";

import { readJsonFile } from "../io";
import type { CliDeps } from "../program";

export const OUTPUT_FORMATS = ["ts", "json", "report"] as const;

const ResolveOptionsSchema = z.object({
  registry: z.string().min(1).optional(),
  marker: z.union([
    z.string().regex(IDENTIFIER_PATTERN, "marker must be a valid identifier"),
    z.literal(false),
  ]),
  format: z.enum(OUTPUT_FORMATS),
  subsetsOnly: z.boolean().default(false),
});

type ResolveOptions = z.infer<typeof ResolveOptionsSchema>;

function parseOptions(rawOptions: unknown): ResolveOptions {
  const result = ResolveOptionsSchema.safeParse(rawOptions);
  if (!result.success) {
    throw new AppError(ErrorCode.INVALID_INPUT, result.error, {
      operation: "parseResolveOptions",
      violations: formatZodIssues(result.error),
    });
  }
  return result.data;
}

interface Resolution {
  result: ResolutionResult;
  /** Registry types; present only for anchored runs. */
  baseTypes?: BaseTypeDescriptor[];
}

function resolve(
  columnSets: ColumnSet[],
  registryDocument: unknown,
  options: ResolveOptions,
  deps: CliDeps,
): Resolution {
  const shared = {
    minSubsetSize: deps.env.MIN_SUBSET_SIZE,
    maxFieldsPerColumnSet: deps.env.MAX_FIELDS_PER_COLUMN_SET,
    typeNamePrefix: deps.env.TYPE_NAME_PREFIX,
    ids: createIdSequence(deps.env.FIRST_TYPE_ID),
    logger: deps.logger,
  };
  const marker = options.marker === false ? undefined : options.marker;

  if (registryDocument === undefined) {
    return {
      result: resolveTypeHierarchy(columnSets, {
        ...shared,
        capabilityMarker: marker ?? deps.env.CAPABILITY_MARKER,
        includeColumnSets: !options.subsetsOnly,
      }),
    };
  }

  const registry = InMemoryTypeRegistry.fromDocument(registryDocument);
  return {
    result: resolveAnchoredTypes(columnSets, registry, {
      ...shared,
      capabilityMarker: marker,
    }),
    baseTypes: registry.enumerateCandidates(),
  };
}

function render(
  columnSets: ColumnSet[],
  { result, baseTypes }: Resolution,
  format: ResolveOptions["format"],
): string {
  switch (format) {
    case "ts":
      return new TypeScriptEmitter({
        externalTypes: (baseTypes ?? []).map((base) => base.name),
        header: ["Generated by typeforest. Do not edit by hand."],
      }).emit(result.descriptors);
    case "json":
      return new JsonDescriptorEmitter().emit(result.descriptors);
    case "report":
      return formatHierarchyReport({
        columnSets,
        columnSetTypes: result.columnSetTypes,
        descriptors: result.descriptors,
        ...(baseTypes
          ? { baseTypes }
          : { recurringSubsets: result.recurringSubsets }),
      });
  }
}

export function registerResolve(program: Command, deps: CliDeps): void {
  program
    .command("resolve <input>")
    .description(
      "Derive a type hierarchy from a JSON array of column sets",
    )
    .option(
      "-r, --registry <file>",
      "Anchor each column set to the closest type in this registry document",
    )
    .option(
      "-m, --marker <name>",
      "Capability marker for root types and registry filtering",
      deps.env.CAPABILITY_MARKER,
    )
    .option("--no-marker", "Anchored mode: do not filter or fall back to a marker")
    .option(
      "--subsets-only",
      "Unanchored mode: emit only recurring subsets, not the column sets",
    )
    .addOption(
      new Option("-f, --format <format>", "Output format")
        .choices(OUTPUT_FORMATS)
        .default("ts"),
    )
    .action(async (input: string, rawOptions: unknown) => {
      const options = parseOptions(rawOptions);
      const columnSets = parseColumnSets(
        await readJsonFile(deps.readFile, input),
        "readColumnSets",
      );
      const registryDocument = options.registry
        ? await readJsonFile(deps.readFile, options.registry)
        : undefined;

      const resolution = resolve(columnSets, registryDocument, options, deps);
      deps.logger.info(
        {
          mode: registryDocument === undefined ? "unanchored" : "anchored",
          types: resolution.result.descriptors.length,
        },
        "column sets resolved",
      );
      deps.write(render(columnSets, resolution, options.format));
    });
}
