import { AppError, formatZodIssues } from "@typeforest/runtime-shared";
import {
  type BaseTypeDescriptor,
  ErrorCode,
  RegistryFileSchema,
  type RegistryTypeDefinition,
  RegistryTypeDefinitionSchema,
  type TypeRegistry,
} from "@typeforest/shared-types";
import { z } from "zod";

interface RegistryEntry extends BaseTypeDescriptor {
  readonly markers: ReadonlySet<string>;
}

function invalidRegistry(
  violations: string[],
  extra: { typeName?: string; parentName?: string; cause?: unknown } = {},
): AppError {
  return new AppError(ErrorCode.REGISTRY_INVALID, extra.cause, {
    operation: "loadTypeRegistry",
    typeName: extra.typeName,
    parentName: extra.parentName,
    violations,
  });
}

/**
 * Registry of pre-existing types held in memory. A type's full field set is
 * its parent's full set followed by its own fields; it satisfies a marker
 * when it or any ancestor lists that marker.
 */
export class InMemoryTypeRegistry implements TypeRegistry {
  private readonly entries: RegistryEntry[];

  /**
   * @throws AppError REGISTRY_INVALID on schema violations, duplicate
   *   names, unknown parents or inheritance cycles
   */
  constructor(definitions: readonly RegistryTypeDefinition[]) {
    const parsed = z.array(RegistryTypeDefinitionSchema).safeParse(definitions);
    if (!parsed.success) {
      throw invalidRegistry(formatZodIssues(parsed.error), {
        cause: parsed.error,
      });
    }

    const byName = new Map<
      string,
      z.infer<typeof RegistryTypeDefinitionSchema>
    >();
    for (const definition of parsed.data) {
      if (byName.has(definition.name)) {
        throw invalidRegistry(["duplicate type name"], {
          typeName: definition.name,
        });
      }
      byName.set(definition.name, definition);
    }

    const resolved = new Map<string, RegistryEntry>();
    const resolve = (name: string, visiting: string[]): RegistryEntry => {
      const done = resolved.get(name);
      if (done) {
        return done;
      }
      const definition = byName.get(name);
      if (!definition) {
        throw invalidRegistry(["parent type is not registered"], {
          typeName: visiting[visiting.length - 1],
          parentName: name,
        });
      }
      if (visiting.includes(name)) {
        throw invalidRegistry(
          [`inheritance cycle: ${[...visiting, name].join(" -> ")}`],
          { typeName: name },
        );
      }

      const parent = definition.parent
        ? resolve(definition.parent, [...visiting, name])
        : undefined;
      const fullFields: ReadonlySet<string> = new Set([
        ...(parent ? parent.fullFields() : []),
        ...definition.fields,
      ]);
      const markers: ReadonlySet<string> = new Set([
        ...(parent ? parent.markers : []),
        ...definition.markers,
      ]);
      const entry: RegistryEntry = {
        name,
        markers,
        fullFields: () => fullFields,
        satisfies: (marker) => markers.has(marker),
      };
      resolved.set(name, entry);
      return entry;
    };

    this.entries = parsed.data.map((definition) =>
      resolve(definition.name, []),
    );
  }

  /**
   * Builds a registry from a parsed registry document (`{ "types": [...] }`).
   */
  static fromDocument(document: unknown): InMemoryTypeRegistry {
    const parsed = RegistryFileSchema.safeParse(document);
    if (!parsed.success) {
      throw invalidRegistry(formatZodIssues(parsed.error), {
        cause: parsed.error,
      });
    }
    return new InMemoryTypeRegistry(parsed.data.types);
  }

  enumerateCandidates(marker?: string): BaseTypeDescriptor[] {
    return marker === undefined
      ? [...this.entries]
      : this.entries.filter((entry) => entry.satisfies(marker));
  }
}
