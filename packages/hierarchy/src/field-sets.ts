/**
 * Drops repeated field names, keeping each name at its first position.
 */
export function distinctFields(fields: readonly string[]): string[] {
  return [...new Set(fields)];
}

/**
 * Order-insensitive identity of a field collection. Two collections with the
 * same members share a key regardless of field order.
 */
export function fieldSetKey(fields: readonly string[]): string {
  return JSON.stringify(distinctFields(fields).sort());
}

export function isSubsetOf(
  candidate: Iterable<string>,
  fields: ReadonlySet<string>,
): boolean {
  for (const field of candidate) {
    if (!fields.has(field)) {
      return false;
    }
  }
  return true;
}

/** Fields of `fields` not in `excluded`, in their original order. */
export function withoutFields(
  fields: readonly string[],
  excluded: ReadonlySet<string>,
): string[] {
  return fields.filter((field) => !excluded.has(field));
}
