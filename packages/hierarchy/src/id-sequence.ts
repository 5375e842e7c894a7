/**
 * Hands out consecutive integer ids. One sequence per resolution call keeps
 * generated type names reproducible.
 */
export interface IdSequence {
  next(): number;
}

export function createIdSequence(start = 1): IdSequence {
  let current = start;
  return {
    next: () => current++,
  };
}
