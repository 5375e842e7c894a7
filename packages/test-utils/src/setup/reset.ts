// Counter reset functions - call in beforeEach to ensure test isolation
let columnSetCounter = 0;
let baseTypeCounter = 0;

export function resetColumnSetCounter(): void {
  columnSetCounter = 0;
}

export function resetBaseTypeCounter(): void {
  baseTypeCounter = 0;
}

export function resetFactories(): void {
  resetColumnSetCounter();
  resetBaseTypeCounter();
}

// Export counter getters for factory use
export function getNextColumnSetId(): number {
  return ++columnSetCounter;
}

export function getNextBaseTypeId(): number {
  return ++baseTypeCounter;
}
