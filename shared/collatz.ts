/**
 * Collatz sequence engine.
 *
 * Values are plain numbers kept inside the safe integer range; a step that
 * would leave it throws CollatzOverflowError rather than rounding.
 */

export type CollatzOperation = "" | "divide" | "multiply-add";

export interface CollatzResult {
  values: number[];
  truncated: boolean;
}

export interface CollatzStep {
  step: number;
  value: number;
  operation: CollatzOperation;
}

export interface CollatzStats {
  computedSteps: number;
  peak: number;
}

// 3n+1 stays a safe integer for every n up to this bound.
export const COLLATZ_TRIPLE_LIMIT = Math.floor((Number.MAX_SAFE_INTEGER - 1) / 3);

export class CollatzInvalidArgumentError extends Error {
  status: number;
  constructor(message: string) {
    super(message);
    this.status = 400;
    this.name = "CollatzInvalidArgumentError";
  }
}

export class CollatzOverflowError extends Error {
  status: number;
  value: number;
  constructor(value: number) {
    super(`3n+1 leaves the safe integer range at ${value}`);
    this.status = 422;
    this.value = value;
    this.name = "CollatzOverflowError";
  }
}

const assertStart = (start: unknown): number => {
  if (typeof start !== "number" || !Number.isInteger(start) || start < 1) {
    throw new CollatzInvalidArgumentError("start must be a positive integer");
  }
  if (!Number.isSafeInteger(start)) {
    throw new CollatzInvalidArgumentError("start exceeds the safe integer range");
  }
  return start;
};

const assertMaxSteps = (maxSteps: unknown): number => {
  if (maxSteps === undefined) return Number.POSITIVE_INFINITY;
  if (typeof maxSteps !== "number" || !Number.isInteger(maxSteps) || maxSteps < 0) {
    throw new CollatzInvalidArgumentError("maxSteps must be a non-negative integer");
  }
  return maxSteps;
};

export const collatzOperation = (previous: number): Exclude<CollatzOperation, ""> =>
  previous % 2 === 0 ? "divide" : "multiply-add";

export function nextCollatzValue(n: number): number {
  if (n % 2 === 0) return n / 2;
  if (n > COLLATZ_TRIPLE_LIMIT) {
    throw new CollatzOverflowError(n);
  }
  return n * 3 + 1;
}

/**
 * Runs the Collatz rule from `start` until it reaches 1 or `maxSteps` values
 * have been appended. Omitting `maxSteps` leaves the run unbounded.
 */
export function computeCollatz(start: number, maxSteps?: number): CollatzResult {
  let current = assertStart(start);
  const cap = assertMaxSteps(maxSteps);

  const values = [current];
  let appended = 0;
  while (current !== 1 && appended < cap) {
    current = nextCollatzValue(current);
    values.push(current);
    appended += 1;
  }

  return { values, truncated: current !== 1 };
}

export function describeCollatzSteps(values: readonly number[]): CollatzStep[] {
  return values.map((value, index) => ({
    step: index,
    value,
    operation: index === 0 ? "" : collatzOperation(values[index - 1]),
  }));
}

export function collatzStats(values: readonly number[]): CollatzStats {
  return {
    computedSteps: Math.max(values.length - 1, 0),
    peak: values.reduce((max, value) => Math.max(max, value), 0),
  };
}
