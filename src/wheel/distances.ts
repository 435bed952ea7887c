import { parseError, validationError } from './errors';

export const MAX_DISTANCE_MM = 30;
export const MIN_DISTANCE_COUNT = 2;

// Plain decimal notation only: no hex, no "Infinity", no "NaN"
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Splits a comma-separated list of distances (mm) into numbers, keeping the
 * input order. Empty tokens are skipped, so trailing commas are harmless.
 * @throws ParseError for the first token that is not a number
 */
export function parseDistances(input: string): number[] {
  const values: number[] = [];
  for (const raw of input.split(',')) {
    const token = raw.trim();
    if (!token) continue;
    if (!NUMBER_PATTERN.test(token)) {
      throw parseError(token);
    }
    values.push(Number(token));
  }
  return values;
}

export function normalizeDistances(values: readonly number[]): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b);
}

/**
 * Deduplicates and sorts, then checks the range of every value and that at
 * least two distinct distances remain.
 * @throws ValidationError
 */
export function validateDistances(values: readonly number[]): number[] {
  const distances = normalizeDistances(values);

  if (distances.some((d) => d <= 0)) {
    throw validationError('All distances must be >0 mm.', distances);
  }
  if (distances.some((d) => d > MAX_DISTANCE_MM)) {
    throw validationError(`Max allowed distance is ${MAX_DISTANCE_MM}mm.`, distances);
  }
  if (distances.length < MIN_DISTANCE_COUNT) {
    throw validationError('Please enter at least two distances.', distances);
  }

  return distances;
}

export function readDistances(input: string): number[] {
  return validateDistances(parseDistances(input));
}
