import type { GenerationConfig } from '../types';
import { InvalidConfigError } from './errors';

export const PLACEHOLDER = 'X';

/** Estimates at or above this value count as unbounded. */
export const CAPACITY_CEILING = 10n ** 18n;

/**
 * Number of randomly filled positions per key: the placeholders of the
 * pattern, or the fixed length.
 */
export function keyspaceLength(config: Pick<GenerationConfig, 'pattern' | 'length'>): number {
  if (config.pattern !== undefined) {
    let positions = 0;
    for (const ch of config.pattern) {
      if (ch === PLACEHOLDER) positions++;
    }
    return positions;
  }
  return config.length;
}

/**
 * Approximate number of distinct keys, `alphabetSize ^ keyspaceLength`,
 * clamped to CAPACITY_CEILING.
 *
 * Multiplication stops as soon as the ceiling is reached, so huge
 * exponents cost no more than a few dozen steps.
 */
export function estimateCapacity(alphabetSize: number, keyspaceLength: number): bigint {
  if (!Number.isInteger(alphabetSize) || alphabetSize < 0) {
    throw new InvalidConfigError(`Alphabet size must be a non-negative integer, got ${alphabetSize}`);
  }
  if (!Number.isInteger(keyspaceLength) || keyspaceLength < 0) {
    throw new InvalidConfigError(`Keyspace length must be a non-negative integer, got ${keyspaceLength}`);
  }

  if (keyspaceLength === 0) return 1n;
  if (alphabetSize <= 1) return BigInt(alphabetSize);

  const base = BigInt(alphabetSize);
  let capacity = 1n;
  for (let i = 0; i < keyspaceLength; i++) {
    capacity *= base;
    if (capacity >= CAPACITY_CEILING) return CAPACITY_CEILING;
  }
  return capacity;
}

export function isUnbounded(capacity: bigint): boolean {
  return capacity >= CAPACITY_CEILING;
}
