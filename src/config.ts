import type { LookupTableConfig, LookupTableOptions } from './types';

export const DEFAULT_INPUT_BITS = 4;
export const DEFAULT_WEIGHT = 0.75;

/** Largest supported bit width; keeps the table within a few million entries. */
export const MAX_INPUT_BITS = 24;
export const MAX_NUM_VALUES = 2 ** MAX_INPUT_BITS;

function checkPositiveInteger(name: string, value: number, max: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
  if (value > max) {
    throw new Error(`${name} must be at most ${max}, got ${value}`);
  }
}

/**
 * Validate options and fill in defaults.
 *
 * An explicit `numValues` wins over `inputBits`; otherwise the domain size is
 * `2 ** inputBits`.
 */
export function resolveConfig(options: LookupTableOptions = {}): LookupTableConfig {
  const { numValues, inputBits = DEFAULT_INPUT_BITS, weight = DEFAULT_WEIGHT } = options;

  if (!Number.isFinite(weight)) {
    throw new Error(`weight must be a finite number, got ${weight}`);
  }

  // Checked even when numValues overrides it.
  checkPositiveInteger('inputBits', inputBits, MAX_INPUT_BITS);

  if (numValues !== undefined) {
    checkPositiveInteger('numValues', numValues, MAX_NUM_VALUES);
    return Object.freeze({ inputBits: null, numValues, weight });
  }

  return Object.freeze({ inputBits, numValues: 2 ** inputBits, weight });
}
