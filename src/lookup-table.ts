/**
 * Precomputed scalar multiplication table.
 *
 * The table stores `i * weight` for every input in the domain, so a lookup is
 * a bounds check and an array read; no multiplication happens at lookup time.
 */

import { resolveConfig } from './config';
import { consoleLogger, type Logger } from './logger';
import type { LookupResult, LookupTable, LookupTableOptions, OutOfRangeInput } from './types';

/** Thrown by `lookupOrThrow` for inputs outside the table's domain. */
export class OutOfRangeError extends RangeError {
  readonly input: number;
  readonly numValues: number;

  constructor(error: OutOfRangeInput) {
    super(error.message);
    this.name = 'OutOfRangeError';
    this.input = error.input;
    this.numValues = error.numValues;
  }
}

/** Fill `[0 * weight, 1 * weight, ..., (numValues - 1) * weight]` in index order. */
export function buildTable(numValues: number, weight: number): readonly number[] {
  if (!Number.isSafeInteger(numValues) || numValues <= 0) {
    throw new Error(`numValues must be a positive integer, got ${numValues}`);
  }
  const values = new Array<number>(numValues);
  for (let i = 0; i < numValues; i++) {
    values[i] = i * weight;
  }
  return Object.freeze(values);
}

/**
 * Resolve options and build the table once.
 *
 * The returned handle is read-only and is passed to every lookup; there is no
 * module-level table.
 */
export function createLookupTable(options?: LookupTableOptions): LookupTable {
  const config = resolveConfig(options);
  const values = buildTable(config.numValues, config.weight);
  return Object.freeze({ config, values, size: values.length });
}

function outOfRange(input: number, numValues: number): OutOfRangeInput {
  return {
    kind: 'OutOfRangeInput',
    input,
    numValues,
    message: `input ${input} outside [0, ${numValues})`,
  };
}

export function lookup(table: LookupTable, inputValue: number): LookupResult {
  if (!Number.isInteger(inputValue) || inputValue < 0 || inputValue >= table.size) {
    return { ok: false, error: outOfRange(inputValue, table.size) };
  }
  return { ok: true, value: table.values[inputValue] };
}

/**
 * Lookup that reports out-of-range inputs and carries on with `fallback`.
 * Note the default fallback of 0 is also the legitimate value at input 0.
 */
export function lookupOrDefault(
  table: LookupTable,
  inputValue: number,
  fallback = 0,
  logger: Logger = consoleLogger,
): number {
  const result = lookup(table, inputValue);
  if (!result.ok) {
    logger.warn(`lookup failed: ${result.error.message}`);
    return fallback;
  }
  return result.value;
}

export function lookupOrThrow(table: LookupTable, inputValue: number): number {
  const result = lookup(table, inputValue);
  if (!result.ok) {
    throw new OutOfRangeError(result.error);
  }
  return result.value;
}
