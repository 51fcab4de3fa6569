/**
 * Multi-input precomputed database.
 *
 * Every combination of `numInputs` values, each in [0, 2^inputBitDepth), is
 * mapped to the operation's result. A neuron is then simulated by looking its
 * inputs up instead of computing them.
 */

import type { Operation, ProductDatabase, ProductDatabaseOptions } from './types';

/** Upper bound on the number of stored combinations. */
export const MAX_COMBINATIONS = 2 ** 20;

const OPERATIONS: Record<Operation, (inputs: readonly number[]) => number> = {
  multiply: inputs => inputs.reduce((acc, v) => acc * v, 1),
};

function isOperation(name: string): name is Operation {
  return Object.prototype.hasOwnProperty.call(OPERATIONS, name);
}

/** Thrown when a tuple has no entry in the database. */
export class MissingCombinationError extends Error {
  readonly inputs: readonly number[];

  constructor(inputs: readonly number[], keys: string[]) {
    super(
      `Input combination ${formatKey(inputs)} (searched as ${keys.map(k => `'${k}'`).join(' and ')}) not found in the database.`,
    );
    this.name = 'MissingCombinationError';
    this.inputs = inputs;
  }
}

/** Tuple text used as a key: "(0, 1)", or "(3,)" for a single input. */
export function formatKey(inputs: readonly number[]): string {
  if (inputs.length === 1) return `(${inputs[0]},)`;
  return `(${inputs.join(', ')})`;
}

function compactKey(inputs: readonly number[]): string {
  return formatKey(inputs).replace(/ /g, '');
}

export function createDatabase(options: ProductDatabaseOptions): ProductDatabase {
  const { numInputs, inputBitDepth, operation } = options;

  if (!Number.isSafeInteger(numInputs) || numInputs <= 0) {
    throw new Error('numInputs must be a positive integer.');
  }
  if (!Number.isSafeInteger(inputBitDepth) || inputBitDepth <= 0) {
    throw new Error('inputBitDepth must be a positive integer.');
  }
  if (!isOperation(operation)) {
    throw new Error(`Unsupported operation: ${operation}`);
  }

  const radix = 2 ** inputBitDepth;
  const total = radix ** numInputs;
  if (total > MAX_COMBINATIONS) {
    throw new Error(`Database would hold ${total} combinations; the limit is ${MAX_COMBINATIONS}`);
  }

  const apply = OPERATIONS[operation];
  const entries = new Map<string, number>();
  // Odometer over the inputs; the last input turns fastest.
  const current = new Array<number>(numInputs).fill(0);
  for (let n = 0; n < total; n++) {
    entries.set(formatKey(current), apply(current));
    for (let pos = numInputs - 1; pos >= 0; pos--) {
      current[pos]++;
      if (current[pos] < radix) break;
      current[pos] = 0;
    }
  }

  return { entries };
}

/** Look up a tuple by its spaced key, then by the compact "(0,1)" form. */
export function queryDatabase(db: ProductDatabase, inputs: readonly number[]): number {
  if (inputs.length === 0) {
    throw new TypeError('inputs must be a non-empty tuple.');
  }

  const key = formatKey(inputs);
  const direct = db.entries.get(key);
  if (direct !== undefined) return direct;

  const compact = compactKey(inputs);
  const fallback = db.entries.get(compact);
  if (fallback !== undefined) return fallback;

  throw new MissingCombinationError(inputs, [key, compact]);
}

/** Output of a single precomputed neuron for the given inputs. */
export function simulateNeuron(db: ProductDatabase, inputs: readonly number[]): number {
  return queryDatabase(db, inputs);
}

export function databaseToRecord(db: ProductDatabase): Record<string, number> {
  return Object.fromEntries(db.entries);
}

/** Rebuild a database from its string-keyed object form, e.g. parsed JSON. */
export function databaseFromRecord(record: Record<string, unknown>): ProductDatabase {
  const entries = new Map<string, number>();
  for (const [key, value] of Object.entries(record)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new Error(`Invalid database entry for ${key}: expected a finite number`);
    }
    entries.set(key, value);
  }
  return { entries };
}
