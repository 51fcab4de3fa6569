/**
 * precomputed-lut — replace runtime multiplication with a precomputed table.
 *
 * @example
 * ```ts
 * const table = createLookupTable({ inputBits: 4, weight: 0.75 });
 * const result = lookup(table, 3);
 * if (result.ok) console.log(result.value); // 2.25
 * ```
 */

export type {
  LookupResult,
  LookupTable,
  LookupTableConfig,
  LookupTableOptions,
  Operation,
  OutOfRangeInput,
  ProductDatabase,
  ProductDatabaseOptions,
} from './types';

export { resolveConfig, DEFAULT_INPUT_BITS, DEFAULT_WEIGHT, MAX_INPUT_BITS } from './config';
export {
  buildTable,
  createLookupTable,
  lookup,
  lookupOrDefault,
  lookupOrThrow,
  OutOfRangeError,
} from './lookup-table';
export {
  createDatabase,
  queryDatabase,
  simulateNeuron,
  formatKey,
  databaseToRecord,
  databaseFromRecord,
  MissingCombinationError,
} from './product-database';
export { runDemo } from './demo';
export { runSampleDatabase, SAMPLE_DATABASE_OPTIONS } from './sample-database';
export type { DemoReport } from './demo';
export { consoleLogger } from './logger';
export type { Logger } from './logger';
