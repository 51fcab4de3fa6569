/**
 * Sample product database: the 2-input, 2-bit multiply neuron, printed as
 * string-keyed JSON.
 */

import { consoleLogger, type Logger } from './logger';
import { createDatabase, databaseToRecord } from './product-database';
import type { ProductDatabaseOptions } from './types';

export const SAMPLE_DATABASE_OPTIONS: ProductDatabaseOptions = {
  numInputs: 2,
  inputBitDepth: 2,
  operation: 'multiply',
};

/** Build the sample database, report progress and write its JSON form. */
export function runSampleDatabase(
  write: (line: string) => void = line => console.log(line),
  logger: Logger = consoleLogger,
  options: ProductDatabaseOptions = SAMPLE_DATABASE_OPTIONS,
): Record<string, number> {
  const { numInputs, inputBitDepth, operation } = options;
  logger.info(
    `Generating database with: numInputs=${numInputs}, inputBitDepth=${inputBitDepth}, operation='${operation}'`,
  );

  const record = databaseToRecord(createDatabase(options));
  logger.info(`Converted ${Object.keys(record).length} tuple keys to string keys for JSON serialization.`);

  write(JSON.stringify(record, null, 4));
  return record;
}
