import { lookup } from './lookup-table';
import type { LookupResult, LookupTable } from './types';

/** How many leading table entries the transcript shows. */
export const PREVIEW_ENTRIES = 5;

export interface DemoReport {
  lines: string[];
  results: Array<{ input: number; result: LookupResult }>;
}

/** Inputs exercised by the transcript, including one just past each end. */
export function demoInputs(numValues: number): number[] {
  return [...new Set([0, 1, 3, numValues - 1, -1, numValues])];
}

/**
 * Print parameters, a preview of the table and a fixed set of lookups.
 * Out-of-range lookups print 0 with the reason and the run continues.
 */
export function runDemo(
  table: LookupTable,
  write: (line: string) => void = line => console.log(line),
): DemoReport {
  const { inputBits, numValues, weight } = table.config;
  const lines: string[] = [];
  const emit = (line: string) => {
    lines.push(line);
    write(line);
  };

  emit(`Input bits: ${inputBits ?? 'n/a'}`);
  emit(`Domain size: ${numValues}`);
  emit(`Weight: ${weight}`);
  emit(`Table preview: [${table.values.slice(0, PREVIEW_ENTRIES).join(', ')}]`);

  const results: DemoReport['results'] = [];
  for (const input of demoInputs(numValues)) {
    const result = lookup(table, input);
    results.push({ input, result });
    if (result.ok) {
      emit(`lookup(${input}) = ${result.value}`);
    } else {
      emit(`lookup(${input}) = 0 (out of range: ${result.error.message})`);
    }
  }

  return { lines, results };
}
