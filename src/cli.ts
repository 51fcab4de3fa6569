import { runDemo } from './demo';
import { consoleLogger, type Logger } from './logger';
import { createLookupTable } from './lookup-table';
import { runSampleDatabase } from './sample-database';
import type { LookupTableOptions } from './types';

/** Bad command-line usage. */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

export interface CliArgs extends LookupTableOptions {
  help: boolean;
  sampleDatabase: boolean;
}

export interface CliIo {
  write: (line: string) => void;
  logger: Logger;
}

export const USAGE = `Usage: lut-demo [--input-bits <n> | --num-values <n>] [--weight <x>]
       lut-demo --sample-database

Precompute i * weight for every input in the domain and exercise lookups.

Options:
  --input-bits <n>  domain is [0, 2^n) (default 4)
  --num-values <n>  explicit domain size, overrides --input-bits
  --weight <x>      scalar multiplier (default 0.75)
  --sample-database print the 2-input, 2-bit multiply database as JSON
  -h, --help        show this message`;

const NUMERIC_OPTIONS = {
  'input-bits': 'inputBits',
  'num-values': 'numValues',
  weight: 'weight',
} as const satisfies Record<string, keyof LookupTableOptions>;

type NumericOption = keyof typeof NUMERIC_OPTIONS;

function isNumericOption(key: string): key is NumericOption {
  return Object.prototype.hasOwnProperty.call(NUMERIC_OPTIONS, key);
}

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new CliError(`--${flag} expects a number, got '${raw}'`);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false, sampleDatabase: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === '-h' || token === '--help') {
      args.help = true;
      continue;
    }
    if (token === '--sample-database') {
      args.sampleDatabase = true;
      continue;
    }
    if (!token.startsWith('--')) {
      throw new CliError(`unexpected argument '${token}'`);
    }

    let key = token.slice(2);
    let raw: string | undefined;
    const eq = key.indexOf('=');
    if (eq >= 0) {
      raw = key.slice(eq + 1);
      key = key.slice(0, eq);
    }
    if (!isNumericOption(key)) {
      throw new CliError(`unknown option '--${key}'`);
    }
    if (raw === undefined) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new CliError(`--${key} requires a value`);
      }
      raw = next;
      i += 1;
    }
    args[NUMERIC_OPTIONS[key]] = parseNumber(key, raw);
  }

  return args;
}

const defaultIo: CliIo = {
  write: line => console.log(line),
  logger: consoleLogger,
};

/** Run the demo for the given arguments and return the process exit code. */
export function runCli(argv: readonly string[], io: CliIo = defaultIo): number {
  try {
    const { help, sampleDatabase, ...options } = parseCliArgs(argv);
    if (help) {
      io.write(USAGE);
      return 0;
    }
    if (sampleDatabase) {
      runSampleDatabase(io.write, io.logger);
      return 0;
    }
    runDemo(createLookupTable(options), io.write);
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.logger.error(message);
    io.write(USAGE);
    return 1;
  }
}
