/** Options for creating a lookup table. */
export interface LookupTableOptions {
  /** Bit width of the input; the domain is [0, 2^inputBits). Default: 4 */
  inputBits?: number;
  /** Explicit domain size. Takes precedence over `inputBits` when set. */
  numValues?: number;
  /** Scalar multiplier applied to every input. Default: 0.75 */
  weight?: number;
}

/** Resolved, immutable table configuration. */
export interface LookupTableConfig {
  /** `null` when the domain size was given directly. */
  inputBits: number | null;
  numValues: number;
  weight: number;
}

/** A precomputed table plus the configuration it was built from. */
export interface LookupTable {
  config: LookupTableConfig;
  /** `values[i] === i * config.weight` */
  values: readonly number[];
  size: number;
}

/** Raised by a lookup whose input falls outside [0, numValues). */
export interface OutOfRangeInput {
  kind: 'OutOfRangeInput';
  input: number;
  numValues: number;
  message: string;
}

export type LookupResult =
  | { ok: true; value: number }
  | { ok: false; error: OutOfRangeInput };

/** Operations the product database knows how to precompute. */
export type Operation = 'multiply';

export interface ProductDatabaseOptions {
  /** Number of inputs feeding the neuron. */
  numInputs: number;
  /** Each input ranges over [0, 2^inputBitDepth). */
  inputBitDepth: number;
  operation: string;
}

/** Precomputed results keyed by tuple text, e.g. "(0, 1)". */
export interface ProductDatabase {
  entries: ReadonlyMap<string, number>;
}
