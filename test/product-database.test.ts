import { describe, it, expect } from 'vitest';
import {
  createDatabase,
  databaseFromRecord,
  databaseToRecord,
  formatKey,
  MissingCombinationError,
  queryDatabase,
  simulateNeuron,
} from '../src/product-database';

describe('formatKey', () => {
  it('formats tuples with a space after each comma', () => {
    expect(formatKey([0, 1])).toBe('(0, 1)');
    expect(formatKey([2, 3, 1])).toBe('(2, 3, 1)');
  });

  it('keeps the trailing comma of a single-element tuple', () => {
    expect(formatKey([3])).toBe('(3,)');
  });
});

describe('createDatabase', () => {
  it('covers every combination of two 2-bit inputs', () => {
    const db = createDatabase({ numInputs: 2, inputBitDepth: 2, operation: 'multiply' });
    expect(db.entries.size).toBe(16);
    const keys = [...db.entries.keys()];
    expect(keys[0]).toBe('(0, 0)');
    expect(keys[1]).toBe('(0, 1)');
    expect(keys[4]).toBe('(1, 0)');
    expect(keys[15]).toBe('(3, 3)');
    expect(db.entries.get('(3, 2)')).toBe(6);
    expect(db.entries.get('(3, 3)')).toBe(9);
  });

  it('stores the input itself for a single input', () => {
    const db = createDatabase({ numInputs: 1, inputBitDepth: 2, operation: 'multiply' });
    expect(databaseToRecord(db)).toEqual({ '(0,)': 0, '(1,)': 1, '(2,)': 2, '(3,)': 3 });
  });

  it('validates its arguments', () => {
    expect(() => createDatabase({ numInputs: 0, inputBitDepth: 2, operation: 'multiply' })).toThrow(
      'numInputs must be a positive integer.',
    );
    expect(() => createDatabase({ numInputs: 2, inputBitDepth: 1.5, operation: 'multiply' })).toThrow(
      'inputBitDepth must be a positive integer.',
    );
    expect(() => createDatabase({ numInputs: 2, inputBitDepth: 2, operation: 'add' })).toThrow(
      'Unsupported operation: add',
    );
  });

  it('refuses to enumerate oversized domains', () => {
    expect(() => createDatabase({ numInputs: 3, inputBitDepth: 8, operation: 'multiply' })).toThrow(
      'Database would hold 16777216 combinations; the limit is 1048576',
    );
  });
});

describe('queryDatabase', () => {
  const db = createDatabase({ numInputs: 3, inputBitDepth: 1, operation: 'multiply' });

  it('returns the precomputed product', () => {
    expect(queryDatabase(db, [1, 1, 1])).toBe(1);
    expect(queryDatabase(db, [1, 0, 1])).toBe(0);
  });

  it('falls back to compact keys', () => {
    const compact = databaseFromRecord({ '(0,1)': 0, '(2,3)': 6 });
    expect(queryDatabase(compact, [2, 3])).toBe(6);
  });

  it('names both searched keys when a tuple is missing', () => {
    expect(() => queryDatabase(db, [9, 9])).toThrow(MissingCombinationError);
    expect(() => queryDatabase(db, [9, 9])).toThrow(
      "Input combination (9, 9) (searched as '(9, 9)' and '(9,9)') not found in the database.",
    );
  });

  it('rejects an empty tuple', () => {
    expect(() => queryDatabase(db, [])).toThrow(TypeError);
  });
});

describe('simulateNeuron', () => {
  it('matches the direct product for every combination', () => {
    const db = createDatabase({ numInputs: 2, inputBitDepth: 3, operation: 'multiply' });
    for (let a = 0; a < 8; a++) {
      for (let b = 0; b < 8; b++) {
        expect(simulateNeuron(db, [a, b])).toBe(a * b);
      }
    }
  });
});

describe('record conversion', () => {
  it('restores a database from its record form', () => {
    const db = createDatabase({ numInputs: 2, inputBitDepth: 1, operation: 'multiply' });
    const record = databaseToRecord(db);
    expect(record).toEqual({ '(0, 0)': 0, '(0, 1)': 0, '(1, 0)': 0, '(1, 1)': 1 });
    expect(queryDatabase(databaseFromRecord(record), [1, 1])).toBe(1);
  });

  it('rejects non-numeric entries', () => {
    expect(() => databaseFromRecord({ '(0, 0)': 'x' })).toThrow(
      'Invalid database entry for (0, 0): expected a finite number',
    );
  });
});
