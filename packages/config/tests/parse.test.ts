import { describe, it, expect } from 'vitest';
import { tryParseBool, parseCommaSeparated } from '../src/parse.js';
import { configBoolean } from '../src/schemas.js';

describe('parseCommaSeparated', () => {
  it('trims and drops empty entries', () => {
    expect(parseCommaSeparated(' a , ,b,')).toEqual(['a', 'b']);
    expect(parseCommaSeparated(undefined)).toEqual([]);
  });
});

describe('tryParseBool', () => {
  it('accepts only true/false in any casing', () => {
    expect(tryParseBool('True')).toBe(true);
    expect(tryParseBool(' false ')).toBe(false);
    expect(tryParseBool('1')).toBeUndefined();
    expect(tryParseBool('yes')).toBeUndefined();
    expect(tryParseBool(undefined)).toBeUndefined();
  });
});

describe('configBoolean', () => {
  it('parses true and false in any casing', () => {
    expect(configBoolean.parse('True')).toBe(true);
    expect(configBoolean.parse(' FALSE')).toBe(false);
    expect(configBoolean.safeParse('1').success).toBe(false);
  });
});
