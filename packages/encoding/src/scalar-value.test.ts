/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { GroupCodeClass } from './group-codes.js';
import {
  parseDouble,
  parseInteger,
  parseBool,
  parseHandle,
  formatDouble,
  formatInteger,
  formatBool,
  formatHandle,
  formatGroupCode,
} from './scalar-value.js';

describe('parseDouble', () => {
  it('accepts fixed and scientific notation', () => {
    expect(parseDouble('2.500000')).toBe(2.5);
    expect(parseDouble(' -0.25 ')).toBe(-0.25);
    expect(parseDouble('.5')).toBe(0.5);
    expect(parseDouble('1e3')).toBe(1000);
    expect(parseDouble('7')).toBe(7);
  });

  it('rejects text that is not a number', () => {
    expect(parseDouble('')).toBeNull();
    expect(parseDouble('abc')).toBeNull();
    expect(parseDouble('1.2.3')).toBeNull();
    expect(parseDouble('NaN')).toBeNull();
    expect(parseDouble('Infinity')).toBeNull();
  });
});

describe('parseInteger', () => {
  it('parses decimal integers with padding', () => {
    expect(parseInteger('   256', GroupCodeClass.Int16)).toBe(256);
    expect(parseInteger('-1', GroupCodeClass.Int32)).toBe(-1);
  });

  it('enforces the range of the class', () => {
    expect(parseInteger('32767', GroupCodeClass.Int16)).toBe(32767);
    expect(parseInteger('32768', GroupCodeClass.Int16)).toBeNull();
    expect(parseInteger('32768', GroupCodeClass.Int32)).toBe(32768);
    expect(parseInteger('2147483648', GroupCodeClass.Int32)).toBeNull();
    expect(parseInteger('2147483648', GroupCodeClass.Int64)).toBe(2147483648);
  });

  it('rejects fractions and words', () => {
    expect(parseInteger('1.5', GroupCodeClass.Int16)).toBeNull();
    expect(parseInteger('ten', GroupCodeClass.Int16)).toBeNull();
  });
});

describe('parseBool', () => {
  it('reads 0 and 1 only', () => {
    expect(parseBool('1')).toBe(true);
    expect(parseBool('  0')).toBe(false);
    expect(parseBool('2')).toBeNull();
  });
});

describe('handles', () => {
  it('parses hexadecimal handles', () => {
    expect(parseHandle('1A')).toBe(26);
    expect(parseHandle('1a')).toBe(26);
    expect(parseHandle('0')).toBe(0);
    expect(parseHandle('G1')).toBeNull();
    expect(parseHandle('')).toBeNull();
  });

  it('accepts handles up to the largest safe integer', () => {
    expect(parseHandle('1FFFFFFFFFFFFF')).toBe(Number.MAX_SAFE_INTEGER);
    expect(parseHandle('20000000000000')).toBeNull();
  });

  it('writes lower-case hex', () => {
    expect(formatHandle(26)).toBe('1a');
    expect(formatHandle(0)).toBe('0');
  });
});

describe('formatting', () => {
  it('writes doubles with six decimals', () => {
    expect(formatDouble(2.5)).toBe('2.500000');
    expect(formatDouble(0)).toBe('0.000000');
    expect(formatDouble(-1.25)).toBe('-1.250000');
  });

  it('writes integers and booleans', () => {
    expect(formatInteger(65)).toBe('65');
    expect(formatInteger(-3)).toBe('-3');
    expect(formatBool(true)).toBe('1');
    expect(formatBool(false)).toBe('0');
  });

  it('right-aligns group codes in three columns', () => {
    expect(formatGroupCode(0)).toBe('  0');
    expect(formatGroupCode(10)).toBe(' 10');
    expect(formatGroupCode(100)).toBe('100');
    expect(formatGroupCode(1001)).toBe('1001');
  });
});
