/**
 * @file tests/quantity.test.ts
 * @description Ensures quantity tokens parse as integers, decimals, exponents and fractions.
 */

import { describe, expect, it } from 'vitest';
import { parseQuantity } from '../src/lib/quantity';
import { NumericParseError } from '../src/shared/errors';

describe('parseQuantity', () => {
  it('parses integers and decimals', () => {
    expect(parseQuantity('10')).toBe(10);
    expect(parseQuantity('0.4')).toBe(0.4);
    expect(parseQuantity('.5')).toBe(0.5);
    expect(parseQuantity('2.')).toBe(2);
  });

  it('parses scientific notation', () => {
    expect(parseQuantity('1e3')).toBe(1000);
    expect(parseQuantity('5e-2')).toBe(0.05);
  });

  it('accepts signed decimals', () => {
    expect(parseQuantity('-40')).toBe(-40);
    expect(parseQuantity('+2.5')).toBe(2.5);
  });

  it('divides simple fractions', () => {
    expect(parseQuantity('3/4')).toBe(0.75);
    expect(parseQuantity('10/4')).toBe(2.5);
  });

  it('accepts fraction parts up to the 64-bit limit', () => {
    expect(parseQuantity('18446744073709551615/1')).toBe(2 ** 64);
  });

  it('leaves a zero denominator to float semantics', () => {
    expect(parseQuantity('1/0')).toBe(Infinity);
    expect(parseQuantity('0/0')).toBeNaN();
  });

  it.each([
    '3.5/4',
    '3/4.0',
    '-3/4',
    '3/',
    '/4',
    '1/2/3',
    ' 3/4',
    '99999999999999999999999/1',
    '1/18446744073709551616',
  ])('rejects the fraction %s', (text) => {
    expect(() => parseQuantity(text)).toThrow(NumericParseError);
  });

  it.each(['', 'abc', '12abc', '1e', '1.2.3', '1,5', 'e3', '1e999', '-1e999'])(
    'rejects %j',
    (text) => {
      expect(() => parseQuantity(text)).toThrow(NumericParseError);
    },
  );

  it('names the offending token in the message', () => {
    expect(() => parseQuantity('3.5/4')).toThrow("could not convert '3.5/4' into a number");
  });
});
