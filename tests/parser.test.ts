/**
 * @file tests/parser.test.ts
 * @description Ensures CLI tokens are classified into quantity, units and substances.
 */

import { describe, expect, it } from 'vitest';
import { parseArguments, resolveSubstance } from '../src/lib/parser';
import { ArgumentSyntaxError, SubstanceMismatchError } from '../src/shared/errors';

describe('parseArguments', () => {
  it('reads the minimal form', () => {
    expect(parseArguments(['10', 'kg', 'to', 'lb'])).toEqual({
      quantity: '10',
      fromUnit: 'kg',
      toUnit: 'lb',
    });
  });

  it('lower-cases every token and accepts "in" as the separator', () => {
    expect(parseArguments(['400', 'F', 'IN', 'C'])).toEqual({
      quantity: '400',
      fromUnit: 'f',
      toUnit: 'c',
    });
  });

  it('skips "of" before a source substance', () => {
    expect(parseArguments(['3', 'TS', 'of', 'Sugar', 'to', 'g'])).toEqual({
      quantity: '3',
      fromUnit: 'ts',
      fromSubstance: 'sugar',
      toUnit: 'g',
    });
  });

  it('places a trailing substance on the target side', () => {
    expect(parseArguments(['1', 'cup', 'to', 'g', 'of', 'butter'])).toEqual({
      quantity: '1',
      fromUnit: 'cup',
      toUnit: 'g',
      toSubstance: 'butter',
    });
  });

  it('keeps both substances when given on each side', () => {
    const parsed = parseArguments(['1', 'cup', 'butter', 'to', 'g', 'flour']);
    expect(parsed.fromSubstance).toBe('butter');
    expect(parsed.toSubstance).toBe('flour');
  });

  it('rejects a second separator', () => {
    expect(() => parseArguments(['1', 'cup', 'to', 'ml', 'in'])).toThrow(
      "multiple 'to' or 'in' not allowed",
    );
  });

  it('rejects surplus tokens', () => {
    expect(() => parseArguments(['1', 'cup', 'butter', 'sugar', 'to', 'g'])).toThrow(
      ArgumentSyntaxError,
    );
    expect(() => parseArguments(['1', 'cup', 'to', 'g', 'butter', 'extra'])).toThrow(
      "expected '<quantity> <unit> [substance] to <unit> [substance]'",
    );
  });

  it('requires a separator and a target unit', () => {
    expect(() => parseArguments(['1', 'cup', 'of', 'butter'])).toThrow(ArgumentSyntaxError);
    expect(() => parseArguments(['1', 'cup', 'butter', 'to'])).toThrow(ArgumentSyntaxError);
  });

  it('reports syntax errors with the SyntaxError kind', () => {
    try {
      parseArguments(['1', 'to', 'to', 'g']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ArgumentSyntaxError);
      expect((error as ArgumentSyntaxError).kind).toBe('SyntaxError');
      expect((error as ArgumentSyntaxError).label).toBe('syntax error');
    }
  });
});

describe('resolveSubstance', () => {
  it('returns whichever side names the substance', () => {
    expect(resolveSubstance(parseArguments(['1', 'cup', 'butter', 'to', 'g']))).toBe('butter');
    expect(resolveSubstance(parseArguments(['1', 'cup', 'to', 'g', 'butter']))).toBe('butter');
  });

  it('accepts the same substance on both sides', () => {
    expect(resolveSubstance(parseArguments(['1', 'cup', 'rice', 'to', 'g', 'rice']))).toBe('rice');
  });

  it('is undefined without a substance', () => {
    expect(resolveSubstance(parseArguments(['1', 'cup', 'to', 'ml']))).toBeUndefined();
  });

  it('rejects two different substances', () => {
    const parsed = parseArguments(['1', 'cup', 'butter', 'to', 'g', 'flour']);
    expect(() => resolveSubstance(parsed)).toThrow(SubstanceMismatchError);
    expect(() => resolveSubstance(parsed)).toThrow(
      "cannot convert a quantity of 'butter' into one of 'flour'",
    );
  });
});
