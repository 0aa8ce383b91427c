/**
 * @file tests/convert-workflow.test.ts
 * @description End-to-end conversions from raw CLI tokens to values.
 */

import { describe, expect, it } from 'vitest';
import { createDensityTable } from '../src/lib/densities';
import {
  MissingSubstanceError,
  NumericParseError,
  SubstanceMismatchError,
  UnknownSubstanceError,
  UnknownUnitError,
} from '../src/shared/errors';
import { runConvertWorkflow } from '../src/workflows/convert-workflow';

describe('runConvertWorkflow', () => {
  it('converts a fraction of a cup to milliliters', () => {
    const result = runConvertWorkflow(['3/4', 'cup', 'to', 'ml']);
    expect(result.quantity).toBe(0.75);
    expect(result.value).toBeCloseTo(177.45, 9);
    expect(result.substance).toBeUndefined();
  });

  it('converts a cup of butter to grams', () => {
    const result = runConvertWorkflow(['1', 'cup', 'butter', 'to', 'g']);
    expect(result.substance).toBe('butter');
    expect(result.value).toBeCloseTo(226.805, 3);
  });

  it('accepts the substance after the target unit', () => {
    const result = runConvertWorkflow(['100', 'g', 'to', 'cup', 'of', 'sugar']);
    expect(result.substance).toBe('sugar');
    expect(result.value).toBeCloseTo(0.1 / (0.2366 * 0.8453), 9);
  });

  it('converts oven temperatures', () => {
    expect(runConvertWorkflow(['400', 'F', 'in', 'C']).value).toBeCloseTo(204.444, 3);
  });

  it('converts kilograms to pounds', () => {
    expect(runConvertWorkflow(['0.4', 'kg', 'to', 'lb']).value).toBeCloseTo(0.881834, 6);
  });

  it('resolves configured substances', () => {
    const densities = createDensityTable({ honey: 1.42 });
    const result = runConvertWorkflow(['1', 'l', 'honey', 'to', 'kg'], { densities });
    expect(result.value).toBeCloseTo(1.42, 10);
  });

  it('fails on mismatched substances', () => {
    expect(() => runConvertWorkflow(['1', 'cup', 'butter', 'to', 'g', 'flour'])).toThrow(
      SubstanceMismatchError,
    );
  });

  it('fails on volume to weight without a substance', () => {
    expect(() => runConvertWorkflow(['1', 'cup', 'to', 'g'])).toThrow(MissingSubstanceError);
  });

  it('fails on non-integer fractions', () => {
    expect(() => runConvertWorkflow(['3.5/4', 'cup', 'to', 'ml'])).toThrow(NumericParseError);
  });

  it('parses the quantity before resolving units', () => {
    expect(() => runConvertWorkflow(['abc', 'cupp', 'to', 'ml'])).toThrow(NumericParseError);
  });

  it('fails on unknown units and substances', () => {
    expect(() => runConvertWorkflow(['1', 'cupp', 'to', 'ml'])).toThrow(UnknownUnitError);
    expect(() => runConvertWorkflow(['1', 'cup', 'to', 'mll'])).toThrow(UnknownUnitError);
    expect(() => runConvertWorkflow(['1', 'cup', 'honey', 'to', 'g'])).toThrow(
      UnknownSubstanceError,
    );
  });
});
