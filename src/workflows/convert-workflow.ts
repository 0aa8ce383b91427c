/**
 * @file src/workflows/convert-workflow.ts
 * @description Runs one conversion from raw tokens to a computed value: parse the arguments,
 *              check the substance, parse the quantity, resolve both units, convert.
 *              Rendering is left to the caller.
 */

import { convert } from '../lib/converter';
import { BUILT_IN_DENSITIES, type DensityTable } from '../lib/densities';
import { type ParsedArguments, parseArguments, resolveSubstance } from '../lib/parser';
import { parseQuantity } from '../lib/quantity';
import { resolveUnit, type Unit } from '../lib/units';

export interface ConvertWorkflowOptions {
  densities?: DensityTable;
}

export interface ConvertWorkflowResult {
  parsed: ParsedArguments;
  quantity: number;
  from: Unit;
  to: Unit;
  substance?: string;
  value: number;
}

export const runConvertWorkflow = (
  tokens: readonly string[],
  options: ConvertWorkflowOptions = {},
): ConvertWorkflowResult => {
  const parsed = parseArguments(tokens);
  const substance = resolveSubstance(parsed);
  const quantity = parseQuantity(parsed.quantity);
  const from = resolveUnit(parsed.fromUnit);
  const to = resolveUnit(parsed.toUnit);
  const value = convert(
    { quantity, from, to, substance },
    options.densities ?? BUILT_IN_DENSITIES,
  );
  return { parsed, quantity, from, to, substance, value };
};
