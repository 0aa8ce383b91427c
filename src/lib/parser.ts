/**
 * @file src/lib/parser.ts
 * @description Classifies CLI tokens into quantity, units and optional substances.
 *              Accepted shape: `<quantity> <unit> [of] [substance] {to|in} <unit> [of] [substance]`.
 */

import { ArgumentSyntaxError, SubstanceMismatchError } from '../shared/errors';

/** Shortest usable invocation: quantity, unit, separator, unit. */
export const MIN_TOKENS = 4;

const SEPARATORS = new Set(['to', 'in']);
const FILLER = 'of';

export interface ParsedArguments {
  quantity: string;
  fromUnit: string;
  fromSubstance?: string;
  toUnit: string;
  toSubstance?: string;
}

/**
 * Tokens are lower-cased and assigned positionally; the separator decides whether a trailing
 * word belongs to the source or the target side.
 * @throws ArgumentSyntaxError on a repeated separator, surplus tokens, or a missing target unit.
 */
export const parseArguments = (tokens: readonly string[]): ParsedArguments => {
  let quantity = '';
  let fromUnit = '';
  let fromSubstance = '';
  let toUnit = '';
  let toSubstance = '';
  let separatorFound = false;

  for (const raw of tokens) {
    const token = raw.toLowerCase();
    if (SEPARATORS.has(token)) {
      if (separatorFound) {
        throw new ArgumentSyntaxError("multiple 'to' or 'in' not allowed");
      }
      separatorFound = true;
    } else if (!quantity) {
      quantity = token;
    } else if (!fromUnit) {
      fromUnit = token;
    } else if (!separatorFound && !fromSubstance) {
      if (token !== FILLER) fromSubstance = token;
    } else if (separatorFound && !toUnit) {
      toUnit = token;
    } else if (separatorFound && !toSubstance) {
      if (token !== FILLER) toSubstance = token;
    } else {
      throw new ArgumentSyntaxError();
    }
  }

  // An absent target unit is a shape error here, not a lookup of the empty unit name.
  if (!separatorFound || !quantity || !fromUnit || !toUnit) {
    throw new ArgumentSyntaxError();
  }

  return {
    quantity,
    fromUnit,
    fromSubstance: fromSubstance || undefined,
    toUnit,
    toSubstance: toSubstance || undefined,
  };
};

/**
 * The substance a conversion is about, if any.
 * @throws SubstanceMismatchError when both sides name different substances.
 */
export const resolveSubstance = (parsed: ParsedArguments): string | undefined => {
  const { fromSubstance, toSubstance } = parsed;
  if (fromSubstance && toSubstance && fromSubstance !== toSubstance) {
    throw new SubstanceMismatchError(fromSubstance, toSubstance);
  }
  return fromSubstance ?? toSubstance;
};
