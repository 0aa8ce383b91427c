/**
 * @file src/lib/converter.ts
 * @description Conversion arithmetic between resolved units, bridging volume and weight with a
 *              substance density.
 */

import { IncompatibleCategoryError, MissingSubstanceError } from '../shared/errors';
import { BUILT_IN_DENSITIES, type DensityTable, resolveDensity } from './densities';
import type { LinearUnit, TemperatureUnit, Unit } from './units';

export interface ConversionRequest {
  quantity: number;
  from: Unit;
  to: Unit;
  substance?: string;
}

const isCrossMeasure = (from: Unit, to: Unit): boolean =>
  (from.category === 'volume' && to.category === 'weight') ||
  (from.category === 'weight' && to.category === 'volume');

/** Restates a volume unit as the weight of that volume of a substance. */
const asWeight = (unit: Unit, density: number): Unit =>
  unit.category === 'volume'
    ? { name: unit.name, category: 'weight', factor: unit.factor * density }
    : unit;

export const convertTemperature = (
  quantity: number,
  from: TemperatureUnit,
  to: TemperatureUnit,
): number => {
  if (from.scale === to.scale) {
    return quantity;
  }
  if (from.scale === 'celsius') {
    return quantity * (9 / 5) + 32;
  }
  return (quantity - 32) * (5 / 9);
};

export const convertLinear = (quantity: number, from: LinearUnit, to: LinearUnit): number =>
  (quantity * from.factor) / to.factor;

/**
 * Converts `request.quantity` from one unit to the other.
 * @throws MissingSubstanceError when volume meets weight without a substance.
 * @throws UnknownSubstanceError when the substance has no known density.
 * @throws IncompatibleCategoryError for any other category mix, e.g. temperature and weight.
 */
export const convert = (
  request: ConversionRequest,
  densities: DensityTable = BUILT_IN_DENSITIES,
): number => {
  let { from, to } = request;

  if (isCrossMeasure(from, to)) {
    if (!request.substance) {
      throw new MissingSubstanceError(from.name, from.category, to.name, to.category);
    }
    const density = resolveDensity(request.substance, densities);
    from = asWeight(from, density);
    to = asWeight(to, density);
  }

  if (from.category === 'temperature' && to.category === 'temperature') {
    return convertTemperature(request.quantity, from, to);
  }
  if (
    from.category !== 'temperature' &&
    to.category !== 'temperature' &&
    from.category === to.category
  ) {
    return convertLinear(request.quantity, from, to);
  }
  throw new IncompatibleCategoryError(
    request.from.name,
    from.category,
    request.to.name,
    to.category,
  );
};
