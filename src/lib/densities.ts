/**
 * @file src/lib/densities.ts
 * @description Substance densities (kg per liter) used to bridge volume and weight units.
 */

import { UnknownSubstanceError } from '../shared/errors';
import { rankSuggestions } from './suggestions';

export type DensityTable = ReadonlyMap<string, number>;

const HERB_DENSITY = 0.10566;

export const BUILT_IN_DENSITIES: DensityTable = new Map<string, number>([
  ['flour', 0.5283],
  ['butter', 0.9586],
  ['sugar', 0.8453],
  ['salt', 1.1548],
  ['baking-powder', 0.7208],
  ['baking-soda', 0.9337],
  ['almond-flour', 0.5679],
  ['tomato-paste', 1.1075],
  ['tomato-puree', 1.1075],
  ['rice', 0.8453],
  ['tofu', 1.048],
  ['parmesan', 0.4227],
  ['oil', 0.9215],
  ['water', 1.0],
  ['parsley', HERB_DENSITY],
  ['basil', HERB_DENSITY],
  ['cilantro', HERB_DENSITY],
  ['dill', HERB_DENSITY],
  ['herbs', HERB_DENSITY],
]);

/**
 * Builds the table used for one run: the built-in densities with user-configured ones laid
 * over them. Configured names are lower-cased to match how tokens are read.
 */
export const createDensityTable = (extra: Record<string, number> = {}): DensityTable => {
  const table = new Map(BUILT_IN_DENSITIES);
  Object.entries(extra).forEach(([name, density]) => {
    table.set(name.trim().toLowerCase(), density);
  });
  return table;
};

/**
 * @throws UnknownSubstanceError with the known substances ranked by closeness to `substance`.
 */
export const resolveDensity = (
  substance: string,
  table: DensityTable = BUILT_IN_DENSITIES,
): number => {
  const density = table.get(substance);
  if (density === undefined) {
    throw new UnknownSubstanceError(substance, rankSuggestions(substance, table.keys()));
  }
  return density;
};
