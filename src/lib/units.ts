/**
 * @file src/lib/units.ts
 * @description Unit table and lookup. Weight factors convert to kilograms, volume factors to
 *              liters. Temperature units carry their scale instead of a factor because
 *              Celsius and Fahrenheit do not share a zero.
 */

import { UnknownUnitError } from '../shared/errors';
import { rankSuggestions } from './suggestions';

export type UnitCategory = 'weight' | 'volume' | 'temperature';

export type TemperatureScale = 'celsius' | 'fahrenheit';

export interface LinearUnit {
  name: string;
  category: 'weight' | 'volume';
  factor: number;
}

export interface TemperatureUnit {
  name: string;
  category: 'temperature';
  scale: TemperatureScale;
}

export type Unit = LinearUnit | TemperatureUnit;

const weight = (name: string, factor: number): LinearUnit => ({ name, category: 'weight', factor });
const volume = (name: string, factor: number): LinearUnit => ({ name, category: 'volume', factor });
const temperature = (name: string, scale: TemperatureScale): TemperatureUnit => ({
  name,
  category: 'temperature',
  scale,
});

export const UNITS: ReadonlyMap<string, Readonly<Unit>> = new Map(
  [
    weight('kg', 1),
    weight('g', 1e-3),
    weight('mg', 1e-6),
    weight('lb', 0.4536),
    weight('oz', 0.02835),
    volume('l', 1),
    volume('dl', 0.1),
    volume('cl', 0.01),
    volume('ml', 0.001),
    volume('gal', 3.785),
    volume('cup', 0.2366),
    volume('floz', 0.02957),
    volume('tbs', 0.01479),
    volume('ts', 0.00493),
    temperature('c', 'celsius'),
    temperature('f', 'fahrenheit'),
  ].map((unit) => [unit.name, Object.freeze(unit)] as const),
);

export const BASE_UNIT_LABEL: Record<UnitCategory, string> = {
  weight: 'kg',
  volume: 'l',
  temperature: 'scale',
};

export const unitNames = (): string[] => Array.from(UNITS.keys());

/**
 * Looks a unit up by name, ignoring case.
 * @throws UnknownUnitError with every known unit ranked by closeness to `name`.
 */
export const resolveUnit = (name: string): Unit => {
  const key = name.toLowerCase();
  const unit = UNITS.get(key);
  if (!unit) {
    throw new UnknownUnitError(key, rankSuggestions(key, UNITS.keys()));
  }
  return unit;
};

export const unitsByCategory = (): Record<UnitCategory, Unit[]> => {
  const groups: Record<UnitCategory, Unit[]> = { weight: [], volume: [], temperature: [] };
  UNITS.forEach((unit) => groups[unit.category].push(unit));
  return groups;
};
