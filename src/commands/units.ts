/**
 * @file src/commands/units.ts
 * @description Lists the supported units grouped by category.
 */

import { Command } from 'commander';
import { formatNumber } from '../lib/format';
import { BASE_UNIT_LABEL, type UnitCategory, unitsByCategory } from '../lib/units';
import { createReporter, type Reporter } from '../shared/reporter';

const CATEGORY_ORDER: UnitCategory[] = ['weight', 'volume', 'temperature'];

export const renderUnitTable = (reporter: Reporter): void => {
  const groups = unitsByCategory();
  CATEGORY_ORDER.forEach((category, idx) => {
    const heading = `${category} (${BASE_UNIT_LABEL[category]})`;
    reporter.info(reporter.paint.bold(idx ? `\n${heading}` : heading));
    groups[category].forEach((unit) => {
      const detail =
        unit.category === 'temperature'
          ? unit.scale
          : `${formatNumber(unit.factor)} ${BASE_UNIT_LABEL[unit.category]}`;
      reporter.info(`  ${unit.name.padEnd(5)} ${detail}`);
    });
  });
};

interface UnitsCliOptions {
  color?: boolean;
}

const unitsCommand = new Command('units')
  .description('List the supported units and their size in kg or l')
  .option('--no-color', 'Disable colored output')
  .action((options: UnitsCliOptions) => {
    renderUnitTable(createReporter({ color: options.color }));
  });

export default unitsCommand;
