/**
 * @file src/commands/substances.ts
 * @description Lists the substances whose density is known, built-in and configured.
 */

import { Command } from 'commander';
import { BUILT_IN_DENSITIES, createDensityTable } from '../lib/densities';
import { formatNumber } from '../lib/format';
import { CONFIG_PATH, readConfig } from '../shared/config';
import { createReporter, type Reporter } from '../shared/reporter';

export const renderSubstanceTable = (
  configured: Record<string, number>,
  reporter: Reporter,
): void => {
  const table = createDensityTable(configured);
  const names = Array.from(table.keys()).sort((a, b) => a.localeCompare(b));
  const width = Math.max(...names.map((name) => name.length));
  reporter.info(reporter.paint.bold(`[substances] ${names.length} densities (kg/l)`));
  names.forEach((name) => {
    const density = table.get(name) ?? 0;
    const builtIn = BUILT_IN_DENSITIES.get(name);
    const origin =
      builtIn === undefined ? ' (configured)' : builtIn !== density ? ' (configured override)' : '';
    reporter.info(`  ${name.padEnd(width)}  ${formatNumber(density)}${reporter.paint.gray(origin)}`);
  });
};

interface SubstancesCliOptions {
  config?: string;
  color?: boolean;
}

const substancesCommand = new Command('substances')
  .description('List the substances that can bridge volume and weight')
  .option('--config <file>', 'Configuration file to read', CONFIG_PATH)
  .option('--no-color', 'Disable colored output')
  .action((options: SubstancesCliOptions) => {
    const reporter = createReporter({ color: options.color });
    const config = readConfig(options.config ?? CONFIG_PATH, (message) =>
      reporter.error(reporter.paint.yellow(message)),
    );
    renderSubstanceTable(config.substances ?? {}, reporter);
  });

export default substancesCommand;
