/**
 * @file src/commands/config.ts
 * @description Shows and edits the kitchenconv configuration file: default precision and extra
 *              substance densities.
 */

import { Command } from 'commander';
import { BUILT_IN_DENSITIES } from '../lib/densities';
import {
  CONFIG_PATH,
  DensitySchema,
  PrecisionSchema,
  readConfig,
  resetConfig,
  resolveSettings,
  writeConfig,
} from '../shared/config';
import { createReporter, type Reporter } from '../shared/reporter';

type ConfigCliOptions = {
  config?: string;
};

const configFile = (command: Command): string => {
  const options = command.optsWithGlobals<ConfigCliOptions>();
  return options.config ?? CONFIG_PATH;
};

const fail = (reporter: Reporter, message: string): void => {
  reporter.error(reporter.paint.red(`[config] ${message}`));
  process.exitCode = 1;
};

export const showConfig = (filePath: string, reporter: Reporter): void => {
  const config = readConfig(filePath, (message) => reporter.error(reporter.paint.yellow(message)));
  const settings = resolveSettings({}, config);
  reporter.info(reporter.paint.bold(`[config] ${filePath}`));
  const origin = config.precision === undefined ? ' (default)' : '';
  reporter.info(`  precision: ${settings.precision}${origin}`);
  const substances = Object.entries(settings.substances);
  if (!substances.length) {
    reporter.info('  substances: none configured');
    return;
  }
  reporter.info('  substances:');
  substances.forEach(([name, density]) => reporter.info(`    ${name}: ${density}`));
};

export const setPrecision = (filePath: string, value: string, reporter: Reporter): void => {
  const parsed = PrecisionSchema.safeParse(value);
  if (!parsed.success) {
    fail(reporter, parsed.error.issues[0].message);
    return;
  }
  writeConfig({ precision: parsed.data }, filePath);
  reporter.info(reporter.paint.green(`[config] precision set to ${parsed.data}`));
};

export const setDensity = (
  filePath: string,
  substance: string,
  value: string,
  reporter: Reporter,
): void => {
  const name = substance.trim().toLowerCase();
  if (!name.length) {
    fail(reporter, 'substance name must not be empty');
    return;
  }
  const parsed = DensitySchema.safeParse(value);
  if (!parsed.success) {
    fail(reporter, parsed.error.issues[0].message);
    return;
  }
  writeConfig({ substances: { [name]: parsed.data } }, filePath);
  const verb = BUILT_IN_DENSITIES.has(name) ? 'overridden' : 'added';
  reporter.info(reporter.paint.green(`[config] ${name} ${verb} at ${parsed.data} kg/l`));
};

export const clearConfig = (filePath: string, reporter: Reporter): void => {
  const removed = resetConfig(filePath);
  reporter.info(
    removed ? `[config] Removed ${filePath}` : `[config] Nothing to reset at ${filePath}`,
  );
};

const configCommand = new Command('config')
  .description('Inspect or edit the kitchenconv configuration')
  .option('--config <file>', 'Configuration file to use', CONFIG_PATH);

configCommand
  .command('show')
  .description('Print the effective configuration')
  .action((_options: unknown, command: Command) => {
    showConfig(configFile(command), createReporter());
  });

configCommand
  .command('precision')
  .description('Set the default number of significant digits')
  .argument('<digits>', 'Significant digits, 1 to 17')
  .action((digits: string, _options: unknown, command: Command) => {
    setPrecision(configFile(command), digits, createReporter());
  });

configCommand
  .command('density')
  .description('Add or override the density of a substance')
  .argument('<substance>', 'Substance name, e.g. honey')
  .argument('<kgPerLiter>', 'Density in kilograms per liter')
  .action((substance: string, kgPerLiter: string, _options: unknown, command: Command) => {
    setDensity(configFile(command), substance, kgPerLiter, createReporter());
  });

configCommand
  .command('reset')
  .description('Delete the configuration file')
  .action((_options: unknown, command: Command) => {
    clearConfig(configFile(command), createReporter());
  });

export default configCommand;
