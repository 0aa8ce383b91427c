#!/usr/bin/env node
/**
 * @file src/cli.ts
 * @description Bootstraps the kitchenconv CLI, a converter for cooking measurements that bridges
 *              volume and weight through substance densities.
 *
 * Commands exposed by the entry point:
 *   - default: convert `<quantity> <unit> [substance] {to|in} <unit> [substance]`.
 *   - `units`: list the unit table.
 *   - `substances`: list the known densities.
 *   - `config`: show or edit `~/.kitchenconv/config.json`.
 *
 * @example
 *   kitchenconv 10 kg to lb
 *   kitchenconv 400 F in C
 *   kitchenconv 3 ts of sugar to g
 *   kitchenconv 3/4 cup to ml --precision 3
 *   kitchenconv config density honey 1.42
 */

import { Command } from 'commander';
import pkg from '../package.json';
import configCommand from './commands/config';
import { convertAction } from './commands/convert';
import substancesCommand from './commands/substances';
import unitsCommand from './commands/units';
import { CONFIG_PATH } from './shared/config';

const program = new Command();
program
  .name('kitchenconv')
  .description('Convert cooking quantities between weight, volume and temperature units')
  .version(pkg.version, '-v, --version', 'Display CLI version')
  .usage('<quantity> <unit> [substance] {to|in} <unit> [substance]')
  .argument('[tokens...]', 'Quantity, units and optional substance names')
  .option('-p, --precision <digits>', 'Significant digits in the result')
  .option('--config <file>', 'Configuration file to read', CONFIG_PATH)
  .option('--no-color', 'Disable colored output')
  // Negative quantities such as `-40 c to f` look like options.
  .allowUnknownOption()
  .action(convertAction);

program.addCommand(unitsCommand);
program.addCommand(substancesCommand);
program.addCommand(configCommand);

program.parse();
