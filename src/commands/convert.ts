/**
 * @file src/commands/convert.ts
 * @description Default action of the CLI: converts `<quantity> <unit> [substance] to <unit>`.
 *              Business logic lives in `src/workflows/convert-workflow.ts`.
 */

import figlet from 'figlet';
import { createDensityTable, type DensityTable } from '../lib/densities';
import { formatConversionLine } from '../lib/format';
import { MIN_TOKENS } from '../lib/parser';
import { CONFIG_PATH, PrecisionSchema, readConfig, resolveSettings } from '../shared/config';
import { isConversionError } from '../shared/errors';
import { createReporter, type Reporter } from '../shared/reporter';
import { runConvertWorkflow } from '../workflows/convert-workflow';

export const USAGE_LINES = [
  'usage examples:',
  '  kitchenconv 10 kg to lb',
  '  kitchenconv 400 F in C',
  '  kitchenconv 1 tbs butter to g',
  '  kitchenconv 3 ts of sugar to g',
  '  kitchenconv 3/4 cup to ml',
];

export const printUsage = (reporter: Reporter, banner = false): void => {
  if (banner) {
    const art = figlet.textSync('kitchenconv', { font: 'Standard' });
    reporter.info(reporter.paint.hex('#f4a261')(art));
  }
  USAGE_LINES.forEach((line) => reporter.info(line));
};

export const reportError = (error: unknown, reporter: Reporter): void => {
  const { paint } = reporter;
  if (!isConversionError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    reporter.error(paint.red(`error: ${message}`));
    return;
  }
  reporter.error(paint.red(`${error.label}: ${error.message}`));
  if (error.suggestions.length) {
    reporter.error(paint.yellow(`did you mean: ${error.suggestions.join(', ')}`));
  }
  if (error.resolution) {
    reporter.error(paint.gray(`hint: ${error.resolution}`));
  }
};

export interface ConversionSettings {
  precision: number;
  densities: DensityTable;
}

/**
 * Runs one conversion and reports it.
 * @returns the process exit code.
 */
export const executeConversion = (
  tokens: readonly string[],
  settings: ConversionSettings,
  reporter: Reporter,
): number => {
  if (tokens.length < MIN_TOKENS) {
    printUsage(reporter, tokens.length === 0);
    return 1;
  }
  try {
    const { parsed, substance, value } = runConvertWorkflow(tokens, {
      densities: settings.densities,
    });
    reporter.info(
      formatConversionLine(
        {
          quantity: parsed.quantity,
          fromUnit: parsed.fromUnit,
          substance,
          value,
          toUnit: parsed.toUnit,
        },
        settings.precision,
      ),
    );
    return 0;
  } catch (error) {
    reportError(error, reporter);
    return 1;
  }
};

export interface ConvertCliOptions {
  precision?: string;
  config?: string;
  color?: boolean;
}

export const convertAction = (tokens: string[], options: ConvertCliOptions): void => {
  const reporter = createReporter({ color: options.color });
  let precision: number | undefined;
  if (options.precision !== undefined) {
    const parsed = PrecisionSchema.safeParse(options.precision);
    if (!parsed.success) {
      reporter.error(reporter.paint.red(`error: --precision: ${parsed.error.issues[0].message}`));
      process.exitCode = 1;
      return;
    }
    precision = parsed.data;
  }

  const config = readConfig(options.config ?? CONFIG_PATH, (message) =>
    reporter.error(reporter.paint.yellow(message)),
  );
  const settings = resolveSettings({ precision }, config);
  process.exitCode = executeConversion(
    tokens,
    { precision: settings.precision, densities: createDensityTable(settings.substances) },
    reporter,
  );
};
