/**
 * @file src/shared/config.ts
 * @description Handles the persistent kitchenconv configuration (`~/.kitchenconv/config.json`).
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_PRECISION } from '../lib/format';
import { paths } from './paths';

export const MAX_PRECISION = 17;

export const PrecisionSchema = z.coerce
  .number()
  .int('precision must be a whole number')
  .min(1, 'precision must be at least 1')
  .max(MAX_PRECISION, `precision must be at most ${MAX_PRECISION}`);

export const DensitySchema = z.coerce
  .number()
  .finite('density must be a finite number')
  .positive('density must be greater than zero');

export const ConfigSchema = z.object({
  precision: PrecisionSchema.optional(),
  substances: z.record(DensitySchema).optional(),
});

export type KitchenConfig = z.infer<typeof ConfigSchema>;

export const CONFIG_PATH = paths.CONFIG;

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');

/**
 * Reads and validates the configuration file. A missing file is an empty configuration;
 * an unreadable or invalid one is reported and ignored.
 */
export const readConfig = (
  filePath: string = CONFIG_PATH,
  warn: (message: string) => void = console.warn,
): KitchenConfig => {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    warn(`[config] Ignoring ${filePath}: ${message}`);
    return {};
  }
  const parsed = ConfigSchema.safeParse(payload);
  if (!parsed.success) {
    warn(`[config] Ignoring ${filePath}: ${describeIssues(parsed.error)}`);
    return {};
  }
  return parsed.data;
};

export const writeConfig = (
  update: Partial<KitchenConfig>,
  filePath: string = CONFIG_PATH,
): KitchenConfig => {
  const current = readConfig(filePath);
  const next: KitchenConfig = ConfigSchema.parse({
    ...current,
    ...update,
    substances:
      current.substances || update.substances
        ? { ...current.substances, ...update.substances }
        : undefined,
  });
  paths.ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(next, null, 2), 'utf8');
  return next;
};

export const resetConfig = (filePath: string = CONFIG_PATH): boolean => {
  if (!fs.existsSync(filePath)) {
    return false;
  }
  fs.rmSync(filePath);
  return true;
};

export interface ResolvedSettings {
  precision: number;
  substances: Record<string, number>;
}

/** CLI overrides win over the file, which wins over the defaults. */
export const resolveSettings = (
  overrides: { precision?: number } = {},
  config: KitchenConfig = {},
): ResolvedSettings => ({
  precision: overrides.precision ?? config.precision ?? DEFAULT_PRECISION,
  substances: config.substances ?? {},
});
