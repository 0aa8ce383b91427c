/**
 * @file src/index.ts
 * @description Library entry point for embedding the converter without the CLI.
 */

export * from './lib/converter';
export * from './lib/densities';
export * from './lib/format';
export * from './lib/parser';
export * from './lib/quantity';
export * from './lib/suggestions';
export * from './lib/units';
export * from './shared/errors';
export * from './workflows/convert-workflow';
