/**
 * @file src/shared/reporter.ts
 * @description Console output used by the commands. Standard output carries results, standard
 *              error carries diagnostics; `color: false` renders plain text.
 */

import chalk from 'chalk';

export type Paint = InstanceType<typeof chalk.Instance>;

export interface Reporter {
  paint: Paint;
  info: (line: string) => void;
  error: (line: string) => void;
}

export interface ReporterOptions {
  color?: boolean;
  info?: (line: string) => void;
  error?: (line: string) => void;
}

export const createReporter = (options: ReporterOptions = {}): Reporter => ({
  paint: options.color === false ? new chalk.Instance({ level: 0 }) : chalk,
  info: options.info ?? ((line) => console.log(line)),
  error: options.error ?? ((line) => console.error(line)),
});

/** Reporter that records lines instead of printing them. */
export const createBufferedReporter = (): Reporter & { out: string[]; err: string[] } => {
  const out: string[] = [];
  const err: string[] = [];
  return {
    ...createReporter({
      color: false,
      info: (line) => out.push(line),
      error: (line) => err.push(line),
    }),
    out,
    err,
  };
};
