/**
 * @file src/shared/errors.ts
 * @description Error kinds raised while parsing and converting a kitchen measurement.
 *
 * Hierarchy:
 *   - ConversionError (base, carries `kind`, `label`, `userMessage`, `resolution`)
 *     - ArgumentSyntaxError, SubstanceMismatchError, NumericParseError
 *     - UnknownUnitError, UnknownSubstanceError (both carry ranked `suggestions`)
 *     - MissingSubstanceError, IncompatibleCategoryError
 *
 * Every kind is terminal: the CLI prints it and exits with status 1.
 */

export type ConversionErrorKind =
  | 'SyntaxError'
  | 'SubstanceMismatchError'
  | 'UnknownUnitError'
  | 'UnknownSubstanceError'
  | 'MissingSubstanceError'
  | 'IncompatibleCategoryError'
  | 'NumericParseError';

export const USAGE_SHAPE = "'<quantity> <unit> [substance] to <unit> [substance]'";

export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;
  readonly userMessage: string;
  readonly resolution?: string;
  readonly suggestions: string[];

  constructor(
    kind: ConversionErrorKind,
    message: string,
    options: { userMessage?: string; resolution?: string; suggestions?: string[] } = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.kind = kind;
    this.userMessage = options.userMessage ?? message;
    this.resolution = options.resolution;
    this.suggestions = options.suggestions ?? [];
    Error.captureStackTrace(this, this.constructor);
  }

  /** Prefix printed before the message on standard error. */
  get label(): string {
    return this.kind === 'SyntaxError' ? 'syntax error' : 'error';
  }

  toJSON() {
    return {
      error: this.name,
      kind: this.kind,
      message: this.message,
      userMessage: this.userMessage,
      resolution: this.resolution,
      suggestions: this.suggestions,
    };
  }
}

export class ArgumentSyntaxError extends ConversionError {
  constructor(message: string = `expected ${USAGE_SHAPE}`) {
    super('SyntaxError', message, {
      resolution: `Arrange the arguments as ${USAGE_SHAPE}`,
    });
  }
}

export class SubstanceMismatchError extends ConversionError {
  constructor(
    readonly fromSubstance: string,
    readonly toSubstance: string,
  ) {
    super(
      'SubstanceMismatchError',
      `cannot convert a quantity of '${fromSubstance}' into one of '${toSubstance}'`,
      { resolution: 'Name the substance once, or the same substance on both sides' },
    );
  }
}

export class UnknownUnitError extends ConversionError {
  constructor(
    readonly unit: string,
    suggestions: string[],
  ) {
    super('UnknownUnitError', `unknown unit '${unit}'`, {
      resolution: "Run 'kitchenconv units' to list the supported units",
      suggestions,
    });
  }
}

export class UnknownSubstanceError extends ConversionError {
  constructor(
    readonly substance: string,
    suggestions: string[],
  ) {
    super('UnknownSubstanceError', `the density of '${substance}' is unknown`, {
      resolution: "Run 'kitchenconv substances' or add one with 'kitchenconv config density'",
      suggestions,
    });
  }
}

export class MissingSubstanceError extends ConversionError {
  constructor(from: string, fromCategory: string, to: string, toCategory: string) {
    super(
      'MissingSubstanceError',
      `converting '${from}' (a ${fromCategory}) into '${to}' (a ${toCategory}) requires knowing the substance which is converted`,
      { resolution: `Name the substance, e.g. '1 ${from} of flour to ${to}'` },
    );
  }
}

export class IncompatibleCategoryError extends ConversionError {
  constructor(from: string, fromCategory: string, to: string, toCategory: string) {
    super(
      'IncompatibleCategoryError',
      `cannot convert from '${from}' (a ${fromCategory}) into '${to}' (a ${toCategory})`,
    );
  }
}

export class NumericParseError extends ConversionError {
  constructor(readonly text: string) {
    super('NumericParseError', `could not convert '${text}' into a number`, {
      resolution: 'Use an integer, a decimal, a fraction like 3/4 or a value like 1e3',
    });
  }
}

export const isConversionError = (error: unknown): error is ConversionError =>
  error instanceof ConversionError;
