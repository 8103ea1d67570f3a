/**
 * @file errors.ts - Conversion error taxonomy
 * @description File-level errors abort a run with a distinct exit code; row and bucket
 * errors are recovered locally by the converters.
 */

export type ConversionErrorCode =
  | 'MALFORMED_INPUT'
  | 'ROW_INVALID'
  | 'NO_VALID_ROWS'
  | 'DIVISION_BY_ZERO';

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  MALFORMED_INPUT: 2,
  NO_VALID_ROWS: 3,
} as const;

export abstract class ConversionError extends Error {
  abstract readonly code: ConversionErrorCode;
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedInputError extends ConversionError {
  readonly code = 'MALFORMED_INPUT';
  readonly exitCode = ExitCode.MALFORMED_INPUT;

  static missingColumns(file: string, columns: string[]): MalformedInputError {
    return new MalformedInputError(
      `${file}: missing required column${columns.length > 1 ? 's' : ''} ${columns.join(', ')}`
    );
  }
}

export class RowValidationError extends ConversionError {
  readonly code = 'ROW_INVALID';
  readonly exitCode = ExitCode.FAILURE;

  constructor(
    readonly line: number,
    readonly fields: string[]
  ) {
    super(`line ${line}: missing or non-numeric ${fields.join(', ')}`);
  }
}

export class NoValidRowsError extends ConversionError {
  readonly code = 'NO_VALID_ROWS';
  readonly exitCode = ExitCode.NO_VALID_ROWS;
}

export class DivisionByZeroError extends ConversionError {
  readonly code = 'DIVISION_BY_ZERO';
  readonly exitCode = ExitCode.FAILURE;
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
