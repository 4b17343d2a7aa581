/**
 * Conversion errors
 *
 * Every failure of a single file conversion is one of these; the driver
 * reports it with the input file name and moves on to the next file.
 */

export type ConversionErrorKind = 'InputReadError' | 'InvalidNumericFormat' | 'RenderError';

export abstract class ConversionError extends Error {
  abstract readonly kind: ConversionErrorKind;

  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
  }
}

/**
 * Input file missing, unreadable, or not parseable as CSV
 */
export class InputReadError extends ConversionError {
  readonly kind = 'InputReadError';

  constructor(
    public readonly filePath: string,
    reason: string,
    originalError?: unknown
  ) {
    super(`Cannot read "${filePath}": ${reason}`, originalError);
    this.name = 'InputReadError';
  }
}

/**
 * A cell value that cannot be formatted under its column's policy
 */
export class InvalidNumericFormatError extends ConversionError {
  readonly kind = 'InvalidNumericFormat';

  constructor(
    public readonly value: unknown,
    public readonly column: string,
    reason: string,
    originalError?: unknown
  ) {
    super(`Cannot format value ${String(value)} in column "${column}": ${reason}`, originalError);
    this.name = 'InvalidNumericFormatError';
  }
}

/**
 * The table could not be rendered or the image could not be written
 */
export class RenderError extends ConversionError {
  readonly kind = 'RenderError';

  constructor(
    public readonly outputPath: string,
    reason: string,
    originalError?: unknown
  ) {
    super(`Cannot render "${outputPath}": ${reason}`, originalError);
    this.name = 'RenderError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
