/**
 * Error classes for wallet metadata handling
 */

export enum MetaErrorCode {
  InvalidCoinType = 1001,
  MalformedField = 2001,
  InvalidMeta = 2002,
  InvalidConfig = 3001,
}

/**
 * Base class for all metadata errors
 */
export class MetaError extends Error {
  public readonly code: MetaErrorCode;
  public readonly recoverable: boolean;
  public readonly field?: string;

  constructor(
    code: MetaErrorCode,
    message: string,
    options: { recoverable?: boolean; field?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'MetaError';
    this.code = code;
    this.recoverable = options.recoverable ?? false;
    this.field = options.field;
  }
}

/**
 * A coin type string did not match any known chain or alias
 */
export class InvalidCoinTypeError extends MetaError {
  public readonly input: string;

  constructor(input: string) {
    super(MetaErrorCode.InvalidCoinType, `Invalid coin type: "${input}"`, {
      recoverable: true,
      field: 'coin',
    });
    this.name = 'InvalidCoinTypeError';
    this.input = input;
  }
}

/**
 * A stored value could not be decoded into its field's type.
 * Values only get in through the typed setters or the validated load path,
 * so this means the record was corrupted or validation was skipped.
 */
export class MalformedFieldError extends MetaError {
  public readonly value: string;

  constructor(field: string, value: string, expected: string) {
    super(
      MetaErrorCode.MalformedField,
      `Malformed wallet meta field "${field}": expected ${expected}`,
      { field }
    );
    this.name = 'MalformedFieldError';
    this.value = value;
  }
}

/**
 * Loaded metadata breaks a cross-field invariant
 */
export class InvalidMetaError extends MetaError {
  constructor(message: string, field?: string, cause?: unknown) {
    super(MetaErrorCode.InvalidMeta, message, { field, cause });
    this.name = 'InvalidMetaError';
  }
}

export class ConfigError extends MetaError {
  constructor(message: string, cause?: unknown) {
    super(MetaErrorCode.InvalidConfig, message, { cause });
    this.name = 'ConfigError';
  }
}

export function isMetaError(error: unknown): error is MetaError {
  return error instanceof MetaError;
}
