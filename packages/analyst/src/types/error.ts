export type ErrorKind =
  | 'DuplicateNameError'
  | 'UnknownFunctionError'
  | 'InvalidArgumentError'
  | 'DataAccessError'
  | 'ModelUnavailableError'
  | 'QueryCancelledError'
  | 'CatalogValidationError'
  | 'ConfigValidationError';

/**
 * Base class for every analyst failure. `kind` is the machine-readable label
 * that goes to logs and query outcomes; the message is for operators only.
 */
export abstract class PitchsideError extends Error {
  abstract readonly kind: ErrorKind;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

/** A function name was registered twice. Fatal at startup. */
export class DuplicateNameError extends PitchsideError {
  override readonly kind = 'DuplicateNameError';
  readonly functionName: string;

  constructor(functionName: string) {
    super(`function '${functionName}' is already registered`);
    this.functionName = functionName;
  }
}

export class UnknownFunctionError extends PitchsideError {
  override readonly kind = 'UnknownFunctionError';
  readonly functionName: string;
  readonly available: ReadonlyArray<string>;

  constructor(functionName: string, available: ReadonlyArray<string>) {
    super(`unknown function '${functionName}'. Available functions: ${available.join(', ')}`);
    this.functionName = functionName;
    this.available = available;
  }
}

export class InvalidArgumentError extends PitchsideError {
  override readonly kind = 'InvalidArgumentError';
  readonly functionName: string;
  readonly parameter: string;

  constructor(functionName: string, parameter: string, detail: string) {
    super(`invalid argument '${parameter}' for ${functionName}: ${detail}`);
    this.functionName = functionName;
    this.parameter = parameter;
  }
}

/**
 * The store was unreachable, timed out, or returned a record that does not
 * match its schema. A missing entity is never a DataAccessError.
 */
export class DataAccessError extends PitchsideError {
  override readonly kind = 'DataAccessError';
}

export class ModelUnavailableError extends PitchsideError {
  override readonly kind = 'ModelUnavailableError';
}

export class QueryCancelledError extends PitchsideError {
  override readonly kind = 'QueryCancelledError';
}

export class CatalogValidationError extends PitchsideError {
  override readonly kind = 'CatalogValidationError';
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super(`invalid function catalog: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ConfigValidationError extends PitchsideError {
  override readonly kind = 'ConfigValidationError';
  readonly missing: ReadonlyArray<string>;
  readonly invalid: ReadonlyArray<string>;

  constructor(missing: ReadonlyArray<string>, invalid: ReadonlyArray<string>) {
    super(`invalid configuration: ${JSON.stringify({ missing, invalid })}`);
    this.missing = missing;
    this.invalid = invalid;
  }
}

export function isPitchsideError(value: unknown): value is PitchsideError {
  return value instanceof PitchsideError;
}
