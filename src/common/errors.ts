/**
 * Error taxonomy
 * ==============
 *
 * Only CoaInputError is ever thrown out of the engine (boundary validation).
 * The other classes are created where a fallback applies and are turned
 * into warning strings via toWarning().
 */

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'DATA_GAP'
  | 'PARSE_WARNING'
  | 'INPUT_ERROR';

export class AppError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'AppError';
    this.code = code;
  }
}

/** Malformed rule / relevance / alignment file or rule entry */
export class ConfigurationError extends AppError {
  public readonly source: string;

  constructor(source: string, message: string) {
    super('CONFIGURATION_ERROR', `${source}: ${message}`);
    this.name = 'ConfigurationError';
    this.source = source;
  }
}

/** Missing mapping or situation data, substituted by a fallback constant */
export class DataGapError extends AppError {
  public readonly fallback: number;

  constructor(message: string, fallback: number) {
    super('DATA_GAP', `${message} -> fallback ${fallback}`);
    this.name = 'DataGapError';
    this.fallback = fallback;
  }
}

/** Malformed resource-priority token */
export class ParseWarning extends AppError {
  public readonly token: string;

  constructor(token: string, message: string) {
    super('PARSE_WARNING', `${message}: "${token}"`);
    this.name = 'ParseWarning';
    this.token = token;
  }
}

/** Record rejected at the boundary (missing id, duplicate id, schema failure) */
export class CoaInputError extends AppError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super('INPUT_ERROR', `Decision input validation failed: ${field} - ${message}`);
    this.name = 'CoaInputError';
    this.field = field;
  }
}

export function toWarning(err: AppError): string {
  return `[${err.code}] ${err.message}`;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
