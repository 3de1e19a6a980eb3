export type GateErrorCode =
  | 'E_INPUT_NOT_FOUND'
  | 'E_JTL_READ'
  | 'E_DATA_FORMAT'
  | 'E_CONFIG';

/**
 * Base class for every error that aborts a quality gate run.
 * The CLI maps all of them to exit code 2.
 */
export abstract class QualityGateError extends Error {
  abstract readonly code: GateErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputNotFoundError extends QualityGateError {
  readonly code = 'E_INPUT_NOT_FOUND';

  constructor(readonly filePath: string) {
    super(`JTL file not found: ${filePath}`);
  }
}

export class JtlReadError extends QualityGateError {
  readonly code = 'E_JTL_READ';

  constructor(readonly filePath: string, cause: unknown) {
    super(`Error reading JTL file ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class DataFormatError extends QualityGateError {
  readonly code = 'E_DATA_FORMAT';

  /**
   * @param row - 1-based line in the source file (header is line 1), or the
   *   0-based record index when the samples did not come from a file
   */
  constructor(
    readonly field: string,
    readonly row: number,
    readonly value: unknown,
    detail: string
  ) {
    super(`Invalid '${field}' at row ${row}: ${detail} (got ${JSON.stringify(value)})`);
  }
}

export class ConfigError extends QualityGateError {
  readonly code = 'E_CONFIG';

  constructor(readonly errors: string[]) {
    super(errors.length === 1 ? errors[0] : `Invalid threshold configuration:\n  - ${errors.join('\n  - ')}`);
  }
}

export function isQualityGateError(error: unknown): error is QualityGateError {
  return error instanceof QualityGateError;
}
