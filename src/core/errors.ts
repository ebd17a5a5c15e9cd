export type TranspilerErrorCode =
  | 'MAPPING_INVALID'
  | 'COMPILE_FAILED'
  | 'SECURITY_BLOCKED'
  | 'RESTORATION_INCONSISTENT'
  | 'CONFIG_INVALID';

export class TranspilerError extends Error {
  constructor(
    message: string,
    public readonly code: TranspilerErrorCode,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TranspilerError';
  }
}

export class MappingError extends TranspilerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'MAPPING_INVALID', cause);
    this.name = 'MappingError';
  }
}

export class CompileError extends TranspilerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'COMPILE_FAILED', cause);
    this.name = 'CompileError';
  }
}

export class SecurityBlockedError extends TranspilerError {
  constructor(
    public readonly symbol: string,
    public readonly replacement: string,
    public readonly pattern: string,
  ) {
    super(
      `Security: replacement for symbol ${JSON.stringify(symbol)} matches dangerous pattern ${JSON.stringify(pattern)}`,
      'SECURITY_BLOCKED',
    );
    this.name = 'SecurityBlockedError';
  }
}

/** Placeholder bookkeeping went out of sync. Indicates a defect, never bad input. */
export class RestorationInconsistencyError extends TranspilerError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(message, 'RESTORATION_INCONSISTENT');
    this.name = 'RestorationInconsistencyError';
  }
}

export class ConfigError extends TranspilerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_INVALID', cause);
    this.name = 'ConfigError';
  }
}

export type TranspileError =
  | MappingError
  | CompileError
  | SecurityBlockedError
  | RestorationInconsistencyError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
