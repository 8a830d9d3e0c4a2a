export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_INVALID_INPUT = 2;
export const EXIT_NO_BROWSER = 3;
export const EXIT_OPEN_FAILED = 4;

export class DialerError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_GENERAL_ERROR) {
    super(message);
    this.name = 'DialerError';
    this.exitCode = exitCode;
  }
}

export class InvalidInputError extends DialerError {
  constructor(message: string) {
    super(message, EXIT_INVALID_INPUT);
    this.name = 'InvalidInputError';
  }
}

export class InvalidFormatError extends DialerError {
  constructor(message: string) {
    super(message, EXIT_INVALID_INPUT);
    this.name = 'InvalidFormatError';
  }
}

export class NoBrowserAvailableError extends DialerError {
  constructor(message: string = 'No suitable browser found') {
    super(message, EXIT_NO_BROWSER);
    this.name = 'NoBrowserAvailableError';
  }
}

export class ExternalOpenError extends DialerError {
  constructor(target: string, message: string) {
    super(`[${target}] ${message}`, EXIT_OPEN_FAILED);
    this.name = 'ExternalOpenError';
  }
}

export class StoreWriteError extends DialerError {
  constructor(message: string) {
    super(message);
    this.name = 'StoreWriteError';
  }
}

export class ConfigError extends DialerError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function exitCodeFor(err: unknown): number {
  return err instanceof DialerError ? err.exitCode : EXIT_GENERAL_ERROR;
}

/** Narrow a caught filesystem error to its errno code. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
