export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIG_NOT_FOUND'
  | 'INVALID_CONFIG'
  | 'REPORT_WRITE_FAILED';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_CHECKS_FAILED = 2;

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly exitCode: number = EXIT_ERROR,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Pre-flight failures end up here; probe failures never do.
export function handleError(err: unknown): number {
  if (err instanceof AppError) {
    console.error(`error [${err.code}]: ${err.message}`);
    return err.exitCode;
  }

  console.error('error [INTERNAL]:', err);
  return EXIT_ERROR;
}
