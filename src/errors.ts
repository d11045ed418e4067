export type InjectorErrorCode = 'CONFIG' | 'IO' | 'TIMEOUT';

export abstract class InjectorError extends Error {
  abstract readonly code: InjectorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid setup. Always raised before any asset file is modified.
 */
export class ConfigError extends InjectorError {
  readonly code = 'CONFIG';
}

export type IoOperation = 'read' | 'write' | 'list';

/**
 * Failure on a single asset file or directory. Recorded, never fatal on its own.
 */
export class IoError extends InjectorError {
  readonly code = 'IO';

  constructor(
    readonly path: string,
    readonly operation: IoOperation,
    cause: unknown
  ) {
    super(`Failed to ${operation} ${path}: ${describeCause(cause)}`, { cause });
  }
}

export class TimeoutError extends InjectorError {
  readonly code = 'TIMEOUT';

  constructor(readonly timeoutMs: number) {
    super(`Injection did not finish within ${timeoutMs}ms`);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
