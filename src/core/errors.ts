import type { TapeMode, TapeRequest } from '../types/index.js';

export type TapeErrorCode =
  | 'TAPE_NOT_WRITABLE'
  | 'TAPE_SEQUENTIAL_NO_MATCH'
  | 'LIFECYCLE_CONFLICT'
  | 'PERSISTENCE_FAILURE'
  | 'INVALID_CONFIG';

export class TapeError extends Error {
  constructor(
    message: string,
    public readonly code: TapeErrorCode
  ) {
    super(message);
    this.name = 'TapeError';
  }
}

/**
 * A request needed a write (or a recorded match) the tape's mode cannot give.
 */
export class NonWritableTapeError extends TapeError {
  constructor(
    public readonly tapeName: string,
    public readonly mode: TapeMode,
    public readonly request?: Pick<TapeRequest, 'method' | 'url'>,
    message?: string,
    code: TapeErrorCode = 'TAPE_NOT_WRITABLE'
  ) {
    super(
      message ??
        (request
          ? `Tape "${tapeName}" is not writable in ${mode} mode and has no match for ${request.method} ${request.url}`
          : `Tape "${tapeName}" is not writable in ${mode} mode`),
      code
    );
    this.name = 'NonWritableTapeError';
  }
}

export class SequentialTapeExhaustedError extends NonWritableTapeError {
  constructor(
    tapeName: string,
    mode: TapeMode,
    public readonly position: number,
    public readonly size: number,
    request: Pick<TapeRequest, 'method' | 'url'>
  ) {
    super(
      tapeName,
      mode,
      request,
      position >= size
        ? `Tape "${tapeName}" has no interaction left at position ${position} for ${request.method} ${request.url}`
        : `Interaction ${position} on tape "${tapeName}" does not match ${request.method} ${request.url}`,
      'TAPE_SEQUENTIAL_NO_MATCH'
    );
    this.name = 'SequentialTapeExhaustedError';
  }
}

export class LifecycleConflictError extends TapeError {
  constructor(message: string) {
    super(message, 'LIFECYCLE_CONFLICT');
    this.name = 'LifecycleConflictError';
  }
}

export class PersistenceError extends TapeError {
  constructor(
    message: string,
    public readonly tapeName?: string,
    public readonly path?: string,
    cause?: unknown
  ) {
    super(message, 'PERSISTENCE_FAILURE');
    this.name = 'PersistenceError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ConfigError extends TapeError {
  constructor(
    message: string,
    public readonly errors: string[] = []
  ) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
