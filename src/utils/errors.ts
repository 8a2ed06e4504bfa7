/**
 * Key generator errors.
 *
 * Every failure the generator reports synchronously is a KeygenError
 * carrying a stable `code`, so the CLI and the web form can map it to an
 * exit status or an HTTP response without matching on messages.
 */

export type KeygenErrorCode =
  | 'INVALID_ALPHABET'
  | 'INVALID_CONFIG'
  | 'CAPACITY_EXCEEDED'
  | 'UNSUPPORTED_FORMAT'
  | 'IO_FAILURE';

export abstract class KeygenError extends Error {
  readonly code: KeygenErrorCode;

  constructor(code: KeygenErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KeygenError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, KeygenError);
    }
  }
}

// ─── Input Errors ───────────────────────────────────────────

/**
 * Fewer than two usable characters remain after normalization.
 */
export class InvalidAlphabetError extends KeygenError {
  constructor(message = 'Alphabet is too small. Provide more characters.') {
    super('INVALID_ALPHABET', message);
    this.name = 'InvalidAlphabetError';
  }
}

export class InvalidConfigError extends KeygenError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'InvalidConfigError';
  }
}

/**
 * A unique-key request asks for more keys than the keyspace can hold.
 */
export class CapacityExceededError extends KeygenError {
  constructor(
    public readonly requested: number,
    public readonly capacity: bigint
  ) {
    super('CAPACITY_EXCEEDED', `Requested ${requested} unique keys, but keyspace is only about ${capacity}.`);
    this.name = 'CapacityExceededError';
  }
}

// ─── Output Errors ──────────────────────────────────────────

export class UnsupportedFormatError extends KeygenError {
  constructor(public readonly format: string) {
    super('UNSUPPORTED_FORMAT', `Unknown format "${format}". Use: txt, csv, or json.`);
    this.name = 'UnsupportedFormatError';
  }
}

export class IOFailureError extends KeygenError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('IO_FAILURE', `Failed to write ${path}: ${reason}`, { cause });
    this.name = 'IOFailureError';
  }
}

export function isKeygenError(error: unknown): error is KeygenError {
  return error instanceof KeygenError;
}
