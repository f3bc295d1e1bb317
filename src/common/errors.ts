/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export type TranscodeErrorKind =
  | 'SourceUnavailable'
  | 'AllocationFailure'
  | 'ParserInitFailure'
  | 'ReadFailure'
  | 'SyntaxError'
  | 'FinalizeError';

/** Location reported by the tokenizer. Line and column are 1-based, offset counts input bytes. */
export interface ErrorPosition {
  line: number;
  column: number;
  offset: number;
}

/**
 * Failure of a transcode operation. Every kind aborts the whole operation.
 */
export class TranscodeError extends Error {
  readonly kind: TranscodeErrorKind;
  readonly position?: ErrorPosition;

  constructor(
    kind: TranscodeErrorKind,
    message: string,
    options?: { position?: ErrorPosition; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TranscodeError';
    this.kind = kind;
    this.position = options?.position;
  }

  /** One-line description including the position, for logs and diagnostics. */
  describe(): string {
    const where = this.position
      ? ` at line ${this.position.line}, column ${this.position.column}`
      : '';
    return `${this.kind}: ${this.message}${where}`;
  }
}

export function isTranscodeError(err: unknown): err is TranscodeError {
  return err instanceof TranscodeError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
