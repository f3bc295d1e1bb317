/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { ByteSource, Digest, Token, TokenSink } from '../parser/types';

export const utf8 = (text: string): Uint8Array => new TextEncoder().encode(text);

/**
 * Byte source delivering exactly the given chunks, one per read, then end of input.
 * A number in the script is returned as-is, an Error is thrown.
 */
export function scriptedByteSource(script: Array<Uint8Array | number | Error>): ByteSource & {
  reads: number;
} {
  let index = 0;
  const source = {
    reads: 0,
    read(buffer: Uint8Array): number {
      this.reads++;
      const step = script[index++];
      if (step === undefined) return 0;
      if (typeof step === 'number') return step;
      if (step instanceof Error) throw step;
      buffer.set(step);
      return step.length;
    },
  };
  return source;
}

/** Splits `bytes` at the given offsets. */
export function partition(bytes: Uint8Array, cuts: number[]): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  let start = 0;
  for (const cut of [...cuts, bytes.length]) {
    chunks.push(bytes.slice(start, cut));
    start = cut;
  }
  return chunks;
}

export async function* asyncChunks(
  chunks: Uint8Array[],
  failAfter?: { index: number; error: Error }
): AsyncGenerator<Uint8Array> {
  for (let i = 0; i < chunks.length; i++) {
    if (failAfter && failAfter.index === i) throw failAfter.error;
    yield chunks[i];
  }
}

/** Sink recording everything it receives. */
export class CollectingSink implements TokenSink {
  readonly tokens: Token[] = [];
  readonly completions: Digest[] = [];

  onToken(token: Token): void {
    this.tokens.push(token);
  }

  onComplete(digest: Digest): void {
    this.completions.push(digest);
  }
}
