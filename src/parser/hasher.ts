/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { createHash } from 'crypto';
import type { Hash } from 'crypto';
import type { Digest } from './types';

export const DIGEST_LENGTH = 32;

/**
 * SHA-256 over the raw input, fed chunk by chunk. The digest only depends on the
 * concatenated bytes, not on where the chunk boundaries fall.
 */
export class IncrementalHasher {
  private hash: Hash | undefined = createHash('sha256');
  private bytes = 0;

  get byteCount(): number {
    return this.bytes;
  }

  update(chunk: Uint8Array): void {
    if (!this.hash) throw new Error('IncrementalHasher.update() after digest()');
    this.hash.update(chunk);
    this.bytes += chunk.length;
  }

  /** Finalizes the hash. Can be called once. */
  digest(): Digest {
    if (!this.hash) throw new Error('IncrementalHasher.digest() called twice');
    const out = this.hash.digest();
    this.hash = undefined;
    return new Uint8Array(out);
  }
}

export function digestToHex(digest: Digest): string {
  return Buffer.from(digest.buffer, digest.byteOffset, digest.byteLength).toString('hex');
}
