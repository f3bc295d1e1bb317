/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from './console-logger';
import type { Logger } from './logger';

/** Bytes requested from a byte source per read. */
export const DEFAULT_CHUNK_SIZE = 4096;

export interface TranscoderOptions {
  /** Maximum number of bytes fed to the tokenizer at once. */
  chunkSize?: number;
  logger?: Logger;
}

export interface ResolvedOptions {
  chunkSize: number;
  logger: Logger;
}

export function resolveOptions(options: TranscoderOptions = {}): ResolvedOptions {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  return {
    chunkSize,
    logger: options.logger ?? new ConsoleLogger(),
  };
}
