/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { TranscodeError, errorMessage } from '../common/errors';
import type { ResolvedOptions } from '../common/config';
import type { Logger } from '../common/logger';
import { XmlEventSource } from './event-source';
import { IncrementalHasher } from './hasher';
import type { ByteSource, Digest, MarkupHandler } from './types';

/**
 * State of one transcode invocation: decoder, tokenizer, handler and hasher.
 * Nothing here is shared between invocations.
 */
export class ParseSession {
  private readonly hasher = new IncrementalHasher();
  private readonly events: XmlEventSource;
  private chunkCount = 0;

  constructor(handler: MarkupHandler) {
    this.events = new XmlEventSource(handler);
  }

  get chunks(): number {
    return this.chunkCount;
  }

  get bytes(): number {
    return this.hasher.byteCount;
  }

  /** Hashes the chunk, then parses it. The hash sees every chunk, including one that fails to parse. */
  feed(chunk: Uint8Array): void {
    this.hasher.update(chunk);
    this.chunkCount++;
    this.events.write(chunk);
  }

  finish(): Digest {
    this.events.end();
    return this.hasher.digest();
  }

  release(): void {
    this.events.release();
  }
}

function withSession<T>(handler: MarkupHandler, body: (session: ParseSession) => T): T {
  const session = new ParseSession(handler);
  try {
    return body(session);
  } finally {
    session.release();
  }
}

async function withSessionAsync<T>(
  handler: MarkupHandler,
  body: (session: ParseSession) => Promise<T>
): Promise<T> {
  const session = new ParseSession(handler);
  try {
    return await body(session);
  } finally {
    session.release();
  }
}

function allocateChunkBuffer(size: number): Uint8Array {
  try {
    return new Uint8Array(size);
  } catch (err) {
    throw new TranscodeError('AllocationFailure', `could not allocate ${size} byte read buffer`, {
      cause: err,
    });
  }
}

function readChunk(source: ByteSource, buffer: Uint8Array): number {
  let count: number;
  try {
    count = source.read(buffer);
  } catch (err) {
    throw new TranscodeError('ReadFailure', `byte source failed: ${errorMessage(err)}`, { cause: err });
  }
  if (!Number.isInteger(count) || count > buffer.length) {
    throw new TranscodeError(
      'ReadFailure',
      `byte source reported ${count} bytes for a ${buffer.length} byte buffer`
    );
  }
  if (count < 0) {
    throw new TranscodeError('ReadFailure', `byte source returned error code ${count}`);
  }
  return count;
}

function logSession(logger: Logger, session: ParseSession): void {
  logger.debug(`parsed ${session.bytes} bytes in ${session.chunks} chunk(s)`);
}

/**
 * Pulls chunks from `source` until a zero-length read, then finalizes.
 * Throws `TranscodeError` on any failure; errors raised by the handler itself propagate unchanged.
 */
export function transcodeSource(
  source: ByteSource,
  handler: MarkupHandler,
  options: ResolvedOptions
): Digest {
  if (typeof source.read !== 'function') {
    throw new TranscodeError('SourceUnavailable', 'byte source has no read()');
  }
  const buffer = allocateChunkBuffer(options.chunkSize);
  return withSession(handler, (session) => {
    for (;;) {
      const count = readChunk(source, buffer);
      if (count === 0) break;
      options.logger.trace(`chunk ${session.chunks + 1}: ${count} bytes`);
      session.feed(buffer.subarray(0, count));
    }
    const digest = session.finish();
    logSession(options.logger, session);
    return digest;
  });
}

/** Complete in-memory input: a single feed followed by the final signal. */
export function transcodeBuffer(
  bytes: Uint8Array,
  handler: MarkupHandler,
  options: ResolvedOptions
): Digest {
  return withSession(handler, (session) => {
    session.feed(bytes);
    const digest = session.finish();
    logSession(options.logger, session);
    return digest;
  });
}

async function nextChunk(
  iterator: AsyncIterator<Uint8Array>
): Promise<IteratorResult<Uint8Array>> {
  try {
    return await iterator.next();
  } catch (err) {
    throw new TranscodeError('ReadFailure', `stream failed: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Async counterpart of `transcodeSource` for Node streams and other async iterables.
 * Chunks longer than `chunkSize` are fed in slices; empty chunks are skipped.
 * The iterator is closed early when the parse fails.
 */
export async function transcodeStream(
  stream: AsyncIterable<Uint8Array>,
  handler: MarkupHandler,
  options: ResolvedOptions
): Promise<Digest> {
  const iterator = stream[Symbol.asyncIterator]();
  let exhausted = false;
  try {
    return await withSessionAsync(handler, async (session) => {
      for (;;) {
        const next = await nextChunk(iterator);
        if (next.done) break;
        const chunk = next.value;
        for (let start = 0; start < chunk.length; start += options.chunkSize) {
          session.feed(chunk.subarray(start, start + options.chunkSize));
        }
      }
      exhausted = true;
      const digest = session.finish();
      logSession(options.logger, session);
      return digest;
    });
  } finally {
    if (!exhausted) await closeIterator(iterator, options.logger);
  }
}

async function closeIterator(iterator: AsyncIterator<Uint8Array>, logger: Logger): Promise<void> {
  if (!iterator.return) return;
  try {
    await iterator.return();
  } catch (err) {
    logger.debug(`closing input stream failed: ${errorMessage(err)}`);
  }
}
