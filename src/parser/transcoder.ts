/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { resolveOptions } from '../common/config';
import type { ResolvedOptions, TranscoderOptions } from '../common/config';
import { isTranscodeError } from '../common/errors';
import type { TranscodeError } from '../common/errors';
import type { Logger } from '../common/logger';
import { openFileByteSource } from './byte-source';
import type { FileByteSource } from './byte-source';
import { transcodeBuffer, transcodeSource, transcodeStream } from './driver';
import { TokenEmitter } from './token-emitter';
import { TreeBuilder } from './tree-builder';
import type {
  ByteSource,
  Digest,
  MarkupHandler,
  TokenSink,
  TokenStreamResult,
  TreeParseResult,
} from './types';

/** Pull source, or the complete document already in memory. */
export type LayoutInput = ByteSource | Uint8Array;

function resolveFor(operation: string, options: TranscoderOptions | undefined): ResolvedOptions {
  const resolved = resolveOptions(options);
  const logger = resolved.logger.clone();
  logger.setContext(operation);
  return { ...resolved, logger };
}

function transcode(input: LayoutInput, handler: MarkupHandler, options: ResolvedOptions): Digest {
  return input instanceof Uint8Array
    ? transcodeBuffer(input, handler, options)
    : transcodeSource(input, handler, options);
}

/** Turns a `TranscodeError` into a failure result; anything else is rethrown. */
function failed(err: unknown, logger: Logger): { ok: false; error: TranscodeError } {
  if (!isTranscodeError(err)) throw err;
  logger.warn(err.describe());
  return { ok: false, error: err };
}

/**
 * Parses an XML layout into a single tree and fingerprints the raw bytes.
 *
 * @example
 * const result = parseLayoutTree(Buffer.from('<a x="1"><b/></a>'));
 * // result.root: { type: 'a', attributes: { x: '1' }, children: [{ type: 'b' }] }
 */
export function parseLayoutTree(input: LayoutInput, options?: TranscoderOptions): TreeParseResult {
  const resolved = resolveFor('parseLayoutTree', options);
  const builder = new TreeBuilder();
  try {
    const digest = transcode(input, builder, resolved);
    return { ok: true, root: builder.result(), digest };
  } catch (err) {
    return failed(err, resolved.logger);
  }
}

export async function parseLayoutTreeFromStream(
  stream: AsyncIterable<Uint8Array>,
  options?: TranscoderOptions
): Promise<TreeParseResult> {
  const resolved = resolveFor('parseLayoutTreeFromStream', options);
  const builder = new TreeBuilder();
  try {
    const digest = await transcodeStream(stream, builder, resolved);
    return { ok: true, root: builder.result(), digest };
  } catch (err) {
    return failed(err, resolved.logger);
  }
}

/**
 * Delivers the layout as tokens to `sink`, then the digest through `sink.onComplete`.
 * On failure token delivery stops and `onComplete` is not called.
 */
export function streamLayoutTokens(
  input: LayoutInput,
  sink: TokenSink,
  options?: TranscoderOptions
): TokenStreamResult {
  const resolved = resolveFor('streamLayoutTokens', options);
  let digest: Digest;
  try {
    digest = transcode(input, new TokenEmitter(sink), resolved);
  } catch (err) {
    return failed(err, resolved.logger);
  }
  sink.onComplete(digest);
  return { ok: true, digest };
}

export async function streamLayoutTokensFromStream(
  stream: AsyncIterable<Uint8Array>,
  sink: TokenSink,
  options?: TranscoderOptions
): Promise<TokenStreamResult> {
  const resolved = resolveFor('streamLayoutTokensFromStream', options);
  let digest: Digest;
  try {
    digest = await transcodeStream(stream, new TokenEmitter(sink), resolved);
  } catch (err) {
    return failed(err, resolved.logger);
  }
  sink.onComplete(digest);
  return { ok: true, digest };
}

export function parseLayoutFile(path: string, options?: TranscoderOptions): TreeParseResult {
  let source: FileByteSource;
  try {
    source = openFileByteSource(path);
  } catch (err) {
    return failed(err, resolveFor('parseLayoutFile', options).logger);
  }
  try {
    return parseLayoutTree(source, options);
  } finally {
    source.close();
  }
}

export function streamLayoutFileTokens(
  path: string,
  sink: TokenSink,
  options?: TranscoderOptions
): TokenStreamResult {
  let source: FileByteSource;
  try {
    source = openFileByteSource(path);
  } catch (err) {
    return failed(err, resolveFor('streamLayoutFileTokens', options).logger);
  }
  try {
    return streamLayoutTokens(source, sink, options);
  } finally {
    source.close();
  }
}

/**
 * JSON text of a tree result, or an empty string when the parse failed.
 */
export function renderLayoutJson(result: TreeParseResult, indent = 4): string {
  return result.ok ? JSON.stringify(result.root, null, indent) : '';
}
