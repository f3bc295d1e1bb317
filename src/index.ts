/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export * from './parser';
export { LayoutCache, DEFAULT_CACHE_SIZE } from './cache/layout-cache';
export { TranscodeError, isTranscodeError } from './common/errors';
export type { TranscodeErrorKind, ErrorPosition } from './common/errors';
export { DEFAULT_CHUNK_SIZE, resolveOptions } from './common/config';
export type { TranscoderOptions, ResolvedOptions } from './common/config';
export { ConsoleLogger } from './common/console-logger';
export type { Logger, LogLevel } from './common/logger';
