/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import { TranscodeError, errorMessage } from '../common/errors';
import type { ByteSource } from './types';

/** Serves an in-memory buffer, as much as fits per read. */
export function memoryByteSource(bytes: Uint8Array): ByteSource {
  let offset = 0;
  return {
    read(buffer: Uint8Array): number {
      const count = Math.min(buffer.length, bytes.length - offset);
      buffer.set(bytes.subarray(offset, offset + count));
      offset += count;
      return count;
    },
  };
}

export interface FileByteSource extends ByteSource {
  readonly path: string;
  close(): void;
}

/**
 * Opens `path` for sequential reads. Throws `TranscodeError('SourceUnavailable')`
 * when the file cannot be opened.
 */
export function openFileByteSource(path: string): FileByteSource {
  let fd: number | undefined;
  try {
    fd = fs.openSync(path, 'r');
  } catch (err) {
    throw new TranscodeError('SourceUnavailable', `cannot open ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return {
    path,
    read(buffer: Uint8Array): number {
      if (fd === undefined) throw new Error(`${path} is closed`);
      return fs.readSync(fd, buffer, 0, buffer.length, null);
    },
    close(): void {
      if (fd === undefined) return;
      const open = fd;
      fd = undefined;
      fs.closeSync(open);
    },
  };
}
