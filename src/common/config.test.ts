/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { DEFAULT_CHUNK_SIZE, resolveOptions } from './config';
import { ConsoleLogger } from './console-logger';
import { TranscodeError } from './errors';

describe('resolveOptions', () => {
  it('fills in defaults', () => {
    const resolved = resolveOptions();
    expect(resolved.chunkSize).toBe(DEFAULT_CHUNK_SIZE);
    expect(resolved.logger).toBeInstanceOf(ConsoleLogger);
  });

  it('rejects chunk sizes that are not positive integers', () => {
    expect(() => resolveOptions({ chunkSize: 0 })).toThrow(RangeError);
    expect(() => resolveOptions({ chunkSize: 1.5 })).toThrow('chunkSize must be a positive integer, got 1.5');
  });
});

describe('TranscodeError', () => {
  it('describes itself with the position', () => {
    const err = new TranscodeError('SyntaxError', 'Unexpected close tag', {
      position: { line: 2, column: 7, offset: 19 },
    });
    expect(err.name).toBe('TranscodeError');
    expect(err.describe()).toBe('SyntaxError: Unexpected close tag at line 2, column 7');
  });

  it('describes itself without a position', () => {
    expect(new TranscodeError('ReadFailure', 'byte source returned error code -1').describe()).toBe(
      'ReadFailure: byte source returned error code -1'
    );
  });
});
