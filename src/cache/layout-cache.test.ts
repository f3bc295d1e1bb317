/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect, vi } from 'vitest';
import { LayoutCache } from './layout-cache';
import { digestToHex } from '../parser/hasher';
import { parseLayoutTree } from '../parser/transcoder';
import { RecordingLogger } from '../test/recording-logger';
import { utf8 } from '../test/sources';

describe('LayoutCache', () => {
  it('evicts the least recently used entry', () => {
    const cache = new LayoutCache<number>(2, new RecordingLogger());
    cache.set('aa', 1);
    cache.set('bb', 2);
    expect(cache.get('aa')).toBe(1);
    cache.set('cc', 3);
    expect(cache.has('bb')).toBe(false);
    expect(cache.has('aa')).toBe(true);
    expect(cache.size).toBe(2);
  });

  it('keys entries by the layout digest', () => {
    const logger = new RecordingLogger();
    const cache = new LayoutCache<string>(10, logger);
    const result = parseLayoutTree(utf8('<a/>'), { logger });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    cache.set(result.digest, 'compiled');
    expect(cache.get(digestToHex(result.digest).toUpperCase())).toBe('compiled');
    expect(logger.records.filter((r) => r.context === 'LayoutCache').map((r) => r.message)).toEqual([
      `hit ${digestToHex(result.digest)} (size 1)`,
    ]);
  });

  it('computes a missing entry once', () => {
    const cache = new LayoutCache<string>(10, new RecordingLogger());
    const compute = vi.fn(() => 'value');
    expect(cache.getOrCompute('ab', compute)).toBe('value');
    expect(cache.getOrCompute('ab', compute)).toBe('value');
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('deletes and clears entries', () => {
    const cache = new LayoutCache<number>(10, new RecordingLogger());
    cache.set('aa', 1);
    cache.set('bb', 2);
    expect(cache.delete('aa')).toBe(true);
    expect(cache.get('aa')).toBeUndefined();
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it('rejects a non-positive size', () => {
    expect(() => new LayoutCache(0)).toThrow('maxSize must be a positive integer, got 0');
  });
});
