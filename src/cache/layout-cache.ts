/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from '../common/console-logger';
import type { Logger } from '../common/logger';
import { digestToHex } from '../parser/hasher';
import type { Digest } from '../parser/types';

export const DEFAULT_CACHE_SIZE = 50;

/**
 * Least-recently-used store for artifacts derived from a layout, keyed by the
 * digest of the layout's source bytes. A changed source yields a new digest,
 * so stale entries are never hit and age out.
 */
export class LayoutCache<T> {
  private readonly entries = new Map<string, { value: T }>();
  private readonly logger: Logger;

  constructor(
    readonly maxSize: number = DEFAULT_CACHE_SIZE,
    logger: Logger = new ConsoleLogger()
  ) {
    if (!Number.isSafeInteger(maxSize) || maxSize <= 0) {
      throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
    }
    this.logger = logger.clone();
    this.logger.setContext('LayoutCache');
  }

  get size(): number {
    return this.entries.size;
  }

  has(digest: Digest | string): boolean {
    return this.entries.has(keyOf(digest));
  }

  get(digest: Digest | string): T | undefined {
    return this.lookup(keyOf(digest))?.value;
  }

  set(digest: Digest | string, value: T): void {
    const key = keyOf(digest);
    this.entries.delete(key);
    this.entries.set(key, { value });
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.logger.debug(`evicted ${oldest.value}`);
    }
  }

  getOrCompute(digest: Digest | string, compute: () => T): T {
    const key = keyOf(digest);
    const entry = this.lookup(key);
    if (entry) return entry.value;
    const value = compute();
    this.set(key, value);
    return value;
  }

  delete(digest: Digest | string): boolean {
    return this.entries.delete(keyOf(digest));
  }

  clear(): void {
    this.entries.clear();
  }

  private lookup(key: string): { value: T } | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.logger.debug(`miss ${key} (size ${this.entries.size})`);
      return undefined;
    }
    // re-insert as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.logger.debug(`hit ${key} (size ${this.entries.size})`);
    return entry;
  }
}

function keyOf(digest: Digest | string): string {
  return typeof digest === 'string' ? digest.toLowerCase() : digestToHex(digest);
}
