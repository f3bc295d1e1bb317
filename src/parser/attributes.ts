/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { AttributeMap } from './types';

/**
 * Strips a namespace prefix: `android:id` becomes `id`. Only the first colon counts.
 */
export function normalizeAttributeKey(rawKey: string): string {
  const colonIdx = rawKey.indexOf(':');
  return colonIdx >= 0 ? rawKey.slice(colonIdx + 1) : rawKey;
}

/**
 * Builds the attribute map of one element, or `undefined` when it has none.
 * When two raw keys normalize to the same key the later value wins.
 */
export function buildAttributeMap(
  raw: Iterable<readonly [string, string]>
): AttributeMap | undefined {
  let attrs: AttributeMap | undefined;
  for (const [key, value] of raw) {
    attrs ??= {};
    // defineProperty so keys such as __proto__ become own properties
    Object.defineProperty(attrs, normalizeAttributeKey(key), {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return attrs;
}
