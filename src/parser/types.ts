/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { TranscodeError } from '../common/errors';

/** Normalized attribute key to value, in source encounter order. */
export type AttributeMap = Record<string, string>;

/**
 * Element of the layout tree. `attributes` is present only when the source element
 * had at least one attribute, `children` only when it had at least one child element.
 */
export interface TreeNode {
  type: string;
  attributes?: AttributeMap;
  children?: TreeNode[];
}

export interface StartElementToken {
  kind: 'startElement';
  type: string;
  attributes?: AttributeMap;
}

export interface EndElementToken {
  kind: 'endElement';
  type: string;
}

export interface TextToken {
  kind: 'text';
  content: string;
}

export type Token = StartElementToken | EndElementToken | TextToken;

/** SHA-256 of the raw input bytes (32 bytes). */
export type Digest = Uint8Array;

/**
 * Receiver of mode B output. `onComplete` is called once, after the last token,
 * and only when the whole input was transcoded.
 */
export interface TokenSink {
  onToken(token: Token): void;
  onComplete(digest: Digest): void;
}

/**
 * Pull-based byte source. `read` fills `buffer` from its start and returns the
 * number of bytes written: 0 at end of input, negative on failure.
 * A thrown error is also a read failure.
 */
export interface ByteSource {
  read(buffer: Uint8Array): number;
  close?(): void;
}

/** Callbacks the chunked driver invokes in document order. */
export interface MarkupHandler {
  startElement(name: string, attributes: AttributeMap | undefined): void;
  endElement(name: string): void;
  characters(text: string): void;
  endDocument(): void;
}

export type TreeParseResult =
  | { ok: true; root: TreeNode; digest: Digest }
  | { ok: false; error: TranscodeError };

export type TokenStreamResult =
  | { ok: true; digest: Digest }
  | { ok: false; error: TranscodeError };
