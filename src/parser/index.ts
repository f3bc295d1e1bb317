/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export {
  parseLayoutTree,
  parseLayoutTreeFromStream,
  streamLayoutTokens,
  streamLayoutTokensFromStream,
  parseLayoutFile,
  streamLayoutFileTokens,
  renderLayoutJson,
} from './transcoder';
export type { LayoutInput } from './transcoder';
export { normalizeAttributeKey, buildAttributeMap } from './attributes';
export { IncrementalHasher, digestToHex, DIGEST_LENGTH } from './hasher';
export { memoryByteSource, openFileByteSource } from './byte-source';
export type { FileByteSource } from './byte-source';
export { TreeBuilder } from './tree-builder';
export { TokenEmitter } from './token-emitter';
export { TreeTokenSink } from './tree-token-sink';
export { ParseSession } from './driver';
export type {
  AttributeMap,
  TreeNode,
  Token,
  StartElementToken,
  EndElementToken,
  TextToken,
  TokenSink,
  Digest,
  ByteSource,
  MarkupHandler,
  TreeParseResult,
  TokenStreamResult,
} from './types';
