/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Digest, Token, TokenSink, TreeNode } from './types';

/**
 * Token sink that rebuilds the layout tree from a token stream and keeps the
 * completion digest. Text tokens are dropped, matching the tree output.
 */
export class TreeTokenSink implements TokenSink {
  private readonly nodeStack: TreeNode[] = [];
  private root: TreeNode | undefined;
  private digest: Digest | undefined;

  onToken(token: Token): void {
    switch (token.kind) {
      case 'startElement': {
        const node: TreeNode = token.attributes
          ? { type: token.type, attributes: token.attributes }
          : { type: token.type };
        const parent = this.nodeStack[this.nodeStack.length - 1];
        if (parent) (parent.children ??= []).push(node);
        else this.root = node;
        this.nodeStack.push(node);
        break;
      }
      case 'endElement':
        this.nodeStack.pop();
        break;
      case 'text':
        break;
    }
  }

  onComplete(digest: Digest): void {
    this.digest = digest;
  }

  /** Root and digest once the stream completed, otherwise `undefined`. */
  getResult(): { root: TreeNode; digest: Digest } | undefined {
    if (!this.root || !this.digest) return undefined;
    return { root: this.root, digest: this.digest };
  }
}
