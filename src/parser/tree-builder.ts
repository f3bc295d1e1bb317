/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { DepthStack } from './depth-stack';
import type { AttributeMap, MarkupHandler, TreeNode } from './types';

/**
 * Builds the single root `TreeNode` from markup events. Character data is not
 * part of the tree and is ignored.
 */
export class TreeBuilder implements MarkupHandler {
  private readonly stack = new DepthStack<TreeNode>();
  private root: TreeNode | undefined;

  get depth(): number {
    return this.stack.depth;
  }

  startElement(name: string, attributes: AttributeMap | undefined): void {
    const node: TreeNode = attributes ? { type: name, attributes } : { type: name };
    if (this.stack.depth > 0) {
      const parent = this.stack.top();
      if (this.stack.openChildren()) parent.children = [];
      parent.children?.push(node);
    } else {
      this.root = node;
    }
    this.stack.push(node);
  }

  endElement(name: string): void {
    const { value } = this.stack.pop();
    if (value.type !== name) {
      throw new Error(`close tag </${name}> does not match <${value.type}>`);
    }
  }

  characters(): void {}

  endDocument(): void {
    if (this.stack.depth !== 0) {
      throw new Error(`${this.stack.depth} element(s) still open at end of input`);
    }
  }

  /** The completed tree. Throws unless `endDocument` has succeeded. */
  result(): TreeNode {
    if (!this.root || this.stack.depth !== 0) {
      throw new Error('tree is not complete');
    }
    return this.root;
  }
}
