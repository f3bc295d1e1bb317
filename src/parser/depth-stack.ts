/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

interface Frame<T> {
  value: T;
  childrenOpened: boolean;
}

/**
 * One frame per open element, addressed by depth. Each frame records whether
 * the element's child container has been opened in the output.
 * Push and pop are always paired with the element open and close, so reads
 * below depth 0 are invariant violations and throw.
 */
export class DepthStack<T> {
  private frames: Array<Frame<T>> = [];

  get depth(): number {
    return this.frames.length;
  }

  push(value: T): void {
    this.frames.push({ value, childrenOpened: false });
  }

  pop(): { value: T; childrenOpened: boolean } {
    const frame = this.frames.pop();
    if (!frame) throw new Error('DepthStack.pop() on empty stack');
    return frame;
  }

  top(): T {
    return this.topFrame().value;
  }

  /**
   * Marks the innermost element as having children. Returns true the first time
   * only, i.e. when the caller has to open the container.
   */
  openChildren(): boolean {
    const frame = this.topFrame();
    if (frame.childrenOpened) return false;
    frame.childrenOpened = true;
    return true;
  }

  hasOpenedChildren(): boolean {
    return this.topFrame().childrenOpened;
  }

  private topFrame(): Frame<T> {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw new Error('DepthStack accessed at depth 0');
    return frame;
  }
}
