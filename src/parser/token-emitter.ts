/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { AttributeMap, MarkupHandler, TokenSink } from './types';

/**
 * Turns markup events into tokens for a sink without building a tree.
 * Character data between two markup boundaries is delivered as one text token,
 * flushed right before the next element token or at end of document.
 */
export class TokenEmitter implements MarkupHandler {
  private pendingText: string[] = [];

  constructor(private readonly sink: TokenSink) {}

  startElement(name: string, attributes: AttributeMap | undefined): void {
    this.flushText();
    this.sink.onToken(
      attributes
        ? { kind: 'startElement', type: name, attributes }
        : { kind: 'startElement', type: name }
    );
  }

  endElement(name: string): void {
    this.flushText();
    this.sink.onToken({ kind: 'endElement', type: name });
  }

  characters(text: string): void {
    if (text.length > 0) this.pendingText.push(text);
  }

  endDocument(): void {
    this.flushText();
  }

  private flushText(): void {
    if (this.pendingText.length === 0) return;
    const content = this.pendingText.join('');
    this.pendingText = [];
    this.sink.onToken({ kind: 'text', content });
  }
}
