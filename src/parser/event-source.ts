/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';
import { TranscodeError, errorMessage, isTranscodeError } from '../common/errors';
import type { ErrorPosition } from '../common/errors';
import { buildAttributeMap } from './attributes';
import type { MarkupHandler } from './types';

function createParser(): sax.SAXParser {
  try {
    return sax.parser(true, { trim: false, normalize: false, xmlns: false, position: true });
  } catch (err) {
    throw new TranscodeError('ParserInitFailure', `could not create XML parser: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Attribute store handed to sax for each start tag. sax calls
 * `attributes.hasOwnProperty(name)` on it before storing an attribute, so that
 * lookup is answered here and cannot be shadowed by an attribute of that name.
 * Raw attributes are kept in encounter order; a repeated name is rejected.
 */
class AttributeCollector {
  readonly entries: Array<[string, string]> = [];
  private readonly names = new Set<string>();

  constructor(private readonly onDuplicate: (name: string) => never) {}

  asRecord(): Record<string, string> {
    const hasOwn = (name: unknown): boolean => {
      const key = String(name);
      if (this.names.has(key)) this.onDuplicate(key);
      return false;
    };
    return new Proxy<Record<string, string>>(
      {},
      {
        get: (_target, key) => {
          if (key === 'hasOwnProperty') return hasOwn;
          if (typeof key !== 'string') return undefined;
          return this.entries.find(([name]) => name === key)?.[1];
        },
        set: (_target, key, value) => {
          const name = String(key);
          if (this.names.has(name)) this.onDuplicate(name);
          this.names.add(name);
          this.entries.push([name, String(value)]);
          return true;
        },
      }
    );
  }
}

/**
 * Feeds raw bytes through a streaming UTF-8 decoder into a strict sax parser and
 * forwards element and character events to a `MarkupHandler`.
 * Tokenizer errors surface as `TranscodeError`s thrown from `write` and `end`.
 */
export class XmlEventSource {
  private readonly parser: sax.SAXParser;
  // BOM stays in the text so byte offsets line up; sax skips it
  private readonly decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  private attributes: AttributeCollector | undefined;
  private handlerFailed = false;
  private bytesFed = 0;
  private unitsBefore = 0;
  private bytesBefore = 0;
  private currentText = '';
  private openElements = 0;
  private sawRoot = false;
  private finalizing = false;
  private released = false;

  constructor(private readonly handler: MarkupHandler) {
    this.parser = createParser();

    this.parser.onerror = (err: Error) => {
      throw this.failure(firstLine(err.message), err);
    };

    this.parser.onopentagstart = (tag: sax.Tag | sax.QualifiedTag) => {
      if ('uri' in tag) return;
      const collector = new AttributeCollector((name) => {
        throw this.failure(`duplicate attribute "${name}"`);
      });
      this.attributes = collector;
      tag.attributes = collector.asRecord();
    };

    this.parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
      if (this.openElements === 0 && this.sawRoot) {
        throw this.failure('junk after document element');
      }
      this.sawRoot = true;
      this.openElements++;
      const entries = this.attributes?.entries ?? [];
      this.attributes = undefined;
      this.dispatch(() => this.handler.startElement(tag.name, buildAttributeMap(entries)));
    };

    this.parser.onclosetag = (name: string) => {
      this.openElements--;
      this.dispatch(() => this.handler.endElement(name));
    };

    this.parser.ontext = (text: string) => {
      if (this.openElements > 0) this.dispatch(() => this.handler.characters(text));
    };

    this.parser.oncdata = (text: string) => {
      if (this.openElements > 0) this.dispatch(() => this.handler.characters(text));
    };
  }

  /** Number of currently open elements. */
  get depth(): number {
    return this.openElements;
  }

  write(chunk: Uint8Array): void {
    this.assertUsable();
    let text: string;
    try {
      text = this.decoder.decode(chunk, { stream: true });
    } catch (err) {
      const utf16 = this.bytesFed === 0 && (chunk[0] === 0xff || chunk[0] === 0xfe);
      throw this.failure(
        utf16 ? 'UTF-16 input is not supported' : 'invalid UTF-8 byte sequence',
        err
      );
    }
    this.bytesFed += chunk.length;
    this.parse(text);
  }

  /** Signals end of input. Anything still unbalanced is a `FinalizeError`. */
  end(): void {
    this.assertUsable();
    this.finalizing = true;
    let tail: string;
    try {
      tail = this.decoder.decode();
    } catch (err) {
      throw this.failure('truncated UTF-8 byte sequence at end of input', err);
    }
    this.parse(tail);
    this.tokenize(() => this.parser.close());
    if (!this.sawRoot) throw this.failure('no element found');
    if (this.openElements !== 0) {
      throw this.failure(`${this.openElements} element(s) not closed at end of input`);
    }
    this.handler.endDocument();
  }

  /** Detaches the handler so a late callback cannot reach it. Safe to call more than once. */
  release(): void {
    if (this.released) return;
    this.released = true;
    const noop = (): void => {};
    this.parser.onerror = noop;
    this.parser.onopentagstart = noop;
    this.parser.onopentag = noop;
    this.parser.onclosetag = noop;
    this.parser.ontext = noop;
    this.parser.oncdata = noop;
    this.attributes = undefined;
  }

  private assertUsable(): void {
    if (this.released) throw new Error('XmlEventSource used after release()');
  }

  private parse(text: string): void {
    if (text.length === 0) return;
    this.currentText = text;
    this.tokenize(() => this.parser.write(text));
    this.unitsBefore += text.length;
    this.bytesBefore += Buffer.byteLength(text, 'utf8');
    this.currentText = '';
  }

  /** Runs sax. Errors that are neither a `TranscodeError` nor the handler's own become syntax errors. */
  private tokenize(run: () => void): void {
    try {
      run();
    } catch (err) {
      if (isTranscodeError(err) || this.handlerFailed) throw err;
      throw this.failure(`tokenizer failed: ${errorMessage(err)}`, err);
    }
  }

  private dispatch(deliver: () => void): void {
    try {
      deliver();
    } catch (err) {
      this.handlerFailed = true;
      throw err;
    }
  }

  private position(): ErrorPosition {
    const consumed = Math.max(0, this.parser.position - this.unitsBefore);
    return {
      line: this.parser.line + 1,
      column: this.parser.column,
      offset: this.bytesBefore + Buffer.byteLength(this.currentText.slice(0, consumed), 'utf8'),
    };
  }

  private failure(message: string, cause?: unknown): TranscodeError {
    return new TranscodeError(this.finalizing ? 'FinalizeError' : 'SyntaxError', message, {
      position: this.position(),
      cause,
    });
  }
}

function firstLine(message: string): string {
  const nl = message.indexOf('\n');
  return nl >= 0 ? message.slice(0, nl) : message;
}
