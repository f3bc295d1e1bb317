/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { memoryByteSource, openFileByteSource } from './byte-source';
import { parseLayoutFile, streamLayoutFileTokens } from './transcoder';
import { TranscodeError } from '../common/errors';
import { RecordingLogger } from '../test/recording-logger';
import { CollectingSink, utf8 } from '../test/sources';

describe('memoryByteSource', () => {
  it('serves the buffer in pieces of the read buffer size', () => {
    const source = memoryByteSource(utf8('abcdefg'));
    const buffer = new Uint8Array(3);
    const reads: string[] = [];
    for (let n = source.read(buffer); n > 0; n = source.read(buffer)) {
      reads.push(Buffer.from(buffer.subarray(0, n)).toString('utf8'));
    }
    expect(reads).toEqual(['abc', 'def', 'g']);
    expect(source.read(buffer)).toBe(0);
  });
});

describe('file sources', () => {
  let dir: string;
  let layoutPath: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'layout-xml-'));
    layoutPath = path.join(dir, 'main.xml');
    fs.writeFileSync(layoutPath, '<FrameLayout android:id="root"><View/></FrameLayout>\n');
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reports a missing file as SourceUnavailable', () => {
    expect(() => openFileByteSource(path.join(dir, 'missing.xml'))).toThrow(TranscodeError);
    const result = parseLayoutFile(path.join(dir, 'missing.xml'), { logger: new RecordingLogger() });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('SourceUnavailable');
  });

  it('parses a layout file in small chunks', () => {
    const result = parseLayoutFile(layoutPath, { chunkSize: 8, logger: new RecordingLogger() });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.root).toStrictEqual({
      type: 'FrameLayout',
      attributes: { id: 'root' },
      children: [{ type: 'View' }],
    });
  });

  it('streams tokens from a layout file', () => {
    const sink = new CollectingSink();
    const result = streamLayoutFileTokens(layoutPath, sink, { logger: new RecordingLogger() });
    expect(result.ok).toBe(true);
    expect(sink.tokens.map((t) => t.kind)).toEqual([
      'startElement',
      'startElement',
      'endElement',
      'endElement',
    ]);
    expect(sink.completions).toHaveLength(1);
  });

  it('refuses reads after close', () => {
    const source = openFileByteSource(layoutPath);
    source.close();
    source.close();
    expect(() => source.read(new Uint8Array(4))).toThrow(`${layoutPath} is closed`);
  });
});
