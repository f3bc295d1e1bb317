/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger, LogLevel } from '../common/logger';

export interface LogRecord {
  level: Exclude<LogLevel, 'silent'>;
  context: string | undefined;
  message: string;
  attributes: unknown[];
}

/** Logger for tests; clones share one record list. */
export class RecordingLogger implements Logger {
  private context: string | undefined;

  constructor(readonly records: LogRecord[] = []) {}

  clone(): RecordingLogger {
    return new RecordingLogger(this.records);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  trace(message: string, ...attributes: unknown[]): void {
    this.records.push({ level: 'trace', context: this.context, message, attributes });
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.records.push({ level: 'debug', context: this.context, message, attributes });
  }

  info(message: string, ...attributes: unknown[]): void {
    this.records.push({ level: 'info', context: this.context, message, attributes });
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.records.push({ level: 'warn', context: this.context, message, attributes });
  }

  error(message: string, ...attributes: unknown[]): void {
    this.records.push({ level: 'error', context: this.context, message, attributes });
  }
}
