/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { LOG_LEVEL_ORDER } from './logger';
import type { Logger, LogLevel } from './logger';

type ConsoleMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger writing through `console`. Messages below `level` are dropped.
 */
export class ConsoleLogger implements Logger {
  private context: string | undefined;
  readonly level: LogLevel;

  constructor(level: LogLevel = 'warn') {
    this.context = undefined;
    this.level = level;
  }

  clone(): ConsoleLogger {
    return new ConsoleLogger(this.level);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  trace(message: string, ...attributes: unknown[]): void {
    this.write('trace', message, attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.write('debug', message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    this.write('info', message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.write('warn', message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    this.write('error', message, attributes);
  }

  private write(method: ConsoleMethod, message: string, attributes: unknown[]): void {
    if (LOG_LEVEL_ORDER[method] < LOG_LEVEL_ORDER[this.level]) return;
    if (this.context) console[method](this.context, message, ...attributes);
    else console[method](message, ...attributes);
  }
}
