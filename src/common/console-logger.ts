/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { defaultLogLevel } from '../config';
import type { Logger, LogLevel } from './logger';
import { isLevelEnabled } from './logger';

export class ConsoleLogger implements Logger {
  private context: string | undefined;
  readonly level: LogLevel;

  /**
   * @param level minimum level written to the console; defaults to GEDCOM_LOG_LEVEL or 'warn'
   */
  constructor(level: LogLevel = defaultLogLevel()) {
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
    if (!isLevelEnabled('trace', this.level)) return;
    if (this.context) console.trace(this.context, message, ...attributes);
    else console.trace(message, ...attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    if (!isLevelEnabled('debug', this.level)) return;
    if (this.context) console.debug(this.context, message, ...attributes);
    else console.debug(message, ...attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    if (!isLevelEnabled('info', this.level)) return;
    if (this.context) console.info(this.context, message, ...attributes);
    else console.info(message, ...attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    if (!isLevelEnabled('warn', this.level)) return;
    if (this.context) console.warn(this.context, message, ...attributes);
    else console.warn(message, ...attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    if (!isLevelEnabled('error', this.level)) return;
    if (this.context) console.error(this.context, message, ...attributes);
    else console.error(message, ...attributes);
  }
}
