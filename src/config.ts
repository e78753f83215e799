/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Options accepted by parse / serialize / save, with their defaults.
*/

import type { Logger, LogLevel } from './common/logger';
import { isLogLevel } from './common/logger';
import { InvalidValueError } from './parser/errors';
import type { RecordRegistry } from './records/registry';

export const PRODUCT_NAME = 'gedcom-forest';
export const PRODUCT_VERSION = '0.1.0';

/** Characters of value per physical line before the rest moves to CONC lines. */
export const DEFAULT_MAX_VALUE_LENGTH = 248;
export const DEFAULT_LINE_SEPARATOR = '\n';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
export const LOG_LEVEL_ENV = 'GEDCOM_LOG_LEVEL';

export interface ParseOptions {
  /** Tag → record class table; defaults to the built-in registry. */
  registry?: RecordRegistry;
  /** Cloned and given the `gedcom:parse` context; defaults to a ConsoleLogger. */
  logger?: Logger;
}

export interface SerializeOptions {
  maxValueLength?: number;
  lineSeparator?: string;
  /** Add HEAD / TRLR records to the file before writing when they are missing. */
  ensureHeaderTrailer?: boolean;
}

export interface SaveOptions extends SerializeOptions {
  /** Replace an existing file instead of failing with FileExistsError. */
  overwrite?: boolean;
}

export type ResolvedSerializeOptions = Required<SerializeOptions>;

export function resolveSerializeOptions(options: SerializeOptions = {}): ResolvedSerializeOptions {
  const maxValueLength = options.maxValueLength ?? DEFAULT_MAX_VALUE_LENGTH;
  if (!Number.isInteger(maxValueLength) || maxValueLength < 1) {
    throw new InvalidValueError(`maxValueLength must be a positive integer, got ${maxValueLength}`);
  }
  return {
    maxValueLength,
    lineSeparator: options.lineSeparator ?? DEFAULT_LINE_SEPARATOR,
    ensureHeaderTrailer: options.ensureHeaderTrailer ?? false,
  };
}

/** Console log threshold from GEDCOM_LOG_LEVEL; unknown values fall back to 'warn'. */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return configured && isLogLevel(configured) ? configured : DEFAULT_LOG_LEVEL;
}
