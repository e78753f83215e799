/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { MalformedLineError } from './errors';
import type { GedcomLine } from './types';
import { isPointer } from './types';

const LINE_PATTERN = /^(\S+)\s+(?:(@[^@\s]+@)\s+)?(\S+)(?: (.*))?$/s;
const LEVEL_PATTERN = /^\d{1,2}$/;
const TAG_PATTERN = /^[_A-Z0-9]+$/;

/**
 * Decompose one line into level, optional pointer, tag and value.
 * The value is everything after the single space that follows the tag, kept verbatim.
 */
export function scanLine(text: string, lineNumber: number): GedcomLine {
  const raw = text.replace(/\r?\n$/, '').replace(/\r$/, '');
  const line = lineNumber === 1 ? raw.replace(/^\uFEFF/, '') : raw;
  const match = line.trimStart().match(LINE_PATTERN);
  if (!match) {
    if (/^\s*\d+\s*$/.test(line)) throw new MalformedLineError(lineNumber, raw, 'missing tag');
    throw new MalformedLineError(lineNumber, raw, 'expected "LEVEL [POINTER] TAG [VALUE]"');
  }
  const [, levelStr, pointer, tag, value] = match;
  if (!LEVEL_PATTERN.test(levelStr)) {
    throw new MalformedLineError(lineNumber, raw, `invalid level ${JSON.stringify(levelStr)}`);
  }
  if (!TAG_PATTERN.test(tag)) {
    throw new MalformedLineError(lineNumber, raw, `invalid tag ${JSON.stringify(tag)}`);
  }

  const level = parseInt(levelStr, 10);
  const result: GedcomLine = { level, tag, lineNumber };
  if (pointer !== undefined) result.pointer = pointer;
  if (value !== undefined && value !== '') result.value = value;

  // `0 INDI @I1@` declares the pointer after the tag
  if (level === 0 && result.pointer === undefined && isPointer(result.value)) {
    result.pointer = result.value;
    delete result.value;
  }
  return result;
}

/**
 * Scan a whole text (or a sequence of already-split lines) into structural line records.
 * Blank lines are skipped but still counted for line numbers.
 */
export function* scanLines(source: string | Iterable<string>): Generator<GedcomLine> {
  const lines = typeof source === 'string' ? source.split('\n') : source;
  let lineNumber = 0;
  for (const text of lines) {
    lineNumber++;
    if (text.trim() === '') continue;
    yield scanLine(text, lineNumber);
  }
}
