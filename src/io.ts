/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  File-system boundary: read bytes into text for parse(), write serialized text back.
*/

import * as fs from 'fs';

import type { ParseOptions, SaveOptions } from './config';
import type { GedcomFile } from './gedcom-file';
import { parse } from './parse';
import { FileExistsError } from './parser/errors';

/**
 * Decode file bytes. A UTF-16 byte-order mark selects UTF-16 (LE or BE);
 * anything else is read as UTF-8 with an optional BOM dropped.
 */
export function decodeGedcomBytes(bytes: Buffer): string {
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return bytes.subarray(2).toString('utf16le');
  }
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    const body = Buffer.from(bytes.subarray(2, 2 + ((bytes.length - 2) & ~1)));
    return body.swap16().toString('utf16le');
  }
  const text = bytes.toString('utf-8');
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export function parseFile(filename: string, options: ParseOptions = {}): GedcomFile {
  return parse(decodeGedcomBytes(fs.readFileSync(filename)), options);
}

/** Write the file as UTF-8 with a trailing newline; refuses to replace an existing file unless `overwrite` is set. */
export function saveFile(file: GedcomFile, filename: string, options: SaveOptions = {}): void {
  const text = file.serialize(options);
  const separator = options.lineSeparator ?? '\n';
  try {
    fs.writeFileSync(filename, text + separator, { encoding: 'utf-8', flag: options.overwrite ? 'w' : 'wx' });
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'EEXIST') throw new FileExistsError(filename);
    throw e;
  }
}
