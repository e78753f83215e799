/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from './common/console-logger';
import type { ParseOptions } from './config';
import { GedcomFile } from './gedcom-file';
import { mergeContinuations } from './parser/continuation';
import { scanLines } from './parser/line-scanner';
import { buildTree } from './parser/tree-builder';

/**
 * Parse GEDCOM text (a whole string, or lines already split by the caller) into a file root.
 * Scanning, tree building, continuation merging and indexing all run eagerly; any
 * MalformedLineError, StructuralError or DuplicatePointerError aborts the parse.
 */
export function parse(source: string | Iterable<string>, options: ParseOptions = {}): GedcomFile {
  const logger = (options.logger ?? new ConsoleLogger()).clone();
  logger.setContext('gedcom:parse');

  const lines = [...scanLines(source)];
  logger.debug(`scanned ${lines.length} lines`);
  const roots = mergeContinuations(buildTree(lines));
  logger.debug(`built ${roots.length} top-level records`);

  return new GedcomFile(roots, { registry: options.registry, logger });
}
