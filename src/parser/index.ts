/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { scanLine, scanLines } from './line-scanner';
export { buildTree, walkNodes } from './tree-builder';
export { mergeContinuations } from './continuation';
export { createNode, isPointer, CONTINUATION_TAGS, MAX_LEVEL, POINTER_PATTERN } from './types';
export * from './errors';
export type { GedcomLine, GedcomNode } from './types';
