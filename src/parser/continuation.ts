/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { StructuralError } from './errors';
import type { GedcomNode } from './types';
import { CONTINUATION_TAGS } from './types';

/**
 * Fold CONT/CONC children into their parent's value, in place.
 * CONT joins with a newline, CONC concatenates directly. Bottom-up, so a
 * continuation's own continuations are folded before it is.
 */
export function mergeContinuations(nodes: GedcomNode[]): GedcomNode[] {
  for (const node of nodes) {
    if (CONTINUATION_TAGS.has(node.tag)) {
      throw new StructuralError(`${node.tag} has no parent record`, node.lineNumber);
    }
    mergeInto(node);
  }
  return nodes;
}

function mergeInto(node: GedcomNode): void {
  if (node.children.length === 0) return;
  const kept: GedcomNode[] = [];
  for (const child of node.children) {
    mergeInto(child);
    if (!CONTINUATION_TAGS.has(child.tag)) {
      kept.push(child);
      continue;
    }
    if (child.children.length > 0) {
      throw new StructuralError(
        `${child.tag} cannot carry ${child.children[0].tag} as a child`,
        child.children[0].lineNumber
      );
    }
    const separator = child.tag === 'CONT' ? '\n' : '';
    node.value = (node.value ?? '') + separator + (child.value ?? '');
  }
  node.children = kept;
  if (node.value === '') delete node.value;
}
