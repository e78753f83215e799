/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { StructuralError } from './errors';
import type { GedcomLine, GedcomNode } from './types';

/**
 * Rebuild the level-based nesting of scanned lines into a forest of generic nodes.
 * Keeps a stack of open ancestors; stack[n] is the most recent node at level n.
 */
export function buildTree(lines: Iterable<GedcomLine>): GedcomNode[] {
  const roots: GedcomNode[] = [];
  const stack: GedcomNode[] = [];

  for (const line of lines) {
    if (line.level > stack.length) {
      const reason =
        stack.length === 0
          ? `first record must be at level 0, found level ${line.level}`
          : `level ${line.level} skips past parent level ${stack.length - 1}`;
      throw new StructuralError(reason, line.lineNumber);
    }
    stack.length = line.level;

    const node: GedcomNode = { level: line.level, tag: line.tag, children: [], lineNumber: line.lineNumber };
    if (line.pointer !== undefined) node.pointer = line.pointer;
    if (line.value !== undefined) node.value = line.value;

    if (line.level === 0) roots.push(node);
    else stack[line.level - 1].children.push(node);
    stack.push(node);
  }
  return roots;
}

/** Depth-first walk over a forest, parents before children. */
export function* walkNodes(nodes: Iterable<GedcomNode>): Generator<GedcomNode> {
  for (const node of nodes) {
    yield node;
    yield* walkNodes(node.children);
  }
}
