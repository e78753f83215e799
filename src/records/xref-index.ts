/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { DuplicatePointerError } from '../parser/errors';
import { walkNodes } from '../parser/tree-builder';
import type { GedcomNode } from '../parser/types';
import { isPointer } from '../parser/types';

export interface DanglingReference {
  pointer: string;
  tag: string;
  lineNumber?: number;
}

/**
 * Pointer-id → declaring top-level node. Lookup only: nodes stay owned by the
 * file's forest, and the index never holds a node that is not a root.
 */
export class CrossReferenceIndex {
  private readonly byPointer = new Map<string, GedcomNode>();

  static build(roots: Iterable<GedcomNode>): CrossReferenceIndex {
    const index = new CrossReferenceIndex();
    for (const root of roots) {
      if (root.pointer !== undefined) index.add(root);
    }
    return index;
  }

  add(node: GedcomNode): void {
    if (node.pointer === undefined) return;
    if (this.byPointer.has(node.pointer)) throw new DuplicatePointerError(node.pointer);
    this.byPointer.set(node.pointer, node);
  }

  lookup(pointer: string): GedcomNode | undefined {
    return this.byPointer.get(pointer);
  }

  has(pointer: string): boolean {
    return this.byPointer.has(pointer);
  }

  get size(): number {
    return this.byPointer.size;
  }

  pointers(): string[] {
    return [...this.byPointer.keys()];
  }

  /** Pointer-valued fields anywhere in the forest that this index cannot resolve. */
  danglingReferences(roots: Iterable<GedcomNode>): DanglingReference[] {
    const dangling: DanglingReference[] = [];
    for (const node of walkNodes(roots)) {
      if (node.level === 0 || !isPointer(node.value) || this.byPointer.has(node.value)) continue;
      const entry: DanglingReference = { pointer: node.value, tag: node.tag };
      if (node.lineNumber !== undefined) entry.lineNumber = node.lineNumber;
      dangling.push(entry);
    }
    return dangling;
  }
}
