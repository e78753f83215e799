/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { buildTree, walkNodes } from './tree-builder';
import { scanLines } from './line-scanner';
import { StructuralError } from './errors';
import { shapeOf, thrownBy } from '../test/fixtures';

describe('buildTree', () => {
  it('nests lines by level and returns to shallower levels', () => {
    const roots = buildTree(scanLines('0 A\n1 B\n2 C\n1 D\n0 E'));
    expect(shapeOf(roots)).toEqual([
      {
        tag: 'A',
        children: [
          { tag: 'B', children: [{ tag: 'C', children: [] }] },
          { tag: 'D', children: [] },
        ],
      },
      { tag: 'E', children: [] },
    ]);
  });

  it('preserves sibling order', () => {
    const [indi] = buildTree(scanLines('0 @I1@ INDI\n1 NAME A\n1 SEX M\n1 NAME B\n1 BIRT'));
    expect(indi.children.map((c) => c.tag)).toEqual(['NAME', 'SEX', 'NAME', 'BIRT']);
    expect(indi.children[2].value).toBe('B');
  });

  it('keeps each child one level below its parent', () => {
    const roots = buildTree(scanLines('0 @I1@ INDI\n1 BIRT\n2 DATE 1900\n2 PLAC Here\n1 DEAT\n0 TRLR'));
    for (const node of walkNodes(roots)) {
      for (const child of node.children) expect(child.level).toBe(node.level + 1);
    }
  });

  it('records source line numbers on nodes', () => {
    const [head] = buildTree(scanLines('0 HEAD\n\n1 CHAR UTF-8'));
    expect(head.children[0].lineNumber).toBe(3);
  });

  it('rejects a skipped level', () => {
    const err = thrownBy(() => buildTree(scanLines('0 @I1@ INDI\n2 DATE 1900')));
    expect(err).toBeInstanceOf(StructuralError);
    expect(err).toMatchObject({ lineNumber: 2, message: 'Line 2: level 2 skips past parent level 0' });
  });

  it('rejects input that does not start at level 0', () => {
    expect(() => buildTree(scanLines('1 NAME Bob'))).toThrowError(
      'Line 1: first record must be at level 0, found level 1'
    );
  });
});

describe('walkNodes', () => {
  it('visits parents before children in document order', () => {
    const roots = buildTree(scanLines('0 A\n1 B\n2 C\n1 D\n0 E'));
    expect([...walkNodes(roots)].map((n) => n.tag)).toEqual(['A', 'B', 'C', 'D', 'E']);
  });
});
