/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import * as path from 'path';

import type { GedcomNode } from '../parser/types';

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

export interface NodeShape {
  tag: string;
  pointer?: string;
  value?: string;
  children: NodeShape[];
}

/** Tags, pointers, values and nesting only, for structural comparison of forests. */
export function shapeOf(nodes: readonly GedcomNode[]): NodeShape[] {
  return nodes.map((n) => {
    const shape: NodeShape = { tag: n.tag, children: shapeOf(n.children) };
    if (n.pointer !== undefined) shape.pointer = n.pointer;
    if (n.value !== undefined) shape.value = n.value;
    return shape;
  });
}

/** Run `fn` and return what it throws; fails the test when nothing is thrown. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected the call to throw');
}
