/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { SerializeOptions } from '../config';
import { resolveSerializeOptions } from '../config';
import { StructuralError } from '../parser/errors';
import type { GedcomNode } from '../parser/types';
import { MAX_LEVEL } from '../parser/types';

export function formatLine(level: number, tag: string, value?: string, pointer?: string): string {
  const id = pointer ? ` ${pointer}` : '';
  const text = value ? ` ${value}` : '';
  return `${level}${id} ${tag}${text}`;
}

/**
 * Cut a value into pieces of at most `max` characters, never between the two
 * halves of a surrogate pair.
 */
export function chunkValue(value: string, max: number): string[] {
  if (value.length <= max) return [value];
  const chunks: string[] = [];
  let start = 0;
  while (start < value.length) {
    let end = Math.min(start + max, value.length);
    if (end < value.length && end - start > 1 && isLowSurrogate(value.charCodeAt(end))) end--;
    chunks.push(value.slice(start, end));
    start = end;
  }
  return chunks;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Lines for one node and its subtree, depth-first. Newlines in the value become
 * CONT lines and over-long segments are continued on CONC lines, all at level + 1
 * and ahead of the node's own children.
 */
export function* serializeNode(
  node: GedcomNode,
  options: SerializeOptions = {},
  level: number = node.level
): Generator<string> {
  yield* writeNode(node, level, resolveSerializeOptions(options).maxValueLength);
}

function* writeNode(node: GedcomNode, level: number, maxValueLength: number): Generator<string> {
  const segments = node.value === undefined ? [''] : node.value.split('\n');

  const [head, ...headRest] = chunkValue(segments[0], maxValueLength);
  if (headRest.length > 0 || segments.length > 1) requireLevel(level + 1, node.tag);
  yield formatLine(level, node.tag, head, node.pointer);
  for (const piece of headRest) yield formatLine(level + 1, 'CONC', piece);

  for (const segment of segments.slice(1)) {
    const [first, ...rest] = chunkValue(segment, maxValueLength);
    yield formatLine(level + 1, 'CONT', first);
    for (const piece of rest) yield formatLine(level + 1, 'CONC', piece);
  }

  if (node.children.length > 0) requireLevel(level + 1, node.tag);
  for (const child of node.children) {
    yield* writeNode(child, level + 1, maxValueLength);
  }
}

function requireLevel(level: number, tag: string): void {
  if (level > MAX_LEVEL) {
    throw new StructuralError(`${tag} needs lines at level ${level}, above the maximum of ${MAX_LEVEL}`);
  }
}

export function* serializeForest(nodes: Iterable<GedcomNode>, options: SerializeOptions = {}): Generator<string> {
  const { maxValueLength } = resolveSerializeOptions(options);
  for (const node of nodes) yield* writeNode(node, 0, maxValueLength);
}

export function serializeNodes(nodes: Iterable<GedcomNode>, options: SerializeOptions = {}): string {
  const { lineSeparator } = resolveSerializeOptions(options);
  return [...serializeForest(nodes, options)].join(lineSeparator);
}
