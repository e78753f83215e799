/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Structural line records and the generic node tree built from them.
*/

/**
 * One physical line after scanning: `LEVEL [POINTER] TAG [VALUE]`.
 */
export interface GedcomLine {
  level: number;
  tag: string;
  /** Cross-reference id including the surrounding `@`, e.g. `@I1@`. */
  pointer?: string;
  /** Remainder of the line, verbatim. Absent when the line ends after the tag. */
  value?: string;
  /** 1-based position in the source text (blank lines are counted). */
  lineNumber: number;
}

/**
 * Generic node of the tree, before classification into typed records.
 */
export interface GedcomNode {
  /** Depth from root (0 = top-level record). */
  level: number;
  tag: string;
  pointer?: string;
  value?: string;
  /** Child nodes in document order; owned by this node. */
  children: GedcomNode[];
  /** Source line number, when the node was parsed rather than created. */
  lineNumber?: number;
}

/** Highest level a line can carry (two digits). */
export const MAX_LEVEL = 99;

export const CONTINUATION_TAGS: ReadonlySet<string> = new Set(['CONT', 'CONC']);

/** Pointer-id syntax: `@` + identifier characters + `@`. */
export const POINTER_PATTERN = /^@[^@\s]+@$/;

export function isPointer(value: string | undefined): value is string {
  return value !== undefined && POINTER_PATTERN.test(value);
}

export function createNode(level: number, tag: string, value?: string, pointer?: string): GedcomNode {
  const node: GedcomNode = { level, tag, children: [] };
  if (pointer !== undefined) node.pointer = pointer;
  if (value !== undefined) node.value = value;
  return node;
}
