/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Error taxonomy. Parse-time errors (malformed line, structure, duplicate pointer)
  abort the parse; the others are raised by individual accessor calls.
*/

export class GedcomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GedcomError';
  }
}

/** Line cannot be decomposed into level, optional pointer, tag and value. */
export class MalformedLineError extends GedcomError {
  readonly lineNumber: number;
  readonly line: string;

  constructor(lineNumber: number, line: string, reason: string) {
    super(`Line ${lineNumber}: ${reason}: ${JSON.stringify(line)}`);
    this.name = 'MalformedLineError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

/** Level nesting is broken (skipped level, orphaned continuation). */
export class StructuralError extends GedcomError {
  readonly lineNumber: number | undefined;

  constructor(message: string, lineNumber?: number) {
    super(lineNumber !== undefined ? `Line ${lineNumber}: ${message}` : message);
    this.name = 'StructuralError';
    this.lineNumber = lineNumber;
  }
}

export class DuplicatePointerError extends GedcomError {
  readonly pointer: string;

  constructor(pointer: string) {
    super(`Pointer ${pointer} is declared more than once`);
    this.name = 'DuplicatePointerError';
    this.pointer = pointer;
  }
}

export class UnresolvedReferenceError extends GedcomError {
  readonly pointer: string;
  /** Record kind the caller expected behind the pointer, if any. */
  readonly expected: string | undefined;

  constructor(pointer: string, expected?: string, actual?: string) {
    super(
      actual !== undefined
        ? `Pointer ${pointer} refers to ${actual}, expected ${expected ?? 'a record'}`
        : `Pointer ${pointer} is not declared in this file`
    );
    this.name = 'UnresolvedReferenceError';
    this.pointer = pointer;
    this.expected = expected;
  }
}

export class NotFoundError extends GedcomError {
  readonly tag: string;
  readonly owner: string | undefined;

  constructor(tag: string, owner?: string) {
    super(owner ? `No ${tag} found under ${owner}` : `No ${tag} found`);
    this.name = 'NotFoundError';
    this.tag = tag;
    this.owner = owner;
  }
}

/** Positional access past the end of a resolved sequence. */
export class SlotError extends GedcomError {
  readonly slot: number;
  readonly size: number;

  constructor(slot: number, size: number) {
    super(`Slot ${slot} is out of range (${size} available)`);
    this.name = 'SlotError';
    this.slot = slot;
    this.size = size;
  }
}

export class MalformedNameError extends GedcomError {
  readonly value: string;

  constructor(value: string) {
    super(`Malformed NAME value: ${JSON.stringify(value)}`);
    this.name = 'MalformedNameError';
    this.value = value;
  }
}

export class InvalidValueError extends GedcomError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidValueError';
  }
}

export class FileExistsError extends GedcomError {
  readonly path: string;

  constructor(path: string) {
    super(`Refusing to overwrite existing file ${path}`);
    this.name = 'FileExistsError';
    this.path = path;
  }
}
