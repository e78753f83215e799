/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { NotFoundError, UnresolvedReferenceError } from '../parser/errors';
import type { GedcomNode } from '../parser/types';
import { createNode } from '../parser/types';
import type { RecordContext, RecordKind, RecordKindMap } from './kinds';
import { isKind } from './kinds';

/**
 * Typed view over one generic node. Records never copy node data: reads go
 * straight to the node, and child records come from the file's view cache.
 */
export abstract class GedcomRecord {
  abstract readonly kind: RecordKind;

  constructor(
    readonly node: GedcomNode,
    protected readonly context: RecordContext
  ) {}

  /** Pointer-id of this record, verbatim (e.g. `@I1@`). */
  get id(): string | undefined {
    return this.node.pointer;
  }

  get level(): number {
    return this.node.level;
  }

  get tag(): string {
    return this.node.tag;
  }

  get value(): string | undefined {
    return this.node.value;
  }

  set value(value: string | undefined) {
    if (value === undefined || value === '') delete this.node.value;
    else this.node.value = value;
  }

  children(): GedcomRecord[] {
    return this.node.children.map((c) => this.context.recordFor(c));
  }

  childrenWithTag(tag: string): GedcomRecord[] {
    return this.node.children.filter((c) => c.tag === tag).map((c) => this.context.recordFor(c));
  }

  childrenOfKind<K extends RecordKind>(kind: K): Array<RecordKindMap[K]> {
    return this.children().filter((c): c is RecordKindMap[K] => isKind(c, kind));
  }

  has(tag: string): boolean {
    return this.node.children.some((c) => c.tag === tag);
  }

  findChild(tag: string): GedcomRecord | undefined {
    const node = this.node.children.find((c) => c.tag === tag);
    return node ? this.context.recordFor(node) : undefined;
  }

  /** First direct child with this tag; throws NotFoundError when there is none. */
  child(tag: string): GedcomRecord {
    const found = this.findChild(tag);
    if (!found) throw new NotFoundError(tag, this.describe());
    return found;
  }

  firstOfKind<K extends RecordKind>(kind: K): RecordKindMap[K] | undefined {
    return this.children().find((c): c is RecordKindMap[K] => isKind(c, kind));
  }

  /** Full text of the first NOTE, or undefined without one. */
  get note(): string | undefined {
    return this.firstOfKind('note')?.text;
  }

  /** SOUR citations under this record, dereferenced to the cited source records. */
  sources(): RecordKindMap['source'][] {
    return this.childrenOfKind('source').map((s) => s.resolveSource());
  }

  /** Append a child node at level + 1 and return its typed view. */
  addChild(tag: string, value?: string): GedcomRecord {
    const node = createNode(this.node.level + 1, tag, value === '' ? undefined : value);
    this.node.children.push(node);
    return this.context.recordFor(node);
  }

  describe(): string {
    return this.id ? `${this.tag} ${this.id}` : this.tag;
  }

  protected requireKind<K extends RecordKind>(kind: K, tag: string): RecordKindMap[K] {
    const found = this.firstOfKind(kind);
    if (!found) throw new NotFoundError(tag, this.describe());
    return found;
  }

  protected optionalValue(tag: string): string | undefined {
    return this.findChild(tag)?.value;
  }

  protected requiredValue(tag: string): string {
    return this.child(tag).value ?? '';
  }

  protected dereference(pointer: string): GedcomRecord {
    const node = this.context.lookup(pointer);
    if (!node) throw new UnresolvedReferenceError(pointer);
    return this.context.recordFor(node);
  }

  protected dereferenceAs<K extends RecordKind>(pointer: string, kind: K): RecordKindMap[K] {
    const record = this.dereference(pointer);
    if (!isKind(record, kind)) throw new UnresolvedReferenceError(pointer, kind, record.kind);
    return record;
  }
}

/** Fallback for tags without a dedicated record class, including `_` vendor tags. */
export class GenericRecord extends GedcomRecord {
  readonly kind = 'element' as const;
}
