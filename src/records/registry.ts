/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { GedcomNode } from '../parser/types';
import { Birth, Death, Event, Marriage, Residence } from './event';
import { Family } from './family';
import { Individual } from './individual';
import type { RecordContext } from './kinds';
import { ChildLink, FamilyChildLink, FamilySpouseLink, Husband, Wife } from './links';
import { Note } from './note';
import { GedcomRecord, GenericRecord } from './record';
import { Source } from './source';

export type RecordConstructor = new (node: GedcomNode, context: RecordContext) => GedcomRecord;

/**
 * Tag → record class table with a fallback for tags it does not know.
 * Classification looks at the tag only; pointer-id prefixes are never consulted.
 */
export class RecordRegistry {
  private readonly table = new Map<string, RecordConstructor>();

  constructor(private readonly fallback: RecordConstructor = GenericRecord) {}

  register(tag: string, ctor: RecordConstructor): this {
    this.table.set(tag, ctor);
    return this;
  }

  constructorFor(tag: string): RecordConstructor {
    return this.table.get(tag) ?? this.fallback;
  }

  isRegistered(tag: string): boolean {
    return this.table.has(tag);
  }

  classify(node: GedcomNode, context: RecordContext): GedcomRecord {
    const ctor = this.constructorFor(node.tag);
    return new ctor(node, context);
  }

  tags(): string[] {
    return [...this.table.keys()];
  }

  /** Independent copy, for extending the defaults without touching them. */
  clone(): RecordRegistry {
    const copy = new RecordRegistry(this.fallback);
    for (const [tag, ctor] of this.table) copy.register(tag, ctor);
    return copy;
  }
}

export function createDefaultRegistry(): RecordRegistry {
  const registry = new RecordRegistry()
    .register('INDI', Individual)
    .register('FAM', Family)
    .register('BIRT', Birth)
    .register('DEAT', Death)
    .register('MARR', Marriage)
    .register('RESI', Residence)
    .register('HUSB', Husband)
    .register('WIFE', Wife)
    .register('CHIL', ChildLink)
    .register('FAMC', FamilyChildLink)
    .register('FAMS', FamilySpouseLink)
    .register('SOUR', Source)
    .register('NOTE', Note);
  for (const tag of ['BURI', 'CHR', 'BAPM', 'DIV', 'EVEN']) registry.register(tag, Event);
  return registry;
}

export const defaultRegistry: RecordRegistry = createDefaultRegistry();
