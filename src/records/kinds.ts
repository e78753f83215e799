/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Closed set of record kinds and the kind → class mapping used to narrow
  classified records without instanceof checks.
*/

import type { GedcomNode } from '../parser/types';
import type { Birth, Death, EventRecord, Marriage, Residence } from './event';
import type { Family } from './family';
import type { Individual } from './individual';
import type { ChildLink, FamilyChildLink, FamilySpouseLink, Husband, Wife } from './links';
import type { Note } from './note';
import type { GedcomRecord, GenericRecord } from './record';
import type { Source } from './source';

export type RecordKind =
  | 'element'
  | 'individual'
  | 'family'
  | 'event'
  | 'birth'
  | 'death'
  | 'marriage'
  | 'residence'
  | 'husband'
  | 'wife'
  | 'child-link'
  | 'family-child-link'
  | 'family-spouse-link'
  | 'source'
  | 'note';

export interface RecordKindMap {
  element: GenericRecord;
  individual: Individual;
  family: Family;
  event: EventRecord;
  birth: Birth;
  death: Death;
  marriage: Marriage;
  residence: Residence;
  husband: Husband;
  wife: Wife;
  'child-link': ChildLink;
  'family-child-link': FamilyChildLink;
  'family-spouse-link': FamilySpouseLink;
  source: Source;
  note: Note;
}

export const EVENT_KINDS: ReadonlySet<RecordKind> = new Set<RecordKind>([
  'event',
  'birth',
  'death',
  'marriage',
  'residence',
]);

export function isKind<K extends RecordKind>(record: GedcomRecord, kind: K): record is RecordKindMap[K] {
  return record.kind === kind;
}

export function isEvent(record: GedcomRecord): record is EventRecord {
  return EVENT_KINDS.has(record.kind);
}

/**
 * What a record needs from the file it lives in: pointer lookup through the
 * cross-reference index, and the cached typed view of a node.
 */
export interface RecordContext {
  lookup(pointer: string): GedcomNode | undefined;
  recordFor(node: GedcomNode): GedcomRecord;
}
