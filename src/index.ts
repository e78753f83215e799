/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { parse } from './parse';
export { parseFile, saveFile, decodeGedcomBytes } from './io';
export { GedcomFile } from './gedcom-file';
export type { GedcomFileOptions } from './gedcom-file';
export * from './parser';
export { serializeNodes, serializeNode, serializeForest, formatLine, chunkValue } from './serializer/serializer';

export { GedcomRecord, GenericRecord } from './records/record';
export { Individual, splitName } from './records/individual';
export type { PersonName } from './records/individual';
export { Family } from './records/family';
export { EventRecord, Event, Birth, Death, Marriage, Residence } from './records/event';
export { LinkRecord, Spouse, Husband, Wife, ChildLink, FamilyChildLink, FamilySpouseLink } from './records/links';
export { Source } from './records/source';
export { Note } from './records/note';
export { RecordRegistry, createDefaultRegistry, defaultRegistry } from './records/registry';
export type { RecordConstructor } from './records/registry';
export { isKind, isEvent, EVENT_KINDS } from './records/kinds';
export type { RecordKind, RecordKindMap, RecordContext } from './records/kinds';
export { RecordSequence } from './records/sequence';
export { CrossReferenceIndex } from './records/xref-index';
export type { DanglingReference } from './records/xref-index';

export * from './config';
export type { Logger, LogLevel } from './common/logger';
export { ConsoleLogger } from './common/console-logger';
