/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { GedcomFile } from './gedcom-file';
import { parse } from './parse';
import { UnresolvedReferenceError } from './parser/errors';
import { readFixture } from './test/fixtures';
import { RecordingLogger } from './test/recording-logger';

const HEADER = [
  '0 HEAD',
  '1 SOUR',
  '2 NAME gedcom-forest',
  '2 VERS 0.1.0',
  '1 CHAR UNICODE',
  '1 GEDC',
  '2 VERS 5.5',
  '2 FORM LINEAGE-LINKED',
];

function load(text: string) {
  return parse(text, { logger: new RecordingLogger() });
}

describe('GedcomFile', () => {
  const fixture = readFixture('family.ged');

  it('keeps top-level records in document order', () => {
    const file = load(fixture);
    expect(file.records().map((r) => r.kind)).toEqual([
      'element',
      'individual',
      'individual',
      'individual',
      'family',
      'source',
      'element',
    ]);
  });

  it('serializes an unmodified file back to the same text', () => {
    expect(load(fixture).serialize()).toBe(fixture.replace(/\n$/, ''));
  });

  describe('individuals / families', () => {
    it('can be iterated again and again', () => {
      const file = load(fixture);
      const people = file.individuals();
      expect([...people].map((p) => p.id)).toEqual(['@I1@', '@I2@', '@I3@']);
      expect([...people].map((p) => p.id)).toEqual(['@I1@', '@I2@', '@I3@']);
      expect(people.count()).toBe(3);
      expect(file.roots).toHaveLength(7);
    });

    it('reflects records created after the sequence was taken', () => {
      const file = load(fixture);
      const people = file.individuals();
      file.createIndividual();
      expect(people.count()).toBe(4);
    });

    it('supports lazy filtering and mapping', () => {
      const file = load(fixture);
      const women = file.individuals().filter((p) => p.isFemale).map((p) => p.id);
      expect(women.toArray()).toEqual(['@I2@', '@I3@']);
      expect(file.individuals().find((p) => p.isMale)?.id).toBe('@I1@');
      expect(file.families().first()?.id).toBe('@F1@');
    });
  });

  describe('lookup', () => {
    it('finds records by pointer-id', () => {
      const file = load(fixture);
      expect(file.get('@S1@').kind).toBe('source');
      expect(file.find('@I404@')).toBeUndefined();
      expect(() => file.get('@I404@')).toThrow(UnresolvedReferenceError);
    });
  });

  describe('mutation', () => {
    it('allocates ids from one counter and writes a header on request', () => {
      const file = new GedcomFile([], { logger: new RecordingLogger() });
      const person = file.createIndividual();
      person.setSex('M');
      const family = file.createFamily();
      expect(person.id).toBe('@I1@');
      expect(family.id).toBe('@F2@');
      expect(person.level).toBe(0);
      expect(file.serialize({ ensureHeaderTrailer: true })).toBe(
        [...HEADER, '0 @I1@ INDI', '1 SEX M', '0 @F2@ FAM', '0 TRLR'].join('\n')
      );
    });

    it('writes just a header and trailer for an empty file', () => {
      const file = new GedcomFile([], { logger: new RecordingLogger() });
      expect(file.serialize({ ensureHeaderTrailer: true })).toBe([...HEADER, '0 TRLR'].join('\n'));
    });

    it('skips ids already taken and inserts before the trailer', () => {
      const file = load('0 HEAD\n0 @I1@ INDI\n1 NAME\n2 GIVN Bob\n0 TRLR');
      const added = file.createIndividual();
      expect(added.id).toBe('@I2@');
      expect(file.get('@I2@')).toBe(added);
      expect(file.serialize()).toBe('0 HEAD\n0 @I1@ INDI\n1 NAME\n2 GIVN Bob\n0 @I2@ INDI\n0 TRLR');
    });

    it('leaves an existing header and trailer alone', () => {
      const file = load('0 HEAD\n1 CHAR UTF-8\n0 TRLR');
      file.ensureHeaderTrailer();
      expect(file.serialize()).toBe('0 HEAD\n1 CHAR UTF-8\n0 TRLR');
    });

    it('adds children one level down', () => {
      const file = load('0 @I1@ INDI');
      const birth = file.get('@I1@').addChild('BIRT');
      birth.addChild('DATE', '1 MAY 1900');
      expect(birth.kind).toBe('birth');
      expect(file.serialize()).toBe('0 @I1@ INDI\n1 BIRT\n2 DATE 1 MAY 1900');
      expect([...file.lines()]).toEqual(['0 @I1@ INDI', '1 BIRT', '2 DATE 1 MAY 1900']);
    });
  });
});
