/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { chunkValue, formatLine, serializeForest, serializeNode, serializeNodes } from './serializer';
import { mergeContinuations } from '../parser/continuation';
import { buildTree } from '../parser/tree-builder';
import { scanLines } from '../parser/line-scanner';
import { createNode } from '../parser/types';
import { InvalidValueError, StructuralError } from '../parser/errors';
import { shapeOf } from '../test/fixtures';

function reparse(text: string) {
  return mergeContinuations(buildTree(scanLines(text)));
}

describe('formatLine', () => {
  it('omits pointer and value when absent', () => {
    expect(formatLine(0, 'HEAD')).toBe('0 HEAD');
    expect(formatLine(0, 'INDI', undefined, '@I1@')).toBe('0 @I1@ INDI');
    expect(formatLine(2, 'DATE', '1 JAN 1900')).toBe('2 DATE 1 JAN 1900');
  });
});

describe('chunkValue', () => {
  it('returns short values whole', () => {
    expect(chunkValue('abc', 3)).toEqual(['abc']);
  });

  it('cuts at the threshold', () => {
    expect(chunkValue('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('does not split a surrogate pair', () => {
    expect(chunkValue('a\u{1F600}b', 2)).toEqual(['a', '\u{1F600}', 'b']);
  });
});

describe('serializeNodes', () => {
  it('writes nodes depth-first with their pointers', () => {
    const roots = reparse('0 @I1@ INDI\n1 NAME Ann /Lee/\n1 BIRT\n2 DATE 1901\n0 TRLR');
    expect(serializeNodes(roots)).toBe('0 @I1@ INDI\n1 NAME Ann /Lee/\n1 BIRT\n2 DATE 1901\n0 TRLR');
  });

  it('wraps a 300 character value onto a CONC line and restores it on re-parse', () => {
    const long = '0123456789'.repeat(30);
    const indi = createNode(0, 'INDI', undefined, '@I1@');
    indi.children.push(createNode(1, 'NOTE', long));

    const lines = [...serializeForest([indi])];
    expect(lines).toEqual(['0 @I1@ INDI', `1 NOTE ${long.slice(0, 248)}`, `2 CONC ${long.slice(248)}`]);

    const [again] = reparse(lines.join('\n'));
    expect(again.children[0].value).toBe(long);
    expect(again.children[0].value).toHaveLength(300);
  });

  it('writes embedded newlines as CONT lines', () => {
    const note = createNode(1, 'NOTE', 'first\nsecond\n\nfourth');
    expect([...serializeNode(note)]).toEqual(['1 NOTE first', '2 CONT second', '2 CONT', '2 CONT fourth']);
  });

  it('continues long CONT segments with CONC', () => {
    const note = createNode(1, 'NOTE', 'ab\ncdefg');
    expect([...serializeNode(note, { maxValueLength: 3 })]).toEqual(['1 NOTE ab', '2 CONT cde', '2 CONC fg']);
  });

  it('emits continuation lines before real children', () => {
    const note = createNode(1, 'NOTE', 'line one\nline two');
    note.children.push(createNode(2, 'SOUR', '@S1@'));
    expect([...serializeNode(note)]).toEqual(['1 NOTE line one', '2 CONT line two', '2 SOUR @S1@']);
  });

  it('keeps leading and trailing spaces of wrapped pieces', () => {
    const note = createNode(0, 'NOTE', 'ab cd ', '@N1@');
    const text = serializeNodes([note], { maxValueLength: 3 });
    expect(text).toBe('0 @N1@ NOTE ab \n1 CONC cd ');
    expect(reparse(text)[0].value).toBe('ab cd ');
  });

  it('joins with the configured line separator', () => {
    expect(serializeNodes(reparse('0 HEAD\n0 TRLR'), { lineSeparator: '\r\n' })).toBe('0 HEAD\r\n0 TRLR');
  });

  it('rejects a non-positive threshold', () => {
    expect(() => serializeNodes([createNode(0, 'HEAD')], { maxValueLength: 0 })).toThrow(InvalidValueError);
  });

  it('writes a short value at the deepest level', () => {
    expect([...serializeNode(createNode(99, 'NOTE', 'short'))]).toEqual(['99 NOTE short']);
  });

  it('refuses continuation lines past level 99', () => {
    expect(() => [...serializeNode(createNode(99, 'NOTE', 'a\nb'))]).toThrowError(
      'NOTE needs lines at level 100, above the maximum of 99'
    );
    const chain = Array.from({ length: 100 }, (_, i) => (i === 99 ? `99 NOTE ${'x'.repeat(300)}` : `${i} _L`));
    const roots = reparse(chain.join('\n'));
    expect(() => serializeNodes(roots)).toThrow(StructuralError);
  });

  it('refuses children below a level-99 node', () => {
    const deepest = createNode(99, 'PLAC', 'Ashford');
    deepest.children.push(createNode(100, 'MAP'));
    expect(() => [...serializeNode(deepest)]).toThrow(StructuralError);
  });

  it('round-trips continuation-heavy input structurally', () => {
    const source = [
      '0 @N1@ NOTE ' + 'x'.repeat(260),
      '1 CONT',
      '1 CONT ' + 'y'.repeat(10),
      '1 CONC ' + 'z'.repeat(250),
      '0 @I1@ INDI',
      '1 NAME Ann /Lee/',
      '1 _UID 1234',
    ].join('\n');
    const first = reparse(source);
    const second = reparse(serializeNodes(first));
    expect(shapeOf(second)).toEqual(shapeOf(first));
  });
});
