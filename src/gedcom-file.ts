/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from './common/console-logger';
import type { Logger } from './common/logger';
import type { SerializeOptions } from './config';
import { PRODUCT_NAME, PRODUCT_VERSION, resolveSerializeOptions } from './config';
import { InvalidValueError, UnresolvedReferenceError } from './parser/errors';
import { walkNodes } from './parser/tree-builder';
import type { GedcomNode } from './parser/types';
import { createNode } from './parser/types';
import type { Family } from './records/family';
import type { Individual } from './records/individual';
import type { RecordContext, RecordKind, RecordKindMap } from './records/kinds';
import { isKind } from './records/kinds';
import type { GedcomRecord } from './records/record';
import type { RecordRegistry } from './records/registry';
import { defaultRegistry } from './records/registry';
import { RecordSequence } from './records/sequence';
import { CrossReferenceIndex } from './records/xref-index';
import { serializeForest } from './serializer/serializer';

export interface GedcomFileOptions {
  registry?: RecordRegistry;
  logger?: Logger;
}

/**
 * Root of a parsed file: owns the top-level forest and the cross-reference index.
 * Typed views are created on first access and cached per node.
 */
export class GedcomFile implements RecordContext {
  private readonly forest: GedcomNode[];
  private readonly index: CrossReferenceIndex;
  private readonly registry: RecordRegistry;
  private readonly views = new WeakMap<GedcomNode, GedcomRecord>();
  private readonly logger: Logger;
  private nextFreeId = 1;

  /** Throws DuplicatePointerError when two roots declare the same pointer-id. */
  constructor(roots: GedcomNode[] = [], options: GedcomFileOptions = {}) {
    this.forest = roots;
    this.registry = options.registry ?? defaultRegistry;
    this.logger = options.logger ?? new ConsoleLogger();
    this.index = CrossReferenceIndex.build(roots);

    for (const node of walkNodes(roots)) {
      if (node.tag.startsWith('_')) this.logger.trace(`vendor tag ${node.tag}`, node.lineNumber);
    }
    for (const ref of this.index.danglingReferences(roots)) {
      this.logger.warn(`${ref.tag} points to undeclared ${ref.pointer}`, ref.lineNumber);
    }
    this.logger.debug(`indexed ${this.index.size} pointers across ${roots.length} records`);
  }

  /** Top-level nodes in document order. */
  get roots(): readonly GedcomNode[] {
    return this.forest;
  }

  lookup(pointer: string): GedcomNode | undefined {
    return this.index.lookup(pointer);
  }

  recordFor(node: GedcomNode): GedcomRecord {
    let record = this.views.get(node);
    if (!record) {
      record = this.registry.classify(node, this);
      this.views.set(node, record);
    }
    return record;
  }

  records(): GedcomRecord[] {
    return this.forest.map((n) => this.recordFor(n));
  }

  individuals(): RecordSequence<Individual> {
    return new RecordSequence(() => this.rootsOfKind('individual'));
  }

  families(): RecordSequence<Family> {
    return new RecordSequence(() => this.rootsOfKind('family'));
  }

  /** Record declaring this pointer-id; throws UnresolvedReferenceError if there is none. */
  get(pointer: string): GedcomRecord {
    const record = this.find(pointer);
    if (!record) throw new UnresolvedReferenceError(pointer);
    return record;
  }

  find(pointer: string): GedcomRecord | undefined {
    const node = this.index.lookup(pointer);
    return node ? this.recordFor(node) : undefined;
  }

  createIndividual(): Individual {
    const record = this.createRoot('INDI', 'I');
    if (!isKind(record, 'individual')) throw misclassified('INDI', record);
    return record;
  }

  createFamily(): Family {
    const record = this.createRoot('FAM', 'F');
    if (!isKind(record, 'family')) throw misclassified('FAM', record);
    return record;
  }

  /** Insert a HEAD block and a TRLR record when the forest does not start / end with them. */
  ensureHeaderTrailer(): void {
    if (this.forest.length === 0 || this.forest[0].tag !== 'HEAD') {
      const head = createNode(0, 'HEAD');
      const source = createNode(1, 'SOUR');
      source.children.push(createNode(2, 'NAME', PRODUCT_NAME), createNode(2, 'VERS', PRODUCT_VERSION));
      const format = createNode(1, 'GEDC');
      format.children.push(createNode(2, 'VERS', '5.5'), createNode(2, 'FORM', 'LINEAGE-LINKED'));
      head.children.push(source, createNode(1, 'CHAR', 'UNICODE'), format);
      this.forest.unshift(head);
    }
    if (this.forest[this.forest.length - 1].tag !== 'TRLR') {
      this.forest.push(createNode(0, 'TRLR'));
    }
  }

  lines(options: SerializeOptions = {}): Generator<string> {
    if (options.ensureHeaderTrailer) this.ensureHeaderTrailer();
    return serializeForest(this.forest, options);
  }

  serialize(options: SerializeOptions = {}): string {
    const { lineSeparator } = resolveSerializeOptions(options);
    return [...this.lines(options)].join(lineSeparator);
  }

  private *rootsOfKind<K extends RecordKind>(kind: K): Generator<RecordKindMap[K]> {
    for (const node of this.forest) {
      const record = this.recordFor(node);
      if (isKind(record, kind)) yield record;
    }
  }

  private createRoot(tag: string, prefix: string): GedcomRecord {
    let pointer = `@${prefix}${this.nextFreeId++}@`;
    while (this.index.has(pointer)) pointer = `@${prefix}${this.nextFreeId++}@`;
    const node = createNode(0, tag, undefined, pointer);
    this.index.add(node);
    const trailer = this.forest.length > 0 && this.forest[this.forest.length - 1].tag === 'TRLR';
    if (trailer) this.forest.splice(this.forest.length - 1, 0, node);
    else this.forest.push(node);
    return this.recordFor(node);
  }
}

function misclassified(tag: string, record: GedcomRecord): InvalidValueError {
  return new InvalidValueError(`Registry classifies ${tag} as ${record.kind}`);
}
