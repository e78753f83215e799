/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { isPointer } from '../parser/types';
import { GedcomRecord } from './record';

/**
 * SOUR: either a top-level source record (`0 @S1@ SOUR`) or a citation of one
 * (`1 SOUR @S1@`). An inline citation without a pointer stands for itself.
 */
export class Source extends GedcomRecord {
  readonly kind = 'source' as const;

  get isCitation(): boolean {
    return isPointer(this.value);
  }

  /** The cited source record for a pointer citation, otherwise this record. */
  resolveSource(): Source {
    return isPointer(this.value) ? this.dereferenceAs(this.value, 'source') : this;
  }

  get title(): string | undefined {
    return this.resolveSource().optionalValue('TITL');
  }

  get author(): string | undefined {
    return this.resolveSource().optionalValue('AUTH');
  }

  get publication(): string | undefined {
    return this.resolveSource().optionalValue('PUBL');
  }
}
