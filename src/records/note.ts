/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { isPointer } from '../parser/types';
import { GedcomRecord } from './record';

export class Note extends GedcomRecord {
  readonly kind = 'note' as const;

  /** Merged note text; a `NOTE @N1@` reference yields the text of the referenced note. */
  get text(): string {
    if (this.level > 0 && isPointer(this.value)) return this.dereferenceAs(this.value, 'note').text;
    return this.value ?? '';
  }
}
