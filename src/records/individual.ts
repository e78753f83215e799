/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { InvalidValueError, MalformedNameError, NotFoundError, SlotError } from '../parser/errors';
import type { Birth, Death, Residence } from './event';
import type { Family } from './family';
import { GedcomRecord } from './record';

/** `[given, surname]`; a part the file does not record is undefined. */
export type PersonName = readonly [given: string | undefined, surname: string | undefined];

function orUndefined(part: string): string | undefined {
  const trimmed = part.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Split a NAME value on the `/surname/` convention.
 * `John /Smith/` → ['John', 'Smith']; a value without slashes is all given name.
 */
export function splitName(value: string): PersonName {
  const parts = value.split('/');
  if (parts.length === 1) return [orUndefined(parts[0]), undefined];
  if (parts.length !== 3) throw new MalformedNameError(value);
  return [orUndefined(parts[0]), orUndefined(parts[1])];
}

/**
 * INDI record.
 *
 * Missing-data policy: `name`, `birth`, `death`, `residence`, `sex`, `father` and
 * `mother` throw NotFoundError for this one record; `parents` returns an empty
 * list when the individual has no FAMC link; `isMale` / `isFemale` are false
 * when SEX is absent.
 */
export class Individual extends GedcomRecord {
  readonly kind = 'individual' as const;

  /** Preferred name: the first NAME without a TYPE qualifier, else the first NAME. */
  get name(): PersonName {
    const names = this.childrenWithTag('NAME');
    if (names.length === 0) throw new NotFoundError('NAME', this.describe());
    const preferred = names.find((n) => !n.has('TYPE')) ?? names[0];
    return readName(preferred);
  }

  /** Names recorded with `TYPE aka`. */
  get aka(): PersonName[] {
    return this.childrenWithTag('NAME')
      .filter((n) => n.findChild('TYPE')?.value?.toLowerCase() === 'aka')
      .map(readName);
  }

  get birth(): Birth {
    return this.requireKind('birth', 'BIRT');
  }

  get death(): Death {
    return this.requireKind('death', 'DEAT');
  }

  get residence(): Residence {
    return this.requireKind('residence', 'RESI');
  }

  get sex(): string {
    return this.requiredValue('SEX');
  }

  get isMale(): boolean {
    return this.optionalValue('SEX')?.toUpperCase() === 'M';
  }

  get isFemale(): boolean {
    return this.optionalValue('SEX')?.toUpperCase() === 'F';
  }

  setSex(sex: string): void {
    const normalized = sex.toUpperCase();
    if (normalized !== 'M' && normalized !== 'F') {
      throw new InvalidValueError(`Unsupported SEX value ${JSON.stringify(sex)}, expected M or F`);
    }
    const existing = this.findChild('SEX');
    if (existing) existing.value = normalized;
    else this.addChild('SEX', normalized);
  }

  get title(): string | undefined {
    return this.optionalValue('TITL');
  }

  /** Family this individual is a child of (first FAMC), if any. */
  familyAsChild(): Family | undefined {
    return this.firstOfKind('family-child-link')?.asFamily();
  }

  familiesAsSpouse(): Family[] {
    return this.childrenOfKind('family-spouse-link').map((link) => link.asFamily());
  }

  /** Partners of the FAMC family, husbands first; empty without a FAMC link. */
  get parents(): Individual[] {
    return this.familyAsChild()?.partners() ?? [];
  }

  /** Positional access into `parents`; throws SlotError past the end. */
  parent(slot: number): Individual {
    const parents = this.parents;
    if (!Number.isInteger(slot) || slot < 0 || slot >= parents.length) {
      throw new SlotError(slot, parents.length);
    }
    return parents[slot];
  }

  get father(): Individual {
    return this.requireFamilyAsChild().husband;
  }

  get mother(): Individual {
    return this.requireFamilyAsChild().wife;
  }

  private requireFamilyAsChild(): Family {
    const family = this.familyAsChild();
    if (!family) throw new NotFoundError('FAMC', this.describe());
    return family;
  }
}

function readName(name: GedcomRecord): PersonName {
  if (name.value === undefined || name.value.trim() === '') {
    return [name.findChild('GIVN')?.value, name.findChild('SURN')?.value];
  }
  return splitName(name.value);
}
