/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { GedcomRecord } from './record';

/**
 * Event-like record (BIRT, DEAT, MARR, RESI, ...). Date and place values are
 * returned as written; no date parsing or normalization happens here.
 */
export abstract class EventRecord extends GedcomRecord {
  /** DATE value of this event; throws NotFoundError when absent. */
  get date(): string {
    return this.requiredValue('DATE');
  }

  /** PLAC value of this event; throws NotFoundError when absent. */
  get place(): string {
    return this.requiredValue('PLAC');
  }
}

export class Event extends EventRecord {
  readonly kind = 'event' as const;
}

export class Birth extends EventRecord {
  readonly kind = 'birth' as const;
}

export class Death extends EventRecord {
  readonly kind = 'death' as const;
}

export class Marriage extends EventRecord {
  readonly kind = 'marriage' as const;
}

export class Residence extends EventRecord {
  readonly kind = 'residence' as const;
}
