/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Pointer-valued role records (HUSB, WIFE, CHIL, FAMC, FAMS). The value holds
  the pointer; the target is looked up in the cross-reference index on demand.
*/

import { NotFoundError } from '../parser/errors';
import type { Family } from './family';
import type { Individual } from './individual';
import { GedcomRecord } from './record';

export abstract class LinkRecord extends GedcomRecord {
  /** Pointer held in the value; throws NotFoundError on an empty link. */
  get reference(): string {
    if (this.value === undefined) throw new NotFoundError(`${this.tag} pointer`, this.describe());
    return this.value.trim();
  }

  target(): GedcomRecord {
    return this.dereference(this.reference);
  }
}

export abstract class Spouse extends LinkRecord {
  asIndividual(): Individual {
    return this.dereferenceAs(this.reference, 'individual');
  }
}

export class Husband extends Spouse {
  readonly kind = 'husband' as const;
}

export class Wife extends Spouse {
  readonly kind = 'wife' as const;
}

export class ChildLink extends LinkRecord {
  readonly kind = 'child-link' as const;

  asIndividual(): Individual {
    return this.dereferenceAs(this.reference, 'individual');
  }
}

export class FamilyChildLink extends LinkRecord {
  readonly kind = 'family-child-link' as const;

  asFamily(): Family {
    return this.dereferenceAs(this.reference, 'family');
  }
}

export class FamilySpouseLink extends LinkRecord {
  readonly kind = 'family-spouse-link' as const;

  asFamily(): Family {
    return this.dereferenceAs(this.reference, 'family');
  }
}
