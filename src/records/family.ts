/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Marriage } from './event';
import type { Individual } from './individual';
import { GedcomRecord } from './record';

/**
 * FAM record. Partner and child accessors dereference the HUSB / WIFE / CHIL
 * pointers through the file's cross-reference index.
 */
export class Family extends GedcomRecord {
  readonly kind = 'family' as const;

  /** First HUSB, resolved. */
  get husband(): Individual {
    return this.requireKind('husband', 'HUSB').asIndividual();
  }

  /** First WIFE, resolved. */
  get wife(): Individual {
    return this.requireKind('wife', 'WIFE').asIndividual();
  }

  husbands(): Individual[] {
    return this.childrenOfKind('husband').map((h) => h.asIndividual());
  }

  wives(): Individual[] {
    return this.childrenOfKind('wife').map((w) => w.asIndividual());
  }

  /** All HUSB entries followed by all WIFE entries. */
  partners(): Individual[] {
    return [...this.husbands(), ...this.wives()];
  }

  /**
   * CHIL entries resolved to individuals. `children()` keeps its generic meaning
   * (the FAM node's child records), so the family's children live here.
   */
  childIndividuals(): Individual[] {
    return this.childrenOfKind('child-link').map((c) => c.asIndividual());
  }

  get marriage(): Marriage {
    return this.requireKind('marriage', 'MARR');
  }
}
