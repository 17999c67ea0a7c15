// lib/population/inheritance.ts
// Birth: give an offspring its trait values from its parents, per layout policy.

import type { DataLayout, LayoutEntry } from '../layout/dataLayout';
import type { TraitValue } from '../traits/types';
import { TRAIT_TYPES } from '../traits/valueTypes';
import type { Organism } from './organism';

function inheritedValue(e: LayoutEntry, parents: Organism[]): TraitValue {
  const ops = TRAIT_TYPES[e.type];
  const values = parents.map(p => p.getAt(e.id));
  switch (e.inheritance) {
    case 'default':
      return e.defaultValue;
    case 'parent':
      return values[0];
    case 'average':
      return ops.average(values);
    case 'minimum':
      return values.reduce((best, v) => (ops.compare(v, best) < 0 ? v : best));
    case 'maximum':
      return values.reduce((best, v) => (ops.compare(v, best) > 0 ? v : best));
  }
}

/**
 * Fill `offspring` from `parents` (first parent first).
 *
 * A default-initialized trait counts as a reset of the first parent's value, so its
 * history records that value; inherited traits carry the first parent's history over.
 * Traits flagged `resetParent` reset every parent to the offspring's new value.
 */
export function inheritTraits(layout: DataLayout, parents: Organism[], offspring: Organism) {
  if (!parents.length) return;
  const first = parents[0];

  for (const e of layout.all()) {
    if (e.archiveOf !== null) continue;

    const value = inheritedValue(e, parents);
    const hist = offspring.historyId(e);
    if (hist !== null && e.archive !== 'all_changes') {
      offspring.setAt(hist, first.getAt(hist));
      if (e.inheritance === 'default') offspring.recordReset(e, first.getAt(e.id));
    }
    offspring.setAt(e.id, value);

    if (e.resetParent) {
      for (const p of parents) p.resetTrait(e.name, value);
    }
  }
}
