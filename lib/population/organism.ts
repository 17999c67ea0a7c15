// lib/population/organism.ts
// One organism's trait values, stored by layout slot.

import { copyValue, type DataLayout, type LayoutEntry } from '../layout/dataLayout';
import { ARCHIVE_PREFIX, type TraitTypeId, type TraitValue } from '../traits/types';
import { TRAIT_TYPES } from '../traits/valueTypes';

function appendHistory(list: TraitValue, value: TraitValue, valueType: TraitTypeId): TraitValue {
  if (!Array.isArray(list)) return list;
  const items: ReadonlyArray<number | string> = list;
  const ops = TRAIT_TYPES[valueType];
  if (ops.listType === 'string[]') return [...items.map(String), ops.format(value)];
  return [...items.map(Number), ops.toNumber(value)];
}

export class Organism {
  private readonly values: TraitValue[];

  constructor(readonly layout: DataLayout, values?: TraitValue[]) {
    this.values = values ? values.map(copyValue) : layout.defaults();
  }

  private entryFor(name: string): LayoutEntry {
    const e = this.layout.entry(name);
    if (!e) throw new Error(`Trait '${name}' is not in this organism's data layout.`);
    return e;
  }

  /** Slot of the history entry that records `e`, if the layout has one. */
  historyId(e: LayoutEntry): number | null {
    if (e.archive === 'none') return null;
    const hist = this.layout.entry(`${ARCHIVE_PREFIX[e.archive]}${e.name}`);
    return hist ? hist.id : null;
  }

  get(name: string): TraitValue {
    return this.values[this.entryFor(name).id];
  }

  getAt(id: number): TraitValue {
    this.layout.entryAt(id);
    return this.values[id];
  }

  getNumber(id: number): number {
    return TRAIT_TYPES[this.layout.getType(id)].toNumber(this.values[id]);
  }

  getAsString(id: number): string {
    return TRAIT_TYPES[this.layout.getType(id)].format(this.values[id]);
  }

  set(name: string, value: TraitValue): this {
    return this.setAt(this.entryFor(name).id, value);
  }

  setAt(id: number, value: TraitValue): this {
    const e = this.layout.entryAt(id);
    if (!TRAIT_TYPES[e.type].is(value)) {
      throw new TypeError(`Trait '${e.name}' expects a value of type '${e.type}', got ${JSON.stringify(value)}.`);
    }
    this.values[id] = copyValue(value);
    if (e.archive === 'all_changes') {
      const hist = this.historyId(e);
      if (hist !== null) this.values[hist] = appendHistory(this.values[hist], value, e.type);
    }
    return this;
  }

  /**
   * Reset a trait, archiving the value it had.
   * Restores the default unless `to` is given.
   */
  resetTrait(name: string, to?: TraitValue): this {
    const e = this.entryFor(name);
    this.recordReset(e, this.values[e.id]);
    return this.setAt(e.id, to ?? e.defaultValue);
  }

  /** Archive `previous` as the value `e` had when it was last reset. */
  recordReset(e: LayoutEntry, previous: TraitValue) {
    const hist = this.historyId(e);
    if (hist === null) return;
    if (e.archive === 'last_reset') this.values[hist] = copyValue(previous);
    else if (e.archive === 'all_resets') this.values[hist] = appendHistory(this.values[hist], previous, e.type);
  }

  clone(): Organism {
    return new Organism(this.layout, this.values);
  }
}
