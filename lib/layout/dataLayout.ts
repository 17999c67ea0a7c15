// lib/layout/dataLayout.ts
// Frozen per-population mapping from trait name to type and storage slot.

import type { TraitAccess, TraitArchive, TraitInheritance, TraitTypeId, TraitValue } from '../traits/types';
import { TRAIT_TYPES } from '../traits/valueTypes';

export type LayoutEntry = {
  readonly id: number;
  readonly name: string;
  readonly type: TraitTypeId;
  /** Access of the providing declaration. */
  readonly access: TraitAccess;
  /** Module that owns the trait (owned/private), null for shared traits. */
  readonly owner: string | null;
  /** Every module that declared the trait, in declaration order. */
  readonly modules: readonly string[];
  readonly description: string;
  readonly defaultValue: TraitValue;
  readonly inheritance: TraitInheritance;
  readonly archive: TraitArchive;
  readonly resetParent: boolean;
  /** For history entries (`last_x`, `archive_x`, `sequence_x`): the trait they record. */
  readonly archiveOf: string | null;
};

/** List values are copied wherever they are stored. */
export const copyValue = (v: TraitValue): TraitValue => (Array.isArray(v) ? v.slice() : v);

export class DataLayout {
  private readonly entries: readonly LayoutEntry[];
  private readonly byName: ReadonlyMap<string, LayoutEntry>;

  /** Entries must carry ids 0..n-1 matching their position. */
  constructor(entries: LayoutEntry[]) {
    entries.forEach((e, i) => {
      if (e.id !== i) throw new Error(`Layout entry '${e.name}' has id ${e.id}, expected ${i}.`);
    });
    this.entries = Object.freeze(entries.map(e => Object.freeze({ ...e, modules: Object.freeze([...e.modules]) })));
    const byName = new Map<string, LayoutEntry>();
    for (const e of this.entries) byName.set(e.name, e);
    this.byName = byName;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Look up a trait as seen by `viewer`.
   * Private traits are invisible to every module but their owner; without a viewer
   * (orchestrator, config scripts) everything is visible.
   */
  entry(name: string, viewer?: string): LayoutEntry | undefined {
    const e = this.byName.get(name);
    if (!e) return undefined;
    if (viewer !== undefined && e.access === 'private' && e.owner !== viewer) return undefined;
    return e;
  }

  hasName(name: string, viewer?: string): boolean {
    return this.entry(name, viewer) !== undefined;
  }

  getId(name: string): number {
    const e = this.byName.get(name);
    if (!e) throw new Error(`Trait '${name}' is not in the data layout.`);
    return e.id;
  }

  entryAt(id: number): LayoutEntry {
    const e = this.entries[id];
    if (!e) throw new Error(`No trait at layout slot ${id}.`);
    return e;
  }

  getType(id: number): TraitTypeId {
    return this.entryAt(id).type;
  }

  isNumeric(name: string): boolean {
    const e = this.byName.get(name);
    return e ? TRAIT_TYPES[e.type].numeric : false;
  }

  names(viewer?: string): string[] {
    return this.entries.filter(e => this.entry(e.name, viewer) !== undefined).map(e => e.name);
  }

  all(): readonly LayoutEntry[] {
    return this.entries;
  }

  /** Fresh per-organism default values, one per slot. */
  defaults(): TraitValue[] {
    return this.entries.map(e => copyValue(e.defaultValue));
  }
}
