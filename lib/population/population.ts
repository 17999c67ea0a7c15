// lib/population/population.ts
// Named, ordered set of organisms sharing one data layout.

import type { DataLayout } from '../layout/dataLayout';
import type { TraitValue } from '../traits/types';
import { Organism } from './organism';

export class Population {
  private orgs: Organism[] = [];
  private dataLayout: DataLayout | null = null;

  constructor(readonly name: string, layout?: DataLayout) {
    this.dataLayout = layout ?? null;
  }

  hasDataLayout(): boolean {
    return this.dataLayout !== null;
  }

  getDataLayout(): DataLayout {
    if (!this.dataLayout) throw new Error(`Population '${this.name}' has no data layout yet.`);
    return this.dataLayout;
  }

  /** Layouts are assigned once, when setup freezes them. */
  setDataLayout(layout: DataLayout) {
    if (this.dataLayout && this.dataLayout !== layout) {
      throw new Error(`Population '${this.name}' already has a data layout.`);
    }
    this.dataLayout = layout;
  }

  get size(): number {
    return this.orgs.length;
  }

  isEmpty(): boolean {
    return this.orgs.length === 0;
  }

  at(index: number): Organism {
    const org = this.orgs[index];
    if (!org) throw new RangeError(`Population '${this.name}' has no organism at ${index} (size ${this.orgs.length}).`);
    return org;
  }

  organisms(): readonly Organism[] {
    return this.orgs;
  }

  /** Create an organism with the layout's defaults and append it. */
  spawn(init: Record<string, TraitValue> = {}): Organism {
    const org = new Organism(this.getDataLayout());
    for (const [name, value] of Object.entries(init)) org.set(name, value);
    this.orgs.push(org);
    return org;
  }

  insert(org: Organism): number {
    if (org.layout !== this.getDataLayout()) {
      throw new Error(`Organism does not use the data layout of population '${this.name}'.`);
    }
    this.orgs.push(org);
    return this.orgs.length - 1;
  }

  /** Remove and return every organism. */
  takeAll(): Organism[] {
    const out = this.orgs;
    this.orgs = [];
    return out;
  }

  clear() {
    this.orgs = [];
  }
}
