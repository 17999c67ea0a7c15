// lib/population/collection.ts
// Ordered organism positions drawn from one or more populations ("OrgList" in scripts).

import type { DataLayout } from '../layout/dataLayout';
import type { Organism } from './organism';
import { Population } from './population';

export type OrgPosition = {
  readonly population: Population;
  readonly index: number;
};

export class Collection {
  private readonly positions: OrgPosition[];

  constructor(positions: OrgPosition[] = []) {
    this.positions = [];
    for (const p of positions) this.insert(p.population, p.index);
  }

  /** Every organism of a population, in order. */
  static of(pop: Population): Collection {
    return new Collection(pop.organisms().map((_, index) => ({ population: pop, index })));
  }

  /** Every position must share one data layout; queries compile against it. */
  insert(population: Population, index: number): this {
    const first = this.positions[0];
    if (first && population.getDataLayout() !== first.population.getDataLayout()) {
      throw new Error(
        `Collection cannot mix data layouts: population '${population.name}' differs from '${first.population.name}'.`,
      );
    }
    this.positions.push({ population, index });
    return this;
  }

  get size(): number {
    return this.positions.length;
  }

  isEmpty(): boolean {
    return this.positions.length === 0;
  }

  positionAt(i: number): OrgPosition {
    const pos = this.positions[i];
    if (!pos) throw new RangeError(`Collection has no position ${i} (size ${this.positions.length}).`);
    return pos;
  }

  /** One-position collection for entry `i`. */
  at(i: number): Collection {
    return new Collection([this.positionAt(i)]);
  }

  organisms(): Organism[] {
    return this.positions.map(p => p.population.at(p.index));
  }

  entries(): readonly OrgPosition[] {
    return this.positions;
  }

  /** Layout shared by every position. */
  getDataLayout(): DataLayout {
    if (!this.positions.length) throw new Error('An empty collection has no data layout.');
    return this.positions[0].population.getDataLayout();
  }
}

export type OrgSource = Population | Collection;

export function toCollection(src: OrgSource): Collection {
  return src instanceof Population ? Collection.of(src) : src;
}
