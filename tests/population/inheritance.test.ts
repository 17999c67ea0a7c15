import { describe, expect, it } from 'vitest';

import { inheritTraits } from '@/lib/population/inheritance';
import { Organism } from '@/lib/population/organism';
import type { TraitValue } from '@/lib/traits/types';
import { layoutOf, TestModule } from '../fixtures';

function birthLayout() {
  return layoutOf(new TestModule('life', m => {
    m.owned('double', 'energy', 5).setInheritAverage();
    m.owned('int', 'gen', 0).setInheritMaximum();
    m.owned('int', 'size', 0).setInheritAverage();
    m.owned('string', 'tag', 'none').setInheritParent();
    m.owned('double', 'score', 0).setArchiveLast();
    m.owned('int', 'count', 0).setInheritParent().setParentReset();
  }));
}

describe('inheritTraits', () => {
  const layout = birthLayout();

  function parents() {
    const p1 = new Organism(layout).set('energy', 2).set('gen', 3).set('size', 3).set('tag', 'a').set('score', 7).set('count', 4);
    const p2 = new Organism(layout).set('energy', 4).set('gen', 9).set('size', 4).set('tag', 'b').set('score', 1).set('count', 6);
    return [p1, p2];
  }

  it('applies each inheritance policy', () => {
    const child = new Organism(layout);
    inheritTraits(layout, parents(), child);

    expect(child.get('energy')).toBe(3);
    expect(child.get('gen')).toBe(9);
    expect(child.get('size')).toBe(4);
    expect(child.get('tag')).toBe('a');
    expect(child.get('score')).toBe(0);
  });

  it('archives a default-policy birth as a reset of the first parent', () => {
    const child = new Organism(layout);
    inheritTraits(layout, parents(), child);
    expect(child.get('last_score')).toBe(7);
  });

  it('resets parents to the offspring value when flagged', () => {
    const [p1, p2] = parents();
    const child = new Organism(layout);
    inheritTraits(layout, [p1, p2], child);

    expect(child.get('count')).toBe(4);
    expect(p1.get('count')).toBe(4);
    expect(p2.get('count')).toBe(4);
  });

  it('leaves the offspring untouched without parents', () => {
    const child = new Organism(layout);
    inheritTraits(layout, [], child);
    expect(child.get('energy')).toBe(5);
  });
});

describe('list traits', () => {
  const layout = layoutOf(new TestModule('lists', m => {
    m.owned('double[]', 'weights', [1, 2]);
    m.owned('string[]', 'marks', []).setInheritParent();
  }));

  function clear(v: TraitValue) {
    if (!Array.isArray(v)) throw new Error('expected a list');
    v.length = 0;
  }

  it('gives each newborn its own copy of the default', () => {
    const child = new Organism(layout);
    inheritTraits(layout, [new Organism(layout)], child);
    clear(child.get('weights'));

    expect(layout.entry('weights')?.defaultValue).toEqual([1, 2]);
    expect(new Organism(layout).get('weights')).toEqual([1, 2]);
  });

  it('does not share a list with the parent it came from', () => {
    const parent = new Organism(layout).set('marks', ['a', 'b']);
    const child = new Organism(layout);
    inheritTraits(layout, [parent], child);
    clear(child.get('marks'));

    expect(parent.get('marks')).toEqual(['a', 'b']);
  });

  it('resets to a fresh copy of the default', () => {
    const org = new Organism(layout).set('weights', [9]);
    org.resetTrait('weights');
    clear(org.get('weights'));

    expect(layout.entry('weights')?.defaultValue).toEqual([1, 2]);
  });
});

describe('organism history', () => {
  const layout = layoutOf(new TestModule('hist', m => {
    m.owned('double', 'path', 0).setArchiveChanges();
    m.owned('int', 'hits', 0).setArchiveAll();
    m.owned('bool', 'alive', true).setArchiveLast();
  }));

  it('records every change', () => {
    const org = new Organism(layout).set('path', 1).set('path', 2.5);
    expect(org.get('sequence_path')).toEqual([1, 2.5]);
  });

  it('records every reset and restores the default', () => {
    const org = new Organism(layout).set('hits', 3);
    org.resetTrait('hits');
    org.set('hits', 5).resetTrait('hits');

    expect(org.get('hits')).toBe(0);
    expect(org.get('archive_hits')).toEqual([3, 5]);
  });

  it('keeps the value at the last reset', () => {
    const org = new Organism(layout).set('alive', false);
    org.resetTrait('alive');
    expect(org.get('alive')).toBe(true);
    expect(org.get('last_alive')).toBe(false);
  });

  it('rejects values of the wrong type', () => {
    const org = new Organism(layout);
    expect(() => org.set('hits', 1.5)).toThrow(TypeError);
    expect(() => org.set('path', 'far')).toThrow(TypeError);
  });

  it('clones without sharing history lists', () => {
    const org = new Organism(layout).set('path', 1);
    const copy = org.clone();
    org.set('path', 2);
    expect(copy.get('sequence_path')).toEqual([1]);
    expect(copy.getAsString(layout.getId('path'))).toBe('1');
  });
});
