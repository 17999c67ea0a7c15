import { beforeEach, describe, expect, it } from 'vitest';

import { Notifier, silentSink } from '@/lib/diagnostics/notify';
import { Collection } from '@/lib/population/collection';
import { Population } from '@/lib/population/population';
import { TraitQueryBuilder } from '@/lib/query/traitQuery';
import { basicLayout, popOf, tableEvaluator } from '../fixtures';

const layout = basicLayout();

const xs = (values: number[]) => popOf(layout, values.map(x => ({ x })));

describe('TraitQueryBuilder', () => {
  let notify: Notifier;
  let q: TraitQueryBuilder;

  beforeEach(() => {
    notify = new Notifier(silentSink);
    q = new TraitQueryBuilder(tableEvaluator({ k: '3' }), notify);
  });

  const num = (equation: string, mode: string, pop: Population | Collection) =>
    q.buildNumericSummary(equation, mode, layout)(pop);

  it('summarizes a numeric trait', () => {
    const pop = xs([3, 1, 3, 2, 3, 1]);
    expect(num('x', 'mode', pop)).toBe(3);
    expect(num('x', 'unique', pop)).toBe(3);
    expect(num('x', 'min', pop)).toBe(1);
    expect(num('x', 'sum', pop)).toBe(13);
    expect(num('x', '', pop)).toBe(3);
    expect(num('x', '3', pop)).toBe(2);
    expect(notify.hasErrors()).toBe(false);
  });

  it('finds the index of the first maximum', () => {
    expect(num('x', 'max_id', xs([5, 9, 9, 2]))).toBe(1);
    expect(num('x', 'min_id', xs([5, 9, 9, 2]))).toBe(3);
  });

  it('takes medians and spread', () => {
    expect(num('x', 'median', xs([1, 2, 3, 4]))).toBe(2.5);
    expect(num('x', 'median', xs([1, 2, 3]))).toBe(2);
    expect(num('x', 'variance', xs([2, 4, 4, 4, 5, 5, 7, 9]))).toBe(4);
    expect(num('x', 'stddev', xs([2, 4, 4, 4, 5, 5, 7, 9]))).toBe(2);
    expect(num('x', 'variance', xs([1e9, 1e9 + 1, 1e9 + 2]))).toBeCloseTo(2 / 3, 9);
  });

  it('counts organisms passing a comparison', () => {
    expect(num('x', '>5', xs([1, 6, 7, 3]))).toBe(2);
    expect(num('x', '<=3', xs([1, 6, 7, 3]))).toBe(2);
  });

  it('compares against another trait per organism', () => {
    const pop = popOf(layout, [{ x: 1, n: 2 }, { x: 5, n: 3 }, { x: 2, n: 2 }]);
    expect(num('x', '<n', pop)).toBe(1);
    expect(num('x', '>= n', pop)).toBe(2);
  });

  it('summarizes equations and expands ${...} first', () => {
    const pop = xs([1, 2, 3]);
    expect(num('x * 2', 'sum', pop)).toBe(12);
    expect(num('x*${k}', 'sum', pop)).toBe(18);
    expect(q.equationTraits('x + ${k} * n')).toEqual(new Set(['x', 'n']));
  });

  it('measures entropy and mutual information', () => {
    const pop = popOf(layout, [{ x: 0, n: 0 }, { x: 0, n: 0 }, { x: 1, n: 1 }, { x: 1, n: 1 }]);
    expect(num('x', 'entropy', pop)).toBe(1);
    expect(num('x', ':n', pop)).toBe(1);
  });

  it('works over collections', () => {
    const pop = xs([1, 2, 3]);
    const list = new Collection().insert(pop, 0).insert(pop, 2);
    expect(num('x', 'mean', list)).toBe(2);
  });

  it('reads a lone string trait as a quoted literal', () => {
    const pop = popOf(layout, [{ kind: 'ant' }, { kind: 'bee' }, { kind: 'ant' }]);
    const text = (mode: string) => q.buildTextSummary('kind', mode, layout)(pop);

    expect(text('mode')).toBe('"ant"');
    expect(text('')).toBe('"ant"');
    expect(text('1')).toBe('"bee"');
    expect(num('kind', 'unique', pop)).toBe(2);
    expect(num('kind', '== "ant"', pop)).toBe(2);
  });

  it('formats numeric results as text', () => {
    expect(q.buildTextSummary('x', 'max', layout)(xs([1, 2.5]))).toBe('2.5');
  });

  it('returns the default for an empty target without reducing', () => {
    const empty = new Population('empty');
    expect(q.buildNumericFunction('mean', 0)(empty, 'x')).toBe(0);
    expect(q.buildNumericFunction('mean', 7.5)(empty, 'x')).toBe(7.5);
    expect(q.buildTextFunction('mode', 'none')(new Collection(), 'x')).toBe('none');
    expect(notify.hasErrors()).toBe(false);
  });

  it('applies a function built once to each target', () => {
    const mean = q.buildNumericFunction('mean');
    expect(mean(xs([1, 3]), 'x')).toBe(2);
    expect(mean(xs([10]), 'x * 2')).toBe(20);
  });

  it('reports unknown modes and returns zero', () => {
    expect(num('x', 'bogus', xs([1, 2]))).toBe(0);
    expect(notify.errors()).toEqual(["Unknown trait filter 'bogus' for trait 'x'."]);
    expect(q.queryErrors().map(e => e.kind)).toEqual(['UnknownAggregationMode']);
  });

  it('reports a bad query once however often it runs', () => {
    const mean = q.buildNumericFunction('bogus');
    for (let i = 0; i < 5; i++) expect(mean(xs([1, 2]), 'x')).toBe(0);
    expect(notify.errors()).toEqual(["Unknown trait filter 'bogus' for trait 'x'."]);
    expect(q.queryErrors()).toHaveLength(1);
  });

  it('reports numeric reducers on string traits', () => {
    expect(num('kind', 'mean', popOf(layout, [{ kind: 'ant' }]))).toBe(0);
    expect(notify.errors()).toEqual(["Trait filter 'mean' does not apply to non-numeric trait 'kind'."]);
  });

  it('reports unknown traits', () => {
    expect(num('y', 'mean', xs([1]))).toBe(0);
    expect(q.queryErrors().map(e => e.message)).toEqual(["Equation 'y' uses unknown trait 'y'."]);
  });

  it('reports an unknown trait in a comparison once', () => {
    expect(num('x', '>zz', xs([1]))).toBe(0);
    expect(q.queryErrors().map(e => e.kind)).toEqual(['UnknownTraitReference']);
  });

  it('reports an out-of-range index when applied', () => {
    expect(num('x', '10', xs([1, 2, 3]))).toBe(0);
    expect(q.queryErrors().map(e => e.kind)).toEqual(['IndexOutOfRange']);
  });

  it('builds per-organism equations', () => {
    const pop = popOf(layout, [{ x: 1.5, n: 2 }]);
    expect(q.buildTraitEquation(layout, 'x + n')(pop.at(0))).toBe(3.5);
    expect(q.buildTraitEquation(layout, 'x +')(pop.at(0))).toBe(0);
    expect(q.queryErrors().map(e => e.kind)).toEqual(['EquationSyntax']);
  });
});
