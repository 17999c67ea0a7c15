// lib/query/aggregate.ts
// Aggregation modes: parse a mode string once, then fold per-organism values into one.
//
//   <none>        value for the first organism
//   [ID]          value for the organism at that index
//   [OP][VALUE]   count organisms whose value has relation OP (== != < > <= >=) with VALUE
//   [OP][TRAIT]   ... with that organism's value of another trait (or equation)
//   unique        distinct values (alias: richness)
//   mode          most common value (aliases: dom, dominant)
//   min, max      extremal value
//   min_id, max_id  index of the first extremal organism
//   ave           mean (aliases: mean, average)
//   median, variance, stddev   (population statistics)
//   sum           (alias: total)
//   entropy       Shannon entropy of the values, in bits
//   :TRAIT        mutual information with another trait, in bits

import { ConfigError } from '../errors';
import type { Organism } from '../population/organism';

export type CompareOp = '==' | '!=' | '<' | '>' | '<=' | '>=';

export type CompareTarget =
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'trait'; equation: string };

type NamedReducer =
  | 'unique' | 'mode' | 'min' | 'max' | 'min_id' | 'max_id'
  | 'mean' | 'median' | 'variance' | 'stddev' | 'sum' | 'entropy';

export type AggregationMode =
  | { kind: 'first' }
  | { kind: 'index'; index: number }
  | { kind: 'compare'; op: CompareOp; target: CompareTarget }
  | { kind: NamedReducer }
  | { kind: 'mutual_info'; other: string }
  | { kind: 'unknown'; text: string };

export type SummaryValue = number | string;
export type ValueKind = 'number' | 'string';

const REDUCER_NAMES: Record<string, NamedReducer> = {
  unique: 'unique', richness: 'unique',
  mode: 'mode', dom: 'mode', dominant: 'mode',
  min: 'min', max: 'max',
  min_id: 'min_id', max_id: 'max_id',
  ave: 'mean', mean: 'mean', average: 'mean',
  median: 'median',
  variance: 'variance',
  stddev: 'stddev',
  sum: 'sum', total: 'sum',
  entropy: 'entropy',
};

/** Reducers that only make sense on numbers. */
const NUMERIC_ONLY = new Set<AggregationMode['kind']>(['mean', 'median', 'variance', 'stddev', 'sum']);

const COMPARE_OPS: CompareOp[] = ['==', '!=', '<=', '>=', '<', '>'];
const NUMBER_LITERAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseTarget(text: string): CompareTarget {
  if (NUMBER_LITERAL.test(text)) return { kind: 'number', value: Number(text) };
  const quoted = /^"(.*)"$|^'(.*)'$/.exec(text);
  if (quoted) return { kind: 'string', value: quoted[1] ?? quoted[2] ?? '' };
  return { kind: 'trait', equation: text };
}

export function parseMode(raw: string): AggregationMode {
  const mode = raw.trim();
  if (!mode) return { kind: 'first' };
  if (/^\d+$/.test(mode)) return { kind: 'index', index: Number(mode) };

  const op = COMPARE_OPS.find(o => mode.startsWith(o));
  if (op) {
    const rest = mode.slice(op.length).trim();
    if (!rest) return { kind: 'unknown', text: raw };
    return { kind: 'compare', op, target: parseTarget(rest) };
  }

  if (mode.startsWith(':')) {
    const other = mode.slice(1).trim();
    return other ? { kind: 'mutual_info', other } : { kind: 'unknown', text: raw };
  }

  const named = REDUCER_NAMES[mode.toLowerCase()];
  return named ? { kind: named } : { kind: 'unknown', text: raw };
}

export function compareValues(a: SummaryValue, b: SummaryValue): number {
  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : 0;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function holds(op: CompareOp, c: number): boolean {
  switch (op) {
    case '==': return c === 0;
    case '!=': return c !== 0;
    case '<': return c < 0;
    case '>': return c > 0;
    case '<=': return c <= 0;
    case '>=': return c >= 0;
  }
}

function counts(values: SummaryValue[]): Map<SummaryValue, number> {
  const m = new Map<SummaryValue, number>();
  for (const v of values) m.set(v, (m.get(v) ?? 0) + 1);
  return m;
}

/** First value to reach the highest count, scanning in order. */
export function findMode(values: SummaryValue[]): SummaryValue | undefined {
  const seen = new Map<SummaryValue, number>();
  let best: SummaryValue | undefined;
  let bestCount = 0;
  for (const v of values) {
    const c = (seen.get(v) ?? 0) + 1;
    seen.set(v, c);
    if (c > bestCount) {
      best = v;
      bestCount = c;
    }
  }
  return best;
}

/** Index of the first extremal value; `sign` 1 for max, -1 for min. */
export function extremeIndex(values: SummaryValue[], sign: 1 | -1): number {
  let best = -1;
  values.forEach((v, i) => {
    if (best < 0 || sign * compareValues(v, values[best]) > 0) best = i;
  });
  return best;
}

export function median(values: number[]): number {
  if (!values.length) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Mean and population variance from one pass over the values (Welford). */
export function moments(values: number[]): { mean: number; variance: number } {
  if (!values.length) return { mean: 0, variance: 0 };
  let mean = 0;
  let m2 = 0;
  values.forEach((v, i) => {
    const delta = v - mean;
    mean += delta / (i + 1);
    m2 += delta * (v - mean);
  });
  return { mean, variance: m2 / values.length };
}

export function entropy(values: SummaryValue[]): number {
  const n = values.length;
  let h = 0;
  for (const c of counts(values).values()) {
    const p = c / n;
    h += p * Math.log2(1 / p);
  }
  return h;
}

export function mutualInformation(xs: SummaryValue[], ys: SummaryValue[]): number {
  const n = Math.min(xs.length, ys.length);
  if (!n) return 0;
  const cx = counts(xs.slice(0, n));
  const cy = counts(ys.slice(0, n));
  const joint = new Map<SummaryValue, Map<SummaryValue, number>>();
  for (let i = 0; i < n; i++) {
    const row = joint.get(xs[i]) ?? new Map<SummaryValue, number>();
    row.set(ys[i], (row.get(ys[i]) ?? 0) + 1);
    joint.set(xs[i], row);
  }
  let mi = 0;
  for (const [x, row] of joint) {
    for (const [y, c] of row) {
      mi += (c / n) * Math.log2((c * n) / ((cx.get(x) ?? 1) * (cy.get(y) ?? 1)));
    }
  }
  return mi;
}

export type ValueGetter = (org: Organism) => SummaryValue;

export type CollectOptions = {
  /** What the per-organism getter produces. */
  kind: ValueKind;
  get: ValueGetter;
  /** Reader for another trait or equation named by a mode; null if it cannot be built. */
  resolveOther: (equation: string) => ValueGetter | null;
  /** Trait or equation being summarized, for messages. */
  label: string;
  report: (err: ConfigError) => void;
};

export type CollectFun = (orgs: Organism[]) => SummaryValue;

/**
 * Build the fold for `mode`, or null when the mode is unknown or does not apply
 * to this kind of value (the caller reports it).
 */
export function buildCollectFun(mode: AggregationMode, opts: CollectOptions): CollectFun | null {
  const { get, kind } = opts;
  const zero: SummaryValue = kind === 'number' ? 0 : '';
  const valuesOf = (orgs: Organism[]) => orgs.map(get);

  if (kind === 'string' && NUMERIC_ONLY.has(mode.kind)) return null;

  switch (mode.kind) {
    case 'unknown':
      return null;

    case 'first':
      return orgs => (orgs.length ? get(orgs[0]) : zero);

    case 'index': {
      const index = mode.index;
      return orgs => {
        if (index >= orgs.length) {
          opts.report(new ConfigError(
            'IndexOutOfRange',
            `Index ${index} is out of range for '${opts.label}' over ${orgs.length} organism(s).`,
            { trait: opts.label },
          ));
          return zero;
        }
        return get(orgs[index]);
      };
    }

    case 'compare': {
      const { op, target } = mode;
      let other: ValueGetter;
      if (target.kind === 'trait') {
        const resolved = opts.resolveOther(target.equation);
        if (!resolved) return null;
        other = resolved;
      } else if (target.kind === 'string' && kind === 'string') {
        const literal = JSON.stringify(target.value);
        other = () => literal;
      } else {
        const value = target.value;
        other = () => value;
      }
      return orgs => orgs.filter(org => holds(op, compareValues(get(org), other(org)))).length;
    }

    case 'unique':
      return orgs => new Set(valuesOf(orgs)).size;

    case 'mode':
      return orgs => findMode(valuesOf(orgs)) ?? zero;

    case 'min':
    case 'max': {
      const sign = mode.kind === 'max' ? 1 : -1;
      return orgs => {
        const vs = valuesOf(orgs);
        const i = extremeIndex(vs, sign);
        return i < 0 ? zero : vs[i];
      };
    }

    case 'min_id':
    case 'max_id': {
      const sign = mode.kind === 'max_id' ? 1 : -1;
      return orgs => Math.max(0, extremeIndex(valuesOf(orgs), sign));
    }

    case 'mean':
      return orgs => moments(numbers(valuesOf(orgs))).mean;
    case 'median':
      return orgs => median(numbers(valuesOf(orgs)));
    case 'variance':
      return orgs => moments(numbers(valuesOf(orgs))).variance;
    case 'stddev':
      return orgs => Math.sqrt(moments(numbers(valuesOf(orgs))).variance);
    case 'sum':
      return orgs => numbers(valuesOf(orgs)).reduce((s, v) => s + v, 0);

    case 'entropy':
      return orgs => entropy(valuesOf(orgs));

    case 'mutual_info': {
      const other = opts.resolveOther(mode.other);
      if (!other) return null;
      return orgs => mutualInformation(valuesOf(orgs), orgs.map(other));
    }
  }
}

function numbers(values: SummaryValue[]): number[] {
  return values.map(v => (typeof v === 'number' ? v : Number(v)));
}
