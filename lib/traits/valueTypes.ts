// lib/traits/valueTypes.ts
// Per-type operations for erased trait values.
//
// Everything that handles a trait without knowing its type at compile time
// (aggregation, archiving, inheritance, organism storage) goes through TRAIT_TYPES.

import type { TraitTypeId, TraitValue, TraitValueMap } from './types';

type TypedOps<T> = {
  numeric: boolean;
  ordered: boolean;
  /** Type used to archive a history of this trait; null if it cannot be archived. */
  listType: TraitTypeId | null;
  zero: () => T;
  is: (v: unknown) => v is T;
  format: (v: T) => string;
  parse: (text: string) => T;
  toNumber: (v: T) => number;
  average: (vs: T[]) => T;
  compare: (a: T, b: T) => number;
};

export type TraitTypeOps = {
  readonly id: TraitTypeId;
  readonly numeric: boolean;
  readonly ordered: boolean;
  readonly listType: TraitTypeId | null;
  zero(): TraitValue;
  is(v: unknown): v is TraitValue;
  format(v: TraitValue): string;
  parse(text: string): TraitValue;
  toNumber(v: TraitValue): number;
  average(vs: TraitValue[]): TraitValue;
  compare(a: TraitValue, b: TraitValue): number;
};

const cmpNum = (a: number, b: number) => (a < b ? -1 : a > b ? 1 : 0);
const cmpStr = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const mean = (vs: number[]) => (vs.length ? vs.reduce((s, x) => s + x, 0) / vs.length : 0);

const finiteOr0 = (x: number) => (Number.isFinite(x) ? x : 0);

const isNumberArray = (v: unknown): v is number[] =>
  Array.isArray(v) && v.every(x => typeof x === 'number');

const isStringArray = (v: unknown): v is string[] =>
  Array.isArray(v) && v.every(x => typeof x === 'string');

function parseList(text: string): string[] {
  const body = text.trim().replace(/^\[/, '').replace(/\]$/, '').trim();
  return body ? body.split(',').map(s => s.trim()) : [];
}

const doubleOps: TypedOps<number> = {
  numeric: true,
  ordered: true,
  listType: 'double[]',
  zero: () => 0,
  is: (v): v is number => typeof v === 'number',
  format: v => String(v),
  parse: text => finiteOr0(Number(text)),
  toNumber: v => v,
  average: vs => mean(vs),
  compare: cmpNum,
};

const intOps: TypedOps<number> = {
  ...doubleOps,
  is: (v): v is number => Number.isInteger(v),
  parse: text => Math.trunc(finiteOr0(Number(text))),
  average: vs => Math.round(mean(vs)),
};

const boolOps: TypedOps<boolean> = {
  numeric: true,
  ordered: true,
  listType: 'double[]',
  zero: () => false,
  is: (v): v is boolean => typeof v === 'boolean',
  format: v => (v ? '1' : '0'),
  parse: text => text.trim() === '1' || text.trim().toLowerCase() === 'true',
  toNumber: v => (v ? 1 : 0),
  average: vs => mean(vs.map(b => (b ? 1 : 0))) >= 0.5,
  compare: (a, b) => cmpNum(a ? 1 : 0, b ? 1 : 0),
};

const stringOps: TypedOps<string> = {
  numeric: false,
  ordered: true,
  listType: 'string[]',
  zero: () => '',
  is: (v): v is string => typeof v === 'string',
  format: v => v,
  parse: text => text,
  toNumber: v => finiteOr0(Number(v)),
  average: vs => vs[0] ?? '',
  compare: cmpStr,
};

const doubleListOps: TypedOps<number[]> = {
  numeric: false,
  ordered: false,
  listType: null,
  zero: () => [],
  is: isNumberArray,
  format: v => `[${v.join(',')}]`,
  parse: text => parseList(text).map(s => finiteOr0(Number(s))),
  toNumber: v => v.length,
  average: vs => vs[0] ?? [],
  compare: (a, b) => a.length - b.length,
};

const stringListOps: TypedOps<string[]> = {
  numeric: false,
  ordered: false,
  listType: null,
  zero: () => [],
  is: isStringArray,
  format: v => JSON.stringify(v),
  parse: text => {
    try {
      const parsed: unknown = JSON.parse(text);
      return isStringArray(parsed) ? parsed : [];
    } catch {
      return parseList(text);
    }
  },
  toNumber: v => v.length,
  average: vs => vs[0] ?? [],
  compare: (a, b) => a.length - b.length,
};

function erase<K extends TraitTypeId>(id: K, ops: TypedOps<TraitValueMap[K]>): TraitTypeOps {
  const check = (v: TraitValue): TraitValueMap[K] => {
    if (!ops.is(v)) throw new TypeError(`Value ${JSON.stringify(v)} is not of trait type '${id}'.`);
    return v;
  };
  return {
    id,
    numeric: ops.numeric,
    ordered: ops.ordered,
    listType: ops.listType,
    zero: ops.zero,
    is: (v: unknown): v is TraitValue => ops.is(v),
    format: v => ops.format(check(v)),
    parse: ops.parse,
    toNumber: v => ops.toNumber(check(v)),
    average: vs => ops.average(vs.map(check)),
    compare: (a, b) => ops.compare(check(a), check(b)),
  };
}

export const TRAIT_TYPES: Record<TraitTypeId, TraitTypeOps> = {
  double: erase('double', doubleOps),
  int: erase('int', intOps),
  bool: erase('bool', boolOps),
  string: erase('string', stringOps),
  'double[]': erase('double[]', doubleListOps),
  'string[]': erase('string[]', stringListOps),
};

export function isTraitTypeId(s: string): s is TraitTypeId {
  return Object.prototype.hasOwnProperty.call(TRAIT_TYPES, s);
}

/** Structural equality for erased values (lists compare element-wise). */
export function sameValue(a: TraitValue, b: TraitValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) return false;
    }
    return true;
  }
  return a === b;
}
