// lib/query/traitQuery.ts
// Builds population/collection queries from a trait (or equation) string and a mode string.

import { ConfigError } from '../errors';
import type { Notifier } from '../diagnostics/notify';
import type { DataLayout } from '../layout/dataLayout';
import { toCollection, type OrgSource } from '../population/collection';
import type { Organism } from '../population/organism';
import {
  buildCollectFun, parseMode,
  type CollectFun, type SummaryValue, type ValueGetter, type ValueKind,
} from './aggregate';
import { compileEquation, equationTraits, isIdentifier } from './equation';
import { preprocess, type ScriptEvaluator } from './preprocess';

type Getter = { kind: ValueKind; get: ValueGetter };

const toNumber = (v: SummaryValue): number => {
  if (typeof v === 'number') return v;
  const n = Number(v);
  return Number.isFinite(n) ? n : 0;
};

const toText = (v: SummaryValue): string => (typeof v === 'number' ? String(v) : v);

export class TraitQueryBuilder {
  private readonly errs: ConfigError[] = [];
  private readonly reported = new Set<string>();

  constructor(
    private readonly evaluator: ScriptEvaluator,
    private readonly notify: Notifier,
  ) {}

  /** Errors reported by queries built so far, each distinct one once. */
  queryErrors(): ConfigError[] {
    return [...this.errs];
  }

  preprocess(text: string): string {
    return preprocess(text, this.evaluator);
  }

  equationTraits(equation: string): Set<string> {
    return equationTraits(this.preprocess(equation));
  }

  /** Per-organism numeric function; reports and yields 0 if the equation cannot be built. */
  buildTraitEquation(layout: DataLayout, equation: string): (org: Organism) => number {
    const res = compileEquation(layout, this.preprocess(equation));
    if (!res.ok) {
      this.report(res.error);
      return () => 0;
    }
    return res.fn;
  }

  buildNumericSummary(equation: string, mode: string, layout: DataLayout): (src: OrgSource) => number {
    const fun = this.buildCollect(equation, mode, layout);
    if (!fun) return () => 0;
    return src => toNumber(fun(toCollection(src).organisms()));
  }

  buildTextSummary(equation: string, mode: string, layout: DataLayout): (src: OrgSource) => string {
    const fun = this.buildCollect(equation, mode, layout);
    if (!fun) return () => '';
    return src => toText(fun(toCollection(src).organisms()));
  }

  /** `(target, equation) => number`, giving `defaultValue` for an empty target. */
  buildNumericFunction(mode: string, defaultValue = 0) {
    return (target: OrgSource, equation: string): number => {
      const c = toCollection(target);
      if (c.isEmpty()) return defaultValue;
      return this.buildNumericSummary(equation, mode, c.getDataLayout())(c);
    };
  }

  /** `(target, equation) => string`, giving `defaultValue` for an empty target. */
  buildTextFunction(mode: string, defaultValue = '') {
    return (target: OrgSource, equation: string): string => {
      const c = toCollection(target);
      if (c.isEmpty()) return defaultValue;
      return this.buildTextSummary(equation, mode, c.getDataLayout())(c);
    };
  }

  private buildCollect(equation: string, mode: string, layout: DataLayout): CollectFun | null {
    const src = this.preprocess(equation).trim();
    const getter = this.buildGetter(layout, src);
    if (!getter) return null;

    let otherFailed = false;
    const parsed = parseMode(mode);
    const fun = buildCollectFun(parsed, {
      ...getter,
      label: src,
      report: err => this.report(err),
      resolveOther: eq => {
        const other = this.buildGetter(layout, this.preprocess(eq).trim());
        if (!other) otherFailed = true;
        return other ? other.get : null;
      },
    });
    if (fun || otherFailed) return fun;

    this.report(new ConfigError(
      'UnknownAggregationMode',
      parsed.kind === 'unknown'
        ? `Unknown trait filter '${mode}' for trait '${src}'.`
        : `Trait filter '${mode}' does not apply to non-numeric trait '${src}'.`,
      { trait: src },
    ));
    return null;
  }

  /**
   * A lone identifier naming a non-numeric trait reads that trait as a quoted literal;
   * anything else is compiled as a numeric equation.
   */
  private buildGetter(layout: DataLayout, src: string): Getter | null {
    if (isIdentifier(src) && layout.hasName(src) && !layout.isNumeric(src)) {
      const id = layout.getId(src);
      return { kind: 'string', get: org => JSON.stringify(org.getAsString(id)) };
    }
    const res = compileEquation(layout, src);
    if (!res.ok) {
      this.report(res.error);
      return null;
    }
    return { kind: 'number', get: res.fn };
  }

  // Rebuilt queries repeat their errors; each distinct one is reported once.
  private report(err: ConfigError) {
    const key = `${err.kind}\u0000${err.message}`;
    if (this.reported.has(key)) return;
    this.reported.add(key);
    this.errs.push(err);
    this.notify.error(err.message);
  }
}
