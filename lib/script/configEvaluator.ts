// lib/script/configEvaluator.ts
// Built-in evaluator for ${...} spans: single expressions over run variables and linked globals.

import type { Notifier } from '../diagnostics/notify';
import { compileExpr, EquationError, isIdentifier, parseEquation, type Compiled } from '../query/equation';
import { preprocess, type ScriptEvaluator } from '../query/preprocess';
import type { SimControl } from '../world/control';

type Variable = number | string;

export class ConfigEvaluator implements ScriptEvaluator {
  private readonly vars = new Map<string, Variable>();

  constructor(private readonly control: SimControl, private readonly notify: Notifier) {
    for (const [name, value] of Object.entries(control.config.variables)) this.vars.set(name, value);
  }

  define(name: string, value: Variable): this {
    if (!isIdentifier(name)) throw new Error(`'${name}' is not a valid variable name.`);
    this.vars.set(name, value);
    return this;
  }

  lookup(name: string): Variable | undefined {
    if (name === 'random_seed') return this.control.getRandomSeed();
    if (name === 'update') return this.control.getUpdate();
    return this.vars.get(name);
  }

  /** Evaluate `code` and return its text; reports and returns '' when it cannot. */
  execute(code: string): string {
    const src = preprocess(code, this).trim();
    const single = isIdentifier(src) ? this.lookup(src) : undefined;
    if (typeof single === 'string') return single;

    try {
      const fn = compileExpr<void>(parseEquation(src), name => this.numeric(name));
      return String(fn());
    } catch (e) {
      if (!(e instanceof EquationError)) throw e;
      this.notify.error(`Cannot evaluate '${src}': ${e.message}`);
      return '';
    }
  }

  private numeric(name: string): Compiled<void> | undefined {
    const v = this.lookup(name);
    if (v === undefined) return undefined;
    // Linked globals are read at evaluation time.
    return () => {
      const now = this.lookup(name);
      if (typeof now === 'number') return now;
      const n = Number(now);
      return Number.isFinite(n) ? n : 0;
    };
  }
}
