// lib/script/queryScript.ts
// Script surface of a run: Population and OrgList types, query functions, globals and signals.

import { Collection, toCollection, type OrgSource } from '../population/collection';
import { Population } from '../population/population';
import { TraitQueryBuilder } from '../query/traitQuery';
import type { SimControl } from '../world/control';
import { ConfigEvaluator } from './configEvaluator';
import { populationArg, ScriptType, textArg, type ScriptValue } from './scriptType';

export type SignalName = 'START' | 'UPDATE';
export type SignalHandler = (update: number) => void;

type GlobalFn = { fn: (...args: ScriptValue[]) => ScriptValue; description: string };

/** Numeric summaries shared by Population and OrgList, with the mode each one uses. */
const NUMERIC_QUERIES: [string, string, string][] = [
  ['CALC_RICHNESS', 'richness', 'Count the number of distinct values of a trait (or equation).'],
  ['CALC_MEAN', 'mean', 'Calculate the average value of a trait (or equation).'],
  ['CALC_MIN', 'min', 'Find the smallest value of a trait (or equation).'],
  ['CALC_MAX', 'max', 'Find the largest value of a trait (or equation).'],
  ['ID_MIN', 'min_id', 'Find the index of the smallest value of a trait (or equation).'],
  ['ID_MAX', 'max_id', 'Find the index of the largest value of a trait (or equation).'],
  ['CALC_MEDIAN', 'median', 'Find the 50-percentile value of a trait (or equation).'],
  ['CALC_VARIANCE', 'variance', 'Find the variance of the values of a trait (or equation).'],
  ['CALC_STDDEV', 'stddev', 'Find the standard deviation of the values of a trait (or equation).'],
  ['CALC_SUM', 'sum', 'Add up the total value of a trait (or equation).'],
  ['CALC_ENTROPY', 'entropy', 'Determine the entropy of values for a trait (or equation).'],
];

const TEXT_QUERIES: [string, string, string][] = [
  ['TRAIT', '0', 'Return the value of the provided trait for the first organism.'],
  ['CALC_MODE', 'mode', 'Identify the most common value of a trait (or equation).'],
];

const DEPRECATED: [string, string][] = [
  ['EVAL', 'EXEC'],
  ['exit', 'EXIT'],
  ['inject', 'INJECT'],
  ['print', 'PRINT'],
];

export class QueryScript {
  readonly evaluator: ConfigEvaluator;
  readonly queries: TraitQueryBuilder;
  readonly populationType = new ScriptType<Population>('Population', 'Collection of organisms');
  readonly orgListType = new ScriptType<Collection>('OrgList', 'Collection of organism pointers');

  private readonly globals = new Map<string, GlobalFn>();
  private readonly handlers = new Map<SignalName, SignalHandler[]>();

  constructor(readonly control: SimControl) {
    this.evaluator = new ConfigEvaluator(control, control.notify);
    this.queries = new TraitQueryBuilder(this.evaluator, control.notify);
    this.initialize();
  }

  preprocess(text: string): string {
    return this.queries.preprocess(text);
  }

  // --- calls ---

  hasFunction(name: string): boolean {
    return this.globals.has(name);
  }

  functionNames(): string[] {
    return Array.from(this.globals.keys());
  }

  describe(name: string): string {
    return this.globals.get(name)?.description ?? '';
  }

  callFunction(name: string, ...args: ScriptValue[]): ScriptValue {
    const g = this.globals.get(name);
    if (!g) throw new Error(`Unknown function '${name}'.`);
    return g.fn(...args);
  }

  callMember(target: ScriptValue, name: string, ...args: ScriptValue[]): ScriptValue {
    if (target instanceof Population) return this.populationType.call(target, name, args);
    if (target instanceof Collection) return this.orgListType.call(target, name, args);
    throw new Error(`Cannot call '${name}' on a ${typeof target}.`);
  }

  // --- signals ---

  signals(): SignalName[] {
    return Array.from(this.handlers.keys());
  }

  on(signal: SignalName, handler: SignalHandler): this {
    const list = this.handlers.get(signal);
    if (!list) throw new Error(`Unknown signal '${signal}'.`);
    list.push(handler);
    return this;
  }

  trigger(signal: SignalName) {
    for (const h of this.handlers.get(signal) ?? []) h(this.control.getUpdate());
  }

  /** START once, then UPDATE before every update until the run stops; returns the final update. */
  run(): number {
    this.trigger('START');
    while (this.control.canStep()) {
      this.trigger('UPDATE');
      this.control.step();
    }
    return this.control.getUpdate();
  }

  // --- setup ---

  private addFunction(name: string, fn: (...args: ScriptValue[]) => ScriptValue, description: string) {
    this.globals.set(name, { fn, description });
  }

  private addMember(name: string, fn: (src: OrgSource, ...args: ScriptValue[]) => ScriptValue, description: string) {
    this.populationType.addMember(name, fn, description);
    this.orgListType.addMember(name, fn, description);
  }

  private deprecate(oldName: string, newName: string) {
    this.addFunction(oldName, () => {
      this.control.notify.error(`Function '${oldName}' deprecated; use '${newName}'`);
      this.control.requestExit();
      return 0;
    }, `Deprecated.  Use: ${newName}`);
  }

  /** Position of the extremal organism, as a one-entry OrgList. */
  private findExtreme(src: OrgSource, equation: string, mode: 'min_id' | 'max_id'): Collection {
    const c = toCollection(src);
    if (c.isEmpty()) return new Collection();
    const idx = this.queries.buildNumericSummary(equation, mode, c.getDataLayout())(c);
    return c.at(idx);
  }

  private filter(src: OrgSource, equation: string): Collection {
    const c = toCollection(src);
    const out = new Collection();
    if (c.isEmpty()) return out;
    const test = this.queries.buildTraitEquation(c.getDataLayout(), equation);
    for (const pos of c.entries()) {
      if (test(pos.population.at(pos.index)) !== 0) out.insert(pos.population, pos.index);
    }
    return out;
  }

  private initialize() {
    const control = this.control;

    this.populationType.addMember('REPLACE_WITH', (to, ...args) => {
      control.moveOrgs(populationArg('REPLACE_WITH', args, 0), to, true);
      return 0;
    }, 'Move all organisms from another population, removing current orgs.');
    this.populationType.addMember('APPEND', (to, ...args) => {
      control.moveOrgs(populationArg('APPEND', args, 0), to, false);
      return 0;
    }, 'Move all organisms from another population, adding after current orgs.');

    for (const [name, mode, description] of TEXT_QUERIES) {
      const fn = this.queries.buildTextFunction(mode, '');
      this.addMember(name, (src, ...args) => fn(src, textArg(name, args, 0)), description);
    }
    for (const [name, mode, description] of NUMERIC_QUERIES) {
      const fn = this.queries.buildNumericFunction(mode, 0);
      this.addMember(name, (src, ...args) => fn(src, textArg(name, args, 0)), description);
    }

    this.addMember('FIND_MIN', (src, ...args) => this.findExtreme(src, textArg('FIND_MIN', args, 0), 'min_id'),
      'Produce OrgList with just the org with the minimum value of the provided function.');
    this.addMember('FIND_MAX', (src, ...args) => this.findExtreme(src, textArg('FIND_MAX', args, 0), 'max_id'),
      'Produce OrgList with just the org with the maximum value of the provided function.');
    this.addMember('FILTER', (src, ...args) => this.filter(src, textArg('FILTER', args, 0)),
      'Produce OrgList with just the orgs that pass through the filter criteria.');

    for (const [oldName, newName] of DEPRECATED) this.deprecate(oldName, newName);

    this.addFunction('EXIT', () => { control.requestExit(); return 0; }, 'Exit from this run.');
    this.addFunction('GET_UPDATE', () => control.getUpdate(), 'Get current update.');
    this.addFunction('GET_VERBOSE', () => (control.getVerbose() ? 1 : 0), 'Has the verbose flag been set?');
    this.addFunction('PP', (...args) => this.preprocess(textArg('PP', args, 0)),
      'Preprocess a string (replacing any ${...} with result.)');

    this.handlers.set('START', []);
    this.handlers.set('UPDATE', []);
  }
}
