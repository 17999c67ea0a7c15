// lib/world/control.ts
// Control surface of a run: populations, modules, update counter, seed and exit flag.

import { defaultRunConfig, type RunConfig } from '../config/runConfig';
import { Notifier } from '../diagnostics/notify';
import { formatErrors } from '../errors';
import type { SimModule } from '../modules/simModule';
import { setupWorld, type SetupResult } from '../orchestrator/setupWorld';
import { Population } from '../population/population';

export class SimControl {
  readonly config: RunConfig;
  readonly notify: Notifier;

  private updateNum = 0;
  private exitRequested = false;
  private seed: number;
  private readonly pops = new Map<string, Population>();
  private readonly mods: SimModule[] = [];

  constructor(config: RunConfig = defaultRunConfig(), notify: Notifier = new Notifier()) {
    this.config = config;
    this.notify = notify;
    this.seed = config.randomSeed;
  }

  getUpdate(): number {
    return this.updateNum;
  }

  getVerbose(): boolean {
    return this.config.verbose;
  }

  /** Info message, only when the run is verbose. */
  verbose(...parts: (string | number | boolean)[]) {
    if (this.config.verbose) this.notify.info(...parts);
  }

  requestExit() {
    this.exitRequested = true;
  }

  isExitRequested(): boolean {
    return this.exitRequested;
  }

  getRandomSeed(): number {
    return this.seed;
  }

  setRandomSeed(seed: number) {
    if (!Number.isInteger(seed) || seed < 0) throw new Error(`Random seed must be a non-negative integer, got ${seed}.`);
    this.seed = seed;
  }

  // --- populations ---

  addPopulation(name: string): Population {
    if (this.pops.has(name)) throw new Error(`Population '${name}' already exists.`);
    const pop = new Population(name);
    this.pops.set(name, pop);
    return pop;
  }

  hasPopulation(name: string): boolean {
    return this.pops.has(name);
  }

  getPopulation(name: string): Population {
    const pop = this.pops.get(name);
    if (!pop) throw new Error(`Unknown population '${name}'.`);
    return pop;
  }

  populations(): Population[] {
    return Array.from(this.pops.values());
  }

  /** Move every organism of `from` to the end of `to`; with `replace`, `to` is emptied first. */
  moveOrgs(from: Population, to: Population, replace: boolean) {
    if (from === to) return;
    if (!to.hasDataLayout() && from.hasDataLayout()) to.setDataLayout(from.getDataLayout());
    if (replace) to.clear();
    for (const org of from.takeAll()) to.insert(org);
  }

  /** Make `to` hold copies of every organism in `from`. */
  copyPop(from: Population, to: Population) {
    if (from === to) return;
    if (!to.hasDataLayout() && from.hasDataLayout()) to.setDataLayout(from.getDataLayout());
    to.clear();
    for (const org of from.organisms()) to.insert(org.clone());
  }

  // --- modules ---

  addModule(mod: SimModule): this {
    this.mods.push(mod);
    return this;
  }

  modules(): readonly SimModule[] {
    return this.mods;
  }

  /** Build layouts for every population and run module setup; errors go to the notifier. */
  setup(): SetupResult {
    const res = setupWorld(this.mods, this.populations());
    if (!res.ok) {
      for (const line of formatErrors(res.errors)) this.notify.error(line);
    } else {
      this.verbose('Setup done: ', this.mods.length, ' module(s), ', this.pops.size, ' population(s).');
    }
    return res;
  }

  /** False once exit was requested or the update limit is reached. */
  canStep(): boolean {
    if (this.exitRequested) return false;
    return this.config.maxUpdates === 0 || this.updateNum < this.config.maxUpdates;
  }

  /** Run one update on every module; returns false (without updating) when the run cannot go on. */
  step(): boolean {
    if (!this.canStep()) return false;
    for (const m of this.mods) m.update(this.updateNum);
    this.updateNum++;
    return true;
  }
}
