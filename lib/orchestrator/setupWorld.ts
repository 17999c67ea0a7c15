// lib/orchestrator/setupWorld.ts
// Setup phase: collect trait declarations, build one layout per population, then run module setup.

import { ConfigError } from '../errors';
import type { DataLayout } from '../layout/dataLayout';
import type { SimModule } from '../modules/simModule';
import type { Population } from '../population/population';
import { buildLayout, type LayoutResult } from './buildLayout';

export type SetupResult =
  | { ok: true; layouts: Map<string, DataLayout> }
  | { ok: false; errors: ConfigError[] };

/** Modules attached to `pop`; a module with no populations acts on all of them. */
export function modulesFor(pop: Population, modules: readonly SimModule[]): SimModule[] {
  return modules.filter(m => m.populations().length === 0 || m.populations().includes(pop));
}

function checkPopCounts(modules: readonly SimModule[]): ConfigError[] {
  const errors: ConfigError[] = [];
  for (const m of modules) {
    const have = m.populations().length;
    const need = m.getRequiredPops();
    if (have < need) {
      errors.push(new ConfigError(
        'MissingPopulation',
        `Module ${m.name} needs ${need} population(s) but has ${have}.`,
        { modules: [m.name] },
      ));
    }
  }
  return errors;
}

/**
 * Runs every module's `setupTraits`, freezes the declarations and builds the layouts.
 * Layouts are only assigned (and `setup` only runs) when nothing went wrong anywhere.
 */
export function setupWorld(modules: readonly SimModule[], populations: readonly Population[]): SetupResult {
  for (const m of modules) m.setupTraits();
  for (const m of modules) m.finishSetup();

  const errors: ConfigError[] = checkPopCounts(modules);
  const layouts = new Map<string, DataLayout>();

  // Populations acted on by the same modules share one layout, so organisms can move between them.
  const built = new Map<string, LayoutResult>();
  for (const pop of populations) {
    const acting = modulesFor(pop, modules);
    const key = acting.map(m => m.name).join('\u0000');
    let res = built.get(key);
    if (!res) {
      res = buildLayout(acting.map(m => ({ moduleName: m.name, registry: m.traits })));
      built.set(key, res);
      if (!res.ok) errors.push(...res.errors);
    }
    if (res.ok) layouts.set(pop.name, res.layout);
  }

  if (errors.length) return { ok: false, errors };

  for (const pop of populations) {
    const layout = layouts.get(pop.name);
    if (layout) pop.setDataLayout(layout);
  }
  for (const m of modules) m.setup();
  return { ok: true, layouts };
}
