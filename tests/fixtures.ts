import { formatErrors } from '@/lib/errors';
import type { DataLayout } from '@/lib/layout/dataLayout';
import { SimModule } from '@/lib/modules/simModule';
import { buildLayout } from '@/lib/orchestrator/buildLayout';
import { Population } from '@/lib/population/population';
import type { ScriptEvaluator } from '@/lib/query/preprocess';
import type { TraitTypeId, TraitValue, TraitValueMap } from '@/lib/traits/types';

type DeclareFn = (m: TestModule) => void;

/** Module whose trait declarations come from a callback; records setup and update calls. */
export class TestModule extends SimModule {
  readonly updates: number[] = [];
  setupCalls = 0;

  constructor(name: string, private readonly declareTraits: DeclareFn = () => {}, requiredPops = 0) {
    super(name);
    this.setRequiredPops(requiredPops);
  }

  setupTraits() {
    this.declareTraits(this);
  }

  setup() {
    this.setupCalls++;
  }

  update(update: number) {
    this.updates.push(update);
  }

  owned<K extends TraitTypeId>(type: K, name: string, defaultValue: TraitValueMap[K]) {
    return this.addOwnedTrait(type, name, `${name} (test)`, defaultValue);
  }

  shared<K extends TraitTypeId>(type: K, name: string, defaultValue?: TraitValueMap[K]) {
    return this.addSharedTrait(type, name, `${name} (test)`, defaultValue);
  }

  required<K extends TraitTypeId>(type: K, name: string) {
    return this.addRequiredTrait(type, name, `${name} (test)`);
  }

  priv<K extends TraitTypeId>(type: K, name: string, defaultValue: TraitValueMap[K]) {
    return this.addPrivateTrait(type, name, `${name} (test)`, defaultValue);
  }
}

/** Layout for the given modules; throws with every error if it cannot be built. */
export function layoutOf(...modules: TestModule[]): DataLayout {
  for (const m of modules) {
    m.setupTraits();
    m.finishSetup();
  }
  const res = buildLayout(modules.map(m => ({ moduleName: m.name, registry: m.traits })));
  if (!res.ok) throw new Error(formatErrors(res.errors).join('\n'));
  return res.layout;
}

export function popOf(layout: DataLayout, rows: Record<string, TraitValue>[], name = 'pop'): Population {
  const pop = new Population(name, layout);
  for (const row of rows) pop.spawn(row);
  return pop;
}

/** Layout with numeric `x` and `n` and a string `kind`, owned by module `M`. */
export function basicLayout(): DataLayout {
  return layoutOf(new TestModule('M', m => {
    m.owned('double', 'x', 0);
    m.owned('int', 'n', 0);
    m.owned('string', 'kind', '');
  }));
}

/** Evaluator that answers from a fixed table and returns '' for anything else. */
export function tableEvaluator(table: Record<string, string>): ScriptEvaluator {
  return { execute: code => table[code] ?? '' };
}
