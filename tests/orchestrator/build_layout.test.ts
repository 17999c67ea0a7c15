import { describe, expect, it } from 'vitest';

import { buildLayout, type RegistryInput } from '@/lib/orchestrator/buildLayout';
import { TraitRegistry } from '@/lib/traits/registry';

function reg(moduleName: string, declare: (r: TraitRegistry) => void): RegistryInput {
  const registry = new TraitRegistry(moduleName);
  declare(registry);
  registry.freeze();
  return { moduleName, registry };
}

function errorKinds(inputs: RegistryInput[]): string[] {
  const res = buildLayout(inputs);
  return res.ok ? [] : res.errors.map(e => e.kind);
}

describe('buildLayout', () => {
  it('assigns slots in name order with history entries', () => {
    const res = buildLayout([
      reg('A', r => r.declare('double', 'owned', 'energy', 'Energy', 1).setArchiveLast()),
      reg('B', r => {
        r.declare('double', 'required', 'energy', 'Energy');
        r.declare('int', 'shared', 'age', 'Age', 0);
      }),
    ]);
    if (!res.ok) throw new Error(res.errors.map(e => e.message).join('\n'));
    const layout = res.layout;

    expect(layout.names()).toEqual(['age', 'energy', 'last_energy']);
    expect(layout.getId('energy')).toBe(1);

    const energy = layout.entry('energy');
    expect(energy?.owner).toBe('A');
    expect(energy?.modules).toEqual(['A', 'B']);
    expect(energy?.defaultValue).toBe(1);
    expect(layout.entry('age')?.owner).toBeNull();

    const last = layout.entry('last_energy');
    expect(last?.type).toBe('double');
    expect(last?.archiveOf).toBe('energy');
    expect(layout.defaults()).toEqual([0, 1, 1]);
  });

  it('gives list-typed history to all-resets and all-changes traits', () => {
    const res = buildLayout([
      reg('A', r => {
        r.declare('int', 'owned', 'hits', '', 0).setArchiveAll();
        r.declare('string', 'owned', 'state', '', 'idle').setArchiveChanges();
      }),
    ]);
    if (!res.ok) throw new Error('layout failed');
    expect(res.layout.entry('archive_hits')?.type).toBe('double[]');
    expect(res.layout.entry('sequence_state')?.type).toBe('string[]');
    expect(res.layout.entry('sequence_state')?.defaultValue).toEqual([]);
  });

  it('takes the default from whichever shared declaration sets one', () => {
    const res = buildLayout([
      reg('A', r => r.declare('string', 'shared', 'label', '')),
      reg('B', r => r.declare('string', 'shared', 'label', '', 'none')),
    ]);
    if (!res.ok) throw new Error('layout failed');
    expect(res.layout.entry('label')?.defaultValue).toBe('none');
  });

  it('rejects a provided trait that no declaration gives a default', () => {
    const res = buildLayout([
      reg('A', r => r.declare('string', 'shared', 'label', '')),
      reg('B', r => r.declare('string', 'shared', 'label', '')),
    ]);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors.map(e => e.kind)).toEqual(['InvalidDefault']);
    expect(res.errors[0].message).toBe("Trait 'label' has no default value; at least one of A, B must set one.");
  });

  it('hides private traits from other modules only', () => {
    const res = buildLayout([
      reg('A', r => r.declare('bool', 'private', 'secret', '', false)),
      reg('B', r => r.declare('double', 'owned', 'x', '', 0)),
    ]);
    if (!res.ok) throw new Error('layout failed');
    const layout = res.layout;

    expect(layout.hasName('secret', 'B')).toBe(false);
    expect(layout.hasName('secret', 'A')).toBe(true);
    expect(layout.hasName('secret')).toBe(true);
    expect(layout.names('B')).toEqual(['x']);
  });

  it('rejects two owners of one trait', () => {
    const res = buildLayout([
      reg('A', r => r.declare('double', 'owned', 'x', '', 0)),
      reg('B', r => r.declare('double', 'owned', 'x', '', 0)),
    ]);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors).toHaveLength(1);
    expect(res.errors[0].kind).toBe('AccessConflict');
    expect(res.errors[0].modules).toEqual(['A', 'B']);
    expect(res.errors[0].message).toBe("Trait 'x' is owned by more than one module (A, B).");
  });

  it('rejects owned plus shared', () => {
    expect(errorKinds([
      reg('A', r => r.declare('double', 'owned', 'x', '', 0)),
      reg('B', r => r.declare('double', 'shared', 'x', '', 0)),
    ])).toEqual(['AccessConflict']);
  });

  it('rejects a private trait used by another module', () => {
    expect(errorKinds([
      reg('A', r => r.declare('double', 'private', 'x', '', 0)),
      reg('B', r => r.declare('double', 'shared', 'x', '')),
    ])).toEqual(['AccessConflict']);
  });

  it('rejects declarations with different types', () => {
    expect(errorKinds([
      reg('A', r => r.declare('double', 'owned', 'x', '', 0)),
      reg('B', r => r.declare('int', 'required', 'x', '')),
    ])).toEqual(['AccessConflict']);
  });

  it('rejects shared declarations that disagree on the default', () => {
    expect(errorKinds([
      reg('A', r => r.declare('double', 'shared', 'x', '', 1)),
      reg('B', r => r.declare('double', 'shared', 'x', '', 2)),
    ])).toEqual(['AccessConflict']);
    expect(errorKinds([
      reg('A', r => r.declare('double', 'shared', 'x', '', 1)),
      reg('B', r => r.declare('double', 'shared', 'x', '')),
    ])).toEqual([]);
  });

  it('rejects a required trait nobody provides', () => {
    const res = buildLayout([reg('B', r => r.declare('double', 'required', 'x', ''))]);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors[0].kind).toBe('UnsatisfiedRequiredTrait');
    expect(res.errors[0].message).toBe("Trait 'x' is required by B but no module owns or shares it.");
  });

  it('rejects a trait without an access level', () => {
    expect(errorKinds([reg('A', r => r.declare('double', 'unknown', 'x', ''))])).toEqual(['UnknownAccess']);
  });

  it('rejects a history name that is already taken', () => {
    const res = buildLayout([
      reg('A', r => r.declare('double', 'owned', 'x', '', 0).setArchiveLast()),
      reg('B', r => r.declare('double', 'owned', 'last_x', '', 0)),
    ]);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors.map(e => e.message)).toEqual([
      "History of trait 'x' needs the name 'last_x', which is already declared.",
    ]);
  });

  it('reports every problem at once, module errors first', () => {
    expect(errorKinds([
      reg('A', r => {
        r.declare('double', 'owned', 'x', '', 0);
        r.declare('double', 'owned', 'x', '', 0);
      }),
      reg('B', r => {
        r.declare('double', 'owned', 'x', '', 0);
        r.declare('double', 'required', 'missing', '');
      }),
    ])).toEqual(['DuplicateTrait', 'UnsatisfiedRequiredTrait', 'AccessConflict']);
  });
});
