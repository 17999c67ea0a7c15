// lib/orchestrator/buildLayout.ts
// Merge every module's trait registry into one frozen DataLayout, collecting all violations.

import { ConfigError } from '../errors';
import { DataLayout, type LayoutEntry } from '../layout/dataLayout';
import type { TraitRegistry } from '../traits/registry';
import type { TraitSpec } from '../traits/traitSpec';
import { ARCHIVE_PREFIX, type TraitValue } from '../traits/types';
import { TRAIT_TYPES, sameValue } from '../traits/valueTypes';

export type RegistryInput = {
  moduleName: string;
  registry: TraitRegistry;
};

export type LayoutResult =
  | { ok: true; layout: DataLayout }
  | { ok: false; errors: ConfigError[] };

type Decl = { moduleName: string; spec: TraitSpec };

type PendingEntry = Omit<LayoutEntry, 'id'>;

const listModules = (ds: Decl[]) => ds.map(d => d.moduleName).join(', ');

function conflict(name: string, ds: Decl[], message: string): ConfigError {
  return new ConfigError('AccessConflict', message, { trait: name, modules: ds.map(d => d.moduleName) });
}

/** Check every declaration of one trait name; returns the violations found. */
function checkTrait(name: string, decls: Decl[]): ConfigError[] {
  const errors: ConfigError[] = [];
  const byAccess = (a: string) => decls.filter(d => d.spec.access === a);
  const owned = byAccess('owned');
  const shared = byAccess('shared');
  const priv = byAccess('private');

  for (const d of byAccess('unknown')) {
    errors.push(new ConfigError(
      'UnknownAccess',
      `Module ${d.moduleName} declares trait '${name}' without an access level.`,
      { trait: name, modules: [d.moduleName] },
    ));
  }

  if (owned.length > 1) {
    errors.push(conflict(name, owned, `Trait '${name}' is owned by more than one module (${listModules(owned)}).`));
  }
  if (owned.length && shared.length) {
    errors.push(conflict(name, [...owned, ...shared],
      `Trait '${name}' is owned by ${listModules(owned)} but shared by ${listModules(shared)}.`));
  }
  if (priv.length && decls.length > 1) {
    const others = decls.filter(d => d !== priv[0]);
    errors.push(conflict(name, decls,
      `Trait '${name}' is private to module ${priv[0].moduleName} but also used by ${listModules(others)}.`));
  }

  const types = new Set(decls.map(d => d.spec.type));
  if (types.size > 1) {
    errors.push(conflict(name, decls,
      `Trait '${name}' is declared with different types: ${decls.map(d => `${d.moduleName} (${d.spec.type})`).join(', ')}.`));
  }

  const sharedDefaults: { d: Decl; v: TraitValue }[] = [];
  for (const d of shared) {
    const v = d.spec.defaultValue;
    if (v !== undefined) sharedDefaults.push({ d, v });
  }
  if (sharedDefaults.some(x => !sameValue(x.v, sharedDefaults[0].v))) {
    errors.push(conflict(name, sharedDefaults.map(x => x.d),
      `Shared trait '${name}' has disagreeing defaults: ${sharedDefaults.map(x => `${x.d.moduleName} (${JSON.stringify(x.v)})`).join(', ')}.`));
  }

  const providers = [...owned, ...shared, ...priv];
  if (providers.length && !providers.some(d => d.spec.hasDefault())) {
    errors.push(new ConfigError(
      'InvalidDefault',
      `Trait '${name}' has no default value; at least one of ${listModules(providers)} must set one.`,
      { trait: name, modules: providers.map(d => d.moduleName) },
    ));
  }

  const required = byAccess('required');
  if (required.length && !owned.length && !shared.length) {
    errors.push(new ConfigError(
      'UnsatisfiedRequiredTrait',
      `Trait '${name}' is required by ${listModules(required)} but no module owns or shares it.`,
      { trait: name, modules: required.map(d => d.moduleName) },
    ));
  }

  return errors;
}

function toEntries(name: string, decls: Decl[]): PendingEntry[] {
  const provider =
    decls.find(d => d.spec.access === 'owned') ??
    decls.find(d => d.spec.access === 'shared') ??
    decls.find(d => d.spec.access === 'private');
  if (!provider) return [];

  const spec = provider.spec;
  const ops = TRAIT_TYPES[spec.type];
  const withDefault = decls.find(d => d.spec.defaultValue !== undefined);
  const defaultValue = spec.defaultValue ?? withDefault?.spec.defaultValue ?? ops.zero();

  const base: PendingEntry = {
    name,
    type: spec.type,
    access: spec.access,
    owner: spec.access === 'shared' ? null : provider.moduleName,
    modules: decls.map(d => d.moduleName),
    description: spec.description,
    defaultValue,
    inheritance: spec.inheritance,
    archive: spec.archive,
    resetParent: spec.resetParent,
    archiveOf: null,
  };
  if (spec.archive === 'none' || ops.listType === null) return [base];

  const historyType = spec.archive === 'last_reset' ? spec.type : ops.listType;
  const history: PendingEntry = {
    ...base,
    name: `${ARCHIVE_PREFIX[spec.archive]}${name}`,
    type: historyType,
    description: `History (${spec.archive}) of '${name}'.`,
    defaultValue: spec.archive === 'last_reset' ? defaultValue : TRAIT_TYPES[historyType].zero(),
    inheritance: 'default',
    archive: 'none',
    resetParent: false,
    archiveOf: name,
  };
  return [base, history];
}

/**
 * Build the layout for one population from the registries of the modules acting on it.
 * Always runs to the end so a user sees every misconfiguration at once.
 */
export function buildLayout(inputs: RegistryInput[]): LayoutResult {
  const errors: ConfigError[] = [];
  const byName = new Map<string, Decl[]>();

  for (const { moduleName, registry } of inputs) {
    errors.push(...registry.errors());
    for (const spec of registry.list()) {
      const arr = byName.get(spec.name) ?? [];
      arr.push({ moduleName, spec });
      byName.set(spec.name, arr);
    }
  }

  const names = Array.from(byName.keys()).sort((a, b) => a.localeCompare(b));
  const pending: PendingEntry[] = [];
  for (const name of names) {
    const decls = byName.get(name) ?? [];
    const traitErrors = checkTrait(name, decls);
    errors.push(...traitErrors);
    if (!traitErrors.length) pending.push(...toEntries(name, decls));
  }

  const seen = new Map<string, PendingEntry>();
  for (const e of pending) {
    const prev = seen.get(e.name);
    if (prev) {
      const source = e.archiveOf ?? prev.archiveOf;
      errors.push(new ConfigError(
        'AccessConflict',
        `History of trait '${source}' needs the name '${e.name}', which is already declared.`,
        { trait: e.name, modules: [...prev.modules, ...e.modules] },
      ));
    }
    seen.set(e.name, e);
  }

  if (errors.length) return { ok: false, errors };

  const entries: LayoutEntry[] = pending
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((e, id) => ({ ...e, id }));
  return { ok: true, layout: new DataLayout(entries) };
}
