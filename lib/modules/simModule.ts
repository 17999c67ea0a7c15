// lib/modules/simModule.ts
// Base class for simulation modules (evaluators, selectors, placement, analyzers).

import type { ConfigError } from '../errors';
import type { Population } from '../population/population';
import { TraitRegistry } from '../traits/registry';
import type { TraitSpec } from '../traits/traitSpec';
import type { TraitAccess, TraitTypeId, TraitValueMap } from '../traits/types';

export type ModuleRole = 'evaluate' | 'select' | 'placement' | 'analyze';

export type ReplicationType =
  | 'no_preference'
  | 'require_async'
  | 'default_async'
  | 'default_sync'
  | 'require_sync';

export abstract class SimModule {
  readonly traits: TraitRegistry;

  private readonly roles = new Set<ModuleRole>();
  private repType: ReplicationType = 'no_preference';
  private requiredPops = 0;
  private readonly pops: Population[] = [];

  constructor(readonly name: string, readonly description = '') {
    this.traits = new TraitRegistry(name);
  }

  /** Configuration problems found so far, as user-facing lines. */
  errors(): string[] {
    return this.traits.errors().map(e => e.message);
  }

  configErrors(): ConfigError[] {
    return this.traits.errors();
  }

  is(role: ModuleRole): boolean {
    return this.roles.has(role);
  }

  setRole(role: ModuleRole, on = true): this {
    if (on) this.roles.add(role);
    else this.roles.delete(role);
    return this;
  }

  get replication(): ReplicationType {
    return this.repType;
  }

  requireAsync(): this { this.repType = 'require_async'; return this; }
  defaultAsync(): this { this.repType = 'default_async'; return this; }
  defaultSync(): this { this.repType = 'default_sync'; return this; }
  requireSync(): this { this.repType = 'require_sync'; return this; }

  getRequiredPops(): number {
    return this.requiredPops;
  }

  addPopulation(pop: Population): this {
    this.pops.push(pop);
    return this;
  }

  populations(): readonly Population[] {
    return this.pops;
  }

  /** Declare traits here; runs once before layouts are built. */
  setupTraits(): void {}

  /** Runs after every layout is built and frozen. */
  setup(): void {}

  update(_update: number): void {}

  finishSetup() {
    this.traits.freeze();
  }

  // --- for derived modules ---

  protected setRequiredPops(n: number) {
    this.requiredPops = n;
  }

  protected addTrait<K extends TraitTypeId>(
    type: K,
    access: TraitAccess,
    name: string,
    description: string,
    defaultValue?: TraitValueMap[K],
  ): TraitSpec<K> {
    return this.traits.declare(type, access, name, description, defaultValue);
  }

  /** Read & write; no other module may use it. */
  protected addPrivateTrait<K extends TraitTypeId>(type: K, name: string, description: string, defaultValue: TraitValueMap[K]) {
    return this.addTrait(type, 'private', name, description, defaultValue);
  }

  /** Read & write; other modules may only read. */
  protected addOwnedTrait<K extends TraitTypeId>(type: K, name: string, description: string, defaultValue: TraitValueMap[K]) {
    return this.addTrait(type, 'owned', name, description, defaultValue);
  }

  /**
   * Read & write, as may every other sharing module.
   * A default is optional, but sharing modules that give one must agree on it.
   */
  protected addSharedTrait<K extends TraitTypeId>(type: K, name: string, description: string, defaultValue?: TraitValueMap[K]) {
    return this.addTrait(type, 'shared', name, description, defaultValue);
  }

  /** Read only; another module must write it. */
  protected addRequiredTrait<K extends TraitTypeId>(type: K, name: string, description: string) {
    return this.addTrait(type, 'required', name, description);
  }
}
