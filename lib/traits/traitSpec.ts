// lib/traits/traitSpec.ts
// One declared trait: type, access, default, inheritance and archive policy.

import { ConfigError } from '../errors';
import type { TraitAccess, TraitArchive, TraitInheritance, TraitTypeId, TraitValueMap } from './types';
import { TRAIT_TYPES } from './valueTypes';

export type TraitSpecInit<K extends TraitTypeId> = {
  name: string;
  description: string;
  type: K;
  access: TraitAccess;
  moduleName: string;
  onError: (err: ConfigError) => void;
};

/**
 * Mutable during its module's setup through the chained setters; frozen afterwards.
 *
 *   this.addOwnedTrait('double', 'energy', 'Stored energy', 1.0)
 *     .setInheritAverage()
 *     .setArchiveLast();
 */
export class TraitSpec<K extends TraitTypeId = TraitTypeId> {
  readonly name: string;
  readonly description: string;
  readonly type: K;
  readonly access: TraitAccess;
  readonly moduleName: string;

  private defaultVal: TraitValueMap[K] | undefined = undefined;
  private inherit: TraitInheritance = 'default';
  private archivePolicy: TraitArchive = 'none';
  private resetParentToo = false;
  private frozen = false;
  private readonly onError: (err: ConfigError) => void;

  constructor(init: TraitSpecInit<K>) {
    this.name = init.name;
    this.description = init.description;
    this.type = init.type;
    this.access = init.access;
    this.moduleName = init.moduleName;
    this.onError = init.onError;
  }

  get defaultValue(): TraitValueMap[K] | undefined { return this.defaultVal; }
  get inheritance(): TraitInheritance { return this.inherit; }
  get archive(): TraitArchive { return this.archivePolicy; }
  get resetParent(): boolean { return this.resetParentToo; }

  /** Whether a usable default exists, whatever the trait's type. */
  hasDefault(): boolean {
    return this.defaultVal !== undefined;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  setDefault(value: TraitValueMap[K]): this {
    this.assertMutable();
    if (this.access === 'required') {
      this.onError(new ConfigError(
        'InvalidDefault',
        `Module ${this.moduleName} gives required trait '${this.name}' a default; required traits are set by another module.`,
        { trait: this.name, modules: [this.moduleName] },
      ));
      return this;
    }
    this.defaultVal = value;
    return this;
  }

  /** Offspring copy the (first) parent's value. */
  setInheritParent(): this { return this.setInheritance('parent'); }
  /** Offspring get the mean across parents. */
  setInheritAverage(): this { return this.setInheritance('average'); }
  /** Offspring get the lowest value across parents. */
  setInheritMinimum(): this { return this.setInheritance('minimum'); }
  /** Offspring get the highest value across parents. */
  setInheritMaximum(): this { return this.setInheritance('maximum'); }

  /** The parent is reset alongside the offspring on birth. */
  setParentReset(): this {
    this.assertMutable();
    this.resetParentToo = true;
    return this;
  }

  setArchiveLast(): this { return this.setArchive('last_reset'); }
  setArchiveAll(): this { return this.setArchive('all_resets'); }
  setArchiveChanges(): this { return this.setArchive('all_changes'); }

  private setInheritance(mode: TraitInheritance): this {
    this.assertMutable();
    if (mode !== 'default' && mode !== 'parent' && !TRAIT_TYPES[this.type].numeric) {
      this.onError(new ConfigError(
        'InvalidInheritance',
        `Module ${this.moduleName} sets '${mode}' inheritance on trait '${this.name}' of non-numeric type '${this.type}'.`,
        { trait: this.name, modules: [this.moduleName] },
      ));
      return this;
    }
    this.inherit = mode;
    return this;
  }

  private setArchive(mode: TraitArchive): this {
    this.assertMutable();
    if (TRAIT_TYPES[this.type].listType === null) {
      this.onError(new ConfigError(
        'InvalidArchive',
        `Module ${this.moduleName} cannot archive trait '${this.name}' of type '${this.type}'.`,
        { trait: this.name, modules: [this.moduleName] },
      ));
      return this;
    }
    this.archivePolicy = mode;
    return this;
  }

  private assertMutable() {
    if (this.frozen) {
      throw new Error(`Trait '${this.name}' of module ${this.moduleName} is frozen; declarations can only change during setup.`);
    }
  }
}
