// lib/traits/registry.ts
// Per-module collection of trait declarations, keyed by name.

import { ConfigError } from '../errors';
import { TraitSpec } from './traitSpec';
import type { TraitAccess, TraitTypeId, TraitValueMap } from './types';

export class TraitRegistry {
  private readonly specs = new Map<string, TraitSpec>();
  private readonly detached: TraitSpec[] = [];
  private readonly errs: ConfigError[] = [];
  private frozen = false;

  constructor(readonly moduleName: string) {}

  /**
   * Declare a trait this module works with.
   * A repeated name records a DuplicateTrait error and the first declaration stays
   * in place; the returned handle for the repeat is detached from the registry.
   */
  declare<K extends TraitTypeId>(
    type: K,
    access: TraitAccess,
    name: string,
    description: string,
    defaultValue?: TraitValueMap[K],
  ): TraitSpec<K> {
    if (this.frozen) {
      throw new Error(`Module ${this.moduleName} cannot declare trait '${name}' after setup.`);
    }

    const spec = new TraitSpec<K>({
      name,
      description,
      type,
      access,
      moduleName: this.moduleName,
      onError: (err) => this.errs.push(err),
    });

    if (this.specs.has(name)) {
      this.errs.push(new ConfigError(
        'DuplicateTrait',
        `Module ${this.moduleName} is creating a duplicate trait named '${name}'.`,
        { trait: name, modules: [this.moduleName] },
      ));
      this.detached.push(spec);
    } else {
      this.specs.set(name, spec);
    }

    if (defaultValue !== undefined) spec.setDefault(defaultValue);
    return spec;
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  get(name: string): TraitSpec | undefined {
    return this.specs.get(name);
  }

  /** Declarations in the order they were made. */
  list(): TraitSpec[] {
    return Array.from(this.specs.values());
  }

  get size(): number {
    return this.specs.size;
  }

  errors(): ConfigError[] {
    return [...this.errs];
  }

  /** Ends the setup phase: every declaration becomes read-only. */
  freeze() {
    this.frozen = true;
    for (const spec of this.specs.values()) spec.freeze();
    for (const spec of this.detached) spec.freeze();
  }

  isFrozen(): boolean {
    return this.frozen;
  }
}
