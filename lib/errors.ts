// lib/errors.ts
// Configuration errors collected during setup and reported at query time.

export type ConfigErrorKind =
  | 'DuplicateTrait'
  | 'AccessConflict'
  | 'UnsatisfiedRequiredTrait'
  | 'MissingPopulation'
  | 'UnknownTraitReference'
  | 'EquationSyntax'
  | 'UnknownAggregationMode'
  | 'IndexOutOfRange'
  | 'InvalidInheritance'
  | 'InvalidArchive'
  | 'InvalidDefault'
  | 'UnknownAccess';

export class ConfigError extends Error {
  readonly kind: ConfigErrorKind;
  /** Trait (or equation) the error is about, when there is one. */
  readonly trait: string | null;
  /** Modules involved, in declaration order. */
  readonly modules: string[];

  constructor(kind: ConfigErrorKind, message: string, opts: { trait?: string; modules?: string[] } = {}) {
    super(message);
    this.name = 'ConfigError';
    this.kind = kind;
    this.trait = opts.trait ?? null;
    this.modules = opts.modules ?? [];
  }
}

export function formatErrors(errors: ConfigError[]): string[] {
  return errors.map(e => `[${e.kind}] ${e.message}`);
}
