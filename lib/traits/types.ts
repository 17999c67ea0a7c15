// lib/traits/types.ts
// Trait declaration vocabulary shared by modules, registries and layouts.

/** Which modules may read or write a trait. */
export type TraitAccess =
  | 'unknown'   // access level never set; always a configuration problem
  | 'owned'     // this module reads & writes; others may only read
  | 'shared'    // every sharing module reads & writes
  | 'required'  // this module reads; another module must write
  | 'private';  // this module reads & writes; nobody else may use it

/**
 * How a newborn organism gets its value.
 * Injected organisms always start from the default.
 */
export type TraitInheritance =
  | 'default'   // pre-set default value
  | 'parent'    // copied from the first parent
  | 'average'   // mean across parents
  | 'minimum'   // lowest across parents
  | 'maximum';  // highest across parents

/** What history of a trait is kept as the run goes. */
export type TraitArchive =
  | 'none'
  | 'last_reset'   // value at last reset, in `last_<name>`
  | 'all_resets'   // values at every reset, in `archive_<name>`
  | 'all_changes'; // every value ever set, in `sequence_<name>`

export type TraitValueMap = {
  double: number;
  int: number;
  bool: boolean;
  string: string;
  'double[]': number[];
  'string[]': string[];
};

export type TraitTypeId = keyof TraitValueMap;

export type TraitValue = TraitValueMap[TraitTypeId];

export const ARCHIVE_PREFIX: Record<Exclude<TraitArchive, 'none'>, string> = {
  last_reset: 'last_',
  all_resets: 'archive_',
  all_changes: 'sequence_',
};
