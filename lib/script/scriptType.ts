// lib/script/scriptType.ts
// Named object types visible to config scripts, with their member functions.

import { Collection } from '../population/collection';
import { Population } from '../population/population';

export type ScriptValue = number | string | Population | Collection;

export type MemberFn<T> = (self: T, ...args: ScriptValue[]) => ScriptValue;

type Member<T> = { fn: MemberFn<T>; description: string };

export class ScriptType<T> {
  private readonly members = new Map<string, Member<T>>();

  constructor(readonly name: string, readonly description: string) {}

  addMember(name: string, fn: MemberFn<T>, description: string): this {
    if (this.members.has(name)) throw new Error(`Type ${this.name} already has a member '${name}'.`);
    this.members.set(name, { fn, description });
    return this;
  }

  hasMember(name: string): boolean {
    return this.members.has(name);
  }

  memberNames(): string[] {
    return Array.from(this.members.keys());
  }

  describe(name: string): string {
    return this.members.get(name)?.description ?? '';
  }

  call(self: T, name: string, args: ScriptValue[]): ScriptValue {
    const m = this.members.get(name);
    if (!m) throw new Error(`Type ${this.name} has no member function '${name}'.`);
    return m.fn(self, ...args);
  }
}

// Argument readers for member and global functions.

export function textArg(fn: string, args: ScriptValue[], i: number): string {
  const v = args[i];
  if (typeof v === 'string') return v;
  if (typeof v === 'number') return String(v);
  throw new Error(`${fn}: argument ${i + 1} must be a string.`);
}

export function populationArg(fn: string, args: ScriptValue[], i: number): Population {
  const v = args[i];
  if (v instanceof Population) return v;
  throw new Error(`${fn}: argument ${i + 1} must be a Population.`);
}
