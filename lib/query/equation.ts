// lib/query/equation.ts
// Numeric equations over trait names: tokenize, parse, compile against a data layout.
//
// Grammar (lowest to highest precedence):
//   ||   &&   == !=   < <= > >=   + -   * / %   unary - + !   ^ (right assoc)
// Calls: abs sqrt exp log log2 log10 floor ceil round sin cos tan min max pow clamp if.
// Comparisons and logic produce 1 or 0.

import { ConfigError } from '../errors';
import type { DataLayout } from '../layout/dataLayout';
import type { Organism } from '../population/organism';
import { TRAIT_TYPES } from '../traits/valueTypes';

type BinaryOp = '||' | '&&' | '==' | '!=' | '<' | '<=' | '>' | '>=' | '+' | '-' | '*' | '/' | '%' | '^';
type UnaryOp = '-' | '+' | '!';

export type Expr =
  | { kind: 'num'; value: number }
  | { kind: 'name'; name: string }
  | { kind: 'unary'; op: UnaryOp; arg: Expr }
  | { kind: 'binary'; op: BinaryOp; left: Expr; right: Expr }
  | { kind: 'call'; fn: string; args: Expr[] };

type Token =
  | { t: 'num'; value: number; pos: number }
  | { t: 'name'; name: string; pos: number }
  | { t: 'op'; op: string; pos: number }
  | { t: 'end'; pos: number };

export class EquationError extends Error {
  constructor(message: string, readonly badName: string | null = null) {
    super(message);
    this.name = 'EquationError';
  }
}

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const NUMBER = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/;
const OPERATORS = ['||', '&&', '==', '!=', '<=', '>=', '<', '>', '+', '-', '*', '/', '%', '^', '!', '(', ')', ','];

export function isIdentifier(s: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(s);
}

function tokenize(src: string): Token[] {
  const out: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const c = src[i];
    if (/\s/.test(c)) { i++; continue; }

    if (/[0-9.]/.test(c)) {
      const m = NUMBER.exec(src.slice(i));
      if (!m) throw new EquationError(`Bad number at position ${i} in '${src}'.`);
      out.push({ t: 'num', value: Number(m[0]), pos: i });
      i += m[0].length;
      continue;
    }

    if (IDENT_START.test(c)) {
      let j = i + 1;
      while (j < src.length && IDENT_PART.test(src[j])) j++;
      out.push({ t: 'name', name: src.slice(i, j), pos: i });
      i = j;
      continue;
    }

    const op = OPERATORS.find(o => src.startsWith(o, i));
    if (!op) throw new EquationError(`Unexpected '${c}' at position ${i} in '${src}'.`);
    out.push({ t: 'op', op, pos: i });
    i += op.length;
  }
  out.push({ t: 'end', pos: src.length });
  return out;
}

const BINARY_PREC: Record<BinaryOp, number> = {
  '||': 1,
  '&&': 2,
  '==': 3, '!=': 3,
  '<': 4, '<=': 4, '>': 4, '>=': 4,
  '+': 5, '-': 5,
  '*': 6, '/': 6, '%': 6,
  '^': 8,
};
const UNARY_PREC = 7;

const isBinaryOp = (s: string): s is BinaryOp => Object.prototype.hasOwnProperty.call(BINARY_PREC, s);

class Parser {
  private i = 0;

  constructor(private readonly src: string, private readonly tokens: Token[]) {}

  parse(): Expr {
    const e = this.expr(0);
    const tok = this.peek();
    if (tok.t !== 'end') throw new EquationError(`Unexpected input at position ${tok.pos} in '${this.src}'.`);
    return e;
  }

  private peek(): Token {
    return this.tokens[this.i];
  }

  private isOp(op: string): boolean {
    const tok = this.peek();
    return tok.t === 'op' && tok.op === op;
  }

  private expect(op: string) {
    if (!this.isOp(op)) {
      throw new EquationError(`Expected '${op}' at position ${this.peek().pos} in '${this.src}'.`);
    }
    this.i++;
  }

  private expr(minPrec: number): Expr {
    let left = this.unary();
    for (;;) {
      const tok = this.peek();
      if (tok.t !== 'op' || !isBinaryOp(tok.op)) return left;
      const op = tok.op;
      const prec = BINARY_PREC[op];
      if (prec < minPrec) return left;
      this.i++;
      // '^' is right associative; everything else is left associative.
      const right = this.expr(op === '^' ? prec : prec + 1);
      left = { kind: 'binary', op, left, right };
    }
  }

  private unary(): Expr {
    const tok = this.peek();
    if (tok.t === 'op' && (tok.op === '-' || tok.op === '+' || tok.op === '!')) {
      this.i++;
      const op: UnaryOp = tok.op;
      return { kind: 'unary', op, arg: this.expr(UNARY_PREC) };
    }
    return this.primary();
  }

  private primary(): Expr {
    const tok = this.peek();
    if (tok.t === 'num') {
      this.i++;
      return { kind: 'num', value: tok.value };
    }
    if (tok.t === 'name') {
      this.i++;
      if (!this.isOp('(')) return { kind: 'name', name: tok.name };
      this.i++;
      const args: Expr[] = [];
      if (!this.isOp(')')) {
        args.push(this.expr(0));
        while (this.isOp(',')) {
          this.i++;
          args.push(this.expr(0));
        }
      }
      this.expect(')');
      return { kind: 'call', fn: tok.name, args };
    }
    if (this.isOp('(')) {
      this.i++;
      const e = this.expr(0);
      this.expect(')');
      return e;
    }
    throw new EquationError(
      tok.t === 'end'
        ? `Unexpected end of equation '${this.src}'.`
        : `Unexpected token at position ${tok.pos} in '${this.src}'.`,
    );
  }
}

export function parseEquation(src: string): Expr {
  return new Parser(src, tokenize(src)).parse();
}

type MathFn = { min: number; max: number; fn: (...xs: number[]) => number };

const FUNCTIONS: Record<string, MathFn> = {
  abs: { min: 1, max: 1, fn: Math.abs },
  sqrt: { min: 1, max: 1, fn: Math.sqrt },
  exp: { min: 1, max: 1, fn: Math.exp },
  log: { min: 1, max: 1, fn: Math.log },
  log2: { min: 1, max: 1, fn: Math.log2 },
  log10: { min: 1, max: 1, fn: Math.log10 },
  floor: { min: 1, max: 1, fn: Math.floor },
  ceil: { min: 1, max: 1, fn: Math.ceil },
  round: { min: 1, max: 1, fn: Math.round },
  sin: { min: 1, max: 1, fn: Math.sin },
  cos: { min: 1, max: 1, fn: Math.cos },
  tan: { min: 1, max: 1, fn: Math.tan },
  min: { min: 1, max: Infinity, fn: Math.min },
  max: { min: 1, max: Infinity, fn: Math.max },
  pow: { min: 2, max: 2, fn: Math.pow },
  clamp: { min: 3, max: 3, fn: (x, lo, hi) => Math.min(hi, Math.max(lo, x)) },
};

const bool = (b: boolean) => (b ? 1 : 0);

function binary(op: BinaryOp, a: number, b: number): number {
  switch (op) {
    case '+': return a + b;
    case '-': return a - b;
    case '*': return a * b;
    case '/': return a / b;
    case '%': return a % b;
    case '^': return Math.pow(a, b);
    case '<': return bool(a < b);
    case '<=': return bool(a <= b);
    case '>': return bool(a > b);
    case '>=': return bool(a >= b);
    case '==': return bool(a === b);
    case '!=': return bool(a !== b);
    case '&&': return bool(a !== 0 && b !== 0);
    case '||': return bool(a !== 0 || b !== 0);
  }
}

export type Compiled<C> = (ctx: C) => number;

/** Turn a parsed equation into a closure; `resolve` supplies each name's reader. */
export function compileExpr<C>(expr: Expr, resolve: (name: string) => Compiled<C> | undefined): Compiled<C> {
  switch (expr.kind) {
    case 'num': {
      const v = expr.value;
      return () => v;
    }
    case 'name': {
      const fn = resolve(expr.name);
      if (!fn) throw new EquationError(`Unknown name '${expr.name}'.`, expr.name);
      return fn;
    }
    case 'unary': {
      const arg = compileExpr(expr.arg, resolve);
      if (expr.op === '-') return ctx => -arg(ctx);
      if (expr.op === '!') return ctx => bool(arg(ctx) === 0);
      return arg;
    }
    case 'binary': {
      const op = expr.op;
      const left = compileExpr(expr.left, resolve);
      const right = compileExpr(expr.right, resolve);
      // Short-circuit logic so the right side is skipped when it cannot matter.
      if (op === '&&') return ctx => bool(left(ctx) !== 0 && right(ctx) !== 0);
      if (op === '||') return ctx => bool(left(ctx) !== 0 || right(ctx) !== 0);
      return ctx => binary(op, left(ctx), right(ctx));
    }
    case 'call': {
      const args = expr.args.map(a => compileExpr(a, resolve));
      if (expr.fn === 'if') {
        if (args.length !== 3) throw new EquationError(`if() takes 3 arguments, got ${args.length}.`);
        const [cond, yes, no] = args;
        return ctx => (cond(ctx) !== 0 ? yes(ctx) : no(ctx));
      }
      const def = FUNCTIONS[expr.fn];
      if (!def) throw new EquationError(`Unknown function '${expr.fn}'.`, expr.fn);
      if (args.length < def.min || args.length > def.max) {
        throw new EquationError(`${expr.fn}() cannot take ${args.length} argument(s).`);
      }
      return ctx => def.fn(...args.map(a => a(ctx)));
    }
  }
}

/** Every name an equation reads (function names excluded). */
export function collectNames(expr: Expr, out = new Set<string>()): Set<string> {
  switch (expr.kind) {
    case 'name': out.add(expr.name); break;
    case 'unary': collectNames(expr.arg, out); break;
    case 'binary': collectNames(expr.left, out); collectNames(expr.right, out); break;
    case 'call': expr.args.forEach(a => collectNames(a, out)); break;
    case 'num': break;
  }
  return out;
}

/** Names of all traits an equation uses; empty if it does not parse. */
export function equationTraits(src: string): Set<string> {
  try {
    return collectNames(parseEquation(src));
  } catch (e) {
    if (e instanceof EquationError) return new Set();
    throw e;
  }
}

export type EquationResult =
  | { ok: true; fn: Compiled<Organism>; traits: string[] }
  | { ok: false; error: ConfigError };

/**
 * Compile `src` into a per-organism numeric function for organisms laid out by `layout`.
 * `viewer` is the module asking, if any; private traits of other modules stay hidden.
 */
export function compileEquation(layout: DataLayout, src: string, viewer?: string): EquationResult {
  let expr: Expr;
  try {
    expr = parseEquation(src);
  } catch (e) {
    if (!(e instanceof EquationError)) throw e;
    return { ok: false, error: new ConfigError('EquationSyntax', e.message, { trait: src }) };
  }

  const traits = Array.from(collectNames(expr));
  for (const name of traits) {
    const entry = layout.entry(name, viewer);
    if (!entry) {
      return {
        ok: false,
        error: new ConfigError('UnknownTraitReference', `Equation '${src}' uses unknown trait '${name}'.`, { trait: name }),
      };
    }
    if (!TRAIT_TYPES[entry.type].numeric) {
      return {
        ok: false,
        error: new ConfigError(
          'UnknownTraitReference',
          `Equation '${src}' uses trait '${name}' of non-numeric type '${entry.type}'.`,
          { trait: name },
        ),
      };
    }
  }

  try {
    const fn = compileExpr<Organism>(expr, name => {
      const entry = layout.entry(name, viewer);
      if (!entry) return undefined;
      const id = entry.id;
      return org => org.getNumber(id);
    });
    return { ok: true, fn, traits };
  } catch (e) {
    if (!(e instanceof EquationError)) throw e;
    return { ok: false, error: new ConfigError('EquationSyntax', e.message, { trait: src }) };
  }
}
