// lib/query/preprocess.ts
// ${...} expansion for config strings.

/** Whatever runs the code inside a ${...} span and hands back its text. */
export interface ScriptEvaluator {
  execute(code: string): string;
}

/** Position of the brace closing the one at `open`, or -1. Nested braces are balanced. */
export function findBraceMatch(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === '{') depth++;
    else if (text[i] === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * One left-to-right pass over `text`:
 * - `$$` becomes a literal `$`;
 * - `${code}` is replaced by `evaluator.execute(code)`;
 * - an unmatched `${` ends the pass and everything from it on is kept as is.
 * Substituted text is never scanned again.
 */
export function preprocess(text: string, evaluator: ScriptEvaluator): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const c = text[i];
    if (c !== '$' || i + 1 >= text.length) {
      out += c;
      i++;
      continue;
    }

    const next = text[i + 1];
    if (next === '$') {
      out += '$';
      i += 2;
      continue;
    }
    if (next !== '{') {
      out += c;
      i++;
      continue;
    }

    const end = findBraceMatch(text, i + 1);
    if (end < 0) return out + text.slice(i);
    out += evaluator.execute(text.slice(i + 2, end));
    i = end + 1;
  }
  return out;
}
