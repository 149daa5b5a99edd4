// packages/engine/src/expr/lexer.ts
import { ExpressionSyntaxError } from './ast.js';

export type Keyword = 'true' | 'false' | 'null' | 'and' | 'or' | 'not';

export type Token =
  | { kind: 'num'; value: number; pos: number }
  | { kind: 'str'; value: string; pos: number }
  | { kind: 'ident'; name: string; pos: number }
  | { kind: 'kw'; kw: Keyword; pos: number }
  | { kind: 'op'; op: string; pos: number }
  | { kind: 'eof'; pos: number };

const KEYWORDS: ReadonlySet<string> = new Set(['true', 'false', 'null', 'and', 'or', 'not']);
function isKeyword(s: string): s is Keyword { return KEYWORDS.has(s); }

// longest first
const OPERATORS = ['==', '!=', '>=', '<=', '&&', '||', '=', '>', '<', '!', '+', '-', '*', '/', '(', ')', '?', ':'];

const NUMBER = /^(?:\d+(?:\.\d+)?|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENT_START = /[\p{L}_$]/u;
const IDENT_PART = /[\p{L}\p{N}_$]/u;

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r' };

export function tokenize(src: string): Token[] {
  const out: Token[] = [];
  let i = 0;

  while (i < src.length) {
    const ch = src[i];
    if (/\s/.test(ch)) { i++; continue; }

    const num = NUMBER.exec(src.slice(i));
    if (num) {
      out.push({ kind: 'num', value: Number(num[0]), pos: i });
      i += num[0].length;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i++;
      let value = '';
      while (i < src.length && src[i] !== ch) {
        if (src[i] === '\\' && i + 1 < src.length) {
          const next = src[i + 1];
          value += ESCAPES[next] ?? next;
          i += 2;
        } else {
          value += src[i++];
        }
      }
      if (i >= src.length) throw new ExpressionSyntaxError(`unterminated string at ${start}`, start);
      i++;
      out.push({ kind: 'str', value, pos: start });
      continue;
    }

    // `any name`, `/nested/path`
    if (ch === '`') {
      const end = src.indexOf('`', i + 1);
      if (end < 0) throw new ExpressionSyntaxError(`unterminated quoted identifier at ${i}`, i);
      const name = src.slice(i + 1, end);
      if (!name) throw new ExpressionSyntaxError(`empty quoted identifier at ${i}`, i);
      out.push({ kind: 'ident', name, pos: i });
      i = end + 1;
      continue;
    }

    if (IDENT_START.test(ch)) {
      const start = i;
      // step by code point so astral letters stay whole
      while (i < src.length) {
        const cp = String.fromCodePoint(src.codePointAt(i) ?? 0);
        if (!IDENT_PART.test(cp)) break;
        i += cp.length;
      }
      const word = src.slice(start, i);
      const lower = word.toLowerCase();
      out.push(isKeyword(lower) ? { kind: 'kw', kw: lower, pos: start } : { kind: 'ident', name: word, pos: start });
      continue;
    }

    const op = OPERATORS.find(o => src.startsWith(o, i));
    if (op) {
      out.push({ kind: 'op', op, pos: i });
      i += op.length;
      continue;
    }

    throw new ExpressionSyntaxError(`unexpected character '${ch}' at ${i}`, i);
  }

  out.push({ kind: 'eof', pos: src.length });
  return out;
}
