import { ValidationError } from '../errors';

export type TokenType =
  | 'whitespace'
  | 'comment'
  | 'word'
  | 'quoted_identifier'
  | 'string'
  | 'number'
  | 'placeholder'
  | 'operator'
  | 'punctuation';

export interface Token {
  type: TokenType;
  /** Source text exactly as written. */
  text: string;
  /** Upper-cased text for words, unescaped name for quoted identifiers, raw text otherwise. */
  value: string;
  start: number;
  end: number;
}

const WORD_START = /[A-Za-z_]/;
const WORD_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;
const OPERATOR_CHARS = new Set(['+', '-', '*', '/', '<', '>', '=', '~', '!', '@', '#', '%', '^', '&', '|', ':']);
const PUNCTUATION = new Set(['(', ')', ',', ';', '.', '[', ']']);

/**
 * Splits a Postgres SELECT into tokens. Whitespace and comments are kept so the
 * rewriter can reproduce the original text around its edits.
 */
export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const push = (type: TokenType, start: number, end: number, value?: string) => {
    const text = sql.slice(start, end);
    tokens.push({ type, text, value: value ?? text, start, end });
    pos = end;
  };

  while (pos < sql.length) {
    const ch = sql[pos];
    const next = sql[pos + 1];

    if (/\s/.test(ch)) {
      let end = pos + 1;
      while (end < sql.length && /\s/.test(sql[end])) end++;
      push('whitespace', pos, end);
      continue;
    }

    if (ch === '-' && next === '-') {
      let end = sql.indexOf('\n', pos);
      if (end === -1) end = sql.length;
      push('comment', pos, end);
      continue;
    }

    if (ch === '/' && next === '*') {
      push('comment', pos, readBlockComment(sql, pos));
      continue;
    }

    if ((ch === 'E' || ch === 'e') && next === "'") {
      const end = readQuoted(sql, pos + 1, "'", true);
      push('string', pos, end);
      continue;
    }

    if (WORD_START.test(ch)) {
      let end = pos + 1;
      while (end < sql.length && WORD_PART.test(sql[end])) end++;
      push('word', pos, end, sql.slice(pos, end).toUpperCase());
      continue;
    }

    if (ch === "'") {
      push('string', pos, readQuoted(sql, pos, "'", false));
      continue;
    }

    if (ch === '"') {
      const end = readQuoted(sql, pos, '"', false);
      push('quoted_identifier', pos, end, sql.slice(pos + 1, end - 1).replace(/""/g, '"'));
      continue;
    }

    if (DIGIT.test(ch) || (ch === '.' && next !== undefined && DIGIT.test(next))) {
      push('number', pos, readNumber(sql, pos));
      continue;
    }

    if (ch === '?') {
      push('placeholder', pos, pos + 1);
      continue;
    }

    if (ch === '$') {
      if (next !== undefined && DIGIT.test(next)) {
        let end = pos + 1;
        while (end < sql.length && DIGIT.test(sql[end])) end++;
        push('placeholder', pos, end);
        continue;
      }
      push('string', pos, readDollarQuoted(sql, pos));
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      push('punctuation', pos, pos + 1);
      continue;
    }

    if (OPERATOR_CHARS.has(ch)) {
      let end = pos + 1;
      while (end < sql.length && OPERATOR_CHARS.has(sql[end]) && !startsComment(sql, end)) end++;
      push('operator', pos, end);
      continue;
    }

    throw new ValidationError(`Unexpected character "${ch}" at position ${pos}`, { position: pos });
  }

  return tokens;
}

export function isSignificant(token: Token): boolean {
  return token.type !== 'whitespace' && token.type !== 'comment';
}

export function isKeyword(token: Token | undefined, ...keywords: string[]): boolean {
  return token !== undefined && token.type === 'word' && keywords.includes(token.value);
}

export function isPunctuation(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.type === 'punctuation' && token.text === text;
}

function startsComment(sql: string, pos: number): boolean {
  return (sql[pos] === '-' && sql[pos + 1] === '-') || (sql[pos] === '/' && sql[pos + 1] === '*');
}

function readBlockComment(sql: string, start: number): number {
  // Postgres block comments nest
  let depth = 0;
  let pos = start;
  while (pos < sql.length) {
    if (sql[pos] === '/' && sql[pos + 1] === '*') {
      depth++;
      pos += 2;
    } else if (sql[pos] === '*' && sql[pos + 1] === '/') {
      depth--;
      pos += 2;
      if (depth === 0) return pos;
    } else {
      pos++;
    }
  }
  throw new ValidationError('Unterminated block comment', { position: start });
}

function readQuoted(sql: string, start: number, quote: string, backslashEscapes: boolean): number {
  let pos = start + 1;
  while (pos < sql.length) {
    const ch = sql[pos];
    if (backslashEscapes && ch === '\\') {
      pos += 2;
      continue;
    }
    if (ch === quote) {
      if (sql[pos + 1] === quote) {
        pos += 2;
        continue;
      }
      return pos + 1;
    }
    pos++;
  }
  throw new ValidationError(quote === '"' ? 'Unterminated quoted identifier' : 'Unterminated string literal', {
    position: start,
  });
}

function readDollarQuoted(sql: string, start: number): number {
  const match = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/.exec(sql.slice(start));
  if (!match) {
    throw new ValidationError(`Unexpected character "$" at position ${start}`, { position: start });
  }
  const tag = match[0];
  const close = sql.indexOf(tag, start + tag.length);
  if (close === -1) {
    throw new ValidationError('Unterminated dollar-quoted string', { position: start });
  }
  return close + tag.length;
}

function readNumber(sql: string, start: number): number {
  let pos = start;
  while (pos < sql.length && DIGIT.test(sql[pos])) pos++;
  if (sql[pos] === '.' && sql[pos + 1] !== '.') {
    pos++;
    while (pos < sql.length && DIGIT.test(sql[pos])) pos++;
  }
  if ((sql[pos] === 'e' || sql[pos] === 'E') && /[0-9+-]/.test(sql[pos + 1] ?? '')) {
    pos += 2;
    while (pos < sql.length && DIGIT.test(sql[pos])) pos++;
  }
  return pos;
}
