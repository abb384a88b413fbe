export type TokenKind = 'word' | 'quoted' | 'string' | 'number' | 'punct' | 'operator';

/** A lexical token of comment-free SQL text. */
export interface Token {
  readonly kind: TokenKind;
  /** Source text of the token. */
  readonly text: string;
  /** Identifier value: quotes stripped for quoted identifiers, otherwise the text. */
  readonly value: string;
  readonly start: number;
  readonly end: number;
}

const WORD_START = /[A-Za-z_\u0080-\uffff]/;
const WORD_PART = /[A-Za-z0-9_$\u0080-\uffff]/;
const DIGIT = /[0-9]/;
const OPERATOR_CHARS = new Set(['+', '-', '*', '/', '<', '>', '=', '~', '!', '@', '#', '%', '^', '&', '|', '`', '?', ':']);
const PUNCT_CHARS = new Set(['(', ')', ',', '.', ';', '[', ']']);
const DOLLAR_TAG = /^\$(?:[A-Za-z_\u0080-\uffff][A-Za-z0-9_\u0080-\uffff]*)?\$/;

/**
 * Return the end offset (exclusive) of a quoted run starting at `start`, where
 * `quote` doubled inside the run is an escape. Unterminated runs end at the text end.
 */
export function scanQuoted(text: string, start: number, quote: string, backslashEscapes = false): number {
  let i = start + 1;
  while (i < text.length) {
    const c = text[i];
    if (backslashEscapes && c === '\\') {
      i += 2;
      continue;
    }
    if (c === quote) {
      if (text[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return text.length;
}

/**
 * Return the end offset of a dollar-quoted body starting at `start`, or null
 * when no dollar-quote tag opens there.
 */
export function scanDollarQuoted(text: string, start: number): number | null {
  const match = DOLLAR_TAG.exec(text.slice(start, start + 64));
  if (match === null) {
    return null;
  }
  const tag = match[0];
  const close = text.indexOf(tag, start + tag.length);
  return close === -1 ? text.length : close + tag.length;
}

/**
 * Split comment-free SQL text into tokens. Whitespace is dropped; any
 * character the lexer does not recognize becomes a one-character operator.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  const push = (kind: TokenKind, start: number, end: number, value?: string): void => {
    const tokenText = text.slice(start, end);
    tokens.push({ kind, text: tokenText, value: value ?? tokenText, start, end });
  };

  while (i < text.length) {
    const c = text.charAt(i);

    if (/\s/.test(c)) {
      i++;
      continue;
    }

    if ((c === 'E' || c === 'e') && text[i + 1] === "'") {
      const end = scanQuoted(text, i + 1, "'", true);
      push('string', i, end);
      i = end;
      continue;
    }

    if (c === "'") {
      const end = scanQuoted(text, i, "'");
      push('string', i, end);
      i = end;
      continue;
    }

    if (c === '"') {
      const end = scanQuoted(text, i, '"');
      const inner = text.slice(i + 1, text[end - 1] === '"' && end - 1 > i ? end - 1 : end);
      push('quoted', i, end, inner.replace(/""/g, '"'));
      i = end;
      continue;
    }

    if (c === '$') {
      const end = scanDollarQuoted(text, i);
      if (end !== null) {
        push('string', i, end);
        i = end;
        continue;
      }
      let j = i + 1;
      while (j < text.length && DIGIT.test(text.charAt(j))) j++;
      push('operator', i, j);
      i = j;
      continue;
    }

    if (WORD_START.test(c)) {
      let j = i + 1;
      while (j < text.length && WORD_PART.test(text.charAt(j))) j++;
      push('word', i, j);
      i = j;
      continue;
    }

    if (DIGIT.test(c) || (c === '.' && DIGIT.test(text.charAt(i + 1)))) {
      const match = /^[0-9]*\.?[0-9]+(?:[eE][+-]?[0-9]+)?/.exec(text.slice(i));
      const end = i + (match?.[0].length ?? 1);
      push('number', i, end);
      i = end;
      continue;
    }

    if (PUNCT_CHARS.has(c)) {
      push('punct', i, i + 1);
      i++;
      continue;
    }

    if (OPERATOR_CHARS.has(c)) {
      let j = i + 1;
      while (j < text.length && OPERATOR_CHARS.has(text.charAt(j))) j++;
      push('operator', i, j);
      i = j;
      continue;
    }

    push('operator', i, i + 1);
    i++;
  }

  return tokens;
}

/** True when the token is an unquoted word equal (case-insensitively) to one of `words`. */
export function isWord(token: Token | undefined, ...words: string[]): boolean {
  if (token === undefined || token.kind !== 'word') {
    return false;
  }
  const upper = token.text.toUpperCase();
  return words.some((w) => w === upper);
}

/** True when the token is the given punctuation character. */
export function isPunct(token: Token | undefined, char: string): boolean {
  return token !== undefined && token.kind === 'punct' && token.text === char;
}

/** True when the token can name a table, column, index or policy. */
export function isIdentifier(token: Token | undefined): token is Token {
  return token !== undefined && (token.kind === 'word' || token.kind === 'quoted');
}
