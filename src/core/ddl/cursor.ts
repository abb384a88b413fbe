import { isIdentifier, isPunct, isWord } from './lexer.js';
import type { Token } from './lexer.js';
import { normalizeWhitespace } from '../../util/index.js';

/** A possibly schema-qualified identifier as written. */
export interface QualifiedName {
  readonly schema: string | null;
  readonly name: string;
  readonly quoted: boolean;
}

/** Fold an identifier token the way PostgreSQL does: unquoted names lower-case. */
export function foldIdentifier(token: Token): string {
  return token.kind === 'quoted' ? token.value : token.value.toLowerCase();
}

/** Fold a qualified name into a `schema.table` lookup key. */
export function tableKey(schema: string | null, name: string, quoted: boolean): string {
  const folded = quoted ? name : name.toLowerCase();
  return `${schema ?? 'public'}.${folded}`;
}

/** Split a token run on top-level commas. */
export function splitOnCommas(tokens: readonly Token[]): Token[][] {
  const parts: Token[][] = [];
  let current: Token[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) depth--;
    if (depth === 0 && isPunct(token, ',')) {
      parts.push(current);
      current = [];
      continue;
    }
    current.push(token);
  }
  if (current.length > 0) {
    parts.push(current);
  }
  return parts;
}

/** Source text spanned by a token run, whitespace-normalized. */
export function sliceText(source: string, tokens: readonly Token[]): string {
  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  if (first === undefined || last === undefined) {
    return '';
  }
  return normalizeWhitespace(source.slice(first.start, last.end));
}

/**
 * Forward-only reader over the tokens of one statement.
 * All `accept*` methods consume only on a match.
 */
export class TokenCursor {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  peek(offset = 0): Token | undefined {
    return this.tokens[this.index + offset];
  }

  next(): Token | undefined {
    const token = this.tokens[this.index];
    if (token !== undefined) {
      this.index++;
    }
    return token;
  }

  atEnd(): boolean {
    return this.index >= this.tokens.length;
  }

  acceptWord(...words: string[]): string | null {
    const token = this.peek();
    if (token !== undefined && isWord(token, ...words)) {
      this.index++;
      return token.text.toUpperCase();
    }
    return null;
  }

  /** Consume the words in order, or nothing. */
  acceptSequence(...words: string[]): boolean {
    for (const [offset, word] of words.entries()) {
      if (!isWord(this.peek(offset), word)) {
        return false;
      }
    }
    this.index += words.length;
    return true;
  }

  acceptPunct(char: string): boolean {
    if (isPunct(this.peek(), char)) {
      this.index++;
      return true;
    }
    return false;
  }

  /** Read `name`, `schema.name` or `db.schema.name`. */
  readName(): QualifiedName | null {
    const parts: Token[] = [];
    const first = this.peek();
    if (!isIdentifier(first)) {
      return null;
    }
    parts.push(first);
    this.index++;
    while (isPunct(this.peek(), '.') && isIdentifier(this.peek(1))) {
      const part = this.peek(1);
      if (part === undefined) break;
      parts.push(part);
      this.index += 2;
    }
    const nameToken = parts[parts.length - 1] ?? first;
    const schemaToken = parts.length > 1 ? parts[parts.length - 2] : undefined;
    return {
      schema: schemaToken !== undefined ? foldIdentifier(schemaToken) : null,
      name: nameToken.value,
      quoted: nameToken.kind === 'quoted',
    };
  }

  /** Consume a balanced parenthesized group and return its inner tokens. */
  readGroup(): Token[] | null {
    if (!isPunct(this.peek(), '(')) {
      return null;
    }
    const inner: Token[] = [];
    let depth = 0;
    while (!this.atEnd()) {
      const token = this.next();
      if (token === undefined) break;
      if (isPunct(token, '(')) {
        depth++;
        if (depth === 1) continue;
      } else if (isPunct(token, ')')) {
        depth--;
        if (depth === 0) break;
      }
      inner.push(token);
    }
    return inner;
  }

  /**
   * Consume tokens until `stop` matches a token at parenthesis depth 0.
   * The stopping token is left unread.
   */
  readUntil(stop: (token: Token) => boolean): Token[] {
    const taken: Token[] = [];
    let depth = 0;
    while (!this.atEnd()) {
      const token = this.peek();
      if (token === undefined) break;
      if (depth === 0 && stop(token)) break;
      if (isPunct(token, '(')) depth++;
      if (isPunct(token, ')')) depth--;
      taken.push(token);
      this.index++;
    }
    return taken;
  }

  rest(): Token[] {
    const remaining = this.tokens.slice(this.index);
    this.index = this.tokens.length;
    return remaining;
  }
}
