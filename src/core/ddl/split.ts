import { scanDollarQuoted, scanQuoted } from './lexer.js';

/** One top-level statement cut out of a DDL document. */
export interface RawStatement {
  /** Statement text with comments blanked out and the terminating `;` removed. */
  readonly text: string;
  /** 1-based line of the first non-blank character. */
  readonly line: number;
  readonly terminated: boolean;
}

/**
 * Lines starting with one of these (at parenthesis depth 0) begin a new
 * statement, so an open statement before them is missing its semicolon.
 */
const STATEMENT_START =
  /^(?:CREATE\s+(?:OR\s+REPLACE\s+)?(?:(?:GLOBAL|LOCAL)\s+)?(?:(?:TEMP|TEMPORARY|UNLOGGED|UNIQUE|MATERIALIZED)\s+)?(?:TABLE|INDEX|POLICY|VIEW|FUNCTION|PROCEDURE|TRIGGER|TYPE|SCHEMA|EXTENSION|SEQUENCE|ROLE|DOMAIN)\b|ALTER\s+TABLE\b|DROP\s+(?:TABLE|INDEX|POLICY|VIEW|FUNCTION|PROCEDURE|TRIGGER|TYPE|SCHEMA|EXTENSION|SEQUENCE|ROLE|DOMAIN)\b|GRANT\b|REVOKE\b|COMMENT\s+ON\b|INSERT\s+INTO\b)/i;

function countNewlines(chunk: string): number {
  let count = 0;
  for (const c of chunk) {
    if (c === '\n') count++;
  }
  return count;
}

/** End offset of a (possibly nested) block comment starting at `start`. */
function scanBlockComment(text: string, start: number): number {
  let depth = 0;
  let i = start;
  while (i < text.length) {
    if (text[i] === '/' && text[i + 1] === '*') {
      depth++;
      i += 2;
    } else if (text[i] === '*' && text[i + 1] === '/') {
      depth--;
      i += 2;
      if (depth === 0) return i;
    } else {
      i++;
    }
  }
  return text.length;
}

/**
 * Split a DDL document into top-level statements.
 *
 * Semicolons inside parentheses, string literals, quoted identifiers and
 * dollar-quoted bodies do not split. Comments are replaced by whitespace so
 * line numbers inside a statement still line up with the source.
 */
export function splitStatements(text: string): RawStatement[] {
  const statements: RawStatement[] = [];
  let buffer = '';
  let line = 1;
  let startLine = 0;
  let depth = 0;
  let i = 0;

  const append = (chunk: string): void => {
    if (startLine === 0 && /\S/.test(chunk)) {
      startLine = line;
    }
    buffer += chunk;
    line += countNewlines(chunk);
  };

  const flush = (terminated: boolean): void => {
    const trimmed = buffer.trim();
    if (trimmed !== '') {
      statements.push({ text: trimmed, line: startLine, terminated });
    }
    buffer = '';
    startLine = 0;
    depth = 0;
  };

  while (i < text.length) {
    const c = text.charAt(i);
    const next = text.charAt(i + 1);

    if (c === '-' && next === '-') {
      const newline = text.indexOf('\n', i);
      append(' ');
      i = newline === -1 ? text.length : newline;
      continue;
    }

    if (c === '/' && next === '*') {
      const end = scanBlockComment(text, i);
      append(text.slice(i, end).replace(/[^\n]/g, ' '));
      i = end;
      continue;
    }

    if (c === "'") {
      const prev = text.charAt(i - 1);
      const escapes = (prev === 'E' || prev === 'e') && !/[A-Za-z0-9_]/.test(text.charAt(i - 2));
      const end = scanQuoted(text, i, "'", escapes);
      append(text.slice(i, end));
      i = end;
      continue;
    }

    if (c === '"') {
      const end = scanQuoted(text, i, '"');
      append(text.slice(i, end));
      i = end;
      continue;
    }

    if (c === '$') {
      const end = scanDollarQuoted(text, i);
      if (end !== null) {
        append(text.slice(i, end));
        i = end;
        continue;
      }
    }

    if (c === ';' && depth === 0) {
      flush(true);
      i++;
      continue;
    }

    if (c === '(') depth++;
    if (c === ')') depth = Math.max(0, depth - 1);

    append(c);
    i++;

    if (c === '\n' && depth === 0 && startLine !== 0) {
      let j = i;
      while (j < text.length && (text[j] === ' ' || text[j] === '\t' || text[j] === '\r')) j++;
      if (STATEMENT_START.test(text.slice(j, j + 120))) {
        flush(false);
      }
    }
  }

  flush(false);
  return statements;
}
