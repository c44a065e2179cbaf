import { MalformedSyntaxError } from "./errors";

export type TokenKind = "identifier" | "integer" | "symbol" | "eof";

/**
 * A schema token with its 1-based source location.
 */
export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly line: number;
  readonly column: number;
}

interface Rule {
  readonly pattern: RegExp;
  readonly kind: TokenKind | null;
}

// Order matters: "[deprecated]" and "[]" before anything else starting with "[",
// integers before identifiers. A null kind is skipped.
const RULES: readonly Rule[] = [
  { pattern: /\s+/y, kind: null },
  { pattern: /\/\/[^\n]*/y, kind: null },
  { pattern: /\[deprecated\]/y, kind: "symbol" },
  { pattern: /\[\]/y, kind: "symbol" },
  { pattern: /[=;{}]/y, kind: "symbol" },
  { pattern: /-?\d+(?![A-Za-z0-9_])/y, kind: "integer" },
  { pattern: /[A-Za-z_][A-Za-z0-9_]*/y, kind: "identifier" },
];

export function quote(text: string): string {
  return JSON.stringify(text);
}

/**
 * Splits schema text into tokens, ending with an `eof` token.
 * @throws MalformedSyntaxError on characters that start no token
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;
  let line = 1;
  let column = 1;

  while (offset < text.length) {
    let matched: string | undefined;
    let kind: TokenKind | null = null;

    for (const rule of RULES) {
      rule.pattern.lastIndex = offset;
      const match = rule.pattern.exec(text);
      if (match) {
        matched = match[0];
        kind = rule.kind;
        break;
      }
    }

    if (matched === undefined) {
      const bad = /\S+/y;
      bad.lastIndex = offset;
      const run = bad.exec(text);
      throw new MalformedSyntaxError(
        `Syntax error ${quote(run ? run[0] : text.charAt(offset))}`,
        line,
        column
      );
    }

    if (kind !== null) {
      tokens.push({ kind, text: matched, line, column });
    }

    // Keep track of line and column counts
    const lines = matched.split("\n");
    if (lines.length > 1) {
      line += lines.length - 1;
      column = 1;
    }
    column += lines[lines.length - 1].length;
    offset += matched.length;
  }

  tokens.push({ kind: "eof", text: "", line, column });
  return tokens;
}
