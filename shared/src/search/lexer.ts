// SPDX-License-Identifier: Apache-2.0
import { TokenType, type Token } from "./ast";
import { LexError } from "./errors";

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  "&": TokenType.AND,
  "|": TokenType.OR,
  "!": TokenType.NOT,
  "(": TokenType.LPAREN,
  ")": TokenType.RPAREN,
};

const QUOTE = '"';

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function isWordChar(ch: string): boolean {
  return /^[A-Za-z0-9]$/.test(ch);
}

export function lex(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < input.length) {
    const ch = input[pos];

    if (isWhitespace(ch)) {
      pos++;
      continue;
    }

    if (ch in SINGLE_CHAR_TOKENS) {
      tokens.push({ type: SINGLE_CHAR_TOKENS[ch], value: ch, start: pos, end: pos + 1 });
      pos++;
      continue;
    }

    if (ch === QUOTE) {
      const tokenStart = pos;
      const close = input.indexOf(QUOTE, pos + 1);
      if (close === -1) {
        throw new LexError(`unterminated literal starting at position ${tokenStart}`, tokenStart);
      }
      pos = close + 1;
      tokens.push({ type: TokenType.LITERAL, value: input.slice(tokenStart + 1, close), start: tokenStart, end: pos });
      continue;
    }

    if (isWordChar(ch)) {
      throw new LexError(`unexpected bare word at position ${pos}; literals must be double-quoted`, pos);
    }

    throw new LexError(`unexpected character '${ch}' at position ${pos}`, pos);
  }

  tokens.push({ type: TokenType.EOF, value: "", start: input.length, end: input.length });
  return tokens;
}
