// SPDX-License-Identifier: Apache-2.0
import { TokenType, type Token } from "./ast";

export type SyntaxErrorKind = "lex" | "parse";

/**
 * Base class for everything that can go wrong while compiling a query.
 * `position` is the code-unit offset into the query text that the error
 * refers to.
 */
export class QuerySyntaxError extends Error {
  readonly kind: SyntaxErrorKind;
  readonly position: number;

  constructor(kind: SyntaxErrorKind, message: string, position: number) {
    super(message);
    this.name = "QuerySyntaxError";
    this.kind = kind;
    this.position = position;
  }
}

export class LexError extends QuerySyntaxError {
  constructor(message: string, position: number) {
    super("lex", message, position);
    this.name = "LexError";
  }
}

export class ParseError extends QuerySyntaxError {
  readonly token: Token | null;

  constructor(message: string, position: number, token: Token | null = null) {
    super("parse", message, position);
    this.name = "ParseError";
    this.token = token;
  }
}

export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return "end of query";
    case TokenType.LITERAL:
      return `literal "${token.value}"`;
    default:
      return `'${token.value}'`;
  }
}
