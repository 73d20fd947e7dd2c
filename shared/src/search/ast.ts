// SPDX-License-Identifier: Apache-2.0
import type { StringMatcher } from "./string-matcher";

export const TokenType = {
  LITERAL: "LITERAL",
  AND: "AND",
  OR: "OR",
  NOT: "NOT",
  LPAREN: "LPAREN",
  RPAREN: "RPAREN",
  EOF: "EOF",
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

export interface Token {
  type: TokenType;
  value: string;
  start: number;
  end: number;
}

// --- Source Spans ---

export interface Span {
  readonly start: number;
  readonly end: number;
}

// --- Expression Node Types ---

export interface LiteralNode {
  readonly type: "LITERAL";
  readonly value: string;
  readonly matcher: StringMatcher;
  readonly span: Span;
}

export interface AndNode {
  readonly type: "AND";
  readonly left: ExprNode;
  readonly right: ExprNode;
  readonly span: Span;
}

export interface OrNode {
  readonly type: "OR";
  readonly left: ExprNode;
  readonly right: ExprNode;
  readonly span: Span;
}

export interface NotNode {
  readonly type: "NOT";
  readonly child: ExprNode;
  readonly span: Span;
}

export type ExprNode = LiteralNode | AndNode | OrNode | NotNode;
