// SPDX-License-Identifier: Apache-2.0
export { TokenType } from "./search/ast";
export type { Token, Span, ExprNode, LiteralNode, AndNode, OrNode, NotNode } from "./search/ast";
export { QuerySyntaxError, LexError, ParseError } from "./search/errors";
export type { SyntaxErrorKind } from "./search/errors";
export { lex } from "./search/lexer";
export { parse, parseTokens, MAX_NESTING } from "./search/parser";
export { StringMatcher, failureTable } from "./search/string-matcher";
export { evaluate, collectLiterals } from "./search/evaluator";
export { Matcher } from "./search/matcher";
export type { MatcherResult } from "./search/matcher";
