// SPDX-License-Identifier: Apache-2.0
import { TokenType, type Token, type ExprNode, type Span } from "./ast";
import { ParseError, describeToken } from "./errors";
import { lex } from "./lexer";
import { StringMatcher } from "./string-matcher";

// Each level of '!' or '(' costs a few stack frames here and in the evaluator.
export const MAX_NESTING = 1000;

function freeze<T extends ExprNode>(node: T): T {
  Object.freeze(node);
  return node;
}

function joinSpan(left: ExprNode, right: ExprNode): Span {
  return { start: left.span.start, end: right.span.end };
}

class Parser {
  private tokens: Token[];
  private pos = 0;
  private depth = 0;

  constructor(tokens: Token[]) {
    const last = tokens[tokens.length - 1];
    if (last === undefined || last.type !== TokenType.EOF) {
      throw new TypeError("token list must end with an EOF token");
    }
    this.tokens = tokens;
  }

  parse(): ExprNode {
    if (this.at(TokenType.EOF)) {
      throw new ParseError("empty query", 0, this.peek());
    }
    const node = this.parseQuery();
    if (!this.at(TokenType.EOF)) {
      const tok = this.peek();
      if (tok.type === TokenType.RPAREN) {
        throw new ParseError(`unmatched ')' at position ${tok.start}`, tok.start, tok);
      }
      throw new ParseError(`unexpected ${describeToken(tok)} at position ${tok.start} after end of query`, tok.start, tok);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private advance(): Token {
    const tok = this.tokens[this.pos];
    if (tok.type !== TokenType.EOF) this.pos++;
    return tok;
  }

  private at(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private enter(tok: Token): void {
    this.depth++;
    if (this.depth > MAX_NESTING) {
      throw new ParseError(`query nested too deeply at position ${tok.start}`, tok.start, tok);
    }
  }

  private leave(): void {
    this.depth--;
  }

  // query := or_group ( '|' or_group )*
  private parseQuery(): ExprNode {
    let left = this.parseOrGroup();
    while (this.at(TokenType.OR)) {
      this.advance();
      const right = this.parseOrGroup();
      left = freeze({ type: "OR", left, right, span: joinSpan(left, right) });
    }
    return left;
  }

  // or_group := and_group ( '&' and_group )*
  private parseOrGroup(): ExprNode {
    let left = this.parseAndGroup();
    while (this.at(TokenType.AND)) {
      this.advance();
      const right = this.parseAndGroup();
      left = freeze({ type: "AND", left, right, span: joinSpan(left, right) });
    }
    return left;
  }

  // and_group := literal | '!' and_group | '(' query ')'
  private parseAndGroup(): ExprNode {
    const tok = this.peek();

    switch (tok.type) {
      case TokenType.LITERAL: {
        this.advance();
        if (tok.value.length === 0) {
          throw new ParseError(`empty literal at position ${tok.start}`, tok.start, tok);
        }
        return freeze({
          type: "LITERAL",
          value: tok.value,
          matcher: new StringMatcher(tok.value),
          span: { start: tok.start, end: tok.end },
        });
      }

      case TokenType.NOT: {
        this.enter(tok);
        this.advance();
        const child = this.parseAndGroup();
        this.leave();
        return freeze({ type: "NOT", child, span: { start: tok.start, end: child.span.end } });
      }

      case TokenType.LPAREN: {
        this.enter(tok);
        this.advance();
        const inner = this.parseQuery();
        const close = this.peek();
        if (close.type === TokenType.RPAREN) {
          this.advance();
          this.leave();
          return inner;
        }
        if (close.type === TokenType.EOF) {
          throw new ParseError(`unmatched '(' at position ${tok.start}`, tok.start, tok);
        }
        throw new ParseError(
          `expected ')' but found ${describeToken(close)} at position ${close.start}`,
          close.start,
          close,
        );
      }

      default:
        throw new ParseError(
          `expected a literal, '!' or '(' but found ${describeToken(tok)} at position ${tok.start}`,
          tok.start,
          tok,
        );
    }
  }
}

export function parseTokens(tokens: Token[]): ExprNode {
  return new Parser(tokens).parse();
}

export function parse(input: string): ExprNode {
  return parseTokens(lex(input));
}
