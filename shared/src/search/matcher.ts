// SPDX-License-Identifier: Apache-2.0
import type { ExprNode } from "./ast";
import { QuerySyntaxError } from "./errors";
import { collectLiterals, evaluate } from "./evaluator";
import { parse } from "./parser";

export type MatcherResult =
  | { success: true; matcher: Matcher }
  | { success: false; error: QuerySyntaxError };

/**
 * A compiled boolean query. Build one with `Matcher.from` (throws on bad
 * syntax) or `Matcher.safeFrom` (returns the error instead), then call
 * `query` as often as needed.
 *
 * @example
 * const m = Matcher.from('("this" | "that") & "these" & "those"');
 * m.query("this these those"); // true
 * m.query("this that these"); // false
 */
export class Matcher {
  readonly source: string;
  readonly root: ExprNode;

  private constructor(source: string, root: ExprNode) {
    this.source = source;
    this.root = root;
  }

  static from(query: string): Matcher {
    return new Matcher(query, parse(query));
  }

  static safeFrom(query: string): MatcherResult {
    try {
      return { success: true, matcher: Matcher.from(query) };
    } catch (err) {
      if (err instanceof QuerySyntaxError) return { success: false, error: err };
      throw err;
    }
  }

  query(text: string): boolean {
    return evaluate(this.root, text);
  }

  literals(): string[] {
    return collectLiterals(this.root);
  }
}
