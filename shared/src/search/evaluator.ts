// SPDX-License-Identifier: Apache-2.0
import type { AndNode, ExprNode, OrNode } from "./ast";

type BinaryNode = AndNode | OrNode;

function isBinary(node: ExprNode, type: BinaryNode["type"]): node is BinaryNode {
  return node.type === type;
}

/**
 * Operands of a run of same-type AND or OR nodes, leftmost first. The parser
 * folds `a & b & c` into a left spine as long as the chain, so the spine is
 * walked in a loop instead of recursing once per operator.
 */
function chainOperands(node: BinaryNode): ExprNode[] {
  const operands: ExprNode[] = [];
  let current: ExprNode = node;
  while (isBinary(current, node.type)) {
    operands.push(current.right);
    current = current.left;
  }
  operands.push(current);
  return operands.reverse();
}

/**
 * Test `text` against a compiled expression. AND and OR evaluate their
 * operands left to right and stop once the result is decided.
 */
export function evaluate(node: ExprNode, text: string): boolean {
  switch (node.type) {
    case "LITERAL":
      return node.matcher.contains(text);
    case "AND":
      return chainOperands(node).every((operand) => evaluate(operand, text));
    case "OR":
      return chainOperands(node).some((operand) => evaluate(operand, text));
    case "NOT":
      return !evaluate(node.child, text);
  }
}

export function collectLiterals(node: ExprNode): string[] {
  const literals: string[] = [];
  const stack: ExprNode[] = [node];
  let current: ExprNode | undefined;

  while ((current = stack.pop()) !== undefined) {
    switch (current.type) {
      case "LITERAL":
        literals.push(current.value);
        break;
      case "AND":
      case "OR":
        stack.push(current.right, current.left);
        break;
      case "NOT":
        stack.push(current.child);
        break;
    }
  }
  return literals;
}
