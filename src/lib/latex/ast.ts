/**
 * LaTeX Expression AST
 * Node variants, constructors, structural comparison and traversal helpers
 */

import type { BinaryOperatorKind, UnaryOperatorKind } from "./operators.ts";

// =============================================================================
// AST NODE TYPES
// =============================================================================

export type ASTNodeType = "literal" | "variable" | "unary" | "binary";

/** Number literal; `value` is the decimal text as written ("3.50" stays "3.50") */
export interface LiteralNode {
  readonly type: "literal";
  readonly value: string;
}

/** Variable reference; `x` and `x_1` are distinct variables */
export interface VariableNode {
  readonly type: "variable";
  readonly name: string;
  readonly subscript: string | null;
}

export interface UnaryNode {
  readonly type: "unary";
  readonly operator: UnaryOperatorKind;
  readonly operand: ExpressionNode;
}

export interface BinaryNode {
  readonly type: "binary";
  readonly operator: BinaryOperatorKind;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export type ExpressionNode = LiteralNode | VariableNode | UnaryNode | BinaryNode;

// =============================================================================
// CONSTRUCTORS
// =============================================================================

// Nodes are frozen on construction

export function literal(value: string): LiteralNode {
  const node: LiteralNode = { type: "literal", value };
  return Object.freeze(node);
}

export function variable(name: string, subscript: string | null = null): VariableNode {
  const node: VariableNode = { type: "variable", name, subscript };
  return Object.freeze(node);
}

export function unary(operator: UnaryOperatorKind, operand: ExpressionNode): UnaryNode {
  const node: UnaryNode = { type: "unary", operator, operand };
  return Object.freeze(node);
}

export function binary(
  operator: BinaryOperatorKind,
  left: ExpressionNode,
  right: ExpressionNode,
): BinaryNode {
  const node: BinaryNode = { type: "binary", operator, left, right };
  return Object.freeze(node);
}

// =============================================================================
// COMPARISON & TRAVERSAL
// =============================================================================

/**
 * Check if two trees are structurally equal
 * Literals compare by their text, so "2" and "2.0" are different trees.
 */
export function astEqual(a: ExpressionNode, b: ExpressionNode): boolean {
  switch (a.type) {
    case "literal":
      return b.type === "literal" && a.value === b.value;
    case "variable":
      return b.type === "variable" && a.name === b.name && a.subscript === b.subscript;
    case "unary":
      return b.type === "unary" && a.operator === b.operator && astEqual(a.operand, b.operand);
    case "binary":
      return (
        b.type === "binary" &&
        a.operator === b.operator &&
        astEqual(a.left, b.left) &&
        astEqual(a.right, b.right)
      );
  }
}

/** Binding key of a variable: "x" or "x_1" */
export function variableKey(node: VariableNode): string {
  return node.subscript === null ? node.name : `${node.name}_${node.subscript}`;
}

/** Collect the keys of all variables in a tree, in first-seen order */
export function collectVariables(node: ExpressionNode): Set<string> {
  const vars = new Set<string>();

  function traverse(n: ExpressionNode): void {
    switch (n.type) {
      case "literal":
        break;
      case "variable":
        vars.add(variableKey(n));
        break;
      case "unary":
        traverse(n.operand);
        break;
      case "binary":
        traverse(n.left);
        traverse(n.right);
        break;
    }
  }

  traverse(node);
  return vars;
}
