/**
 * LaTeX Expression Formatting
 * Writes a tree back out as LaTeX that re-parses to the same tree
 */

import type { BinaryNode, ExpressionNode } from "./ast.ts";
import {
  getOperatorPrecedence,
  isRightAssociative,
  OPERATOR_SYMBOLS,
  PRECEDENCE,
} from "./operators.ts";

/** Options for LaTeX formatting */
export interface FormatLatexOptions {
  /**
   * How multiplication is written:
   * - "cdot": a \cdot b (default)
   * - "asterisk": a * b
   * - "implicit": juxtaposition where it re-parses to the same tree (2x, 2(x + 1)), \cdot elsewhere
   */
  multiplication?: "cdot" | "asterisk" | "implicit";
  /** Add spaces around binary operators other than ^ (default: true) */
  spaces?: boolean;
}

// Precedence of anything that parses as a single primary
const ATOM_PRECEDENCE = PRECEDENCE.factorial + 1;

/**
 * Format a tree as LaTeX with the fewest parentheses that keep its shape
 *
 * @example
 * formatLatex(parseLatex("2(x+1)"));                                  // "2 \\cdot (x + 1)"
 * formatLatex(parseLatex("2(x+1)"), { multiplication: "implicit" });  // "2(x + 1)"
 * formatLatex(parseLatex("(-a)^2"));                                  // "(-a)^2"
 */
export function formatLatex(node: ExpressionNode, options: FormatLatexOptions = {}): string {
  const { multiplication = "cdot", spaces = true } = options;
  const sp = spaces ? " " : "";

  /** Can this multiply node be written by juxtaposition and still parse back to itself? */
  function isJuxtaposable(n: BinaryNode): boolean {
    return isChainStart(n.left) && isChainMember(n.right);
  }

  // The parser only starts a juxtaposition chain at a number, variable or group
  function isChainStart(n: ExpressionNode): boolean {
    if (n.type === "literal" || n.type === "variable") return true;
    if (n.type === "binary" && n.operator === "multiply" && multiplication === "implicit") {
      return isJuxtaposable(n);
    }
    return n.type === "binary" && (n.operator === "add" || n.operator === "subtract");
  }

  // ...and extends it only with variables and groups
  function isChainMember(n: ExpressionNode): boolean {
    if (n.type === "variable") return true;
    return n.type === "binary" && (n.operator === "add" || n.operator === "subtract");
  }

  function precedenceOf(n: ExpressionNode): number {
    switch (n.type) {
      case "literal":
      case "variable":
        return ATOM_PRECEDENCE;
      case "unary":
        return getOperatorPrecedence(n.operator);
      case "binary":
        if (multiplication === "implicit" && n.operator === "multiply" && isJuxtaposable(n)) {
          return ATOM_PRECEDENCE;
        }
        return getOperatorPrecedence(n.operator);
    }
  }

  function multiplySymbol(): string {
    switch (multiplication) {
      case "asterisk":
        return `${sp}*${sp}`;
      case "cdot":
      case "implicit":
        return spaces ? " \\cdot " : "\\cdot ";
    }
  }

  function wrap(text: string): string {
    return `(${text})`;
  }

  function fmt(n: ExpressionNode): string {
    switch (n.type) {
      case "literal":
        return n.value;
      case "variable":
        return n.subscript === null ? n.name : `${n.name}_${n.subscript}`;
      case "unary":
        return n.operator === "negate" ? formatNegate(n.operand) : formatFactorial(n.operand);
      case "binary":
        return formatBinary(n);
    }
  }

  function formatNegate(operand: ExpressionNode): string {
    const inner = fmt(operand);
    return precedenceOf(operand) < PRECEDENCE.negate ? `-${wrap(inner)}` : `-${inner}`;
  }

  function formatFactorial(operand: ExpressionNode): string {
    const inner = fmt(operand);
    return precedenceOf(operand) < PRECEDENCE.factorial ? `${wrap(inner)}!` : `${inner}!`;
  }

  function formatBinary(n: BinaryNode): string {
    if (multiplication === "implicit" && n.operator === "multiply" && isJuxtaposable(n)) {
      return formatJuxtaposition(n);
    }

    const prec = getOperatorPrecedence(n.operator);
    const rightAssoc = isRightAssociative(n.operator);
    const leftPrec = precedenceOf(n.left);
    const rightPrec = precedenceOf(n.right);

    let left = fmt(n.left);
    if (leftPrec < prec || (leftPrec === prec && rightAssoc)) {
      left = wrap(left);
    }

    let right = fmt(n.right);
    if (
      rightPrec < prec ||
      (rightPrec === prec && !rightAssoc) ||
      // a + -b and 2^-1 parse, but read ambiguously
      (n.right.type === "unary" && n.right.operator === "negate")
    ) {
      right = wrap(right);
    }

    switch (n.operator) {
      case "power":
        return `${left}^${right}`;
      case "multiply":
        return `${left}${multiplySymbol()}${right}`;
      case "add":
      case "subtract":
      case "divide":
        return `${left}${sp}${OPERATOR_SYMBOLS[n.operator]}${sp}${right}`;
    }
  }

  function formatJuxtaposition(n: BinaryNode): string {
    const left =
      n.left.type === "binary" && n.left.operator !== "multiply" ? wrap(fmt(n.left)) : fmt(n.left);
    if (n.right.type !== "variable") {
      return `${left}${wrap(fmt(n.right))}`;
    }
    // x_1y would read as a two-character subscript
    const separator = /_[A-Za-z0-9]$/.test(left) ? " " : "";
    return `${left}${separator}${fmt(n.right)}`;
  }

  return fmt(node);
}

/**
 * Format a tree with every binary operation parenthesized, for debugging
 *
 * @example
 * formatDebug(parseLatex("2x + y!"));  // "((2 * x) + (y)!)"
 */
export function formatDebug(node: ExpressionNode): string {
  switch (node.type) {
    case "literal":
      return node.value;
    case "variable":
      return node.subscript === null ? node.name : `${node.name}_${node.subscript}`;
    case "unary":
      return node.operator === "negate"
        ? `-(${formatDebug(node.operand)})`
        : `(${formatDebug(node.operand)})!`;
    case "binary":
      return `(${formatDebug(node.left)} ${OPERATOR_SYMBOLS[node.operator]} ${formatDebug(node.right)})`;
  }
}
