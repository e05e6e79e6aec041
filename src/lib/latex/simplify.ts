/**
 * Expression Simplification & Evaluation
 * Constant folding on exact rationals, variable substitution and identity rules
 */

import {
  astEqual,
  binary,
  type BinaryNode,
  type ExpressionNode,
  literal,
  type UnaryNode,
  unary,
  variableKey,
} from "./ast.ts";
import {
  applyBinary,
  applyUnary,
  divide,
  isInteger,
  MAX_EXPONENT,
  MAX_FACTORIAL,
  MAX_RESULT_BITS,
  negate,
  ONE,
  parseRational,
  type Rational,
  rationalEquals,
  toDecimalString,
  ZERO,
} from "./rational.ts";

/** Variable key ("x", "x_1") to the expression substituted for it */
export type Bindings = Record<string, ExpressionNode>;

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Value of a node built only from literals, negation and division, or null.
 * These are the shapes fromRational produces, so folded results fold again.
 */
export function constantValue(node: ExpressionNode): Rational | null {
  switch (node.type) {
    case "literal":
      return parseRational(node.value);
    case "variable":
      return null;
    case "unary": {
      if (node.operator !== "negate") return null;
      const operand = constantValue(node.operand);
      return operand && negate(operand);
    }
    case "binary": {
      if (node.operator !== "divide") return null;
      const left = constantValue(node.left);
      const right = constantValue(node.right);
      return left && right && divide(left, right);
    }
  }
}

/**
 * Turn a rational back into a tree
 * - 5 → 5, 13/4 → 3.25
 * - 1/3 → 1 / 3 (repeating decimals stay fractions)
 * - negatives gain a leading negate
 */
export function fromRational(value: Rational): ExpressionNode {
  const negative = value.numerator < 0n;
  const magnitude = negative ? negate(value) : value;

  const decimal = toDecimalString(magnitude);
  const node =
    decimal !== null
      ? literal(decimal)
      : binary(
          "divide",
          literal(magnitude.numerator.toString()),
          literal(magnitude.denominator.toString()),
        );

  return negative ? unary("negate", node) : node;
}

function isConstant(node: ExpressionNode, expected: Rational): boolean {
  const value = constantValue(node);
  return value !== null && rationalEquals(value, expected);
}

/**
 * Does the tree hold an operation on constants that has no value, such as 1/0?
 * Simplified trees keep those in place, so any constant-only operation left over is one.
 */
function containsUndefined(node: ExpressionNode): boolean {
  switch (node.type) {
    case "literal":
    case "variable":
      return false;
    case "unary": {
      if (containsUndefined(node.operand)) return true;
      const operand = constantValue(node.operand);
      return operand !== null && applyUnary(node.operator, operand) === null;
    }
    case "binary": {
      if (containsUndefined(node.left) || containsUndefined(node.right)) return true;
      const left = constantValue(node.left);
      const right = constantValue(node.right);
      return left !== null && right !== null && applyBinary(node.operator, left, right) === null;
    }
  }
}

// =============================================================================
// SIMPLIFICATION
// =============================================================================

/**
 * Simplify a tree bottom-up
 * Transformations applied:
 * - Substitution: bound variables are replaced by their (simplified) bindings
 * - Constant folding: 2 + 3 → 5, 1/3 + 1/6 → 1 / 2 → 0.5
 * - Identity: x + 0 → x, x \cdot 1 → x, x / 1 → x, x^1 → x
 * - Zero: x \cdot 0 → 0, x^0 → 1, 1^x → 1
 * - Double negation: --x → x
 * - Self subtraction: x - x → 0
 *
 * Operations whose value is undefined (division by zero, non-integer powers) are left in place,
 * and rules that would drop an operand do not drop one holding such an operation.
 *
 * @example
 * simplify(parseLatex("2x + 0 \\cdot y"));           // multiply(2, x)
 * simplify(parseLatex("x^2 + 1"), { x: literal("3") });  // literal("10")
 */
export function simplify(node: ExpressionNode, bindings: Bindings = {}): ExpressionNode {
  switch (node.type) {
    case "literal":
      return node;
    case "variable": {
      const bound = bindings[variableKey(node)];
      return bound ? simplify(bound) : node;
    }
    case "unary":
      return simplifyUnary(node, bindings);
    case "binary":
      return simplifyBinary(node, bindings);
  }
}

function simplifyUnary(node: UnaryNode, bindings: Bindings): ExpressionNode {
  const operand = simplify(node.operand, bindings);

  // --x → x
  if (node.operator === "negate" && operand.type === "unary" && operand.operator === "negate") {
    return operand.operand;
  }

  const value = constantValue(operand);
  if (value) {
    const result = applyUnary(node.operator, value);
    if (result) return fromRational(result);
  }

  return unary(node.operator, operand);
}

function simplifyBinary(node: BinaryNode, bindings: Bindings): ExpressionNode {
  const left = simplify(node.left, bindings);
  const right = simplify(node.right, bindings);

  const leftValue = constantValue(left);
  const rightValue = constantValue(right);
  if (leftValue && rightValue) {
    const result = applyBinary(node.operator, leftValue, rightValue);
    if (result) return fromRational(result);
  }

  return simplifyByOperator(node.operator, left, right) ?? binary(node.operator, left, right);
}

/** Apply operator-specific identity rules */
function simplifyByOperator(
  op: BinaryNode["operator"],
  left: ExpressionNode,
  right: ExpressionNode,
): ExpressionNode | null {
  switch (op) {
    case "add":
      if (isConstant(right, ZERO)) return left;
      if (isConstant(left, ZERO)) return right;
      break;
    case "subtract":
      if (isConstant(right, ZERO)) return left;
      if (astEqual(left, right) && !containsUndefined(left)) return literal("0");
      break;
    case "multiply":
      if (isConstant(left, ZERO) && !containsUndefined(right)) return literal("0");
      if (isConstant(right, ZERO) && !containsUndefined(left)) return literal("0");
      if (isConstant(right, ONE)) return left;
      if (isConstant(left, ONE)) return right;
      break;
    case "divide":
      if (isConstant(right, ONE)) return left;
      break;
    case "power":
      if (isConstant(right, ZERO) && !containsUndefined(left)) return literal("1");
      if (isConstant(right, ONE)) return left;
      if (isConstant(left, ONE) && !containsUndefined(right)) return literal("1");
      break;
  }
  return null;
}

// =============================================================================
// EVALUATION
// =============================================================================

const TOO_WIDE = `Result is wider than ${MAX_RESULT_BITS} bits`;

/** Result of evaluation: an exact value, or null with the reason */
export interface EvalResult {
  value: Rational | null;
  error?: string;
}

/**
 * Evaluate a tree exactly with variable values
 *
 * @example
 * evaluate(parseLatex("x^2 + y"), { x: parseRational("3"), y: parseRational("0.5") });
 * // { value: 19/2 }
 * evaluate(parseLatex("1 / (x - x)"), { x: ONE });
 * // { value: null, error: "Division by zero" }
 */
export function evaluate(node: ExpressionNode, values: Record<string, Rational> = {}): EvalResult {
  switch (node.type) {
    case "literal":
      return { value: parseRational(node.value) };

    case "variable": {
      const key = variableKey(node);
      const value = values[key];
      if (value === undefined) {
        return { value: null, error: `Unbound variable: ${key}` };
      }
      return { value };
    }

    case "unary": {
      const operand = evaluate(node.operand, values);
      if (operand.value === null) return operand;

      const value = applyUnary(node.operator, operand.value);
      if (value === null) {
        return {
          value: null,
          error:
            node.operator === "factorial"
              ? `Factorial needs an integer from 0 to ${MAX_FACTORIAL}`
              : TOO_WIDE,
        };
      }
      return { value };
    }

    case "binary": {
      const left = evaluate(node.left, values);
      if (left.value === null) return left;

      const right = evaluate(node.right, values);
      if (right.value === null) return right;

      const value = applyBinary(node.operator, left.value, right.value);
      if (value === null) {
        return { value: null, error: describeUndefined(node.operator, left.value, right.value) };
      }
      return { value };
    }
  }
}

function describeUndefined(op: BinaryNode["operator"], left: Rational, right: Rational): string {
  if (op === "divide" && right.numerator === 0n) return "Division by zero";
  if (op === "power") {
    const magnitude = right.numerator < 0n ? -right.numerator : right.numerator;
    if (!isInteger(right) || magnitude > MAX_EXPONENT) {
      return `Exponent must be an integer with magnitude at most ${MAX_EXPONENT}`;
    }
    if (left.numerator === 0n && right.numerator < 0n) return "Division by zero";
  }
  return TOO_WIDE;
}
