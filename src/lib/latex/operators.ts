/**
 * LaTeX Operator Classifier
 * Maps operator spellings to operator kinds with arity, position, precedence and associativity
 */

// Surface spellings recognized by the tokenizer
// Infix: + - * / ^ \cdot
// Prefix: -
// Postfix: !

/** Raw operator spellings as they appear in the input */
export type OperatorSpelling = "+" | "-" | "*" | "/" | "^" | "!" | "\\cdot";

/** All recognized single-character operator spellings */
export const SINGLE_CHAR_OPERATORS = "+-*/^!" as const;

/** Backslash commands that are operators */
export const COMMAND_OPERATORS: Record<string, OperatorSpelling> = {
  cdot: "\\cdot",
};

export type UnaryOperatorKind = "negate" | "factorial";
export type BinaryOperatorKind = "add" | "subtract" | "multiply" | "divide" | "power";
export type OperatorKind = UnaryOperatorKind | BinaryOperatorKind;

/** Where an operator sits relative to its operand(s) */
export type OperatorPosition = "prefix" | "infix" | "postfix";

export type Associativity = "left" | "right";

/** Fixed properties of an operator kind */
export interface OperatorInfo<K extends OperatorKind = OperatorKind> {
  kind: K;
  position: OperatorPosition;
  arity: 1 | 2;
  precedence: number;
  associativity: Associativity;
}

/**
 * Operator precedence levels (higher = binds tighter)
 * - Level 1: add, subtract
 * - Level 2: multiply, divide (every multiply spelling, including juxtaposition)
 * - Level 3: prefix negate, so -a^2 is -(a^2) while -a*b is (-a)*b
 * - Level 4: power
 * - Level 5: postfix factorial, so 3!^2 is (3!)^2
 */
export const PRECEDENCE = {
  additive: 1,
  multiplicative: 2,
  negate: 3,
  power: 4,
  factorial: 5,
} as const;

export const OPERATORS: { readonly [K in OperatorKind]: OperatorInfo<K> } = {
  add: {
    kind: "add",
    position: "infix",
    arity: 2,
    precedence: PRECEDENCE.additive,
    associativity: "left",
  },
  subtract: {
    kind: "subtract",
    position: "infix",
    arity: 2,
    precedence: PRECEDENCE.additive,
    associativity: "left",
  },
  multiply: {
    kind: "multiply",
    position: "infix",
    arity: 2,
    precedence: PRECEDENCE.multiplicative,
    associativity: "left",
  },
  divide: {
    kind: "divide",
    position: "infix",
    arity: 2,
    precedence: PRECEDENCE.multiplicative,
    associativity: "left",
  },
  power: {
    kind: "power",
    position: "infix",
    arity: 2,
    precedence: PRECEDENCE.power,
    associativity: "right",
  },
  negate: {
    kind: "negate",
    position: "prefix",
    arity: 1,
    precedence: PRECEDENCE.negate,
    associativity: "right",
  },
  factorial: {
    kind: "factorial",
    position: "postfix",
    arity: 1,
    precedence: PRECEDENCE.factorial,
    associativity: "left",
  },
};

const INFIX_KINDS: Partial<Record<OperatorSpelling, BinaryOperatorKind>> = {
  "+": "add",
  "-": "subtract",
  "*": "multiply",
  "\\cdot": "multiply",
  "/": "divide",
  "^": "power",
};

/** Infix reading of a spelling: "-" is subtract, "!" has none */
function classifyInfix(spelling: OperatorSpelling): OperatorInfo<BinaryOperatorKind> | null {
  const kind = INFIX_KINDS[spelling];
  return kind ? OPERATORS[kind] : null;
}

/** Prefix reading of a spelling: only "-" (negate) */
function classifyPrefix(spelling: OperatorSpelling): OperatorInfo<"negate"> | null {
  return spelling === "-" ? OPERATORS.negate : null;
}

/** Postfix reading of a spelling: only "!" (factorial) */
function classifyPostfix(spelling: OperatorSpelling): OperatorInfo<"factorial"> | null {
  return spelling === "!" ? OPERATORS.factorial : null;
}

/**
 * Classify an operator spelling read at a given position
 * The position comes from the parser: "-" is negate in prefix position and subtract in infix position.
 * Returns null when the spelling is not valid in that position (e.g. "!" as prefix, "*" as prefix).
 *
 * @example
 * classifyOperator("-", "prefix")?.kind;   // "negate"
 * classifyOperator("-", "infix")?.kind;    // "subtract"
 * classifyOperator("!", "infix");          // null
 */
export function classifyOperator(
  spelling: OperatorSpelling,
  position: "infix",
): OperatorInfo<BinaryOperatorKind> | null;
export function classifyOperator(
  spelling: OperatorSpelling,
  position: "prefix",
): OperatorInfo<"negate"> | null;
export function classifyOperator(
  spelling: OperatorSpelling,
  position: "postfix",
): OperatorInfo<"factorial"> | null;
export function classifyOperator(
  spelling: OperatorSpelling,
  position: OperatorPosition,
): OperatorInfo | null;
export function classifyOperator(
  spelling: OperatorSpelling,
  position: OperatorPosition,
): OperatorInfo | null {
  switch (position) {
    case "prefix":
      return classifyPrefix(spelling);
    case "postfix":
      return classifyPostfix(spelling);
    case "infix":
      return classifyInfix(spelling);
  }
}

/** Check if a character starts a single-character operator */
export function isOperatorChar(char: string): char is Exclude<OperatorSpelling, "\\cdot"> {
  return char.length === 1 && SINGLE_CHAR_OPERATORS.includes(char);
}

export function getOperatorPrecedence(kind: OperatorKind): number {
  return OPERATORS[kind].precedence;
}

/**
 * Check if an operator is right-associative
 * Right-associative: a^b^c = a^(b^c)
 * Left-associative: a-b-c = (a-b)-c
 */
export function isRightAssociative(kind: OperatorKind): boolean {
  return OPERATORS[kind].associativity === "right";
}

/** Canonical ASCII symbol for each operator kind, used by the debug formatter */
export const OPERATOR_SYMBOLS: Record<OperatorKind, string> = {
  add: "+",
  subtract: "-",
  multiply: "*",
  divide: "/",
  power: "^",
  negate: "-",
  factorial: "!",
};
