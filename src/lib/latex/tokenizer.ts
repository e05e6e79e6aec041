/**
 * LaTeX Expression Tokenizer
 * Splits input into numbers, variables, operators and parentheses with their offsets
 */

import { LatexParseError } from "./errors.ts";
import { COMMAND_OPERATORS, isOperatorChar, type OperatorSpelling } from "./operators.ts";

// =============================================================================
// TOKEN TYPES
// =============================================================================

/** Decimal literal, kept as written */
export interface NumberToken {
  type: "number";
  text: string;
  position: number;
}

/** Single letter with an optional one-character subscript */
export interface VariableToken {
  type: "variable";
  letter: string;
  subscript: string | null;
  position: number;
}

export interface OperatorToken {
  type: "operator";
  spelling: OperatorSpelling;
  position: number;
}

export interface ParenToken {
  type: "lparen" | "rparen";
  position: number;
}

export type Token = NumberToken | VariableToken | OperatorToken | ParenToken;

// =============================================================================
// CHARACTER CLASSES
// =============================================================================

// Only ASCII space separates tokens; tabs and newlines are rejected
const isSpace = (c: string) => c === " ";
const isDigit = (c: string) => c >= "0" && c <= "9";
const isLetter = (c: string) => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z");
const isAlphanumeric = (c: string) => isDigit(c) || isLetter(c);

/** Advance past any spaces starting at `index` */
export function skipWhitespace(input: string, index: number): number {
  let i = index;
  while (i < input.length && isSpace(input[i] ?? "")) i++;
  return i;
}

// =============================================================================
// SCANNERS
// =============================================================================

/**
 * Scan a decimal number at `start`: digits, optionally "." and more digits.
 * A "." without a following digit is left unconsumed.
 */
function scanNumber(input: string, start: number): { token: NumberToken; end: number } {
  let i = start;
  while (isDigit(input[i] ?? "")) i++;
  if (input[i] === "." && isDigit(input[i + 1] ?? "")) {
    i++;
    while (isDigit(input[i] ?? "")) i++;
  }
  return { token: { type: "number", text: input.slice(start, i), position: start }, end: i };
}

/** Scan a letter with an optional `_k` subscript */
function scanVariable(input: string, start: number): { token: VariableToken; end: number } {
  const letter = input[start] ?? "";
  let end = start + 1;
  let subscript: string | null = null;

  if (input[end] === "_") {
    const sub = input[end + 1] ?? "";
    if (!isAlphanumeric(sub)) {
      throw new LatexParseError(
        "UnexpectedToken",
        end,
        "Expected a single letter or digit after '_'",
      );
    }
    subscript = sub;
    end += 2;

    // v_ab: subscripts are exactly one character
    const after = input[end] ?? "";
    if (isAlphanumeric(after)) {
      throw new LatexParseError(
        "UnexpectedToken",
        end,
        `Unexpected '${after}': subscripts are a single character`,
      );
    }
  }

  return { token: { type: "variable", letter, subscript, position: start }, end };
}

/** Scan a backslash command; only operator commands are accepted */
function scanCommand(input: string, start: number): { token: OperatorToken; end: number } {
  let i = start + 1;
  while (isLetter(input[i] ?? "")) i++;
  const name = input.slice(start + 1, i);
  const spelling = COMMAND_OPERATORS[name];
  if (!spelling) {
    throw new LatexParseError(
      "UnexpectedToken",
      start,
      name ? `Unsupported command '\\${name}'` : "Expected a command name after '\\'",
    );
  }
  return { token: { type: "operator", spelling, position: start }, end: i };
}

// =============================================================================
// TOKENIZER
// =============================================================================

/**
 * Tokenize a LaTeX expression
 * Throws LatexParseError("UnexpectedToken") on characters outside the supported subset.
 *
 * @example
 * tokenizeLatex("2x_1 \\cdot (y)")
 * // [
 * //   { type: "number", text: "2", position: 0 },
 * //   { type: "variable", letter: "x", subscript: "1", position: 1 },
 * //   { type: "operator", spelling: "\\cdot", position: 5 },
 * //   { type: "lparen", position: 11 },
 * //   { type: "variable", letter: "y", subscript: null, position: 12 },
 * //   { type: "rparen", position: 13 },
 * // ]
 */
export function tokenizeLatex(input: string): Token[] {
  const tokens: Token[] = [];
  let i = skipWhitespace(input, 0);

  while (i < input.length) {
    const char = input[i] ?? "";

    if (isDigit(char)) {
      const { token, end } = scanNumber(input, i);
      tokens.push(token);
      i = end;
    } else if (isLetter(char)) {
      const { token, end } = scanVariable(input, i);
      tokens.push(token);
      i = end;
    } else if (char === "\\") {
      const { token, end } = scanCommand(input, i);
      tokens.push(token);
      i = end;
    } else if (isOperatorChar(char)) {
      tokens.push({ type: "operator", spelling: char, position: i });
      i++;
    } else if (char === "(" || char === ")") {
      tokens.push({ type: char === "(" ? "lparen" : "rparen", position: i });
      i++;
    } else {
      throw new LatexParseError("UnexpectedToken", i, `Unexpected character '${char}'`);
    }

    i = skipWhitespace(input, i);
  }

  return tokens;
}

/** Source text of a token, used in error messages and the token listing */
export function tokenText(token: Token): string {
  switch (token.type) {
    case "number":
      return token.text;
    case "variable":
      return token.subscript === null ? token.letter : `${token.letter}_${token.subscript}`;
    case "operator":
      return token.spelling;
    case "lparen":
      return "(";
    case "rparen":
      return ")";
  }
}
