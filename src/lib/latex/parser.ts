/**
 * LaTeX Expression Parser
 * Atom recognition (numbers, variables, groups, implicit multiplication) and
 * precedence climbing over the token stream
 */

import { binary, type ExpressionNode, literal, unary, variable } from "./ast.ts";
import { LatexParseError } from "./errors.ts";
import { classifyOperator, isRightAssociative } from "./operators.ts";
import { type Token, tokenizeLatex, tokenText } from "./tokenizer.ts";

// =============================================================================
// OPTIONS & RESULTS
// =============================================================================

/** Default bound on nested groups and operator recursion */
export const DEFAULT_MAX_DEPTH = 256;

/** Default tree height bound, as a multiple of maxDepth */
export const HEIGHT_PER_DEPTH = 4;

export interface ParseOptions {
  /** Maximum nesting depth before failing with NestingTooDeep */
  maxDepth?: number;
  /**
   * Maximum height of the finished tree (default: 4 * maxDepth)
   * Flat chains such as 1+1+1 or xyz grow the tree without nesting.
   */
  maxHeight?: number;
}

export type ParseResult =
  | { ok: true; ast: ExpressionNode }
  | { ok: false; error: LatexParseError };

// =============================================================================
// PAREN MATCHING
// =============================================================================

interface ParenPairs {
  /** Token index of each "(" mapped to the index of its ")" */
  closers: Map<number, number>;
  /** Token indexes of ")" with no opening partner */
  stray: Set<number>;
}

function matchParens(tokens: Token[]): ParenPairs {
  const closers = new Map<number, number>();
  const stray = new Set<number>();
  const open: number[] = [];

  tokens.forEach((token, index) => {
    if (token.type === "lparen") {
      open.push(index);
    } else if (token.type === "rparen") {
      const opener = open.pop();
      if (opener === undefined) stray.add(index);
      else closers.set(opener, index);
    }
  });

  return { closers, stray };
}

// =============================================================================
// PARSER
// =============================================================================

class Parser {
  private index = 0;
  private depth = 0;
  private readonly parens: ParenPairs;
  // Height of every operator node built so far; leaves are 1
  private readonly heights = new WeakMap<ExpressionNode, number>();

  constructor(
    private readonly input: string,
    private readonly tokens: Token[],
    private readonly maxDepth: number,
    private readonly maxHeight: number,
  ) {
    this.parens = matchParens(tokens);
  }

  /** Parse the whole token stream; anything left after the expression is an error */
  parse(): ExpressionNode {
    const ast = this.parseExpression(0);
    const trailing = this.peek();
    if (trailing) {
      throw this.unexpected(trailing, "after a complete expression");
    }
    return ast;
  }

  // ---------------------------------------------------------------------------
  // Tree builder
  // ---------------------------------------------------------------------------

  /**
   * Precedence climbing: parse a unary, then fold every infix operator whose
   * precedence is at least `minPrecedence`. The right side of a left-associative
   * operator is parsed one level tighter; right-associative "^" reuses its own level.
   */
  private parseExpression(minPrecedence: number): ExpressionNode {
    this.enter();
    let left = this.parseUnary();

    for (;;) {
      const token = this.peek();
      if (token?.type !== "operator") break;

      const info = classifyOperator(token.spelling, "infix");
      if (!info || info.precedence < minPrecedence) break;

      this.index++;
      const nextMin = isRightAssociative(info.kind) ? info.precedence : info.precedence + 1;
      const right = this.parseExpression(nextMin);
      left = this.grow(binary(info.kind, left, right), token.position, left, right);
    }

    this.depth--;
    return left;
  }

  /** Prefix negation, or a primary with its postfix factorials */
  private parseUnary(): ExpressionNode {
    const token = this.peek();
    if (!token) {
      throw this.expectedAtom();
    }

    if (token.type === "operator") {
      if (classifyOperator(token.spelling, "postfix")) {
        throw new LatexParseError(
          "InvalidFactorialPosition",
          token.position,
          "'!' must directly follow an operand",
        );
      }
      const prefix = classifyOperator(token.spelling, "prefix");
      if (!prefix) {
        throw this.expectedAtom();
      }
      this.index++;
      // -a^2 is -(a^2): the operand absorbs only operators that bind tighter than negation
      const operand = this.parseExpression(prefix.precedence);
      return this.grow(unary(prefix.kind, operand), token.position, operand);
    }

    return this.parsePostfix(this.parsePrimary());
  }

  private parsePostfix(primary: ExpressionNode): ExpressionNode {
    let node = primary;
    for (;;) {
      const token = this.peek();
      if (token?.type !== "operator" || !classifyOperator(token.spelling, "postfix")) return node;
      this.index++;
      node = this.grow(unary("factorial", node), token.position, node);
    }
  }

  // ---------------------------------------------------------------------------
  // Atom recognizer
  // ---------------------------------------------------------------------------

  /**
   * A number, variable or group, extended by any juxtaposed variables or groups.
   * `2xy` becomes multiply(multiply(2, x), y); a number is never a juxtaposed operand.
   */
  private parsePrimary(): ExpressionNode {
    const token = this.peek();
    if (!token) {
      throw this.expectedAtom();
    }

    switch (token.type) {
      case "number":
        this.index++;
        return this.parseImplicitMultiplication(literal(token.text));
      case "variable":
        this.index++;
        return this.parseImplicitMultiplication(variable(token.letter, token.subscript));
      case "lparen":
        return this.parseImplicitMultiplication(this.parseGroup());
      case "rparen":
        if (this.parens.stray.has(this.index)) {
          throw new LatexParseError("UnmatchedParen", token.position, "Unmatched ')'");
        }
        throw this.expectedAtom();
      case "operator":
        throw this.expectedAtom();
    }
  }

  private parseImplicitMultiplication(first: ExpressionNode): ExpressionNode {
    let node = first;
    for (;;) {
      const token = this.peek();
      if (token?.type === "variable") {
        this.index++;
        const factor = variable(token.letter, token.subscript);
        node = this.grow(binary("multiply", node, factor), token.position, node, factor);
      } else if (token?.type === "lparen") {
        const factor = this.parseGroup();
        node = this.grow(binary("multiply", node, factor), token.position, node, factor);
      } else {
        return node;
      }
    }
  }

  /** "(" expression ")"; parentheses leave no node behind */
  private parseGroup(): ExpressionNode {
    const open = this.tokens[this.index];
    if (open?.type !== "lparen") {
      throw this.expectedAtom();
    }
    if (!this.parens.closers.has(this.index)) {
      throw new LatexParseError("UnmatchedParen", open.position, "Unclosed '('");
    }
    this.index++;

    const inner = this.parseExpression(0);

    const close = this.peek();
    if (close?.type !== "rparen") {
      throw close
        ? this.unexpected(close, "inside parentheses")
        : new LatexParseError("UnmatchedParen", open.position, "Unclosed '('");
    }
    this.index++;
    return inner;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /** Record the height of a new operator node, failing once the tree is too tall */
  private grow<T extends ExpressionNode>(
    node: T,
    position: number,
    ...children: ExpressionNode[]
  ): T {
    const height = 1 + Math.max(...children.map((child) => this.heights.get(child) ?? 1));
    if (height > this.maxHeight) {
      throw new LatexParseError(
        "NestingTooDeep",
        position,
        `Expression tree is taller than ${this.maxHeight} levels`,
      );
    }
    this.heights.set(node, height);
    return node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private enter(): void {
    this.depth++;
    if (this.depth > this.maxDepth) {
      throw new LatexParseError(
        "NestingTooDeep",
        this.peek()?.position ?? this.input.length,
        `Expression nests deeper than ${this.maxDepth} levels`,
      );
    }
  }

  private expectedAtom(): LatexParseError {
    const token = this.peek();
    const previous = this.tokens[this.index - 1];
    const after = previous ? ` after '${tokenText(previous)}'` : "";
    if (!token) {
      return new LatexParseError("ExpectedAtom", this.input.length, `Expected an operand${after}`);
    }
    return new LatexParseError(
      "ExpectedAtom",
      token.position,
      `Expected an operand${after}, found '${tokenText(token)}'`,
    );
  }

  private unexpected(token: Token, where: string): LatexParseError {
    if (token.type === "rparen" && this.parens.stray.has(this.index)) {
      return new LatexParseError("UnmatchedParen", token.position, "Unmatched ')'");
    }
    return new LatexParseError(
      "UnexpectedToken",
      token.position,
      `Unexpected '${tokenText(token)}' ${where}`,
    );
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Parse a LaTeX expression into a tree
 * Throws LatexParseError on malformed input; the tree always covers the whole input.
 *
 * @example
 * parseLatex("2x^2 + 1");
 * // add(power(multiply(2, x), 2), 1)
 *
 * parseLatex("-2^2");
 * // negate(power(2, 2))
 */
export function parseLatex(input: string, options: ParseOptions = {}): ExpressionNode {
  const maxDepth = positiveInteger("maxDepth", options.maxDepth ?? DEFAULT_MAX_DEPTH);
  const maxHeight = positiveInteger("maxHeight", options.maxHeight ?? maxDepth * HEIGHT_PER_DEPTH);
  const tokens = tokenizeLatex(input);
  if (tokens.length === 0) {
    throw new LatexParseError("EmptyInput", 0, "Empty expression");
  }
  return new Parser(input, tokens, maxDepth, maxHeight).parse();
}

/** Like parseLatex, but returns parse failures as a value */
export function tryParseLatex(input: string, options: ParseOptions = {}): ParseResult {
  try {
    return { ok: true, ast: parseLatex(input, options) };
  } catch (error) {
    if (error instanceof LatexParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}
