/**
 * LaTeX Parse Errors
 * Structured parse failures carrying an error kind and the offset where they were detected
 */

/** Every way a parse can fail */
export type ParseErrorKind =
  | "EmptyInput"
  | "ExpectedAtom"
  | "UnmatchedParen"
  | "UnexpectedToken"
  | "InvalidFactorialPosition"
  | "NestingTooDeep";

/**
 * A parse failure. No partial tree is ever returned alongside one.
 * `position` is a 0-based character offset into the input.
 */
export class LatexParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly position: number;

  constructor(kind: ParseErrorKind, position: number, message: string) {
    super(message);
    this.name = "LatexParseError";
    this.kind = kind;
    this.position = position;
  }
}

export function isLatexParseError(error: unknown): error is LatexParseError {
  return error instanceof LatexParseError;
}

/**
 * Render a two-line caret diagnostic for an error
 *
 * @example
 * formatParseError("2 +", err);
 * // "ExpectedAtom at 3: Expected an operand after '+'\n2 +\n   ^"
 */
export function formatParseError(input: string, error: LatexParseError): string {
  const caret = `${" ".repeat(Math.min(error.position, input.length))}^`;
  return [`${error.kind} at ${error.position}: ${error.message}`, input, caret].join("\n");
}
