/**
 * LaTeX expression module barrel export
 * Re-exports the tokenizer, operator table, parser, formatter and simplifier
 */

export * from "./ast.ts";
export * from "./errors.ts";
export * from "./format.ts";
export * from "./operators.ts";
export * from "./parser.ts";
export * from "./simplify.ts";
export * from "./tokenizer.ts";
export {
  formatRational,
  MAX_EXPONENT,
  MAX_FACTORIAL,
  MAX_RESULT_BITS,
  parseRational,
  type Rational,
  rational,
  rationalEquals,
  toDecimalString,
} from "./rational.ts";
