/**
 * Shared test helpers
 */

import { LatexParseError } from "../src/lib/latex/index.ts";

/** Run `fn` and return the LatexParseError it throws */
export function parseErrorOf(fn: () => unknown): LatexParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof LatexParseError) return error;
    throw error;
  }
  throw new Error("Expected a LatexParseError");
}
