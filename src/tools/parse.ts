import { z } from "zod";
import { parseCache } from "../lib/cache.ts";
import {
  formatDebug,
  formatLatex,
  type Token,
  tokenizeLatex,
  tokenText,
} from "../lib/latex/index.ts";
import { formatFailure, jsonBlock, type ToolContext } from "./shared.ts";

export const ParseLatexSchema = z.object({
  expression: z.string().describe("LaTeX math expression, e.g. 2x^2 + 3x_1 \\cdot y - 1"),
  format: z
    .enum(["tree", "canonical", "implicit", "debug", "tokens"])
    .default("tree")
    .describe(
      "Output: tree (JSON AST), canonical (explicit \\cdot LaTeX), implicit (juxtaposed products), debug (fully parenthesized), tokens",
    ),
});

export type ParseLatexArgs = z.infer<typeof ParseLatexSchema>;

/**
 * Parse tool - LaTeX arithmetic to an expression tree
 */
export const parseLatexTool = {
  name: "parse_latex",
  description: `Parse a LaTeX arithmetic expression into an expression tree.

Supports numbers, single-letter variables with one subscript character (x, x_1),
prefix -, postfix !, binary + - * / \\cdot ^, parentheses and implicit
multiplication (2x, x(y+1), 2xy).

Precedence (tightest first): implicit products, !, ^ (right-associative),
prefix -, * / \\cdot, + -.

Errors report their kind (ExpectedAtom, UnmatchedParen, UnexpectedToken,
InvalidFactorialPosition, NestingTooDeep, EmptyInput) and character offset.`,

  parameters: ParseLatexSchema,

  execute: async (args: ParseLatexArgs, ctx: ToolContext): Promise<string> => {
    const result = parseCache.parse(args.expression);

    if (!result.ok) {
      ctx.log.warn("parse_latex: parse failed", {
        kind: result.error.kind,
        position: result.error.position,
      });
      return formatFailure("Parse error", args.expression, result.error);
    }

    ctx.log.debug("parse_latex: parsed", { format: args.format });

    switch (args.format) {
      case "tree":
        return jsonBlock(result.ast);
      case "canonical":
        return formatLatex(result.ast);
      case "implicit":
        return formatLatex(result.ast, { multiplication: "implicit" });
      case "debug":
        return formatDebug(result.ast);
      case "tokens":
        return formatTokens(tokenizeLatex(args.expression));
    }
  },
};

function formatTokens(tokens: Token[]): string {
  const lines = ["| Position | Type | Text |", "|----------|------|------|"];
  for (const token of tokens) {
    lines.push(`| ${token.position} | ${token.type} | \`${tokenText(token)}\` |`);
  }
  return lines.join("\n");
}
