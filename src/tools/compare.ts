import { z } from "zod";
import { parseCache } from "../lib/cache.ts";
import { astEqual, formatLatex, simplify } from "../lib/latex/index.ts";
import { formatFailure, type ToolContext } from "./shared.ts";

export const CompareLatexSchema = z.object({
  a: z.string().describe("First LaTeX expression"),
  b: z.string().describe("Second LaTeX expression"),
});

export type CompareLatexArgs = z.infer<typeof CompareLatexSchema>;

/**
 * Compare tool - structural equality of two expressions
 * 2x, 2*x and 2 \cdot x are the same tree; x + y and y + x are not.
 */
export const compareLatexTool = {
  name: "compare_latex",
  description: `Check whether two LaTeX expressions parse to the same expression tree.

Multiplication spellings (\\cdot, *, juxtaposition) are equivalent. Also reports
whether the trees match after simplification. Commutativity is not applied.`,

  parameters: CompareLatexSchema,

  execute: async (args: CompareLatexArgs, ctx: ToolContext): Promise<string> => {
    const a = parseCache.parse(args.a);
    if (!a.ok) return formatFailure("Parse error in a", args.a, a.error);
    const b = parseCache.parse(args.b);
    if (!b.ok) return formatFailure("Parse error in b", args.b, b.error);

    const equal = astEqual(a.ast, b.ast);
    const simplifiedA = simplify(a.ast);
    const simplifiedB = simplify(b.ast);
    const equalSimplified = equal || astEqual(simplifiedA, simplifiedB);

    ctx.log.debug("compare_latex: compared", { equal, equalSimplified });

    return [
      `**Structurally equal:** ${equal ? "yes" : "no"}`,
      `**Equal after simplification:** ${equalSimplified ? "yes" : "no"}`,
      `- a: \`${formatLatex(a.ast)}\` → \`${formatLatex(simplifiedA)}\``,
      `- b: \`${formatLatex(b.ast)}\` → \`${formatLatex(simplifiedB)}\``,
    ].join("\n");
  },
};
