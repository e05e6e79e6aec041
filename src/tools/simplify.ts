import { z } from "zod";
import { parseCache } from "../lib/cache.ts";
import {
  type Bindings,
  collectVariables,
  constantValue,
  formatLatex,
  formatRational,
  simplify,
  toDecimalString,
} from "../lib/latex/index.ts";
import { formatFailure, type ToolContext } from "./shared.ts";

const VARIABLE_KEY = /^[A-Za-z](?:_[A-Za-z0-9])?$/;

export const SimplifyLatexSchema = z.object({
  expression: z.string().describe("LaTeX math expression to simplify"),
  bindings: z
    .record(z.string(), z.string())
    .optional()
    .describe('Values for variables as LaTeX, e.g. { "x": "3", "y_1": "1/2" }'),
});

export type SimplifyLatexArgs = z.infer<typeof SimplifyLatexSchema>;

/**
 * Simplify tool - substitution and exact constant folding
 */
export const simplifyLatexTool = {
  name: "simplify_latex",
  description: `Simplify a LaTeX arithmetic expression with exact rational arithmetic.

Substitutes any bound variables, folds constants (1/3 + 1/6 = 0.5) and applies
identity rules (x + 0, x \\cdot 1, x^1, --x). Division by zero and non-integer
powers are left unsimplified.`,

  parameters: SimplifyLatexSchema,

  execute: async (args: SimplifyLatexArgs, ctx: ToolContext): Promise<string> => {
    const parsed = parseCache.parse(args.expression);
    if (!parsed.ok) {
      ctx.log.warn("simplify_latex: parse failed", { kind: parsed.error.kind });
      return formatFailure("Parse error", args.expression, parsed.error);
    }

    const bindings: Bindings = {};
    for (const [name, source] of Object.entries(args.bindings ?? {})) {
      if (!VARIABLE_KEY.test(name)) {
        return `Invalid variable name: ${name} (expected a letter with an optional _subscript)`;
      }
      const bound = parseCache.parse(source);
      if (!bound.ok) {
        ctx.log.warn("simplify_latex: binding parse failed", { variable: name });
        return formatFailure(`Parse error in binding for ${name}`, source, bound.error);
      }
      bindings[name] = bound.ast;
    }

    const simplified = simplify(parsed.ast, bindings);
    const lines = [`**Simplified:** \`${formatLatex(simplified)}\``];

    const value = constantValue(simplified);
    if (value) {
      const decimal = toDecimalString(value);
      const exact = formatRational(value);
      const sign = value.numerator < 0n ? "-" : "";
      lines.push(
        decimal !== null && `${sign}${decimal}` !== exact
          ? `**Value:** ${exact} (= ${sign}${decimal})`
          : `**Value:** ${exact}`,
      );
    }

    const free = Array.from(collectVariables(simplified));
    if (free.length > 0) {
      lines.push(`**Free variables:** ${free.join(", ")}`);
    }

    ctx.log.debug("simplify_latex: simplified", { bound: Object.keys(bindings).length });
    return lines.join("\n");
  },
};
