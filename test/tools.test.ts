/**
 * Tool handler tests - output text and logging through the FastMCP context
 */

import { beforeEach, describe, expect, test, vi } from "vitest";
import { parseCache } from "../src/lib/cache.ts";
import { binary, literal, variable } from "../src/lib/latex/index.ts";
import { compareLatexTool, parseLatexTool, simplifyLatexTool } from "../src/tools/index.ts";
import type { ToolContext } from "../src/tools/shared.ts";

function createContext() {
  return {
    log: { debug: vi.fn(), error: vi.fn(), info: vi.fn(), warn: vi.fn() },
  } satisfies ToolContext;
}

const EXPECTED_ATOM_2_PLUS = [
  "```",
  "ExpectedAtom at 2: Expected an operand after '+'",
  "2+",
  "  ^",
  "```",
];

describe("parse_latex", () => {
  let ctx: ReturnType<typeof createContext>;

  beforeEach(() => {
    parseCache.clear();
    ctx = createContext();
  });

  test("tree output is the JSON AST", async () => {
    const result = await parseLatexTool.execute({ expression: "2x", format: "tree" }, ctx);
    const ast = binary("multiply", literal("2"), variable("x"));
    expect(result).toBe(`\`\`\`json\n${JSON.stringify(ast, null, 2)}\n\`\`\``);
  });

  test("canonical and implicit output", async () => {
    expect(await parseLatexTool.execute({ expression: "2(x+1)", format: "canonical" }, ctx)).toBe(
      "2 \\cdot (x + 1)",
    );
    expect(await parseLatexTool.execute({ expression: "2(x+1)", format: "implicit" }, ctx)).toBe(
      "2(x + 1)",
    );
  });

  test("debug output", async () => {
    expect(await parseLatexTool.execute({ expression: "a-b-c", format: "debug" }, ctx)).toBe(
      "((a - b) - c)",
    );
  });

  test("token table", async () => {
    const result = await parseLatexTool.execute({ expression: "2x", format: "tokens" }, ctx);
    expect(result).toBe(
      [
        "| Position | Type | Text |",
        "|----------|------|------|",
        "| 0 | number | `2` |",
        "| 1 | variable | `x` |",
      ].join("\n"),
    );
  });

  test("reports parse errors with a caret and logs a warning", async () => {
    const result = await parseLatexTool.execute({ expression: "2+", format: "tree" }, ctx);
    expect(result).toBe(["**Parse error**", ...EXPECTED_ATOM_2_PLUS].join("\n"));
    expect(ctx.log.warn).toHaveBeenCalledWith("parse_latex: parse failed", {
      kind: "ExpectedAtom",
      position: 2,
    });
  });

  test("parses go through the shared cache", async () => {
    await parseLatexTool.execute({ expression: "x + 1", format: "canonical" }, ctx);
    expect(parseCache.has("x + 1")).toBe(true);
  });
});

describe("simplify_latex", () => {
  let ctx: ReturnType<typeof createContext>;

  beforeEach(() => {
    parseCache.clear();
    ctx = createContext();
  });

  test("substitutes bindings", async () => {
    const result = await simplifyLatexTool.execute(
      { expression: "x^2 + 1", bindings: { x: "3" } },
      ctx,
    );
    expect(result).toBe("**Simplified:** `10`\n**Value:** 10");
  });

  test("shows exact and decimal values", async () => {
    const result = await simplifyLatexTool.execute({ expression: "1/3 + 1/6" }, ctx);
    expect(result).toBe("**Simplified:** `0.5`\n**Value:** 1/2 (= 0.5)");
  });

  test("negative integers", async () => {
    const result = await simplifyLatexTool.execute({ expression: "2 - 5" }, ctx);
    expect(result).toBe("**Simplified:** `-3`\n**Value:** -3");
  });

  test("lists free variables", async () => {
    const result = await simplifyLatexTool.execute({ expression: "2x + 0y" }, ctx);
    expect(result).toBe("**Simplified:** `2 \\cdot x`\n**Free variables:** x");
  });

  test("leaves powers too wide to fold unsimplified", async () => {
    const result = await simplifyLatexTool.execute({ expression: "((2^1024)^1024)^1024" }, ctx);
    expect(result).toBe(`**Simplified:** \`(${(2n ** 1024n).toString()}^1024)^1024\``);
  });

  test("keeps division by zero under a zero factor", async () => {
    const result = await simplifyLatexTool.execute({ expression: "(1/0) \\cdot 0" }, ctx);
    expect(result).toBe("**Simplified:** `1 / 0 \\cdot 0`");
  });

  test("rejects invalid variable names", async () => {
    const result = await simplifyLatexTool.execute(
      { expression: "x", bindings: { xy: "1" } },
      ctx,
    );
    expect(result).toBe("Invalid variable name: xy (expected a letter with an optional _subscript)");
  });

  test("reports parse errors in bindings", async () => {
    const result = await simplifyLatexTool.execute(
      { expression: "x", bindings: { x: "2+" } },
      ctx,
    );
    expect(result).toBe(["**Parse error in binding for x**", ...EXPECTED_ATOM_2_PLUS].join("\n"));
    expect(ctx.log.warn).toHaveBeenCalledWith("simplify_latex: binding parse failed", {
      variable: "x",
    });
  });
});

describe("compare_latex", () => {
  let ctx: ReturnType<typeof createContext>;

  beforeEach(() => {
    parseCache.clear();
    ctx = createContext();
  });

  test("multiplication spellings are structurally equal", async () => {
    const result = await compareLatexTool.execute({ a: "2x", b: "2 \\cdot x" }, ctx);
    expect(result).toBe(
      [
        "**Structurally equal:** yes",
        "**Equal after simplification:** yes",
        "- a: `2 \\cdot x` → `2 \\cdot x`",
        "- b: `2 \\cdot x` → `2 \\cdot x`",
      ].join("\n"),
    );
  });

  test("equal only after simplification", async () => {
    const result = await compareLatexTool.execute({ a: "x + 0", b: "x" }, ctx);
    expect(result).toBe(
      [
        "**Structurally equal:** no",
        "**Equal after simplification:** yes",
        "- a: `x + 0` → `x`",
        "- b: `x` → `x`",
      ].join("\n"),
    );
  });

  test("commutativity is not applied", async () => {
    const result = await compareLatexTool.execute({ a: "x + y", b: "y + x" }, ctx);
    expect(result.split("\n").slice(0, 2)).toEqual([
      "**Structurally equal:** no",
      "**Equal after simplification:** no",
    ]);
  });

  test("reports which side failed to parse", async () => {
    const result = await compareLatexTool.execute({ a: "x", b: "(" }, ctx);
    expect(result).toBe(
      ["**Parse error in b**", "```", "UnmatchedParen at 0: Unclosed '('", "(", "^", "```"].join(
        "\n",
      ),
    );
  });
});
