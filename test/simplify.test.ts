/**
 * Simplification and exact evaluation
 */

import { describe, expect, test } from "vitest";
import {
  binary,
  constantValue,
  evaluate,
  type ExpressionNode,
  fromRational,
  literal,
  parseLatex,
  parseRational,
  rational,
  simplify,
  unary,
  variable,
} from "../src/lib/latex/index.ts";

const simplified = (input: string): ExpressionNode => simplify(parseLatex(input));

describe("constantValue", () => {
  test("literals, negated literals and quotients", () => {
    expect(constantValue(literal("2.5"))).toEqual(rational(5n, 2n));
    expect(constantValue(parseLatex("-3"))).toEqual(rational(-3n));
    expect(constantValue(parseLatex("1/3"))).toEqual(rational(1n, 3n));
  });

  test("anything else is not a constant", () => {
    expect(constantValue(parseLatex("x"))).toBeNull();
    expect(constantValue(parseLatex("2 + 3"))).toBeNull();
    expect(constantValue(parseLatex("1/0"))).toBeNull();
  });
});

describe("fromRational", () => {
  test("terminating decimals become literals", () => {
    expect(fromRational(parseRational("3.25"))).toEqual(literal("3.25"));
  });

  test("repeating decimals stay fractions, negatives are negated", () => {
    const value = rational(-1n, 3n);
    if (!value) throw new Error("unreachable");
    expect(fromRational(value)).toEqual(unary("negate", binary("divide", literal("1"), literal("3"))));
  });
});

describe("simplify", () => {
  describe("constant folding", () => {
    test("sums and products", () => {
      expect(simplified("2 + 3")).toEqual(literal("5"));
      expect(simplified("2 \\cdot 3 + 4")).toEqual(literal("10"));
      expect(simplified("3!")).toEqual(literal("6"));
    });

    test("fractions fold exactly", () => {
      expect(simplified("1/3 + 1/6")).toEqual(literal("0.5"));
      expect(simplified("1/3")).toEqual(parseLatex("1/3"));
    });

    test("negative results", () => {
      expect(simplified("2 - 5")).toEqual(unary("negate", literal("3")));
    });

    test("undefined operations are left in place", () => {
      expect(simplified("1/0")).toEqual(parseLatex("1/0"));
      expect(simplified("(-1)!")).toEqual(parseLatex("(-1)!"));
      expect(simplified("2^(1/2)")).toEqual(binary("power", literal("2"), literal("0.5")));
    });
  });

  describe("undefined operands", () => {
    const undefinedInputs = [
      "(1/0) \\cdot 0",
      "0 \\cdot (1/0)",
      "1/0 - 1/0",
      "(1/0)^0",
    ];

    test("identity rules do not discard division by zero", () => {
      for (const input of undefinedInputs) {
        expect(simplified(input), input).toEqual(parseLatex(input));
      }
    });

    test("evaluate agrees that the value is undefined", () => {
      for (const input of undefinedInputs) {
        expect(evaluate(parseLatex(input)), input).toEqual({
          value: null,
          error: "Division by zero",
        });
      }
    });

    test("undefined operations nested inside an operand are kept", () => {
      expect(simplified("(2^(1/2) + x) \\cdot 0")).toEqual(
        binary(
          "multiply",
          binary("add", binary("power", literal("2"), literal("0.5")), variable("x")),
          literal("0"),
        ),
      );
      expect(simplified("1^(1/0)")).toEqual(parseLatex("1^(1/0)"));
    });

    test("defined constants still fold", () => {
      expect(simplified("(1/2) \\cdot 0")).toEqual(literal("0"));
      expect(simplified("(1/2)^0")).toEqual(literal("1"));
    });
  });

  describe("result size", () => {
    test("powers too wide to fold stay symbolic", () => {
      const result = simplified("((2^1024)^1024)^1024");
      const folded = literal((2n ** 1024n).toString());
      expect(result).toEqual(
        binary("power", binary("power", folded, literal("1024")), literal("1024")),
      );
    });

    test("evaluate names the bound", () => {
      expect(evaluate(parseLatex("(2^1024)^1024"))).toEqual({
        value: null,
        error: "Result is wider than 65536 bits",
      });
    });
  });

  test("the longest accepted sum folds", () => {
    expect(simplified(Array.from({ length: 1024 }, () => "1").join("+"))).toEqual(literal("1024"));
  });

  describe("identities", () => {
    test("additive and multiplicative identities", () => {
      expect(simplified("x + 0")).toEqual(variable("x"));
      expect(simplified("0 + x")).toEqual(variable("x"));
      expect(simplified("x - 0")).toEqual(variable("x"));
      expect(simplified("x \\cdot 1")).toEqual(variable("x"));
      expect(simplified("1x")).toEqual(variable("x"));
      expect(simplified("x/1")).toEqual(variable("x"));
    });

    test("zero products and self subtraction", () => {
      expect(simplified("0x")).toEqual(literal("0"));
      expect(simplified("x \\cdot 0")).toEqual(literal("0"));
      expect(simplified("x_1 - x_1")).toEqual(literal("0"));
    });

    test("powers", () => {
      expect(simplified("x^0")).toEqual(literal("1"));
      expect(simplified("x^1")).toEqual(variable("x"));
      expect(simplified("1^x")).toEqual(literal("1"));
    });

    test("double negation", () => {
      expect(simplified("-(-x)")).toEqual(variable("x"));
    });

    test("rules combine bottom-up", () => {
      expect(simplified("2x + 0 \\cdot y")).toEqual(binary("multiply", literal("2"), variable("x")));
    });
  });

  describe("bindings", () => {
    test("substitutes and folds", () => {
      expect(simplify(parseLatex("x^2 + 1"), { x: literal("3") })).toEqual(literal("10"));
    });

    test("subscripted keys bind separately", () => {
      expect(simplify(parseLatex("x_1 + x"), { x_1: literal("2") })).toEqual(
        binary("add", literal("2"), variable("x")),
      );
    });

    test("bound expressions are simplified", () => {
      expect(simplify(parseLatex("2y"), { y: parseLatex("1/4 + 1/4") })).toEqual(literal("1"));
    });
  });

  test("is idempotent", () => {
    for (const input of ["2x^2 + 3x - 1", "1/3 + y", "(x+0)(1y)", "2 - 5", "1/0 + x"]) {
      const once = simplified(input);
      expect(simplify(once), input).toEqual(once);
    }
  });
});

describe("evaluate", () => {
  test("computes exact values", () => {
    const result = evaluate(parseLatex("x^2 + y"), {
      x: parseRational("3"),
      y: parseRational("0.5"),
    });
    expect(result).toEqual({ value: rational(19n, 2n) });
  });

  test("subscripted variables", () => {
    expect(evaluate(parseLatex("x_1 \\cdot 2"), { x_1: parseRational("3") })).toEqual({
      value: rational(6n),
    });
  });

  test("reports unbound variables", () => {
    expect(evaluate(parseLatex("x + 1"))).toEqual({ value: null, error: "Unbound variable: x" });
  });

  test("reports undefined operations", () => {
    expect(evaluate(parseLatex("1/(x-x)"), { x: parseRational("1") })).toEqual({
      value: null,
      error: "Division by zero",
    });
    expect(evaluate(parseLatex("0^-1")).error).toBe("Division by zero");
    expect(evaluate(parseLatex("2^(1/2)")).error).toBe(
      "Exponent must be an integer with magnitude at most 1024",
    );
    expect(evaluate(parseLatex("(1/2)!")).error).toBe("Factorial needs an integer from 0 to 1000");
  });
});
