/**
 * Unit tests for the operator classifier
 */

import { describe, expect, test } from "vitest";
import {
  classifyOperator,
  getOperatorPrecedence,
  isOperatorChar,
  isRightAssociative,
  OPERATORS,
} from "../src/lib/latex/index.ts";

describe("operators", () => {
  describe("classifyOperator", () => {
    test("minus is negate in prefix position and subtract in infix position", () => {
      expect(classifyOperator("-", "prefix")?.kind).toBe("negate");
      expect(classifyOperator("-", "infix")?.kind).toBe("subtract");
      expect(classifyOperator("-", "postfix")).toBeNull();
    });

    test("every multiplication spelling is the same kind", () => {
      expect(classifyOperator("*", "infix")?.kind).toBe("multiply");
      expect(classifyOperator("\\cdot", "infix")?.kind).toBe("multiply");
    });

    test("factorial is only valid as postfix", () => {
      expect(classifyOperator("!", "postfix")?.kind).toBe("factorial");
      expect(classifyOperator("!", "prefix")).toBeNull();
      expect(classifyOperator("!", "infix")).toBeNull();
    });

    test("plus has no prefix reading", () => {
      expect(classifyOperator("+", "prefix")).toBeNull();
      expect(classifyOperator("+", "infix")?.kind).toBe("add");
    });

    test("returns the full operator entry", () => {
      expect(classifyOperator("-", "infix")).toBe(OPERATORS.subtract);
      expect(classifyOperator("^", "infix")).toEqual({
        kind: "power",
        position: "infix",
        arity: 2,
        precedence: 4,
        associativity: "right",
      });
    });

    test("divide and power are infix", () => {
      expect(classifyOperator("/", "infix")?.kind).toBe("divide");
      expect(classifyOperator("^", "infix")?.kind).toBe("power");
      expect(classifyOperator("^", "prefix")).toBeNull();
    });
  });

  describe("precedence", () => {
    test("factorial > power > negate > multiplicative > additive", () => {
      expect(getOperatorPrecedence("factorial")).toBeGreaterThan(getOperatorPrecedence("power"));
      expect(getOperatorPrecedence("power")).toBeGreaterThan(getOperatorPrecedence("negate"));
      expect(getOperatorPrecedence("negate")).toBeGreaterThan(getOperatorPrecedence("multiply"));
      expect(getOperatorPrecedence("multiply")).toBeGreaterThan(getOperatorPrecedence("add"));
    });

    test("multiply and divide share a tier, as do add and subtract", () => {
      expect(getOperatorPrecedence("multiply")).toBe(getOperatorPrecedence("divide"));
      expect(getOperatorPrecedence("add")).toBe(getOperatorPrecedence("subtract"));
    });
  });

  describe("associativity and arity", () => {
    test("only power is right-associative among binary operators", () => {
      expect(isRightAssociative("power")).toBe(true);
      expect(isRightAssociative("subtract")).toBe(false);
      expect(isRightAssociative("divide")).toBe(false);
    });

    test("unary kinds have arity 1 with fixed positions", () => {
      expect(OPERATORS.negate).toMatchObject({ arity: 1, position: "prefix" });
      expect(OPERATORS.factorial).toMatchObject({ arity: 1, position: "postfix" });
      expect(OPERATORS.add).toMatchObject({ arity: 2, position: "infix" });
    });
  });

  describe("isOperatorChar", () => {
    test("recognizes single-character operators", () => {
      for (const char of ["+", "-", "*", "/", "^", "!"]) {
        expect(isOperatorChar(char)).toBe(true);
      }
    });

    test("rejects everything else", () => {
      expect(isOperatorChar("x")).toBe(false);
      expect(isOperatorChar("(")).toBe(false);
      expect(isOperatorChar("")).toBe(false);
      expect(isOperatorChar("+-")).toBe(false);
    });
  });
});
