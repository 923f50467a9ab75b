import { describe, expect, test } from "vitest";
import { FormulaError } from "@/lib/errors";
import { formatExpression, parseExpression, referencedColumns } from "@/lib/screening/expression";

function parseError(source: string): FormulaError {
  try {
    parseExpression(source);
  } catch (error) {
    if (error instanceof FormulaError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected "${source}" to fail`);
}

describe("expression parser", () => {
  test("multiplication binds tighter than addition", () => {
    expect(parseExpression('"a" + "b" * 2')).toEqual({
      kind: "binary",
      operator: "+",
      left: { kind: "column", name: "a" },
      right: {
        kind: "binary",
        operator: "*",
        left: { kind: "column", name: "b" },
        right: { kind: "number", value: 2 },
      },
    });
  });

  test("subtraction is left associative", () => {
    expect(formatExpression(parseExpression("10 - 4 - 3"))).toBe("10 - 4 - 3");
    expect(formatExpression(parseExpression("10 - (4 - 3)"))).toBe("10 - (4 - 3)");
  });

  test("quoted column names may contain spaces and parentheses", () => {
    const expression = parseExpression(`("Ärikasum (kahjum)_2023" + abs('Põhivarade kulum ja väärtuse langus_2023')) / "Müügitulu_2023"`);
    expect(referencedColumns(expression)).toEqual([
      "Ärikasum (kahjum)_2023",
      "Põhivarade kulum ja väärtuse langus_2023",
      "Müügitulu_2023",
    ]);
  });

  test("number literals accept leading dots and exponents", () => {
    expect(parseExpression(".5")).toEqual({ kind: "number", value: 0.5 });
    expect(parseExpression("1e3")).toEqual({ kind: "number", value: 1000 });
  });

  test("unary minus wraps its operand", () => {
    expect(parseExpression('-"x"')).toEqual({ kind: "negate", operand: { kind: "column", name: "x" } });
    expect(formatExpression(parseExpression('-("a" + "b")'))).toBe('-("a" + "b")');
  });

  test("function names are case-insensitive", () => {
    expect(parseExpression('MAX("a", 1)')).toEqual({
      kind: "call",
      name: "max",
      args: [
        { kind: "column", name: "a" },
        { kind: "number", value: 1 },
      ],
    });
  });

  test("referencedColumns lists each column once in first-use order", () => {
    expect(referencedColumns(parseExpression('"b" / "a" + "b"'))).toEqual(["b", "a"]);
  });

  test("syntax errors report the position", () => {
    expect(parseError('"a" + ').message).toBe("Unexpected end of formula at end of formula");
    expect(parseError('"a" $ 2').message).toBe('Unexpected character "$" at position 4');
    expect(parseError('"a" "b"').position).toBe(4);
    expect(parseError('("a" + 1').message).toBe('Expected ")" at end of formula');
  });

  test("unknown functions and bare identifiers are rejected", () => {
    expect(parseError('median("a")').message).toBe('Unknown function "median" at position 0');
    expect(parseError("revenue / 2").message).toBe('Bare identifier "revenue" (quote column names) at position 0');
  });

  test("arity is checked at parse time", () => {
    expect(parseError('pow("a")').message).toBe("pow() takes 2 argument(s), got 1 at position 0");
    expect(parseError("max()").message).toBe("max() takes at least 1 argument(s), got 0 at position 0");
    expect(parseError("round(1, 2, 3)").message).toBe("round() takes 1-2 argument(s), got 3 at position 0");
  });

  test("unterminated quotes and empty formulas fail", () => {
    expect(parseError('"abc').message).toBe("Unterminated quoted column name at position 0");
    expect(parseError("   ").message).toBe("Formula is empty");
  });
});
