import { FormulaError } from "@/lib/errors";
import { allPresent, average, finiteOrNull, round, safeDivide } from "@/lib/screening/calculations";
import { appendColumn, assertNewColumn, missingColumns, readNumber, splitYearColumn, yearColumn } from "@/lib/screening/columns";
import {
  formatExpression,
  parseExpression,
  referencedColumns,
  type BinaryOperator,
  type Expression,
  type FunctionName,
} from "@/lib/screening/expression";
import { builtInExpression } from "@/lib/screening/standard-formulas";
import { METRICS } from "@/lib/defaults";
import type { FormulaFailure, FormulaSpec, Row, Table } from "@/lib/types";

export interface CompiledFormula {
  readonly output: string;
  readonly source: string;
  readonly expression: Expression;
  readonly columns: readonly string[];
}

export interface ApplyFormulasResult {
  table: Table;
  applied: string[];
  compiled: CompiledFormula[];
  failures: FormulaFailure[];
}

export function compileFormula(spec: FormulaSpec): CompiledFormula {
  const source = spec.kind === "builtin" ? builtInExpression(spec.name, spec.params) : spec.expression;
  let expression: Expression;
  try {
    expression = parseExpression(source);
  } catch (error) {
    if (error instanceof FormulaError) {
      throw new FormulaError(`Formula "${spec.output}": ${error.message}`, spec.output, [], error.position);
    }
    throw error;
  }
  return { output: spec.output, source, expression, columns: referencedColumns(expression) };
}

function isCompiled(item: FormulaSpec | CompiledFormula): item is CompiledFormula {
  return "columns" in item;
}

function applyOperator(operator: BinaryOperator, left: number, right: number): number | null {
  switch (operator) {
    case "+":
      return finiteOrNull(left + right);
    case "-":
      return finiteOrNull(left - right);
    case "*":
      return finiteOrNull(left * right);
    case "/":
      return safeDivide(left, right);
  }
}

function applyFunction(name: FunctionName, values: Array<number | null>): number | null {
  if (!allPresent(values)) {
    return null;
  }

  switch (name) {
    case "abs":
      return Math.abs(values[0]);
    case "min":
      return Math.min(...values);
    case "max":
      return Math.max(...values);
    case "average":
      return average(values);
    case "pow":
      return Math.pow(values[0], values[1]);
    case "sqrt":
      return Math.sqrt(values[0]);
    case "log":
      return Math.log(values[0]);
    case "log10":
      return Math.log10(values[0]);
    case "exp":
      return Math.exp(values[0]);
    case "round":
      return round(values[0], values.length > 1 ? Math.trunc(values[1]) : 0);
  }
}

/**
 * Evaluates an expression against one row. Absent operands, division by zero
 * and non-finite intermediates all yield null.
 */
export function evaluateExpression(expression: Expression, row: Row): number | null {
  switch (expression.kind) {
    case "number":
      return expression.value;
    case "column":
      return readNumber(row, expression.name);
    case "negate": {
      const value = evaluateExpression(expression.operand, row);
      return value == null ? null : -value;
    }
    case "binary": {
      const left = evaluateExpression(expression.left, row);
      const right = evaluateExpression(expression.right, row);
      return left == null || right == null ? null : applyOperator(expression.operator, left, right);
    }
    case "call":
      return finiteOrNull(
        applyFunction(
          expression.name,
          expression.args.map((arg) => evaluateExpression(arg, row)),
        ),
      );
  }
}

export function evaluateFormula(table: Table, formula: CompiledFormula): Array<number | null> {
  const missing = missingColumns(table, formula.columns);
  if (missing.length > 0) {
    throw new FormulaError(
      `Formula "${formula.output}" references missing columns: ${missing.join(", ")}`,
      formula.output,
      missing,
    );
  }
  return table.rows.map((row) => evaluateExpression(formula.expression, row));
}

/**
 * Appends one column per formula. Formulas see the columns appended before
 * them; a failing formula is reported and skipped without affecting others.
 */
export function applyFormulas(table: Table, formulas: readonly (FormulaSpec | CompiledFormula)[]): ApplyFormulasResult {
  let current = table;
  const applied: string[] = [];
  const compiled: CompiledFormula[] = [];
  const failures: FormulaFailure[] = [];

  for (const item of formulas) {
    try {
      const formula = isCompiled(item) ? item : compileFormula(item);
      if (current.columns.includes(formula.output)) {
        throw new FormulaError(`Formula "${formula.output}" would overwrite an existing column`, formula.output);
      }
      const values = evaluateFormula(current, formula);
      current = appendColumn(current, formula.output, values);
      applied.push(formula.output);
      compiled.push(formula);
      console.info(`[formulas] ${formula.output} = ${formatExpression(formula.expression)}`);
    } catch (error) {
      if (!(error instanceof FormulaError)) {
        throw error;
      }
      failures.push({ output: item.output, message: error.message, missingColumns: error.missingColumns });
      console.warn(`[formulas] skipped ${item.output}: ${error.message}`);
    }
  }

  return { table: current, applied, compiled, failures };
}

export interface InvestmentVehicleResult {
  table: Table;
  flagged: number;
}

/**
 * Marks holding-type companies: a year with reported figures but absent or
 * zero revenue, or an EBITDA margin above 100%. Revenue-based ratios of the
 * affected year are cleared for them.
 */
export function flagInvestmentVehicles(
  table: Table,
  years: readonly number[],
  formulas: readonly CompiledFormula[],
): InvestmentVehicleResult {
  assertNewColumn(table, "investment_vehicle");
  const rowFlags = table.rows.map(() => new Set<number>());

  for (const year of years) {
    const revenueColumn = yearColumn(METRICS.revenue, year);
    const marginColumn = yearColumn("ebitda_margin", year);
    const hasRevenue = table.columns.includes(revenueColumn);
    const hasMargin = table.columns.includes(marginColumn);
    if (!hasRevenue && !hasMargin) {
      continue;
    }
    const reportedColumns = table.columns.filter((column) => {
      const parsed = splitYearColumn(column);
      return parsed != null && parsed.year === year && parsed.metric !== METRICS.revenue;
    });

    table.rows.forEach((row, index) => {
      const reported = reportedColumns.some((column) => row[column] != null);
      const revenue = hasRevenue ? readNumber(row, revenueColumn) : undefined;
      const margin = hasMargin ? readNumber(row, marginColumn) : null;
      const noRevenue = reported && (revenue === null || revenue === 0);
      if (noRevenue || (margin != null && margin > 1)) {
        rowFlags[index].add(year);
      }
    });
  }

  const revenueDependents = new Map<number, string[]>();
  for (const formula of formulas) {
    for (const column of formula.columns) {
      const parsed = splitYearColumn(column);
      if (parsed && parsed.metric === METRICS.revenue && table.columns.includes(formula.output)) {
        const list = revenueDependents.get(parsed.year) ?? [];
        if (!list.includes(formula.output)) {
          list.push(formula.output);
        }
        revenueDependents.set(parsed.year, list);
      }
    }
  }

  let flagged = 0;
  const rows = table.rows.map((row, index) => {
    const flaggedYears = rowFlags[index];
    if (flaggedYears.size === 0) {
      return { ...row, investment_vehicle: false };
    }
    flagged += 1;
    const cleared: Record<string, null> = {};
    for (const year of flaggedYears) {
      for (const output of revenueDependents.get(year) ?? []) {
        cleared[output] = null;
      }
    }
    return { ...row, ...cleared, investment_vehicle: true };
  });

  if (flagged > 0) {
    console.info(`[formulas] flagged ${flagged} rows as investment vehicles`);
  }

  return { table: { columns: [...table.columns, "investment_vehicle"], rows }, flagged };
}
