import { DEFAULT_SCORE_COLUMN } from "@/lib/defaults";
import { ConfigError } from "@/lib/errors";
import { mean, round } from "@/lib/screening/calculations";
import { appendColumn, assertNewColumn, readNumber } from "@/lib/screening/columns";
import type { ColumnScoringSummary, ScoringConfig, ScoringSummary, Table, ThresholdRule } from "@/lib/types";

type RuleDirection = "minimum" | "maximum";

interface CompiledRule {
  direction: RuleDirection;
  bound: number;
  points: number;
}

export interface CompiledColumnRules {
  column: string;
  direction: RuleDirection;
  /** Ordered so that the first matching rule is the winner. */
  rules: readonly CompiledRule[];
  maxPoints: number;
}

export interface ScoreOptions {
  scoreColumn?: string;
  includePointColumns?: boolean;
}

export interface ScoreResult {
  table: Table;
  summary: ScoringSummary;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function compileColumn(column: string, rules: readonly ThresholdRule[], issues: string[]): CompiledColumnRules | null {
  if (rules.length === 0) {
    issues.push(`"${column}" has no threshold rules`);
    return null;
  }

  const directions = new Set<RuleDirection>();
  const compiled: CompiledRule[] = [];
  const before = issues.length;

  rules.forEach((rule, index) => {
    const hasMin = "minimum" in rule;
    const hasMax = "maximum" in rule;
    if (hasMin === hasMax) {
      issues.push(`"${column}" rule ${index} must have exactly one of minimum or maximum`);
      return;
    }
    const direction: RuleDirection = hasMin ? "minimum" : "maximum";
    const bound = "minimum" in rule ? rule.minimum : rule.maximum;
    if (!isFiniteNumber(bound)) {
      issues.push(`"${column}" rule ${index} ${direction} must be a finite number`);
      return;
    }
    if (!isFiniteNumber(rule.points)) {
      issues.push(`"${column}" rule ${index} points must be a finite number`);
      return;
    }
    if (rule.points < 0) {
      issues.push(`"${column}" rule ${index} points must be non-negative`);
      return;
    }
    if (compiled.some((existing) => existing.direction === direction && existing.bound === bound)) {
      issues.push(`"${column}" rule ${index} repeats ${direction} ${bound}`);
      return;
    }
    directions.add(direction);
    compiled.push({ direction, bound, points: rule.points });
  });

  if (directions.size > 1) {
    issues.push(`"${column}" mixes minimum and maximum rules`);
  }
  if (issues.length > before) {
    return null;
  }

  const direction = directions.has("maximum") ? "maximum" : "minimum";
  const ordered = [...compiled].sort((a, b) => (direction === "minimum" ? b.bound - a.bound : a.bound - b.bound));
  return {
    column,
    direction,
    rules: ordered,
    maxPoints: Math.max(...ordered.map((rule) => rule.points)),
  };
}

/**
 * Validates and orders threshold rules. `minimum` rules are tried from the
 * highest bound down, `maximum` rules from the lowest bound up.
 */
export function compileScoringRules(config: ScoringConfig): CompiledColumnRules[] {
  const issues: string[] = [];
  const compiled: CompiledColumnRules[] = [];

  for (const [column, rules] of Object.entries(config)) {
    const result = compileColumn(column, rules, issues);
    if (result) {
      compiled.push(result);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError("Invalid scoring configuration", issues);
  }
  return compiled;
}

export function awardPoints(rules: CompiledColumnRules, value: number | null): number {
  if (value == null) {
    return 0;
  }
  const winner = rules.rules.find((rule) =>
    rules.direction === "minimum" ? rule.bound <= value : value <= rule.bound,
  );
  return winner?.points ?? 0;
}

function columnPoints(table: Table, rules: CompiledColumnRules): number[] {
  if (!table.columns.includes(rules.column)) {
    console.warn(`[scoring] column "${rules.column}" not found; awarding 0 points`);
    return table.rows.map(() => 0);
  }
  return table.rows.map((row) => awardPoints(rules, readNumber(row, rules.column)));
}

function summarize(
  totals: number[],
  perColumn: Array<{ rules: CompiledColumnRules; points: number[] }>,
): ScoringSummary {
  const columns: Record<string, ColumnScoringSummary> = {};
  for (const { rules, points } of perColumn) {
    columns[rules.column] = {
      scoredRows: points.filter((value) => value > 0).length,
      maxPoints: rules.maxPoints,
      averagePoints: round(mean(points), 2),
    };
  }

  const distribution: Record<string, number> = {};
  for (const total of [...totals].sort((a, b) => a - b)) {
    distribution[String(total)] = (distribution[String(total)] ?? 0) + 1;
  }

  return {
    rows: totals.length,
    rowsWithScore: totals.filter((value) => value > 0).length,
    maxPossibleScore: perColumn.reduce((sum, item) => sum + item.rules.maxPoints, 0),
    averageScore: round(mean(totals), 2),
    highestScore: totals.reduce((highest, total) => Math.max(highest, total), 0),
    distribution,
    columns,
  };
}

export function scoreTable(table: Table, config: ScoringConfig, options: ScoreOptions = {}): ScoreResult {
  const scoreColumn = options.scoreColumn ?? DEFAULT_SCORE_COLUMN;
  const compiled = compileScoringRules(config);
  if (options.includePointColumns) {
    compiled.forEach((rules) => assertNewColumn(table, `${rules.column}_points`));
  }
  assertNewColumn(table, scoreColumn);

  console.info(`[scoring] scoring ${table.rows.length} rows on ${compiled.length} columns`);

  const perColumn = compiled.map((rules) => ({ rules, points: columnPoints(table, rules) }));
  const totals = table.rows.map((_, index) => perColumn.reduce((sum, item) => sum + item.points[index], 0));

  let result = table;
  if (options.includePointColumns) {
    for (const { rules, points } of perColumn) {
      result = appendColumn(result, `${rules.column}_points`, points);
    }
  }
  result = appendColumn(result, scoreColumn, totals);

  const summary = summarize(totals, perColumn);
  console.info(
    `[scoring] ${summary.rowsWithScore}/${summary.rows} rows scored above 0 (max ${summary.maxPossibleScore}, avg ${summary.averageScore})`,
  );
  return { table: result, summary };
}

/** Scores the first rows only, with per-column points, for tuning rule sets. */
export function previewScoring(table: Table, config: ScoringConfig, sampleSize = 10): Table {
  const sample: Table = { columns: table.columns, rows: table.rows.slice(0, sampleSize) };
  return scoreTable(sample, config, { scoreColumn: "preview_score", includePointColumns: true }).table;
}
