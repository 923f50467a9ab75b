import { DEFAULT_AVERAGING_WINDOW, METRICS } from "@/lib/defaults";
import { ConfigError } from "@/lib/errors";
import { yearColumn } from "@/lib/screening/columns";
import type { BuiltInParams, FormulaSpec, StandardFormulaConfig, StandardFormulaName } from "@/lib/types";

const AVERAGING_FORMULAS: ReadonlySet<StandardFormulaName> = new Set([
  "roe",
  "roa",
  "asset_turnover",
  "employee_efficiency",
]);

export const STANDARD_FORMULA_NAMES: readonly StandardFormulaName[] = [
  "ebitda_margin",
  "roe",
  "roa",
  "asset_turnover",
  "employee_efficiency",
  "cash_ratio",
  "current_ratio",
  "debt_to_equity",
  "labour_ratio",
  "revenue_growth",
  "revenue_cagr",
];

type YearlyFormulaName = Exclude<StandardFormulaName, "revenue_growth" | "revenue_cagr">;

function q(metric: string, year: number): string {
  return `"${yearColumn(metric, year)}"`;
}

function averagedDenominator(metric: string, year: number, averaging: boolean, window: number): string {
  if (!averaging) {
    return q(metric, year);
  }
  const terms = Array.from({ length: window }, (_, offset) => q(metric, year - offset));
  return `average(${terms.join(", ")})`;
}

function yearlyTemplate(name: YearlyFormulaName, year: number, averaging: boolean, window: number): string {
  switch (name) {
    case "ebitda_margin":
      return `(${q(METRICS.operatingProfit, year)} + abs(${q(METRICS.depreciation, year)})) / ${q(METRICS.revenue, year)}`;
    case "roe":
      return `${q(METRICS.netProfit, year)} / ${averagedDenominator(METRICS.equity, year, averaging, window)}`;
    case "roa":
      return `${q(METRICS.netProfit, year)} / ${averagedDenominator(METRICS.assets, year, averaging, window)}`;
    case "asset_turnover":
      return `${q(METRICS.revenue, year)} / ${averagedDenominator(METRICS.assets, year, averaging, window)}`;
    case "employee_efficiency":
      return `${q(METRICS.revenue, year)} / ${averagedDenominator(METRICS.employees, year, averaging, window)}`;
    case "cash_ratio":
      return `${q(METRICS.cash, year)} / ${q(METRICS.currentLiabilities, year)}`;
    case "current_ratio":
      return `${q(METRICS.currentAssets, year)} / ${q(METRICS.currentLiabilities, year)}`;
    case "debt_to_equity":
      return `(${q(METRICS.currentLiabilities, year)} + ${q(METRICS.longTermLiabilities, year)}) / ${q(METRICS.equity, year)}`;
    case "labour_ratio":
      return `-(${q(METRICS.labourCosts, year)}) / ${q(METRICS.revenue, year)}`;
  }
}

export function revenueGrowth(fromYear: number, toYear: number): string {
  return `(${q(METRICS.revenue, toYear)} / ${q(METRICS.revenue, fromYear)}) - 1`;
}

export function revenueCagr(startYear: number, endYear: number): string {
  return `pow(${q(METRICS.revenue, endYear)} / ${q(METRICS.revenue, startYear)}, 1 / ${endYear - startYear}) - 1`;
}

/**
 * Expands a built-in formula into the expression it stands for. Averaging
 * variants divide by the mean of the denominator over `window` years ending at
 * `year`.
 */
export function builtInExpression(name: StandardFormulaName, params: BuiltInParams): string {
  if (name === "revenue_growth" || name === "revenue_cagr") {
    if (!("fromYear" in params)) {
      throw new ConfigError(`${name} needs fromYear and toYear`);
    }
    if (name === "revenue_cagr" && params.toYear <= params.fromYear) {
      throw new ConfigError(`revenue_cagr end year must be after start year`, [
        `${params.fromYear} -> ${params.toYear}`,
      ]);
    }
    return name === "revenue_growth"
      ? revenueGrowth(params.fromYear, params.toYear)
      : revenueCagr(params.fromYear, params.toYear);
  }

  if (!("year" in params)) {
    throw new ConfigError(`${name} needs a year`);
  }
  const averaging = AVERAGING_FORMULAS.has(name) && (params.averaging ?? true);
  const window = params.window ?? DEFAULT_AVERAGING_WINDOW;
  if (averaging && (!Number.isInteger(window) || window < 2)) {
    throw new ConfigError(`${name} averaging window must be an integer of at least 2`, [`window=${window}`]);
  }
  return yearlyTemplate(name, params.year, averaging, window);
}

export function builtInOutputName(name: StandardFormulaName, params: BuiltInParams): string {
  if ("fromYear" in params) {
    return `${name}_${params.fromYear}_to_${params.toYear}`;
  }
  const single = AVERAGING_FORMULAS.has(name) && params.averaging === false;
  return `${name}${single ? "_single" : ""}_${params.year}`;
}

function builtIn(name: StandardFormulaName, params: BuiltInParams): FormulaSpec {
  return { kind: "builtin", name, output: builtInOutputName(name, params), params };
}

export function buildStandardFormulaSpecs(config: StandardFormulaConfig): FormulaSpec[] {
  const specs: FormulaSpec[] = [];

  for (const name of STANDARD_FORMULA_NAMES) {
    if (name === "revenue_growth") {
      for (const [fromYear, toYear] of config.revenue_growth?.year_pairs ?? []) {
        specs.push(builtIn(name, { fromYear, toYear }));
      }
      continue;
    }
    if (name === "revenue_cagr") {
      const cagr = config.revenue_cagr;
      if (cagr) {
        specs.push(builtIn(name, { fromYear: cagr.start_year, toYear: cagr.end_year }));
      }
      continue;
    }

    const options = config[name];
    const variants =
      options?.averaging === "both" && AVERAGING_FORMULAS.has(name) ? [true, false] : [options?.averaging !== false];
    for (const year of options?.years ?? []) {
      for (const averaging of variants) {
        specs.push(builtIn(name, { year, averaging, window: options?.window }));
      }
    }
  }

  return specs;
}

export function buildFormulaSpecs(
  standard: StandardFormulaConfig,
  custom: Readonly<Record<string, string>>,
): FormulaSpec[] {
  const specs = buildStandardFormulaSpecs(standard);
  const builtInNames = new Set(specs.map((spec) => spec.output));
  const overlapping = Object.keys(custom).filter((output) => builtInNames.has(output));
  if (overlapping.length > 0) {
    throw new ConfigError("Custom formula names overlap built-in formulas", overlapping);
  }

  for (const [output, expression] of Object.entries(custom)) {
    specs.push({ kind: "custom", output, expression });
  }
  return specs;
}

/**
 * Every ratio for every year, with both averaged and `_single` variants where a
 * ratio has them, growth between consecutive years and CAGR over the full span.
 */
export function defaultStandardFormulas(years: readonly number[]): StandardFormulaConfig {
  const sorted = [...years].sort((a, b) => b - a);
  const everyYear = { years: sorted };
  const bothVariants = { years: sorted, averaging: "both" as const };
  const config: StandardFormulaConfig = {
    ebitda_margin: everyYear,
    roe: bothVariants,
    roa: bothVariants,
    asset_turnover: bothVariants,
    employee_efficiency: bothVariants,
    cash_ratio: everyYear,
    current_ratio: everyYear,
    debt_to_equity: everyYear,
    labour_ratio: everyYear,
  };

  if (sorted.length >= 2) {
    config.revenue_growth = {
      year_pairs: sorted.slice(0, -1).map((toYear, index): [number, number] => [sorted[index + 1], toYear]),
    };
  }
  if (sorted.length >= 3) {
    config.revenue_cagr = { start_year: sorted[sorted.length - 1], end_year: sorted[0] };
  }
  return config;
}
