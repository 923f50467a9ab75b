export type CellValue = number | string | boolean | null;

export type Row = Readonly<Record<string, CellValue>>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export type YearlyDatasets = ReadonlyMap<number, Table> | Readonly<Record<number, Table>>;

export type StandardFormulaName =
  | "ebitda_margin"
  | "roe"
  | "roa"
  | "asset_turnover"
  | "employee_efficiency"
  | "cash_ratio"
  | "current_ratio"
  | "debt_to_equity"
  | "labour_ratio"
  | "revenue_growth"
  | "revenue_cagr";

export type BuiltInParams =
  | { year: number; averaging?: boolean; window?: number }
  | { fromYear: number; toYear: number };

export type FormulaSpec =
  | { kind: "builtin"; name: StandardFormulaName; output: string; params: BuiltInParams }
  | { kind: "custom"; output: string; expression: string };

export type ThresholdRule = { minimum: number; points: number } | { maximum: number; points: number };

export type ScoringConfig = Readonly<Record<string, readonly ThresholdRule[]>>;

export interface FilterPredicate {
  column: string;
  min?: number;
  max?: number;
}

export interface StandardFormulaOptions {
  years: number[];
  /** `"both"` builds the averaged ratio and its `_single` variant. */
  averaging?: boolean | "both";
  window?: number;
}

export interface StandardFormulaConfig {
  ebitda_margin?: StandardFormulaOptions;
  roe?: StandardFormulaOptions;
  roa?: StandardFormulaOptions;
  asset_turnover?: StandardFormulaOptions;
  employee_efficiency?: StandardFormulaOptions;
  cash_ratio?: StandardFormulaOptions;
  current_ratio?: StandardFormulaOptions;
  debt_to_equity?: StandardFormulaOptions;
  labour_ratio?: StandardFormulaOptions;
  revenue_growth?: { year_pairs: Array<[number, number]> };
  revenue_cagr?: { start_year: number; end_year: number };
}

export type SkipStep = "age" | "names";

export interface ScreeningConfig {
  years: number[];
  legal_forms: string[];
  id_column: string;
  require_all_years: boolean;
  fail_on_empty: boolean;
  standard_formulas: StandardFormulaConfig;
  custom_formulas: Record<string, string>;
  flag_investment_vehicles: boolean;
  scoring_config: ScoringConfig;
  include_point_columns: boolean;
  financial_filters: FilterPredicate[];
  sort_column: string;
  ascending: boolean;
  top_n?: number;
  export_columns?: string[];
  skip_steps: SkipStep[];
}

export interface FormulaFailure {
  output: string;
  message: string;
  missingColumns: string[];
}

export interface ColumnScoringSummary {
  scoredRows: number;
  maxPoints: number;
  averagePoints: number;
}

export interface ScoringSummary {
  rows: number;
  rowsWithScore: number;
  maxPossibleScore: number;
  averageScore: number;
  highestScore: number;
  distribution: Record<string, number>;
  columns: Record<string, ColumnScoringSummary>;
}

export interface ScreeningReport {
  years: number[];
  mergedRows: number;
  appliedFormulas: string[];
  formulaFailures: FormulaFailure[];
  flaggedInvestmentVehicles: number;
  scoring: ScoringSummary | null;
  resultRows: number;
}
