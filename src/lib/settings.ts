import { readFileSync } from "node:fs";
import { z } from "zod";
import { DEFAULT_ID_COLUMN, DEFAULT_SCORE_COLUMN, defaultScoringConfig } from "@/lib/defaults";
import { ConfigError } from "@/lib/errors";
import { compileScoringRules } from "@/lib/screening/scoring";
import { buildFormulaSpecs, defaultStandardFormulas } from "@/lib/screening/standard-formulas";
import type { ScreeningConfig } from "@/lib/types";

const yearSchema = z.number().int().min(1990).max(2100);

const formulaOptionsSchema = z
  .object({
    years: z.array(yearSchema).min(1),
    averaging: z.union([z.boolean(), z.literal("both")]).optional(),
    window: z.number().int().min(2).optional(),
  })
  .strict();

const standardFormulasSchema = z
  .object({
    ebitda_margin: formulaOptionsSchema.optional(),
    roe: formulaOptionsSchema.optional(),
    roa: formulaOptionsSchema.optional(),
    asset_turnover: formulaOptionsSchema.optional(),
    employee_efficiency: formulaOptionsSchema.optional(),
    cash_ratio: formulaOptionsSchema.optional(),
    current_ratio: formulaOptionsSchema.optional(),
    debt_to_equity: formulaOptionsSchema.optional(),
    labour_ratio: formulaOptionsSchema.optional(),
    revenue_growth: z.object({ year_pairs: z.array(z.tuple([yearSchema, yearSchema])) }).strict().optional(),
    revenue_cagr: z
      .object({ start_year: yearSchema, end_year: yearSchema })
      .strict()
      .refine((value) => value.end_year > value.start_year, {
        message: "end_year must be after start_year",
        path: ["end_year"],
      })
      .optional(),
  })
  .strict();

const thresholdRuleSchema = z.union([
  z.object({ minimum: z.number(), points: z.number() }).strict(),
  z.object({ maximum: z.number(), points: z.number() }).strict(),
]);

const filterSchema = z
  .object({
    column: z.string().min(1),
    min: z.number().optional(),
    max: z.number().optional(),
  })
  .strict()
  .refine((value) => value.min == null || value.max == null || value.min <= value.max, {
    message: "min must not exceed max",
  });

const screeningConfigSchema = z
  .object({
    years: z
      .array(yearSchema)
      .min(1)
      .refine((years) => new Set(years).size === years.length, { message: "years must be distinct" }),
    legal_forms: z.array(z.string().min(1)).default([]),
    id_column: z.string().min(1).default(DEFAULT_ID_COLUMN),
    require_all_years: z.boolean().default(false),
    fail_on_empty: z.boolean().default(false),
    standard_formulas: standardFormulasSchema.optional(),
    custom_formulas: z.record(z.string().min(1), z.string()).default({}),
    flag_investment_vehicles: z.boolean().default(true),
    scoring_config: z.record(z.string().min(1), z.array(thresholdRuleSchema)).optional(),
    include_point_columns: z.boolean().default(false),
    financial_filters: z.array(filterSchema).default([]),
    sort_column: z.string().min(1).default(DEFAULT_SCORE_COLUMN),
    ascending: z.boolean().default(false),
    top_n: z.number().int().positive().optional(),
    export_columns: z.array(z.string().min(1)).optional(),
    skip_steps: z.array(z.enum(["age", "names"])).default([]),
  })
  .strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validates a raw configuration object. Omitted `standard_formulas` and
 * `scoring_config` fall back to the default sets for the configured years; an
 * explicit empty object turns them off.
 */
export function parseScreeningConfig(input: unknown): ScreeningConfig {
  const parsed = screeningConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError("Invalid screening configuration", formatIssues(parsed.error));
  }

  const data = parsed.data;
  const config: ScreeningConfig = {
    ...data,
    standard_formulas: data.standard_formulas ?? defaultStandardFormulas(data.years),
    scoring_config: data.scoring_config ?? defaultScoringConfig(data.years),
  };

  // Overlapping formula names and invalid rule sets throw ConfigError.
  buildFormulaSpecs(config.standard_formulas, config.custom_formulas);
  compileScoringRules(config.scoring_config);

  return config;
}

export function loadScreeningConfig(path: string): ScreeningConfig {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read screening configuration ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let input: unknown;
  try {
    input = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Screening configuration ${path} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return parseScreeningConfig(input);
}
