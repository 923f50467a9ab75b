import { addCompanyAge, addCompanyNames } from "@/lib/screening/enrichment";
import { applyFormulas, flagInvestmentVehicles } from "@/lib/screening/formulas";
import { mergeYears } from "@/lib/screening/merger";
import { filterAndRank, selectColumns } from "@/lib/screening/ranking";
import { compileScoringRules, scoreTable } from "@/lib/screening/scoring";
import { buildFormulaSpecs } from "@/lib/screening/standard-formulas";
import type { ScreeningConfig, ScreeningReport, Table, YearlyDatasets } from "@/lib/types";

export interface ScreeningInputs {
  datasets: YearlyDatasets;
  /** Company register extract used for age and name enrichment. */
  register?: Table | null;
  /** Reference table for legal forms when the yearly datasets carry none. */
  legalFormSource?: Table;
}

export interface RunScreeningOptions {
  referenceDate?: Date;
}

export interface ScreeningRun {
  table: Table;
  report: ScreeningReport;
}

export function runScreening(
  inputs: ScreeningInputs,
  config: ScreeningConfig,
  options: RunScreeningOptions = {},
): ScreeningRun {
  const startedAt = Date.now();
  const formulas = buildFormulaSpecs(config.standard_formulas, config.custom_formulas);
  compileScoringRules(config.scoring_config);

  const merged = mergeYears(inputs.datasets, {
    years: config.years,
    idColumn: config.id_column,
    legalForms: config.legal_forms,
    legalFormSource: inputs.legalFormSource,
    requireAllYears: config.require_all_years,
    failOnEmpty: config.fail_on_empty,
  });
  console.info(`[screening] merged ${merged.rows.length} companies over ${config.years.join(", ")}`);

  const computed = applyFormulas(merged, formulas);
  let table = computed.table;

  let flaggedInvestmentVehicles = 0;
  if (config.flag_investment_vehicles) {
    const flagged = flagInvestmentVehicles(table, config.years, computed.compiled);
    table = flagged.table;
    flaggedInvestmentVehicles = flagged.flagged;
  }

  const register = inputs.register ?? null;
  if (register && !config.skip_steps.includes("age")) {
    table = addCompanyAge(table, register, { idColumn: config.id_column, referenceDate: options.referenceDate });
  }

  const hasScoring = Object.keys(config.scoring_config).length > 0;
  const scored = scoreTable(table, config.scoring_config, { includePointColumns: config.include_point_columns });

  let result = filterAndRank(scored.table, {
    filters: config.financial_filters,
    sortColumn: config.sort_column,
    ascending: config.ascending,
    topN: config.top_n,
  });

  if (register && !config.skip_steps.includes("names")) {
    result = addCompanyNames(result, register, { idColumn: config.id_column });
  }
  if (config.export_columns) {
    result = selectColumns(result, config.export_columns);
  }

  const report: ScreeningReport = {
    years: [...config.years],
    mergedRows: merged.rows.length,
    appliedFormulas: computed.applied,
    formulaFailures: computed.failures,
    flaggedInvestmentVehicles,
    scoring: hasScoring ? scored.summary : null,
    resultRows: result.rows.length,
  };

  console.info(
    `[screening] completed: ${report.resultRows} of ${report.mergedRows} companies, ${report.formulaFailures.length} formula failures (${Date.now() - startedAt}ms)`,
  );

  return { table: result, report };
}
