import type { ScoringConfig } from "@/lib/types";

export const DEFAULT_ID_COLUMN = "company_code";
export const DEFAULT_LEGAL_FORM_COLUMN = "legal_form";
export const DEFAULT_SCORE_COLUMN = "score";
export const DEFAULT_AVERAGING_WINDOW = 2;

// Register status of companies that are active ("entered into the register").
export const ACTIVE_REGISTER_STATUS = "Registrisse kantud";
export const CONSOLIDATED_MARKER = "Konsolideeritud";

export const METRICS = {
  revenue: "Müügitulu",
  operatingProfit: "Ärikasum (kahjum)",
  depreciation: "Põhivarade kulum ja väärtuse langus",
  netProfit: "Aruandeaasta kasum (kahjum)",
  equity: "Omakapital",
  assets: "Varad",
  cash: "Raha",
  currentAssets: "Käibevarad",
  currentLiabilities: "Lühiajalised kohustised",
  longTermLiabilities: "Pikaajalised kohustised",
  labourCosts: "Tööjõukulud",
  employees: "Töötajate keskmine arv taandatud täistööajale",
} as const;

/** Default rule sets, all keyed to the latest configured year. */
export function defaultScoringConfig(years: readonly number[]): ScoringConfig {
  const sorted = [...years].sort((a, b) => b - a);
  const latest = sorted[0];
  const config: Record<string, ScoringConfig[string]> = {
    [`ebitda_margin_${latest}`]: [
      { minimum: 0.4, points: 3 },
      { minimum: 0.2, points: 2 },
      { minimum: 0.1, points: 1 },
    ],
    [`roe_${latest}`]: [
      { minimum: 0.25, points: 3 },
      { minimum: 0.15, points: 2 },
      { minimum: 0.1, points: 1 },
    ],
    [`asset_turnover_${latest}`]: [
      { minimum: 2.0, points: 3 },
      { minimum: 1.0, points: 2 },
      { minimum: 0.5, points: 1 },
    ],
    [`debt_to_equity_${latest}`]: [
      { maximum: 0.3, points: 3 },
      { maximum: 0.5, points: 2 },
      { maximum: 0.8, points: 1 },
    ],
    [`current_ratio_${latest}`]: [
      { minimum: 2.0, points: 2 },
      { minimum: 1.2, points: 1 },
    ],
  };

  if (sorted.length >= 2) {
    config[`revenue_growth_${sorted[1]}_to_${latest}`] = [
      { minimum: 0.3, points: 3 },
      { minimum: 0.15, points: 2 },
      { minimum: 0.05, points: 1 },
    ];
  }

  return config;
}
