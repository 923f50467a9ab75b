import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { ConfigError } from "@/lib/errors";
import { loadScreeningConfig, parseScreeningConfig } from "@/lib/settings";

function configError(input: unknown): ConfigError {
  try {
    parseScreeningConfig(input);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected configuration to be rejected");
}

describe("parseScreeningConfig", () => {
  test("fills defaults for omitted options", () => {
    const config = parseScreeningConfig({ years: [2023, 2022], standard_formulas: {}, scoring_config: {} });

    expect(config).toEqual({
      years: [2023, 2022],
      legal_forms: [],
      id_column: "company_code",
      require_all_years: false,
      fail_on_empty: false,
      standard_formulas: {},
      custom_formulas: {},
      flag_investment_vehicles: true,
      scoring_config: {},
      include_point_columns: false,
      financial_filters: [],
      sort_column: "score",
      ascending: false,
      skip_steps: [],
    });
  });

  test("omitted formula and scoring sets fall back to the defaults", () => {
    const config = parseScreeningConfig({ years: [2022, 2023] });
    expect(config.standard_formulas.revenue_growth).toEqual({ year_pairs: [[2022, 2023]] });
    expect(Object.keys(config.scoring_config)).toContain("revenue_growth_2022_to_2023");
  });

  test("averaging accepts both variants at once", () => {
    const config = parseScreeningConfig({
      years: [2023],
      standard_formulas: { roa: { years: [2023], averaging: "both" } },
      scoring_config: {},
    });
    expect(config.standard_formulas.roa).toEqual({ years: [2023], averaging: "both" });

    const error = configError({ years: [2023], standard_formulas: { roa: { years: [2023], averaging: "sometimes" } } });
    expect(error.issues.some((issue) => issue.startsWith("standard_formulas.roa.averaging"))).toBe(true);
  });

  test("schema problems list their paths", () => {
    const error = configError({
      years: [2023, 2023],
      top_n: 0,
      financial_filters: [{ column: "roe_2023", min: 2, max: 1 }],
      scoring_config: { roe_2023: [{ minimum: 0.1, maximum: 0.2, points: 1 }] },
    });

    expect(error.issues).toContain("years: years must be distinct");
    expect(error.issues).toContain("top_n: Number must be greater than 0");
    expect(error.issues).toContain("financial_filters.0: min must not exceed max");
    expect(error.issues.some((issue) => issue.startsWith("scoring_config.roe_2023.0"))).toBe(true);
  });

  test("unknown keys are rejected", () => {
    expect(configError({ years: [2023], sort_by: "score" }).issues).toEqual([
      "(root): Unrecognized key(s) in object: 'sort_by'",
    ]);
  });

  test("CAGR years must increase", () => {
    const error = configError({ years: [2023], standard_formulas: { revenue_cagr: { start_year: 2023, end_year: 2021 } } });
    expect(error.issues).toEqual(["standard_formulas.revenue_cagr.end_year: end_year must be after start_year"]);
  });

  test("cross-checks run eagerly", () => {
    expect(() =>
      parseScreeningConfig({
        years: [2023],
        standard_formulas: { roe: { years: [2023] } },
        custom_formulas: { roe_2023: "1" },
      }),
    ).toThrow("Custom formula names overlap built-in formulas: roe_2023");

    expect(() =>
      parseScreeningConfig({
        years: [2023],
        scoring_config: { roe_2023: [{ minimum: 0.1, points: -2 }] },
      }),
    ).toThrow('Invalid scoring configuration: "roe_2023" rule 0 points must be non-negative');
  });
});

describe("loadScreeningConfig", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  test("reads the fixture configuration", () => {
    const config = loadScreeningConfig("tests/fixtures/screening.config.json");
    expect(config.years).toEqual([2023, 2022]);
    expect(config.legal_forms).toEqual(["AS", "OÜ"]);
    expect(Object.keys(config.scoring_config)).toHaveLength(3);
  });

  test("invalid JSON and missing files are configuration errors", () => {
    const tmp = mkdtempSync(join(tmpdir(), "screener-config-"));
    dir = tmp;
    const path = join(tmp, "broken.json");
    writeFileSync(path, "{ years: ");

    expect(() => loadScreeningConfig(path)).toThrow(`Screening configuration ${path} is not valid JSON`);
    expect(() => loadScreeningConfig(join(tmp, "missing.json"))).toThrow(ConfigError);
  });
});
