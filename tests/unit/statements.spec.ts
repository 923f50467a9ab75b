import { describe, expect, test } from "vitest";
import { buildYearlyDataset, type GeneralRecord, type StatementLine } from "@/lib/screening/statements";

const general: GeneralRecord[] = [
  { report_id: 1, company_code: 10000001, legal_form: "AS", status: "Registrisse kantud", year: 2023 },
  { report_id: 2, company_code: 10000002, legal_form: "OÜ", status: "Registrisse kantud", year: 2023 },
  { report_id: 3, company_code: 10000003, legal_form: "OÜ", status: "Kustutatud", year: 2023 },
  { report_id: 4, company_code: 10000004, legal_form: "AS", status: "Registrisse kantud", year: 2022 },
  { report_id: 5, company_code: 10000005, legal_form: "AS", status: "Registrisse kantud", year: 2023 },
];

const statements: StatementLine[] = [
  { report_id: 1, table: "Kasumiaruanne", label: "Müügitulu", value: 1000 },
  { report_id: 1, table: "Bilanss", label: "Varad", value: "2500,5" },
  { report_id: 1, table: "Bilanss", label: "Varad", value: 1 },
  { report_id: 2, table: "Kasumiaruanne", label: "Müügitulu", value: 400 },
  { report_id: 2, table: "Kasumiaruanne", label: "Müügitulu Konsolideeritud", value: 900 },
  { report_id: 2, table: "Konsolideeritud bilanss", label: "Varad", value: 3000 },
  { report_id: 3, table: "Kasumiaruanne", label: "Müügitulu", value: 10 },
];

describe("buildYearlyDataset", () => {
  test("pivots active companies of the year with first values winning", () => {
    const dataset = buildYearlyDataset(2023, general, statements);

    expect(dataset.columns).toEqual(["company_code", "report_id", "legal_form", "is_consolidated", "Müügitulu", "Varad"]);
    expect(dataset.rows).toEqual([
      {
        company_code: "10000001",
        report_id: "1",
        legal_form: "AS",
        is_consolidated: false,
        "Müügitulu": 1000,
        Varad: 2500.5,
      },
      {
        company_code: "10000002",
        report_id: "2",
        legal_form: "OÜ",
        is_consolidated: true,
        "Müügitulu": 900,
        Varad: 3000,
      },
      {
        company_code: "10000005",
        report_id: "5",
        legal_form: "AS",
        is_consolidated: false,
        "Müügitulu": null,
        Varad: null,
      },
    ]);
  });

  test("items restrict and order the pivoted labels", () => {
    const dataset = buildYearlyDataset(2023, general, statements, { items: ["Varad", "Raha"] });
    expect(dataset.columns).toEqual(["company_code", "report_id", "legal_form", "is_consolidated", "Varad", "Raha"]);
    expect(dataset.rows[0]).toMatchObject({ Varad: 2500.5, Raha: null });
  });
});
