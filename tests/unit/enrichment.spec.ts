import { describe, expect, test } from "vitest";
import { ConfigError } from "@/lib/errors";
import { addCompanyAge, addCompanyNames } from "@/lib/screening/enrichment";
import { parseEstonianDate } from "@/lib/time";
import type { Table } from "@/lib/types";

const companies: Table = {
  columns: ["company_code", "score"],
  rows: [
    { company_code: "10000001", score: 4 },
    { company_code: "10000002", score: 2 },
    { company_code: "10000003", score: 1 },
  ],
};

const register: Table = {
  columns: ["ariregistri_kood", "nimi", "ettevotja_esmakande_kpv"],
  rows: [
    { ariregistri_kood: "10000001", nimi: "Näidis AS", ettevotja_esmakande_kpv: "01.01.2020" },
    { ariregistri_kood: "10000002", nimi: "Proov OÜ", ettevotja_esmakande_kpv: "31.02.2019" },
    { ariregistri_kood: "10000001", nimi: "Teine nimi", ettevotja_esmakande_kpv: "01.01.2000" },
  ],
};

describe("parseEstonianDate", () => {
  test("parses dd.mm.yyyy as UTC midnight", () => {
    expect(parseEstonianDate("05.03.2021")?.toISOString()).toBe("2021-03-05T00:00:00.000Z");
    expect(parseEstonianDate(" 5.3.2021 ")?.toISOString()).toBe("2021-03-05T00:00:00.000Z");
  });

  test("rejects impossible dates and other formats", () => {
    expect(parseEstonianDate("31.02.2019")).toBeNull();
    expect(parseEstonianDate("2019-02-01")).toBeNull();
    expect(parseEstonianDate(null)).toBeNull();
  });
});

describe("register enrichment", () => {
  test("addCompanyAge measures from first registration to the reference day", () => {
    const result = addCompanyAge(companies, register, { referenceDate: new Date("2024-01-01T15:30:00Z") });
    expect(result.columns).toEqual(["company_code", "score", "company_age_years"]);
    expect(result.rows.map((row) => row.company_age_years)).toEqual([4, null, null]);
  });

  test("addCompanyNames puts the name first and keeps the first register entry", () => {
    const result = addCompanyNames(companies, register);
    expect(result.columns).toEqual(["company_name", "company_code", "score"]);
    expect(result.rows.map((row) => row.company_name)).toEqual(["Näidis AS", "Proov OÜ", null]);
  });

  test("existing enrichment columns are not overwritten", () => {
    const aged: Table = { columns: [...companies.columns, "company_age_years"], rows: companies.rows };
    expect(() => addCompanyAge(aged, register)).toThrow(ConfigError);

    const named: Table = { columns: ["company_name", ...companies.columns], rows: companies.rows };
    expect(() => addCompanyNames(named, register)).toThrow("Output column already exists: company_name");
  });
});
