import { describe, expect, test, vi } from "vitest";
import { ConfigError, EmptyResultError, SchemaError } from "@/lib/errors";
import { mergeYears } from "@/lib/screening/merger";
import type { Table } from "@/lib/types";

const year2023: Table = {
  columns: ["company_code", "legal_form", "Müügitulu"],
  rows: [
    { company_code: "A", legal_form: "AS", "Müügitulu": 1000 },
    { company_code: "B", legal_form: "OÜ", "Müügitulu": 500 },
    { company_code: "C", legal_form: "MTÜ", "Müügitulu": 50 },
  ],
};

const year2022: Table = {
  columns: ["company_code", "legal_form", "Müügitulu"],
  rows: [
    { company_code: "A", legal_form: "AS", "Müügitulu": 800 },
    { company_code: "D", legal_form: "AS", "Müügitulu": 300 },
  ],
};

describe("mergeYears", () => {
  test("outer-joins every entity with year-suffixed columns", () => {
    const merged = mergeYears(new Map([[2023, year2023], [2022, year2022]]), { years: [2023, 2022] });

    expect(merged.columns).toEqual([
      "company_code",
      "legal_form_2023",
      "Müügitulu_2023",
      "legal_form_2022",
      "Müügitulu_2022",
    ]);
    expect(merged.rows.map((row) => row.company_code)).toEqual(["A", "B", "C", "D"]);
    expect(merged.rows[1]).toEqual({
      company_code: "B",
      legal_form_2023: "OÜ",
      "Müügitulu_2023": 500,
      legal_form_2022: null,
      "Müügitulu_2022": null,
    });
    expect(merged.rows[3]["Müügitulu_2023"]).toBeNull();
    expect(merged.rows[3].company_code).toBe("D");
  });

  test("accepts a plain record keyed by year", () => {
    const merged = mergeYears({ 2023: year2023 }, { years: [2023] });
    expect(merged.rows).toHaveLength(3);
  });

  test("requireAllYears keeps only entities present in every year", () => {
    const merged = mergeYears({ 2023: year2023, 2022: year2022 }, { years: [2023, 2022], requireAllYears: true });
    expect(merged.rows.map((row) => row.company_code)).toEqual(["A"]);
  });

  test("legal form filter applies to the entity universe only", () => {
    const merged = mergeYears({ 2023: year2023, 2022: year2022 }, { years: [2023, 2022], legalForms: ["AS", "OÜ"] });
    expect(merged.rows.map((row) => row.company_code)).toEqual(["A", "B", "D"]);
    expect(merged.rows[0]["Müügitulu_2022"]).toBe(800);
  });

  test("a companion table can supply legal forms", () => {
    const bare: Table = { columns: ["company_code", "x"], rows: [{ company_code: "A", x: 1 }, { company_code: "B", x: 2 }] };
    const source: Table = { columns: ["company_code", "legal_form"], rows: [{ company_code: "B", legal_form: " AS " }] };
    const merged = mergeYears({ 2023: bare }, { years: [2023], legalForms: ["AS"], legalFormSource: source });
    expect(merged.rows).toEqual([{ company_code: "B", x_2023: 2 }]);
  });

  test("duplicate and missing identifiers are skipped with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const messy: Table = {
      columns: ["company_code", "v"],
      rows: [
        { company_code: "A", v: 1 },
        { company_code: "A", v: 2 },
        { company_code: null, v: 3 },
      ],
    };
    const merged = mergeYears({ 2023: messy }, { years: [2023] });
    expect(merged.rows).toEqual([{ company_code: "A", v_2023: 1 }]);
    expect(warn).toHaveBeenCalledWith("[merge] 2023: skipped 1 rows without company_code");
    expect(warn).toHaveBeenCalledWith("[merge] 2023: ignored 1 duplicate company_code rows (first row kept)");
    warn.mockRestore();
  });

  test("structural problems raise typed errors", () => {
    expect(() => mergeYears({ 2023: year2023 }, { years: [] })).toThrow(ConfigError);
    expect(() => mergeYears({ 2023: year2023 }, { years: [2023, 2021] })).toThrow(SchemaError);
    expect(() => mergeYears({ 2023: year2023 }, { years: [2023], idColumn: "registrikood" })).toThrow(
      'Dataset for year 2023 lacks identifier column "registrikood"',
    );
    const noForms: Table = { columns: ["company_code"], rows: [{ company_code: "A" }] };
    expect(() => mergeYears({ 2023: noForms }, { years: [2023], legalForms: ["AS"] })).toThrow(SchemaError);
  });

  test("failOnEmpty raises when nothing survives the filters", () => {
    expect(() =>
      mergeYears({ 2023: year2023 }, { years: [2023], legalForms: ["TÜ"], failOnEmpty: true }),
    ).toThrow(EmptyResultError);
    expect(mergeYears({ 2023: year2023 }, { years: [2023], legalForms: ["TÜ"] }).rows).toEqual([]);
  });
});
