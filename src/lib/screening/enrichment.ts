import { DEFAULT_ID_COLUMN } from "@/lib/defaults";
import { calculateAgeInYears, round } from "@/lib/screening/calculations";
import { appendColumn, readValue } from "@/lib/screening/columns";
import { getUtcDayStart, parseEstonianDate } from "@/lib/time";
import type { CellValue, Table } from "@/lib/types";

export const REGISTER_CODE_COLUMN = "ariregistri_kood";
export const REGISTRATION_DATE_COLUMN = "ettevotja_esmakande_kpv";
export const REGISTER_NAME_COLUMN = "nimi";

export interface EnrichmentOptions {
  idColumn?: string;
  referenceDate?: Date;
}

function registerLookup(registrations: Table, valueColumn: string): Map<string, CellValue> {
  const lookup = new Map<string, CellValue>();
  if (!registrations.columns.includes(REGISTER_CODE_COLUMN) || !registrations.columns.includes(valueColumn)) {
    console.warn(`[enrich] register data lacks ${REGISTER_CODE_COLUMN} or ${valueColumn}`);
    return lookup;
  }

  let duplicates = 0;
  for (const row of registrations.rows) {
    const code = readValue(row, REGISTER_CODE_COLUMN);
    if (code == null || code === "") {
      continue;
    }
    const key = String(code);
    if (lookup.has(key)) {
      duplicates += 1;
      continue;
    }
    lookup.set(key, readValue(row, valueColumn));
  }
  if (duplicates > 0) {
    console.warn(`[enrich] ${duplicates} duplicate register codes; keeping first`);
  }
  return lookup;
}

function companyKey(value: CellValue): string | null {
  return value == null || value === "" ? null : String(value);
}

/**
 * Appends `company_age_years`: days from first registration to the start of
 * the reference day, over 365.25, rounded to two decimals.
 */
export function addCompanyAge(table: Table, registrations: Table, options: EnrichmentOptions = {}): Table {
  const idColumn = options.idColumn ?? DEFAULT_ID_COLUMN;
  const reference = getUtcDayStart(options.referenceDate);
  const dates = registerLookup(registrations, REGISTRATION_DATE_COLUMN);

  const ages = table.rows.map((row) => {
    const key = companyKey(readValue(row, idColumn));
    const raw = key == null ? null : dates.get(key);
    const registered = typeof raw === "string" ? parseEstonianDate(raw) : null;
    return registered == null ? null : round(calculateAgeInYears(registered, reference), 2);
  });

  const matched = ages.filter((age) => age != null).length;
  console.info(`[enrich] company age matched for ${matched} of ${table.rows.length} companies`);
  if (matched === 0 && table.rows.length > 0) {
    console.warn("[enrich] no companies matched register data");
  }

  return appendColumn(table, "company_age_years", ages);
}

/** Adds `company_name` from the register and moves it to the front. */
export function addCompanyNames(table: Table, registrations: Table, options: EnrichmentOptions = {}): Table {
  const idColumn = options.idColumn ?? DEFAULT_ID_COLUMN;
  const names = registerLookup(registrations, REGISTER_NAME_COLUMN);

  const values = table.rows.map((row) => {
    const key = companyKey(readValue(row, idColumn));
    const name = key == null ? null : names.get(key);
    return name == null ? null : String(name);
  });

  console.info(`[enrich] company name matched for ${values.filter((name) => name != null).length} of ${table.rows.length} companies`);

  const withNames = appendColumn(table, "company_name", values);
  return {
    columns: ["company_name", ...withNames.columns.filter((column) => column !== "company_name")],
    rows: withNames.rows,
  };
}
