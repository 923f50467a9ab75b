import { DEFAULT_ID_COLUMN, DEFAULT_LEGAL_FORM_COLUMN } from "@/lib/defaults";
import { ConfigError, EmptyResultError, SchemaError } from "@/lib/errors";
import { hasColumn, readValue, yearColumn } from "@/lib/screening/columns";
import type { CellValue, Row, Table, YearlyDatasets } from "@/lib/types";

export interface MergeOptions {
  years: readonly number[];
  idColumn?: string;
  legalForms?: readonly string[];
  legalFormSource?: Table;
  legalFormColumn?: string;
  requireAllYears?: boolean;
  failOnEmpty?: boolean;
}

interface YearSource {
  year: number;
  table: Table;
  index: Map<string, Row>;
  renamed: Array<[string, string]>;
}

function isDatasetMap(datasets: YearlyDatasets): datasets is ReadonlyMap<number, Table> {
  return datasets instanceof Map;
}

function datasetFor(datasets: YearlyDatasets, year: number): Table | undefined {
  if (isDatasetMap(datasets)) {
    return datasets.get(year);
  }
  return datasets[year];
}

function entityKey(value: CellValue): string | null {
  if (value == null || value === "") {
    return null;
  }
  return String(value);
}

function indexRows(table: Table, idColumn: string, year: number): Map<string, Row> {
  const index = new Map<string, Row>();
  let skipped = 0;
  let duplicates = 0;

  for (const row of table.rows) {
    const key = entityKey(readValue(row, idColumn));
    if (key == null) {
      skipped += 1;
      continue;
    }
    if (index.has(key)) {
      duplicates += 1;
      continue;
    }
    index.set(key, row);
  }

  if (skipped > 0) {
    console.warn(`[merge] ${year}: skipped ${skipped} rows without ${idColumn}`);
  }
  if (duplicates > 0) {
    console.warn(`[merge] ${year}: ignored ${duplicates} duplicate ${idColumn} rows (first row kept)`);
  }
  return index;
}

function collectLegalForms(options: MergeOptions, idColumn: string, sources: YearSource[]): Map<string, string> {
  const legalFormColumn = options.legalFormColumn ?? DEFAULT_LEGAL_FORM_COLUMN;
  const tables = options.legalFormSource ? [options.legalFormSource] : sources.map((source) => source.table);
  const forms = new Map<string, string>();
  let sawColumn = false;

  for (const source of tables) {
    if (!hasColumn(source, legalFormColumn)) {
      continue;
    }
    if (!hasColumn(source, idColumn)) {
      throw new SchemaError(`Legal form reference lacks identifier column "${idColumn}"`, idColumn);
    }
    sawColumn = true;
    for (const row of source.rows) {
      const key = entityKey(readValue(row, idColumn));
      const form = readValue(row, legalFormColumn);
      if (key == null || form == null || forms.has(key)) {
        continue;
      }
      forms.set(key, String(form).trim());
    }
  }

  if (!sawColumn) {
    throw new SchemaError(
      `Legal form filter requested but no dataset provides column "${legalFormColumn}"`,
      legalFormColumn,
    );
  }
  return forms;
}

/**
 * Outer-joins yearly datasets on the entity identifier. Every other column is
 * renamed `<column>_<year>`; entities missing from a year get null for that
 * year's columns.
 */
export function mergeYears(datasets: YearlyDatasets, options: MergeOptions): Table {
  const idColumn = options.idColumn ?? DEFAULT_ID_COLUMN;
  const years = options.years;

  if (years.length === 0) {
    throw new ConfigError("No years specified for merge");
  }

  const sources: YearSource[] = [];
  for (const year of years) {
    const table = datasetFor(datasets, year);
    if (!table) {
      throw new SchemaError(`No dataset provided for year ${year}`, null, year);
    }
    if (!hasColumn(table, idColumn)) {
      throw new SchemaError(`Dataset for year ${year} lacks identifier column "${idColumn}"`, idColumn, year);
    }
    sources.push({
      year,
      table,
      index: indexRows(table, idColumn, year),
      renamed: table.columns
        .filter((column) => column !== idColumn)
        .map((column): [string, string] => [column, yearColumn(column, year)]),
    });
  }

  console.info(`[merge] merging years ${years.join(", ")} on ${idColumn}`);

  const universe: string[] = [];
  const seen = new Set<string>();
  for (const source of sources) {
    for (const key of source.index.keys()) {
      if (!seen.has(key)) {
        seen.add(key);
        universe.push(key);
      }
    }
  }

  let entities = universe;

  if (options.requireAllYears) {
    entities = entities.filter((key) => sources.every((source) => source.index.has(key)));
    console.info(`[merge] ${entities.length} of ${universe.length} entities have data for every year`);
  }

  const allowedForms = options.legalForms ?? [];
  if (allowedForms.length > 0) {
    const forms = collectLegalForms(options, idColumn, sources);
    const allowed = new Set(allowedForms);
    const before = entities.length;
    entities = entities.filter((key) => {
      const form = forms.get(key);
      return form != null && allowed.has(form);
    });
    console.info(
      `[merge] legal form filter (${allowedForms.join(", ")}) kept ${entities.length} of ${before} entities`,
    );
  }

  if (entities.length === 0 && options.failOnEmpty) {
    throw new EmptyResultError(`No entities remain after merging years ${years.join(", ")}`);
  }

  const columns = [idColumn, ...sources.flatMap((source) => source.renamed.map(([, renamed]) => renamed))];

  const rows = entities.map((key) => {
    const merged: Record<string, CellValue> = {};
    for (const source of sources) {
      const row = source.index.get(key);
      if (row && !(idColumn in merged)) {
        merged[idColumn] = readValue(row, idColumn);
      }
      for (const [column, renamed] of source.renamed) {
        merged[renamed] = row ? readValue(row, column) : null;
      }
    }
    return merged;
  });

  console.info(`[merge] merged table has ${rows.length} rows and ${columns.length} columns`);
  return { columns, rows };
}
