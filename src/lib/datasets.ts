import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { SchemaError } from "@/lib/errors";
import { buildYearlyDataset, type YearlyDatasetOptions } from "@/lib/screening/statements";
import type { CellValue, Row, Table } from "@/lib/types";

const idSchema = z.union([z.string().min(1), z.number().int()]);

const generalRecordSchema = z.object({
  report_id: idSchema,
  company_code: idSchema,
  legal_form: z.string().nullable(),
  status: z.string().nullable(),
  year: z.number().int(),
});

const statementLineSchema = z.object({
  report_id: idSchema,
  table: z.string().nullable().default(null),
  label: z.string().min(1),
  value: z.union([z.number(), z.string(), z.null()]),
});

const registerRecordSchema = z
  .object({
    ariregistri_kood: idSchema,
    nimi: z.string().nullable().optional(),
    ettevotja_esmakande_kpv: z.string().nullable().optional(),
  })
  .passthrough();

export const REGISTER_FILE = "legal_data.json";

export interface ScreeningInputs {
  datasets: Map<number, Table>;
  register: Table | null;
}

function readJsonFile<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  if (!existsSync(path)) {
    throw new SchemaError(`Data file not found: ${path}`);
  }

  let input: unknown;
  try {
    input = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new SchemaError(`Data file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".")}: ${first.message}` : parsed.error.message;
    throw new SchemaError(`Data file ${path} is malformed (${where})`);
  }
  return parsed.data;
}

export function tableFromRecords(records: readonly Record<string, unknown>[]): Table {
  const columns: string[] = [];
  const rows: Row[] = records.map((record) => {
    const row: Record<string, CellValue> = {};
    for (const [key, value] of Object.entries(record)) {
      if (!columns.includes(key)) {
        columns.push(key);
      }
      row[key] =
        typeof value === "number" || typeof value === "string" || typeof value === "boolean" ? value : null;
    }
    return row;
  });
  return { columns, rows };
}

export function loadYearlyDataset(dataDir: string, year: number, options: YearlyDatasetOptions = {}): Table {
  const general = readJsonFile(join(dataDir, `general_${year}.json`), z.array(generalRecordSchema));
  const statements = readJsonFile(join(dataDir, `financials_${year}.json`), z.array(statementLineSchema));
  return buildYearlyDataset(year, general, statements, options);
}

export function loadRegister(dataDir: string): Table | null {
  const path = join(dataDir, REGISTER_FILE);
  if (!existsSync(path)) {
    console.info(`[datasets] ${REGISTER_FILE} not found; skipping register enrichment`);
    return null;
  }
  return tableFromRecords(readJsonFile(path, z.array(registerRecordSchema)));
}

export function loadScreeningInputs(
  dataDir: string,
  years: readonly number[],
  options: YearlyDatasetOptions = {},
): ScreeningInputs {
  const datasets = new Map<number, Table>();
  for (const year of years) {
    datasets.set(year, loadYearlyDataset(dataDir, year, options));
  }
  console.info(`[datasets] loaded ${years.length} years from ${dataDir}`);
  return { datasets, register: loadRegister(dataDir) };
}
