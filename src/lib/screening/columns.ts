import { ConfigError } from "@/lib/errors";
import type { CellValue, Row, Table } from "@/lib/types";

const YEAR_SUFFIX = /^(.+)_(\d{4})$/;
const ABSENT_MARKERS = new Set(["", "n/a", "na", "nan", "null", "-"]);

export function yearColumn(metric: string, year: number): string {
  return `${metric}_${year}`;
}

export function splitYearColumn(column: string): { metric: string; year: number } | null {
  const match = YEAR_SUFFIX.exec(column);
  if (!match) {
    return null;
  }
  return { metric: match[1], year: Number(match[2]) };
}

export function hasColumn(table: Table, column: string): boolean {
  return table.columns.includes(column);
}

export function missingColumns(table: Table, columns: readonly string[]): string[] {
  const known = new Set(table.columns);
  return [...new Set(columns)].filter((column) => !known.has(column));
}

export function readValue(row: Row, column: string): CellValue {
  return row[column] ?? null;
}

export function isAbsentText(value: string): boolean {
  return ABSENT_MARKERS.has(value.trim().toLowerCase());
}

export function toNumber(value: CellValue | undefined): number | null {
  if (value == null) {
    return null;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (isAbsentText(value)) {
    return null;
  }
  const trimmed = value.trim();
  const normalized = trimmed.includes(".") ? trimmed : trimmed.replace(",", ".");
  const parsed = Number(normalized.replace(/\s+/g, ""));
  return Number.isFinite(parsed) ? parsed : null;
}

export function readNumber(row: Row, column: string): number | null {
  return toNumber(row[column]);
}

/** Later stages only add columns; an existing name is never rewritten. */
export function assertNewColumn(table: Table, column: string): void {
  if (table.columns.includes(column)) {
    throw new ConfigError("Output column already exists", [column]);
  }
}

export function appendColumn(
  table: Table,
  column: string,
  values: readonly CellValue[],
): Table {
  assertNewColumn(table, column);
  return {
    columns: [...table.columns, column],
    rows: table.rows.map((row, index) => ({ ...row, [column]: values[index] ?? null })),
  };
}
