import { DEFAULT_SCORE_COLUMN } from "@/lib/defaults";
import { ConfigError } from "@/lib/errors";
import { isAbsentText, readNumber, readValue, toNumber } from "@/lib/screening/columns";
import type { CellValue, FilterPredicate, Row, Table } from "@/lib/types";

export interface RankOptions {
  filters?: readonly FilterPredicate[];
  sortColumn?: string;
  ascending?: boolean;
  topN?: number;
  exportColumns?: readonly string[];
}

type SortKey = number | string | null;

const inRange = (value: number | null, min?: number, max?: number) => {
  if (min == null && max == null) {
    return true;
  }
  if (value == null) {
    return false;
  }
  if (min != null && value < min) {
    return false;
  }
  if (max != null && value > max) {
    return false;
  }
  return true;
};

// Numeric text ranks by its value, the same reading filters and scoring use.
function toSortKey(value: CellValue): SortKey {
  const numeric = toNumber(value);
  if (numeric != null || typeof value !== "string" || isAbsentText(value)) {
    return numeric;
  }
  return value.trim();
}

function comparePresent(a: number | string, b: number | string, direction: number): number {
  if (typeof a === "number" && typeof b === "number") {
    return (a === b ? 0 : a < b ? -1 : 1) * direction;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a.localeCompare(b, "et-EE") * direction;
  }
  // Text after numbers in either direction.
  return typeof a === "number" ? -1 : 1;
}

export function applyFilters(table: Table, filters: readonly FilterPredicate[]): Table {
  let rows: readonly Row[] = table.rows;

  for (const filter of filters) {
    if (!table.columns.includes(filter.column)) {
      console.warn(`[rank] filter column "${filter.column}" not found; no rows pass`);
      rows = [];
      continue;
    }
    const before = rows.length;
    rows = rows.filter((row) => inRange(readNumber(row, filter.column), filter.min, filter.max));
    console.info(`[rank] ${filter.column} [${filter.min ?? "-inf"}, ${filter.max ?? "+inf"}]: ${before} -> ${rows.length}`);
  }

  return { columns: table.columns, rows };
}

export function sortRows(table: Table, sortColumn: string, ascending = false): Table {
  if (!table.columns.includes(sortColumn)) {
    throw new ConfigError(`Sort column "${sortColumn}" does not exist`, [sortColumn]);
  }
  const direction = ascending ? 1 : -1;
  const keyed = table.rows.map((row) => ({ row, key: toSortKey(readValue(row, sortColumn)) }));

  keyed.sort((a, b) => {
    if (a.key == null && b.key == null) {
      return 0;
    }
    if (a.key == null) {
      return 1;
    }
    if (b.key == null) {
      return -1;
    }
    return comparePresent(a.key, b.key, direction);
  });

  return { columns: table.columns, rows: keyed.map((item) => item.row) };
}

export function selectColumns(table: Table, exportColumns: readonly string[]): Table {
  const unknown = exportColumns.filter((column) => !table.columns.includes(column));
  if (unknown.length > 0) {
    console.warn(`[rank] dropping unknown export columns: ${unknown.join(", ")}`);
  }
  const columns = [...new Set(exportColumns)].filter((column) => table.columns.includes(column));
  const rows = table.rows.map((row) => Object.fromEntries(columns.map((column) => [column, readValue(row, column)])));
  return { columns, rows };
}

/**
 * Applies the filters (AND), sorts stably with absent keys last, then keeps the
 * first `topN` rows. Running it again on its own output changes nothing.
 */
export function filterAndRank(table: Table, options: RankOptions = {}): Table {
  const sortColumn = options.sortColumn ?? DEFAULT_SCORE_COLUMN;
  if (!table.columns.includes(sortColumn)) {
    throw new ConfigError(`Sort column "${sortColumn}" does not exist`, [sortColumn]);
  }
  if (options.topN != null && (!Number.isInteger(options.topN) || options.topN < 1)) {
    throw new ConfigError("topN must be a positive integer", [`topN=${options.topN}`]);
  }

  const filtered = applyFilters(table, options.filters ?? []);
  const sorted = sortRows(filtered, sortColumn, options.ascending ?? false);
  const limited: Table =
    options.topN == null ? sorted : { columns: sorted.columns, rows: sorted.rows.slice(0, options.topN) };

  console.info(
    `[rank] ${limited.rows.length} of ${table.rows.length} rows kept, sorted by ${sortColumn} ${options.ascending ? "asc" : "desc"}`,
  );

  return options.exportColumns ? selectColumns(limited, options.exportColumns) : limited;
}
