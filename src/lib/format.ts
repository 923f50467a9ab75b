import type { CellValue, Table } from "@/lib/types";

function formatter(digits: number) {
  return new Intl.NumberFormat("et-EE", {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  });
}

export function formatNumber(value: number | null | undefined, digits = 0): string {
  if (value == null || !Number.isFinite(value)) {
    return "-";
  }
  return formatter(digits).format(value);
}

export function formatCell(value: CellValue | undefined): string {
  if (value == null) {
    return "-";
  }
  if (typeof value === "boolean") {
    return value ? "yes" : "no";
  }
  if (typeof value === "number") {
    return formatNumber(value, Number.isInteger(value) ? 0 : 2);
  }
  return value;
}

/** Plain-text preview of the first rows, one padded line per row. */
export function formatTable(table: Table, columns: readonly string[] = table.columns, limit = 20): string {
  const shown = columns.filter((column) => table.columns.includes(column));
  const body = table.rows.slice(0, limit).map((row) => shown.map((column) => formatCell(row[column])));
  const widths = shown.map((column, index) => Math.max(column.length, ...body.map((cells) => cells[index].length)));

  const line = (cells: string[]) => cells.map((cell, index) => cell.padEnd(widths[index])).join("  ").trimEnd();
  const lines = [line(shown), line(widths.map((width) => "-".repeat(width))), ...body.map(line)];
  if (table.rows.length > limit) {
    lines.push(`... ${table.rows.length - limit} more rows`);
  }
  return lines.join("\n");
}
