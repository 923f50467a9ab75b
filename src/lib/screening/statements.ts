import { ACTIVE_REGISTER_STATUS, CONSOLIDATED_MARKER } from "@/lib/defaults";
import { toNumber } from "@/lib/screening/columns";
import type { CellValue, Row, Table } from "@/lib/types";

export interface GeneralRecord {
  report_id: string | number;
  company_code: string | number;
  legal_form: string | null;
  status: string | null;
  year: number;
}

export interface StatementLine {
  report_id: string | number;
  table: string | null;
  label: string;
  value: CellValue;
}

export interface YearlyDatasetOptions {
  /** Labels to pivot, in output order. All labels are kept when omitted. */
  items?: readonly string[];
}

interface ReportLines {
  consolidated: boolean;
  lines: StatementLine[];
}

const SUFFIX = ` ${CONSOLIDATED_MARKER}`;

function isConsolidated(line: StatementLine): boolean {
  return line.label.endsWith(SUFFIX) || (line.table ?? "").includes(CONSOLIDATED_MARKER);
}

function baseLabel(label: string): string {
  return label.endsWith(SUFFIX) ? label.slice(0, -SUFFIX.length) : label;
}

function groupByReport(statements: readonly StatementLine[]): Map<string, ReportLines> {
  const reports = new Map<string, ReportLines>();
  for (const line of statements) {
    const key = String(line.report_id);
    const entry = reports.get(key) ?? { consolidated: false, lines: [] };
    entry.lines.push(line);
    entry.consolidated = entry.consolidated || isConsolidated(line);
    reports.set(key, entry);
  }
  return reports;
}

/**
 * Builds one year's dataset from register records and long-format statement
 * lines. Reports that carry consolidated figures contribute only those.
 */
export function buildYearlyDataset(
  year: number,
  general: readonly GeneralRecord[],
  statements: readonly StatementLine[],
  options: YearlyDatasetOptions = {},
): Table {
  const active = general.filter((record) => record.year === year && record.status === ACTIVE_REGISTER_STATUS);
  const reports = groupByReport(statements);
  const wanted = options.items ? new Set(options.items) : null;

  const labels: string[] = options.items ? [...options.items] : [];
  const pivots = new Map<string, Record<string, number | null>>();

  for (const [reportId, report] of reports) {
    const values: Record<string, number | null> = {};
    for (const line of report.lines) {
      if (report.consolidated && !isConsolidated(line)) {
        continue;
      }
      const label = baseLabel(line.label);
      if (wanted && !wanted.has(label)) {
        continue;
      }
      if (label in values) {
        continue;
      }
      values[label] = toNumber(line.value);
      if (!wanted && !labels.includes(label)) {
        labels.push(label);
      }
    }
    pivots.set(reportId, values);
  }

  const rows: Row[] = active.map((record) => {
    const key = String(record.report_id);
    const values = pivots.get(key) ?? {};
    const row: Record<string, CellValue> = {
      company_code: String(record.company_code),
      report_id: key,
      legal_form: record.legal_form,
      is_consolidated: reports.get(key)?.consolidated ?? false,
    };
    for (const label of labels) {
      row[label] = values[label] ?? null;
    }
    return row;
  });

  const consolidatedCount = rows.filter((row) => row.is_consolidated === true).length;
  console.info(
    `[statements] ${year}: ${rows.length} active companies, ${labels.length} items, ${consolidatedCount} consolidated`,
  );

  return { columns: ["company_code", "report_id", "legal_form", "is_consolidated", ...labels], rows };
}
