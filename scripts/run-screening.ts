import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { DEFAULT_SCORE_COLUMN, METRICS } from "../src/lib/defaults";
import { loadScreeningInputs } from "../src/lib/datasets";
import { readEnv } from "../src/lib/env";
import { ScreenerError } from "../src/lib/errors";
import { formatTable } from "../src/lib/format";
import { runScreening } from "../src/lib/screening/service";
import { loadScreeningConfig } from "../src/lib/settings";

function previewColumns(columns: readonly string[], idColumn: string, sortColumn: string, scored: string[]): string[] {
  const wanted = ["company_name", idColumn, sortColumn, DEFAULT_SCORE_COLUMN, ...scored];
  return [...new Set(wanted)].filter((column) => columns.includes(column));
}

function main() {
  const env = readEnv();
  console.log(`[cli] config: ${env.SCREENER_CONFIG_PATH}`);
  const config = loadScreeningConfig(env.SCREENER_CONFIG_PATH);

  const inputs = loadScreeningInputs(env.SCREENER_DATA_DIR, config.years, { items: Object.values(METRICS) });
  const { table, report } = runScreening(inputs, config);

  const columns = config.export_columns
    ? table.columns
    : previewColumns(table.columns, config.id_column, config.sort_column, Object.keys(config.scoring_config));
  console.log(formatTable(table, columns, env.SCREENER_PREVIEW_ROWS));
  console.log(`[cli] report: ${JSON.stringify(report)}`);

  if (env.SCREENER_OUTPUT_PATH) {
    mkdirSync(dirname(env.SCREENER_OUTPUT_PATH), { recursive: true });
    writeFileSync(env.SCREENER_OUTPUT_PATH, JSON.stringify({ report, columns: table.columns, rows: table.rows }, null, 2));
    console.log(`[cli] wrote ${table.rows.length} rows to ${env.SCREENER_OUTPUT_PATH}`);
  }
}

try {
  main();
} catch (error) {
  if (error instanceof ScreenerError) {
    console.error(`[cli] ${error.name}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
}
