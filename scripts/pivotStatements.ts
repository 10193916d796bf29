/**
 * Reshape a multi-year statement CSV (Statement, Item, <year>...) into the structured
 * year → line item table, with a data quality summary.
 *
 * Usage: npx tsx scripts/pivotStatements.ts <statements.csv>
 */

import { readFileSync } from "fs";
import { buildStatementPivot, pivotToJson } from "../lib/statementPivot";

function main() {
  const file = process.argv[2];
  if (!file) {
    console.error("Usage: npx tsx scripts/pivotStatements.ts <statements.csv>");
    process.exit(1);
  }

  const { pivot, warnings, quality } = buildStatementPivot(readFileSync(file, "utf-8"));

  if (warnings.duplicate_count > 0) {
    console.warn(`Found ${warnings.duplicate_count} duplicate (year, item) entries. Using first occurrence.`);
  }
  if (warnings.non_numeric_count > 0) {
    console.warn(`Found ${warnings.non_numeric_count} non-numeric values treated as missing.`);
  }

  console.log(`Years: ${quality.years.join(", ")}`);
  console.log(`Metrics: ${quality.metric_count}`);
  console.log(`Completeness: ${quality.completeness_pct.toFixed(1)}%`);
  console.log(JSON.stringify(pivotToJson(pivot), null, 2));
}

try {
  main();
} catch (err: unknown) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
