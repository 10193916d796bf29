/**
 * Compute forensic alpha from a per-year score CSV and print the table.
 *
 * Usage: npx tsx scripts/forensicAlpha.ts <scores.csv> [--min-signals N] [--json] [--advise]
 */

import { readFileSync } from "fs";
import { computeForensicAlpha } from "../lib/forensicAlpha";
import { parseScoreTable } from "../lib/scoreTable";
import { getAlphaModelMetadata } from "../lib/alphaModelMetadata";
import { getAlphaRecommendation } from "../lib/alphaAdvisor";
import { formatAlphaTable, formatRecommendation } from "../lib/alphaReport";
import { DEFAULT_MIN_SIGNALS } from "../lib/forensicMetrics";

function readFlagValue(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

async function main() {
  const file = process.argv.slice(2).find((a, i, all) => !a.startsWith("--") && all[i - 1] !== "--min-signals");
  if (!file) {
    console.error("Usage: npx tsx scripts/forensicAlpha.ts <scores.csv> [--min-signals N] [--json] [--advise]");
    process.exit(1);
  }
  const rawMin = readFlagValue("--min-signals");
  const minSignals = rawMin != null ? Number(rawMin) : DEFAULT_MIN_SIGNALS;
  const asJson = process.argv.includes("--json");
  const advise = process.argv.includes("--advise");

  const inputs = parseScoreTable(readFileSync(file, "utf-8"));
  const records = computeForensicAlpha(inputs, { minSignals });
  const advice = advise ? await getAlphaRecommendation(records) : null;

  if (asJson) {
    console.log(JSON.stringify({ model: getAlphaModelMetadata(), records, advice }, null, 2));
    return;
  }

  console.log(formatAlphaTable(records));
  if (advice) {
    console.log("\nAI-Assisted Investment View");
    console.log(formatRecommendation(advice));
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
