/**
 * Plain-text rendering of the alpha table and advisor view for the CLI.
 */

import type { AlphaRecord } from "./forensicAlpha";
import type { AlphaRecommendation } from "./alphaAdvisor";

export const NO_DATA_MESSAGE =
  "Insufficient data: no year has enough forensic signals to compute forensic alpha.";

const COLUMNS: { header: string; cell: (r: AlphaRecord) => string }[] = [
  { header: "year", cell: (r) => String(r.year) },
  { header: "manipulation", cell: (r) => fmt(r.manipulation_risk_signal) },
  { header: "accrual", cell: (r) => fmt(r.accrual_quality_signal) },
  { header: "fundamental", cell: (r) => fmt(r.fundamental_strength_signal) },
  { header: "bankruptcy", cell: (r) => fmt(r.bankruptcy_risk_signal) },
  { header: "alpha", cell: (r) => fmt(r.forensic_alpha) },
  { header: "signals", cell: (r) => String(r.signal_count) },
  { header: "label", cell: (r) => r.signal ?? "—" },
];

function fmt(v: number | null): string {
  return v === null ? "—" : v.toFixed(4);
}

export function formatAlphaTable(records: readonly AlphaRecord[]): string {
  if (records.length === 0) return NO_DATA_MESSAGE;
  const cells = records.map((r) => COLUMNS.map((c) => c.cell(r)));
  const widths = COLUMNS.map((c, i) => Math.max(c.header.length, ...cells.map((row) => row[i].length)));
  const line = (row: string[]) => row.map((v, i) => v.padEnd(widths[i])).join("  ").trimEnd();
  return [line(COLUMNS.map((c) => c.header)), ...cells.map(line)].join("\n");
}

export function formatRecommendation(rec: AlphaRecommendation): string {
  return [
    `Recommendation: ${rec.recommendation}`,
    `Confidence: ${rec.confidence}`,
    `Reasoning: ${rec.reasoning}`,
  ].join("\n");
}
