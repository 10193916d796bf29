/**
 * Per-year forensic score CSV → the four RawSignalSeries consumed by computeForensicAlpha.
 * Columns: "year" plus one column per metric. Original score names are accepted as aliases.
 */

import { METRIC_KEYS, type ForensicSignalInputs, type MetricKey } from "./forensicMetrics";
import { parseCellNumber, readCsvTable } from "./statementPivot";

export const METRIC_COLUMN_ALIASES: Record<MetricKey, string[]> = {
  manipulation_risk: ["manipulation_risk", "beneish", "beneish_m_score"],
  accrual_quality: ["accrual_quality", "sloan", "sloan_accrual"],
  fundamental_strength: ["fundamental_strength", "piotroski", "piotroski_f_score"],
  bankruptcy_risk: ["bankruptcy_risk", "altman", "altman_z_score"],
};

function normalizeHeader(h: string): string {
  return h.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

function findColumn(header: string[], candidates: string[]): string | null {
  for (const h of header) {
    if (candidates.includes(normalizeHeader(h))) return h;
  }
  return null;
}

/**
 * Parse score CSV text. Throws when there is no year column, a year is not an integer,
 * or a year appears on more than one row.
 * A metric without a column is an all-null series.
 */
export function parseScoreTable(csvText: string): ForensicSignalInputs {
  const { header, records } = readCsvTable(csvText);
  const yearColumn = findColumn(header, ["year"]);
  if (records.length > 0 && !yearColumn) {
    throw new Error("Score file must contain a 'year' column.");
  }

  const series: Record<MetricKey, Map<number, number | null>> = {
    manipulation_risk: new Map(),
    accrual_quality: new Map(),
    fundamental_strength: new Map(),
    bankruptcy_risk: new Map(),
  };
  if (!yearColumn) return series;

  const columns: Record<MetricKey, string | null> = {
    manipulation_risk: findColumn(header, METRIC_COLUMN_ALIASES.manipulation_risk),
    accrual_quality: findColumn(header, METRIC_COLUMN_ALIASES.accrual_quality),
    fundamental_strength: findColumn(header, METRIC_COLUMN_ALIASES.fundamental_strength),
    bankruptcy_risk: findColumn(header, METRIC_COLUMN_ALIASES.bankruptcy_risk),
  };

  for (const rec of records) {
    const rawYear = (rec[yearColumn] ?? "").trim();
    if (!/^-?\d+$/.test(rawYear)) {
      throw new Error(`Invalid year in score file: '${rawYear}'`);
    }
    const year = Number(rawYear);
    if (series.manipulation_risk.has(year)) {
      throw new Error(`Duplicate year in score file: '${rawYear}'`);
    }
    for (const key of METRIC_KEYS) {
      const col = columns[key];
      series[key].set(year, col ? parseCellNumber(rec[col]) : null);
    }
  }
  return series;
}
