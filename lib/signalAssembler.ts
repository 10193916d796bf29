/**
 * Signal Assembler: merges the four per-year forensic score series into one table and drops
 * years with fewer than `minSignals` available scores.
 * Dropped years are removed entirely so they never enter a later normalization window.
 */

import {
  METRIC_KEYS,
  DEFAULT_MIN_SIGNALS,
  type ForensicSignalInputs,
  type MetricKey,
  type RawSignalSeries,
} from "./forensicMetrics";

export type AssembledRow = Record<MetricKey, number | null> & {
  year: number;
  signal_count: number;
};

function assertValidMinSignals(minSignals: number): void {
  if (!Number.isInteger(minSignals) || minSignals < 1 || minSignals > METRIC_KEYS.length) {
    throw new RangeError(`minSignals must be an integer in [1, ${METRIC_KEYS.length}] (got ${minSignals})`);
  }
}

function readValue(series: RawSignalSeries, year: number, key: MetricKey): number | null {
  const v = series.get(year);
  if (v == null) return null;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new TypeError(`${key}[${year}] must be a finite number or null (got ${String(v)})`);
  }
  return v;
}

/** Sorted union of every year key present in any series. */
export function collectYears(inputs: ForensicSignalInputs): number[] {
  const years = new Set<number>();
  for (const key of METRIC_KEYS) {
    for (const year of inputs[key].keys()) {
      if (!Number.isInteger(year)) {
        throw new TypeError(`${key} has a non-integer year key: ${String(year)}`);
      }
      years.add(year);
    }
  }
  return [...years].sort((a, b) => a - b);
}

/**
 * Returns one row per surviving year, ascending. An empty array means insufficient data;
 * callers present it as "no data", not as an error.
 */
export function assembleSignals(
  inputs: ForensicSignalInputs,
  minSignals: number = DEFAULT_MIN_SIGNALS
): AssembledRow[] {
  assertValidMinSignals(minSignals);

  const rows: AssembledRow[] = [];
  for (const year of collectYears(inputs)) {
    const manipulation_risk = readValue(inputs.manipulation_risk, year, "manipulation_risk");
    const accrual_quality = readValue(inputs.accrual_quality, year, "accrual_quality");
    const fundamental_strength = readValue(inputs.fundamental_strength, year, "fundamental_strength");
    const bankruptcy_risk = readValue(inputs.bankruptcy_risk, year, "bankruptcy_risk");
    const signal_count = [manipulation_risk, accrual_quality, fundamental_strength, bankruptcy_risk].filter(
      (v) => v !== null
    ).length;
    if (signal_count < minSignals) continue;
    rows.push({
      year,
      manipulation_risk,
      accrual_quality,
      fundamental_strength,
      bankruptcy_risk,
      signal_count,
    });
  }
  return rows;
}
