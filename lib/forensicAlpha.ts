/**
 * Forensic Alpha — direction-corrected, missing-data-aware composite of four forensic scores.
 *
 * Pipeline: assembleSignals (min-signal filter) → expandingZScore per metric (no look-ahead)
 * → polarity correction → weighted blend renormalized over the metrics present that year
 * → round to 4 decimals → label.
 *
 * Deterministic: same inputs and config → same records. No state survives a call.
 */

import {
  METRIC_KEYS,
  DEFAULT_FORENSIC_ALPHA_CONFIG,
  DEFAULT_MIN_SIGNALS,
  assertValidAlphaConfig,
  type ForensicAlphaConfig,
  type ForensicSignalInputs,
  type MetricKey,
  type Polarity,
} from "./forensicMetrics";
import { assembleSignals, type AssembledRow } from "./signalAssembler";
import { expandingZScore } from "./expandingZScore";
import { labelForensicAlpha, type AlphaSignalLabel } from "./alphaLabel";

export const ALPHA_DECIMALS = 4;

export type SignalColumn = `${MetricKey}_signal`;

export type NormalizedSignals = Record<SignalColumn, number | null>;

export type AlphaRecord = NormalizedSignals & {
  year: number;
  forensic_alpha: number | null;
  signal_count: number;
  signal: AlphaSignalLabel | null;
};

export type ForensicAlphaOptions = {
  minSignals?: number;
  config?: ForensicAlphaConfig;
};

export function signalColumn(key: MetricKey): SignalColumn {
  return `${key}_signal`;
}

/** Round half to even at `decimals`; never returns -0. */
export function roundTo(value: number, decimals: number = ALPHA_DECIMALS): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const frac = scaled - floor;
  let rounded: number;
  if (frac > 0.5) rounded = floor + 1;
  else if (frac < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;
  const r = rounded / factor;
  return r === 0 ? 0 : r;
}

function applyPolarity(z: number | null, polarity: Polarity): number | null {
  if (z === null) return null;
  // 0 * -1 is -0; keep the convergence value a plain 0
  return z === 0 ? 0 : z * polarity;
}

/**
 * Normalize each metric over the surviving rows and apply polarity.
 * Returns one NormalizedSignals per row, same order.
 */
export function normalizeSignals(
  rows: readonly AssembledRow[],
  config: ForensicAlphaConfig = DEFAULT_FORENSIC_ALPHA_CONFIG
): NormalizedSignals[] {
  const corrected = (key: MetricKey): (number | null)[] =>
    expandingZScore(rows.map((r) => r[key])).map((z) => applyPolarity(z, config.polarity[key]));
  const columns: Record<MetricKey, (number | null)[]> = {
    manipulation_risk: corrected("manipulation_risk"),
    accrual_quality: corrected("accrual_quality"),
    fundamental_strength: corrected("fundamental_strength"),
    bankruptcy_risk: corrected("bankruptcy_risk"),
  };
  return rows.map((_, i) => ({
    manipulation_risk_signal: columns.manipulation_risk[i],
    accrual_quality_signal: columns.accrual_quality[i],
    fundamental_strength_signal: columns.fundamental_strength[i],
    bankruptcy_risk_signal: columns.bankruptcy_risk[i],
  }));
}

/**
 * Weighted blend of one year's normalized signals. The denominator is the sum of weights of
 * the non-null signals only, so a year missing a metric is not scaled toward zero.
 * Returns null (not 0) when no signal is present.
 */
export function blendSignals(
  signals: NormalizedSignals,
  config: ForensicAlphaConfig = DEFAULT_FORENSIC_ALPHA_CONFIG
): number | null {
  let weightedSum = 0;
  let effectiveWeight = 0;
  for (const key of METRIC_KEYS) {
    const s = signals[signalColumn(key)];
    if (s === null) continue;
    const w = config.weights[key];
    weightedSum += s * w;
    effectiveWeight += w;
  }
  if (effectiveWeight === 0) return null;
  return roundTo(weightedSum / effectiveWeight, ALPHA_DECIMALS);
}

/**
 * Compute the AlphaRecord table, ordered by year ascending.
 * Returns [] when no year has at least `minSignals` scores.
 */
export function computeForensicAlpha(
  inputs: ForensicSignalInputs,
  options: ForensicAlphaOptions = {}
): AlphaRecord[] {
  const config = options.config ?? DEFAULT_FORENSIC_ALPHA_CONFIG;
  assertValidAlphaConfig(config);

  const rows = assembleSignals(inputs, options.minSignals ?? DEFAULT_MIN_SIGNALS);
  if (rows.length === 0) return [];

  const normalized = normalizeSignals(rows, config);
  return rows.map((row, i) => {
    const signals = normalized[i];
    const forensic_alpha = blendSignals(signals, config);
    return {
      year: row.year,
      ...signals,
      forensic_alpha,
      signal_count: row.signal_count,
      signal: labelForensicAlpha(forensic_alpha),
    };
  });
}
