/**
 * Forensic metric keys, input series shape, and the static weight/polarity configuration
 * used to blend them into forensic alpha.
 *
 * Configuration is an immutable value passed into the blender; there is no module-level
 * mutable state, so concurrent calls with different weight schemes cannot interfere.
 */

export const METRIC_KEYS = [
  "manipulation_risk",
  "accrual_quality",
  "fundamental_strength",
  "bankruptcy_risk",
] as const;

export type MetricKey = (typeof METRIC_KEYS)[number];

/** Year → score. `null` (or an absent year) means the score is unavailable for that year. */
export type RawSignalSeries = ReadonlyMap<number, number | null>;

export type ForensicSignalInputs = Record<MetricKey, RawSignalSeries>;

/** +1: higher raw value = stronger/safer. -1: higher raw value = worse (negated before blending). */
export type Polarity = 1 | -1;

export type ForensicAlphaConfig = {
  readonly weights: Readonly<Record<MetricKey, number>>;
  readonly polarity: Readonly<Record<MetricKey, Polarity>>;
};

export const DEFAULT_MIN_SIGNALS = 3;

/** Static blend weights (sum 1.0). */
export const DEFAULT_WEIGHTS: Readonly<Record<MetricKey, number>> = Object.freeze({
  manipulation_risk: 0.35,
  accrual_quality: 0.25,
  fundamental_strength: 0.25,
  bankruptcy_risk: 0.15,
});

export const DEFAULT_POLARITY: Readonly<Record<MetricKey, Polarity>> = Object.freeze({
  manipulation_risk: -1,
  accrual_quality: -1,
  fundamental_strength: 1,
  bankruptcy_risk: 1,
});

export const DEFAULT_FORENSIC_ALPHA_CONFIG: ForensicAlphaConfig = Object.freeze({
  weights: DEFAULT_WEIGHTS,
  polarity: DEFAULT_POLARITY,
});

const WEIGHT_SUM_TOLERANCE = 1e-9;

/**
 * Throws RangeError when weights are negative/non-finite, do not sum to 1.0, or a polarity
 * is not ±1. A bad configuration is a programming error, not a data condition.
 */
export function assertValidAlphaConfig(config: ForensicAlphaConfig): void {
  let sum = 0;
  for (const key of METRIC_KEYS) {
    const w = config.weights[key];
    if (typeof w !== "number" || !Number.isFinite(w) || w < 0) {
      throw new RangeError(`Invalid weight for ${key}: ${String(w)}`);
    }
    sum += w;
    const p = config.polarity[key];
    if (p !== 1 && p !== -1) {
      throw new RangeError(`Invalid polarity for ${key}: ${String(p)}`);
    }
  }
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new RangeError(`Weights must sum to 1.0 (got ${sum})`);
  }
}

/** Build a series from year/value points; later duplicates of a year overwrite earlier ones. */
export function toSignalSeries(
  points: { year: number; value: number | null | undefined }[]
): RawSignalSeries {
  const series = new Map<number, number | null>();
  for (const p of points) series.set(p.year, p.value ?? null);
  return series;
}

/** Series from an array aligned to `years` (same length). */
export function seriesFromArray(years: number[], values: (number | null)[]): RawSignalSeries {
  if (years.length !== values.length) {
    throw new RangeError(`years (${years.length}) and values (${values.length}) differ in length`);
  }
  return toSignalSeries(years.map((year, i) => ({ year, value: values[i] })));
}
