/**
 * Model governance metadata for Forensic Alpha.
 * All values are sourced from the engine modules; no duplicated magic numbers.
 */

import {
  DEFAULT_FORENSIC_ALPHA_CONFIG,
  DEFAULT_MIN_SIGNALS,
  type ForensicAlphaConfig,
  type MetricKey,
  type Polarity,
} from "./forensicMetrics";
import { MIN_WINDOW_OBSERVATIONS } from "./expandingZScore";
import { STRONG_THRESHOLD, MILD_THRESHOLD } from "./alphaLabel";
import { ALPHA_DECIMALS } from "./forensicAlpha";

/** Blending logic version; store it alongside outputs so older results stay traceable. */
export const FORENSIC_ALPHA_VERSION = "1.0";

export type AlphaModelMetadata = {
  version: string;
  weights: Record<MetricKey, number>;
  polarity: Record<MetricKey, Polarity>;
  normalization: string;
  min_signals_default: number;
  alpha_decimals: number;
  label_thresholds: { strong: number; mild: number };
};

export function getAlphaModelMetadata(
  config: ForensicAlphaConfig = DEFAULT_FORENSIC_ALPHA_CONFIG
): AlphaModelMetadata {
  return {
    version: FORENSIC_ALPHA_VERSION,
    weights: { ...config.weights },
    polarity: { ...config.polarity },
    normalization: `expanding z-score, sample std (N-1), min ${MIN_WINDOW_OBSERVATIONS} observations`,
    min_signals_default: DEFAULT_MIN_SIGNALS,
    alpha_decimals: ALPHA_DECIMALS,
    label_thresholds: { strong: STRONG_THRESHOLD, mild: MILD_THRESHOLD },
  };
}
