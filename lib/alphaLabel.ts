/**
 * Qualitative label for a rounded forensic alpha.
 * Strict thresholds, first match wins: > 1.0, > 0.3, < -1.0, < -0.3, else Neutral.
 */

export const ALPHA_SIGNAL_LABELS = [
  "Strong Positive",
  "Positive",
  "Neutral",
  "Negative",
  "Strong Negative",
] as const;

export type AlphaSignalLabel = (typeof ALPHA_SIGNAL_LABELS)[number];

export const STRONG_THRESHOLD = 1.0;
export const MILD_THRESHOLD = 0.3;

/** Null alpha has no label; it is never treated as Neutral. */
export function labelForensicAlpha(alpha: number | null): AlphaSignalLabel | null {
  if (alpha === null) return null;
  if (alpha > STRONG_THRESHOLD) return "Strong Positive";
  if (alpha > MILD_THRESHOLD) return "Positive";
  if (alpha < -STRONG_THRESHOLD) return "Strong Negative";
  if (alpha < -MILD_THRESHOLD) return "Negative";
  return "Neutral";
}
