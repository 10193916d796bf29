/**
 * Expanding-window z-score with no look-ahead.
 *
 * Position i is scored against the window [0..i] of the same series only:
 *   z_i = (x_i - mean(window)) / sampleStd(window)
 * where mean and std are taken over the window's non-null values and the std divisor is N-1.
 * Fewer than 2 non-null observations, or a std of exactly 0, yields 0.0 (convergence rule).
 * A null input stays null at its own position and is skipped by every window.
 */

export const MIN_WINDOW_OBSERVATIONS = 2;

export type WindowStats = { count: number; mean: number; std: number };

// Deviations are taken around the window's first value, so a run of identical values
// sums to exactly 0 and the std is exactly 0.
type ShiftedStats = { count: number; ref: number; shift: number; std: number };

function shiftedStats(values: readonly (number | null)[]): ShiftedStats {
  let count = 0;
  let ref = NaN;
  let sum = 0;
  for (const v of values) {
    if (v === null) continue;
    if (count === 0) ref = v;
    count += 1;
    sum += v - ref;
  }
  if (count === 0) return { count, ref, shift: NaN, std: NaN };
  const shift = sum / count;
  if (count < 2) return { count, ref, shift, std: NaN };
  let sq = 0;
  for (const v of values) {
    if (v === null) continue;
    const d = v - ref - shift;
    sq += d * d;
  }
  return { count, ref, shift, std: Math.sqrt(sq / (count - 1)) };
}

/** Mean and sample std (N-1) of the non-null values. `std` is NaN when count < 2. */
export function windowStats(values: readonly (number | null)[]): WindowStats {
  const { count, ref, shift, std } = shiftedStats(values);
  return { count, mean: ref + shift, std };
}

export function expandingZScore(values: readonly (number | null)[]): (number | null)[] {
  const out: (number | null)[] = [];
  for (let i = 0; i < values.length; i++) {
    const current = values[i];
    if (current === null) {
      out.push(null);
      continue;
    }
    const { count, ref, shift, std } = shiftedStats(values.slice(0, i + 1));
    if (count < MIN_WINDOW_OBSERVATIONS || std === 0) {
      out.push(0);
      continue;
    }
    out.push((current - ref - shift) / std);
  }
  return out;
}
