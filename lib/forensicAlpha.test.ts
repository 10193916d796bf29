import { describe, it, expect } from "vitest";
import {
  computeForensicAlpha,
  blendSignals,
  normalizeSignals,
  roundTo,
  type NormalizedSignals,
} from "./forensicAlpha";
import {
  seriesFromArray,
  DEFAULT_FORENSIC_ALPHA_CONFIG,
  type ForensicAlphaConfig,
  type ForensicSignalInputs,
} from "./forensicMetrics";

const YEARS = [2020, 2021, 2022];

function scenario(): ForensicSignalInputs {
  return {
    manipulation_risk: seriesFromArray(YEARS, [-2.2, -2.0, -1.8]),
    accrual_quality: seriesFromArray(YEARS, [0.02, 0.03, 0.05]),
    fundamental_strength: seriesFromArray(YEARS, [6, 7, 8]),
    bankruptcy_risk: seriesFromArray(YEARS, [3.0, 3.2, 2.9]),
  };
}

describe("computeForensicAlpha", () => {
  it("end-to-end: three complete years", () => {
    const out = computeForensicAlpha(scenario());
    expect(out.map((r) => r.year)).toEqual(YEARS);
    expect(out.map((r) => r.signal_count)).toEqual([4, 4, 4]);
    expect(out.map((r) => r.forensic_alpha)).toEqual([0, -0.1414, -0.5037]);
    expect(out.map((r) => r.signal)).toEqual(["Neutral", "Neutral", "Negative"]);
  });

  it("end-to-end: direction-corrected normalized signals", () => {
    const [first, second, third] = computeForensicAlpha(scenario());
    expect(first.manipulation_risk_signal).toBe(0);
    expect(first.bankruptcy_risk_signal).toBe(0);
    // manipulation and accrual rise → negated; fundamental rises → positive
    expect(second.manipulation_risk_signal).toBeCloseTo(-0.7071067811865475, 12);
    expect(second.accrual_quality_signal).toBeCloseTo(-0.7071067811865475, 12);
    expect(second.fundamental_strength_signal).toBeCloseTo(0.7071067811865475, 12);
    expect(second.bankruptcy_risk_signal).toBeCloseTo(0.7071067811865475, 12);
    expect(third.manipulation_risk_signal).toBeCloseTo(-1, 12);
    expect(third.accrual_quality_signal).toBeCloseTo(-1.091089451179962, 12);
    expect(third.fundamental_strength_signal).toBeCloseTo(1, 12);
    expect(third.bankruptcy_risk_signal).toBeCloseTo(-0.8728715609439686, 12);
  });

  it("never emits -0 for a converged negated signal", () => {
    const [first] = computeForensicAlpha(scenario());
    expect(Object.is(first.manipulation_risk_signal, 0)).toBe(true);
    expect(Object.is(first.accrual_quality_signal, 0)).toBe(true);
  });

  it("flat metrics with fractional values give a zero alpha every year", () => {
    const years = [2019, 2020, 2021, 2022];
    const out = computeForensicAlpha({
      manipulation_risk: seriesFromArray(years, [-2.1, -2.1, -2.1, -2.1]),
      accrual_quality: seriesFromArray(years, [0.1, 0.1, 0.1, 0.1]),
      fundamental_strength: seriesFromArray(years, [6, 6, 6, 6]),
      bankruptcy_risk: seriesFromArray(years, [2.9, 2.9, 2.9, 2.9]),
    });
    expect(out.map((r) => r.forensic_alpha)).toEqual([0, 0, 0, 0]);
    expect(out.map((r) => r.signal)).toEqual(["Neutral", "Neutral", "Neutral", "Neutral"]);
  });

  it("dropped years never enter any normalization window", () => {
    const years = [2019, 2020, 2021, 2022];
    const withGap: ForensicSignalInputs = {
      // 2020 has only one signal and is dropped; its outlier value must not leak into 2021
      manipulation_risk: seriesFromArray(years, [-2.2, 50, -2.0, -1.8]),
      accrual_quality: seriesFromArray(years, [0.02, null, 0.03, 0.05]),
      fundamental_strength: seriesFromArray(years, [6, null, 7, 8]),
      bankruptcy_risk: seriesFromArray(years, [3.0, null, 3.2, 2.9]),
    };
    const out = computeForensicAlpha(withGap);
    expect(out.map((r) => r.year)).toEqual([2019, 2021, 2022]);
    expect(out.map((r) => r.forensic_alpha)).toEqual([0, -0.1414, -0.5037]);
  });

  it("renormalizes over the metrics present when one is missing", () => {
    const years = [2019, 2020, 2021, 2022];
    const out = computeForensicAlpha({
      manipulation_risk: seriesFromArray(years, [1, 2, 4, null]),
      accrual_quality: seriesFromArray(years, [1, 3, 2, 5]),
      fundamental_strength: seriesFromArray(years, [2, 2, 3, 4]),
      bankruptcy_risk: seriesFromArray(years, [null, 1, 1, 2]),
    });
    expect(out.map((r) => r.signal_count)).toEqual([3, 4, 4, 3]);
    expect(out[0].bankruptcy_risk_signal).toBeNull();
    expect(out[3].manipulation_risk_signal).toBeNull();
    expect(out.map((r) => r.forensic_alpha)).toEqual([0, -0.4243, -0.0932, 0.2619]);
    expect(out.map((r) => r.signal)).toEqual(["Neutral", "Negative", "Neutral", "Neutral"]);
  });

  it("returns an empty table when every year lacks enough signals", () => {
    const out = computeForensicAlpha({
      manipulation_risk: seriesFromArray(YEARS, [1, 2, 3]),
      accrual_quality: seriesFromArray(YEARS, [null, null, null]),
      fundamental_strength: seriesFromArray(YEARS, [4, null, null]),
      bankruptcy_risk: seriesFromArray(YEARS, [null, null, 1]),
    });
    expect(out).toEqual([]);
  });

  it("honors minSignals", () => {
    const inputs: ForensicSignalInputs = {
      manipulation_risk: seriesFromArray(YEARS, [1, 2, 3]),
      accrual_quality: seriesFromArray(YEARS, [null, null, null]),
      fundamental_strength: seriesFromArray(YEARS, [null, null, null]),
      bankruptcy_risk: seriesFromArray(YEARS, [null, null, null]),
    };
    const out = computeForensicAlpha(inputs, { minSignals: 1 });
    expect(out.map((r) => r.signal_count)).toEqual([1, 1, 1]);
    // single negated metric: alpha equals its corrected z-score
    expect(out[2].forensic_alpha).toBe(-1);
    expect(out[2].signal).toBe("Negative");
  });

  it("uses the config passed in rather than the default", () => {
    const reversed: ForensicAlphaConfig = {
      weights: DEFAULT_FORENSIC_ALPHA_CONFIG.weights,
      polarity: {
        manipulation_risk: 1,
        accrual_quality: 1,
        fundamental_strength: -1,
        bankruptcy_risk: -1,
      },
    };
    const out = computeForensicAlpha(scenario(), { config: reversed });
    expect(out.map((r) => r.forensic_alpha)).toEqual([0, 0.1414, 0.5037]);
  });

  it("rejects a config whose weights do not sum to 1", () => {
    const bad: ForensicAlphaConfig = {
      weights: { manipulation_risk: 0.5, accrual_quality: 0.5, fundamental_strength: 0.5, bankruptcy_risk: 0 },
      polarity: DEFAULT_FORENSIC_ALPHA_CONFIG.polarity,
    };
    expect(() => computeForensicAlpha(scenario(), { config: bad })).toThrow(RangeError);
  });

  it("is reproducible for identical inputs", () => {
    expect(computeForensicAlpha(scenario())).toEqual(computeForensicAlpha(scenario()));
  });
});

describe("blendSignals", () => {
  const signals = (s: Partial<NormalizedSignals>): NormalizedSignals => ({
    manipulation_risk_signal: s.manipulation_risk_signal ?? null,
    accrual_quality_signal: s.accrual_quality_signal ?? null,
    fundamental_strength_signal: s.fundamental_strength_signal ?? null,
    bankruptcy_risk_signal: s.bankruptcy_risk_signal ?? null,
  });

  it("divides by the weights of present signals only", () => {
    const alpha = blendSignals(
      signals({ manipulation_risk_signal: 1, accrual_quality_signal: -1, fundamental_strength_signal: 0.5 })
    );
    // (0.35 - 0.25 + 0.125) / 0.85, not / 1.0
    expect(alpha).toBe(0.2647);
  });

  it("returns null, not 0, when no signal is present", () => {
    expect(blendSignals(signals({}))).toBeNull();
  });

  it("a lone signal passes through at full scale", () => {
    expect(blendSignals(signals({ bankruptcy_risk_signal: 1.23456 }))).toBe(1.2346);
  });
});

describe("normalizeSignals", () => {
  it("returns no rows for no input", () => {
    expect(normalizeSignals([])).toEqual([]);
  });
});

describe("roundTo", () => {
  it("rounds to 4 decimals", () => {
    expect(roundTo(0.12341)).toBe(0.1234);
    expect(roundTo(0.12344)).toBe(0.1234);
    expect(roundTo(-1.00006)).toBe(-1.0001);
  });

  it("never returns -0", () => {
    expect(Object.is(roundTo(-0.00001), 0)).toBe(true);
    expect(Object.is(roundTo(-0.5, 0), 0)).toBe(true);
  });

  it("rounds exact ties to the even neighbour", () => {
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(3.5, 0)).toBe(4);
    expect(roundTo(-2.5, 0)).toBe(-2);
    expect(roundTo(0.00125)).toBe(0.0012);
    expect(roundTo(-0.00125)).toBe(-0.0012);
  });
});
