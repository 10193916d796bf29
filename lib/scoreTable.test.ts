import { describe, it, expect } from "vitest";
import { parseScoreTable } from "./scoreTable";
import { computeForensicAlpha } from "./forensicAlpha";

describe("parseScoreTable", () => {
  it("reads metric columns by name", () => {
    const inputs = parseScoreTable(
      "year,manipulation_risk,accrual_quality,fundamental_strength,bankruptcy_risk\n2021,-2.2,0.02,6,3.0\n2022,-2.0,,7,3.2\n"
    );
    expect(inputs.manipulation_risk.get(2021)).toBe(-2.2);
    expect(inputs.accrual_quality.get(2022)).toBeNull();
    expect(inputs.fundamental_strength.get(2022)).toBe(7);
    expect(inputs.bankruptcy_risk.get(2021)).toBe(3);
  });

  it("accepts the conventional score names as aliases", () => {
    const inputs = parseScoreTable("Year,Beneish M-Score,Sloan,Piotroski,Altman Z Score\n2020,-1.9,0.04,5,2.1\n");
    expect(inputs.manipulation_risk.get(2020)).toBe(-1.9);
    expect(inputs.accrual_quality.get(2020)).toBe(0.04);
    expect(inputs.fundamental_strength.get(2020)).toBe(5);
    expect(inputs.bankruptcy_risk.get(2020)).toBe(2.1);
  });

  it("a missing metric column is an all-null series", () => {
    const inputs = parseScoreTable("year,beneish,sloan,piotroski\n2020,-1.9,0.04,5\n");
    expect(inputs.bankruptcy_risk.get(2020)).toBeNull();
  });

  it("requires a year column and integer years", () => {
    expect(() => parseScoreTable("period,beneish\n2020,1\n")).toThrow("Score file must contain a 'year' column.");
    expect(() => parseScoreTable("year,beneish\nFY20,1\n")).toThrow("Invalid year in score file: 'FY20'");
  });

  it("rejects a year repeated on two rows", () => {
    expect(() => parseScoreTable("year,beneish,sloan\n2020,-1.9,0.04\n2021,-2.0,0.03\n2020,-1.5,0.05\n")).toThrow(
      "Duplicate year in score file: '2020'"
    );
  });

  it("an empty file yields empty series and an empty alpha table", () => {
    const inputs = parseScoreTable("");
    expect(inputs.manipulation_risk.size).toBe(0);
    expect(computeForensicAlpha(inputs)).toEqual([]);
  });
});
