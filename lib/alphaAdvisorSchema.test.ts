import { describe, it, expect } from "vitest";
import { extractJsonObject, parseAlphaAdvisorOutput } from "./alphaAdvisorSchema";

describe("extractJsonObject", () => {
  it("strips code fences", () => {
    expect(extractJsonObject('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("keeps the span from the first { to the last }", () => {
    expect(extractJsonObject('Answer: {"a":{"b":2}} done')).toBe('{"a":{"b":2}}');
  });

  it("returns null when there is no object", () => {
    expect(extractJsonObject("HOLD")).toBeNull();
    expect(extractJsonObject("} reversed {")).toBeNull();
    expect(extractJsonObject("")).toBeNull();
  });
});

describe("parseAlphaAdvisorOutput", () => {
  it("accepts the three keys and drops extras", () => {
    const out = parseAlphaAdvisorOutput(
      '{"recommendation":"HOLD","confidence":"Medium","reasoning":" Stable. ","extra":true}'
    );
    expect(out).toEqual({ recommendation: "HOLD", confidence: "Medium", reasoning: "Stable." });
  });

  it("rejects an empty reasoning", () => {
    expect(parseAlphaAdvisorOutput('{"recommendation":"HOLD","confidence":"Low","reasoning":"  "}')).toBeNull();
  });

  it("rejects an unknown confidence level", () => {
    expect(
      parseAlphaAdvisorOutput('{"recommendation":"LONG","confidence":"Very High","reasoning":"x"}')
    ).toBeNull();
  });

  it("rejects a non-object root", () => {
    expect(parseAlphaAdvisorOutput("[1, 2]")).toBeNull();
  });
});
