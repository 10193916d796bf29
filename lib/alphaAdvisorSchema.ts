/**
 * Strict Zod schema for advisor model output (untrusted input).
 */

import { z } from "zod";

export const RECOMMENDATION_VALUES = ["LONG", "SHORT", "HOLD"] as const;
export type Recommendation = (typeof RECOMMENDATION_VALUES)[number];

export const ADVISOR_CONFIDENCE_VALUES = ["Low", "Medium", "High"] as const;
export type AdvisorConfidence = (typeof ADVISOR_CONFIDENCE_VALUES)[number];

export const alphaAdvisorOutputSchema = z.object({
  recommendation: z.preprocess(
    (v) => (typeof v === "string" ? v.trim().toUpperCase() : v),
    z.enum(RECOMMENDATION_VALUES)
  ),
  confidence: z.preprocess(
    (v) => (typeof v === "string" ? titleCase(v.trim()) : v),
    z.enum(ADVISOR_CONFIDENCE_VALUES)
  ),
  reasoning: z.string().trim().min(1),
});

export type AlphaAdvisorOutput = z.infer<typeof alphaAdvisorOutputSchema>;

function titleCase(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1).toLowerCase();
}

/**
 * Repair raw model output: strip markdown code fences, then keep the span from the first
 * "{" to the last "}". Returns null when no such span exists.
 */
export function extractJsonObject(raw: string): string | null {
  let s = (raw ?? "").trim();
  const mStart = s.match(/^```(?:json)?\s*/i);
  if (mStart) s = s.slice(mStart[0].length);
  const mEnd = s.match(/\s*```\s*$/);
  if (mEnd) s = s.slice(0, s.length - mEnd[0].length);
  const start = s.indexOf("{");
  const end = s.lastIndexOf("}");
  if (start === -1 || end === -1 || end < start) return null;
  return s.slice(start, end + 1);
}

/** Parse and validate model output. Returns null when it is not well-formed JSON with the three keys. */
export function parseAlphaAdvisorOutput(raw: string): AlphaAdvisorOutput | null {
  const json = extractJsonObject(raw);
  if (json === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  const result = alphaAdvisorOutputSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
