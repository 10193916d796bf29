/**
 * AI-assisted view of a forensic alpha table.
 *
 * Talks to any OpenAI-compatible chat endpoint (a local Ollama server by default).
 * Never throws: a failed call, timeout, or output that is not the strict three-key JSON
 * yields the conservative fallback (HOLD / Low).
 */

import OpenAI from "openai";
import type { AlphaRecord } from "./forensicAlpha";
import {
  ALPHA_ADVISOR_SYSTEM_PROMPT,
  ALPHA_ADVISOR_PROMPT_VERSION,
  buildAlphaAdvisorUserPrompt,
} from "./prompts/alphaAdvisorPrompt";
import { parseAlphaAdvisorOutput, type AdvisorConfidence, type Recommendation } from "./alphaAdvisorSchema";

export type AlphaRecommendation = {
  recommendation: Recommendation;
  confidence: AdvisorConfidence;
  reasoning: string;
  source: "model" | "fallback";
  model: string | null;
  prompt_version: string;
};

export type AlphaAdvisorOptions = {
  baseURL?: string;
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
};

export const DEFAULT_ADVISOR_BASE_URL = "http://localhost:11434/v1";
export const DEFAULT_ADVISOR_MODEL = "llama3";
export const DEFAULT_ADVISOR_TIMEOUT_MS = 60_000;

export const FALLBACK_REASONING =
  "AI interpretation unavailable. Recommendation based solely on quantitative forensic alpha.";

export function fallbackRecommendation(model: string | null = null): AlphaRecommendation {
  return {
    recommendation: "HOLD",
    confidence: "Low",
    reasoning: FALLBACK_REASONING,
    source: "fallback",
    model,
    prompt_version: ALPHA_ADVISOR_PROMPT_VERSION,
  };
}

function parseTimeout(raw: string | undefined): number {
  const n = raw != null ? Number(raw) : NaN;
  return Number.isFinite(n) && n > 0 ? n : DEFAULT_ADVISOR_TIMEOUT_MS;
}

/** Explicit options win over FORENSIC_AI_* / OPENAI_API_KEY environment variables. */
export function resolveAdvisorOptions(options: AlphaAdvisorOptions = {}): Required<AlphaAdvisorOptions> {
  return {
    baseURL: options.baseURL ?? (process.env.FORENSIC_AI_BASE_URL || DEFAULT_ADVISOR_BASE_URL),
    apiKey: options.apiKey ?? (process.env.OPENAI_API_KEY || "ollama"),
    model: options.model ?? (process.env.FORENSIC_AI_MODEL || DEFAULT_ADVISOR_MODEL),
    timeoutMs: options.timeoutMs ?? parseTimeout(process.env.FORENSIC_AI_TIMEOUT_MS),
  };
}

function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return typeof e === "string" ? e : "Unknown error";
}

export async function getAlphaRecommendation(
  records: readonly AlphaRecord[],
  options: AlphaAdvisorOptions = {}
): Promise<AlphaRecommendation> {
  const { baseURL, apiKey, model, timeoutMs } = resolveAdvisorOptions(options);

  if (records.length === 0) {
    console.warn("[alpha_advisor] FALLBACK", { reason: "empty alpha table", model });
    return fallbackRecommendation(null);
  }

  const started = Date.now();
  try {
    const client = new OpenAI({ apiKey, baseURL, timeout: timeoutMs, maxRetries: 0 });
    const completion = await client.chat.completions.create({
      model,
      temperature: 0.1,
      messages: [
        { role: "system", content: ALPHA_ADVISOR_SYSTEM_PROMPT },
        { role: "user", content: buildAlphaAdvisorUserPrompt(records) },
      ],
    });
    const content = completion.choices?.[0]?.message?.content ?? "";
    const usedModel = completion.model ?? model;
    console.log("[alpha_advisor] MODEL_OK", { model: usedModel, ms: Date.now() - started, len: content.length });

    const parsed = parseAlphaAdvisorOutput(content);
    if (!parsed) {
      console.warn("[alpha_advisor] FALLBACK", { reason: "invalid model output", model: usedModel });
      return fallbackRecommendation(usedModel);
    }
    return {
      ...parsed,
      source: "model",
      model: usedModel,
      prompt_version: ALPHA_ADVISOR_PROMPT_VERSION,
    };
  } catch (e: unknown) {
    console.warn("[alpha_advisor] FALLBACK", {
      reason: describeError(e),
      model,
      ms: Date.now() - started,
    });
    return fallbackRecommendation(model);
  }
}
