import { z } from "zod";
import { getLogger, errorMessage } from "@coinsage/core";
import { flattenToText, parseJsonObject } from "../json.js";
import {
  intentions,
  riskLevels,
  MIN_TRADE_AMOUNT,
  MAX_TRADE_AMOUNT,
  type TradingAnalysis,
} from "./types.js";

const logger = getLogger("analysis-parser");

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max);
}

// Prompts ask for "hold"; the record calls it "nothing"
function normalizeIntention(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const lowered = value.trim().toLowerCase();
  return lowered === "hold" ? "nothing" : lowered;
}

function normalizeEnum(value: unknown): unknown {
  return typeof value === "string" ? value.trim().toLowerCase() : value;
}

// numbers and numeric strings only; null, booleans and "" fall to the default
const finiteNumber = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
  z.number().finite(),
);

function analysisSchema(defaultAmount: number) {
  return z.object({
    intention: z.preprocess(normalizeIntention, z.enum(intentions)).catch("nothing"),
    analysis: z
      .unknown()
      .transform((v) => flattenToText(v) || "Analysis unavailable"),
    suggested_action: z
      .unknown()
      .transform((v) => flattenToText(v) || "No action recommended"),
    endpoint: z.string().optional().catch(undefined),
    amount: finiteNumber
      .catch(defaultAmount)
      .transform((n) => clamp(n, MIN_TRADE_AMOUNT, MAX_TRADE_AMOUNT)),
    confidence: finiteNumber.catch(0.5).transform((n) => clamp(n, 0, 1)),
    risk_level: z.preprocess(normalizeEnum, z.enum(riskLevels)).catch("medium"),
  });
}

/** Conservative record used whenever a reply cannot be read. */
export function fallbackAnalysis(reason: string, suggestedAction?: string): TradingAnalysis {
  return {
    intention: "nothing",
    analysis: reason,
    suggestedAction: suggestedAction ?? "Unable to process market analysis. Please try again.",
    amount: MIN_TRADE_AMOUNT,
    confidence: 0,
    riskLevel: "high",
  };
}

/**
 * Turn a raw model reply into a TradingAnalysis. Every field is defaulted or
 * clamped into range; the function never throws.
 */
export function parseTradingAnalysis(
  raw: string,
  defaultAmount: number = MIN_TRADE_AMOUNT,
): TradingAnalysis {
  let data: Record<string, unknown>;
  try {
    data = parseJsonObject(raw);
  } catch (err) {
    logger.warn({ err }, "Could not decode analysis reply");
    logger.debug({ raw }, "Raw analysis reply");
    return fallbackAnalysis(`Failed to parse analysis response: ${errorMessage(err)}`);
  }

  // missing keys read as undefined and fall through to each field's default
  const parsed = analysisSchema(defaultAmount).parse({
    intention: data.intention,
    analysis: data.analysis,
    suggested_action: data.suggested_action ?? data.suggestedAction,
    endpoint: data.endpoint,
    amount: data.amount,
    confidence: data.confidence,
    risk_level: data.risk_level ?? data.riskLevel,
  });

  return {
    intention: parsed.intention,
    analysis: parsed.analysis,
    suggestedAction: parsed.suggested_action,
    ...(parsed.endpoint ? { endpoint: parsed.endpoint } : {}),
    amount: parsed.amount,
    confidence: parsed.confidence,
    riskLevel: parsed.risk_level,
  };
}
