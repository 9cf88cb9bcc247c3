import { z } from "zod";
import { getLogger, errorMessage } from "@coinsage/core";
import type { LLMProvider } from "../llm/types.js";
import { parseJsonObject } from "../json.js";
import { keywordOverride } from "./keywords.js";
import { buildIntentPrompt } from "./prompt.js";
import { isIntentName, queryTypes, requestedProviders, type IntentClassification } from "./types.js";

const logger = getLogger("intent-classifier");

export function fallbackClassification(reasoning: string): IntentClassification {
  return {
    intent: "error_recovery",
    confidence: 0,
    reasoning,
    suggestedHandler: "error_recovery",
    requiredData: ["error_info"],
    queryType: "consultation",
    premiumRequested: false,
    requestedProvider: "none",
    comparisonRequested: false,
    source: "fallback",
  };
}

const confidenceSchema = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
  z.number().finite(),
);

const classificationSchema = z.object({
  intent: z.string({
    required_error: "intent is missing",
    invalid_type_error: "intent must be a string",
  }),
  confidence: confidenceSchema.catch(0.5).transform((n) => Math.min(Math.max(n, 0), 1)),
  reasoning: z.string().catch("Intent classification completed"),
  suggested_handler: z.string().optional().catch(undefined),
  suggested_prompt_function: z.string().optional().catch(undefined),
  required_data: z.array(z.string()).catch([]),
  query_type: z.enum(queryTypes).catch("consultation"),
  user_query_type: z.enum(queryTypes).optional().catch(undefined),
  premium_ai_requested: z.boolean().catch(false),
  requested_ai_provider: z.enum(requestedProviders).catch("none"),
  comparison_analysis: z.boolean().catch(false),
});

/**
 * Read a classifier reply. Unknown intents become error_recovery with the
 * confidence kept; anything unreadable becomes the zero-confidence fallback.
 * Never throws.
 */
export function parseIntentClassification(raw: string): IntentClassification {
  let data: Record<string, unknown>;
  try {
    data = parseJsonObject(raw);
  } catch (err) {
    logger.warn({ err }, "Could not decode classifier reply");
    logger.debug({ raw }, "Raw classifier reply");
    return fallbackClassification(`JSON parsing error: ${errorMessage(err)}`);
  }

  const result = classificationSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => i.message).join(", ");
    logger.warn({ issues }, "Classifier reply failed validation");
    return fallbackClassification(`Intent parsing error: ${issues}`);
  }

  const parsed = result.data;
  const known = isIntentName(parsed.intent);
  const intent = isIntentName(parsed.intent) ? parsed.intent : "error_recovery";

  return {
    intent,
    confidence: parsed.confidence,
    reasoning: known ? parsed.reasoning : `Unknown intent detected: ${parsed.intent}`,
    suggestedHandler: parsed.suggested_handler ?? parsed.suggested_prompt_function ?? intent,
    requiredData: parsed.required_data,
    queryType: parsed.user_query_type ?? parsed.query_type,
    premiumRequested: parsed.premium_ai_requested || parsed.requested_ai_provider !== "none",
    requestedProvider: parsed.requested_ai_provider,
    comparisonRequested: parsed.comparison_analysis,
    source: "llm",
  };
}

/**
 * Classifies free text into one intent. The news keyword fast path always
 * wins; otherwise one prompt goes to the intent backend.
 */
export class IntentClassifier {
  constructor(private llm: LLMProvider) {}

  async classify(text: string): Promise<IntentClassification> {
    const override = keywordOverride(text);
    if (override) {
      logger.info({ reasoning: override.reasoning }, "Keyword override: news_sentiment");
      return override;
    }

    try {
      const response = await this.llm.chat([{ role: "user", content: buildIntentPrompt(text) }], {
        json: true,
      });
      logger.debug({ raw: response.content }, "Classifier reply received");

      const classification = parseIntentClassification(response.content);
      logger.info(
        { intent: classification.intent, confidence: classification.confidence },
        "Intent classified",
      );
      return classification;
    } catch (err) {
      logger.error({ err, provider: this.llm.name }, "Intent classification failed");
      return fallbackClassification(`Intent classification failed: ${errorMessage(err)}`);
    }
  }
}
