import { getLogger, errorMessage } from "@coinsage/core";
import type { IntentClassifier } from "../intent/parser.js";
import { isIntentName, type IntentClassification, type IntentName } from "../intent/types.js";
import { HANDLERS } from "./handlers.js";
import type {
  HandlerServices,
  HandlerTable,
  IntentHandler,
  IntentInfo,
  ResponseEnvelope,
} from "./types.js";

const logger = getLogger("dispatcher");

/** Looks a handler up by name; anything unknown gets error_recovery. */
export function resolveHandler(name: string, table: HandlerTable = HANDLERS): IntentHandler {
  if (isIntentName(name)) return table[name];
  logger.warn({ name }, "No handler for intent, using error_recovery");
  return table.error_recovery;
}

/** Classification used when a command names its intent directly. */
export function directClassification(intent: IntentName): IntentClassification {
  return {
    intent,
    confidence: 1,
    reasoning: "Direct command",
    suggestedHandler: intent,
    requiredData: [],
    queryType: "information",
    premiumRequested: false,
    requestedProvider: "none",
    comparisonRequested: false,
    source: "keyword",
  };
}

function intentInfo(classification: IntentClassification, handler: IntentHandler): IntentInfo {
  return {
    intent: classification.intent,
    confidence: classification.confidence,
    reasoning: classification.reasoning,
    handler: handler.name,
    source: classification.source,
    premiumRequested: classification.premiumRequested,
    requestedProvider: classification.requestedProvider,
  };
}

export interface DispatcherDeps {
  classifier: Pick<IntentClassifier, "classify">;
  services: HandlerServices;
  handlers?: HandlerTable;
}

/**
 * Routes one message: classify, run the matching handler, wrap the result in
 * an envelope. `handle` always resolves; failures come back as envelopes
 * with `success: false`.
 */
export class IntentDispatcher {
  private classifier: Pick<IntentClassifier, "classify">;
  private services: HandlerServices;
  private handlers: HandlerTable;

  constructor(deps: DispatcherDeps) {
    this.classifier = deps.classifier;
    this.services = deps.services;
    this.handlers = deps.handlers ?? HANDLERS;
  }

  async handle(text: string): Promise<ResponseEnvelope> {
    let classification: IntentClassification;
    try {
      classification = await this.classifier.classify(text);
    } catch (err) {
      logger.error({ err }, "Classification threw");
      return this.recover(text, `Routing error: ${errorMessage(err)}`);
    }
    return this.dispatch(text, classification);
  }

  /** Skips classification; used by slash commands. */
  async runIntent(intent: IntentName, text: string): Promise<ResponseEnvelope> {
    return this.dispatch(text, directClassification(intent));
  }

  private async dispatch(text: string, classification: IntentClassification): Promise<ResponseEnvelope> {
    const handler = resolveHandler(classification.intent, this.handlers);
    logger.info(
      { intent: classification.intent, handler: handler.name, source: classification.source },
      "Dispatching",
    );

    try {
      const response = await handler.handle({ text, intent: classification, services: this.services });
      return { ...response, intentInfo: intentInfo(classification, handler) };
    } catch (err) {
      const message = errorMessage(err);
      logger.error({ err, handler: handler.name }, "Handler failed");
      return {
        responseType: "error",
        data: { kind: "error", error: message },
        message: `❌ ${handler.errorLabel}: ${message}`,
        success: false,
        requiresTradeConfirmation: false,
        intentInfo: intentInfo(classification, handler),
      };
    }
  }

  private async recover(text: string, error: string): Promise<ResponseEnvelope> {
    const classification: IntentClassification = {
      ...directClassification("error_recovery"),
      confidence: 0,
      reasoning: error,
      source: "fallback",
    };
    const handler = this.handlers.error_recovery;
    try {
      const response = await handler.handle({ text, intent: classification, services: this.services, error });
      return { ...response, intentInfo: intentInfo(classification, handler) };
    } catch (err) {
      logger.error({ err }, "Error recovery failed");
      return {
        responseType: "error",
        data: { kind: "error", error },
        message: `❌ ${error}`,
        success: false,
        requiresTradeConfirmation: false,
        intentInfo: intentInfo(classification, handler),
      };
    }
  }
}
