import type { IntentName } from "./types.js";

interface IntentDescription {
  description: string;
  examples: string[];
}

const TAXONOMY: Record<IntentName, IntentDescription> = {
  btc_price_info: {
    description: "current BTC price",
    examples: ["What's BTC price?", "How much is Bitcoin?"],
  },
  usdt_balance_info: {
    description: "USDT balance and how much BTC it can buy",
    examples: ["How much USDT do I have?", "What's my buying power?"],
  },
  portfolio_value: {
    description: "total portfolio value and allocation",
    examples: ["Portfolio value", "How much is my portfolio worth?"],
  },
  market_analysis: {
    description: "analysis of the market and its trend",
    examples: ["Market analysis", "What's the BTC trend?"],
  },
  risk_assessment: {
    description: "how risky a trade or the market is right now",
    examples: ["Is it risky to buy now?", "How risky is selling?"],
  },
  trading_decision: {
    description: "a concrete buy/sell/hold recommendation",
    examples: ["Should I buy or sell?", "What should I do?"],
  },
  volatile_market: {
    description: "the user is worried about swings or uncertainty",
    examples: ["The market is crazy", "Prices are jumping around"],
  },
  portfolio_analysis: {
    description: "rebalancing or allocation advice",
    examples: ["Should I rebalance?", "Optimize my holdings"],
  },
  general_consult: {
    description: "help, capabilities or system status",
    examples: ["Help", "What can you do?"],
  },
  error_recovery: {
    description: "the message is unclear or fits nothing else",
    examples: ["asdf", "?"],
  },
  price_alerts: {
    description: "price alerts or levels to watch",
    examples: ["Alert me if BTC drops", "What levels should I watch?"],
  },
  trade_history: {
    description: "past trades or recent price history",
    examples: ["Show my trade history", "What did BTC do this week?"],
  },
  technical_analysis: {
    description: "indicators such as RSI, moving averages, support and resistance",
    examples: ["What's the RSI?", "Technical analysis please"],
  },
  news_sentiment: {
    description: "news, headlines or market sentiment",
    examples: ["Any BTC news?", "What's the sentiment?"],
  },
  stop_loss_management: {
    description: "where to put a stop loss",
    examples: ["Where should my stop loss be?", "Protect my position"],
  },
  dca_strategy: {
    description: "dollar-cost averaging plans",
    examples: ["How should I DCA?", "Split my buys over time"],
  },
  multi_timeframe: {
    description: "comparison across weekly, monthly and quarterly timeframes",
    examples: ["Weekly vs monthly trend", "Multi-timeframe view"],
  },
  educational_mode: {
    description: "the user wants a concept explained",
    examples: ["What is RSI?", "Explain support and resistance"],
  },
};

function renderTaxonomy(): string {
  return Object.entries(TAXONOMY)
    .map(
      ([name, { description, examples }], i) =>
        `${i + 1}. "${name}": ${description}\n   Examples: ${examples.map((e) => `"${e}"`).join(", ")}`,
    )
    .join("\n");
}

export function buildIntentPrompt(userText: string): string {
  return `You classify messages sent to a Bitcoin trading assistant.

USER MESSAGE: ${userText}

INTENTS:
${renderTaxonomy()}

Also note whether the user asks for a premium provider ("use openai", "ask gemini")
or wants the providers compared.

Reply with one JSON object only:
{
  "intent": "one intent name from the list",
  "confidence": 0.0-1.0,
  "reasoning": "why this intent",
  "suggested_handler": "handler name, usually the intent name",
  "required_data": ["price_history", "balances", ...],
  "query_type": "information" | "analysis" | "trading" | "consultation",
  "premium_ai_requested": false,
  "requested_ai_provider": "none" | "openai" | "gemini",
  "comparison_analysis": false
}

Pick the most specific intent. Use "error_recovery" only when nothing fits.`;
}
