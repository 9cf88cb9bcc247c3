import {
  formatBtc,
  formatDate,
  formatPct,
  formatPriceDataForLlm,
  formatUsd,
  periodChangePct,
  technicalSnapshot,
  volatilityStats,
  type Candle,
} from "@coinsage/market";
import { analysisResponse, runAnalysis } from "./analysis-flow.js";
import { formatTestnetNotice } from "./format.js";
import type {
  DcaPlan,
  HandlerRequest,
  HandlerTable,
  IntentHandler,
  PriceLevel,
  StopLossLevel,
  TimeframeChange,
} from "./types.js";

const TECHNICAL_MIN_DAYS = 30;
const ALERT_BAND_PCT = 5;
const STOP_LOSS_PCTS = [2, 5, 10];
const DCA_WEEKS = [4, 8, 12];
const TIMEFRAME_DAYS = [7, 30, 90];

async function marketData(request: HandlerRequest, days: number): Promise<{ candles: Candle[]; text: string }> {
  const candles = await request.services.market.history(days);
  return { candles, text: formatPriceDataForLlm(candles) };
}

function distancePct(level: number, price: number): number {
  return price > 0 ? ((level - price) / price) * 100 : 0;
}

// ─── Information ────────────────────────────────────────────

const btcPriceInfo: IntentHandler = {
  name: "btc_price_info",
  errorLabel: "Error fetching BTC price",
  async handle({ services }) {
    const currentPrice = await services.market.currentPrice();
    const history = await services.market.history(3);

    const lines = [`₿ Current BTC Price: ${formatUsd(currentPrice)}`];
    if (history.length > 1) {
      lines.push(`📈 ${history.length}-day change: ${formatPct(periodChangePct(history))}`);
    }

    return {
      responseType: "btc_price_info",
      data: { kind: "price", currentPrice, history },
      message: lines.join("\n"),
      success: true,
      requiresTradeConfirmation: false,
    };
  },
};

const usdtBalanceInfo: IntentHandler = {
  name: "usdt_balance_info",
  errorLabel: "Error fetching USDT balance",
  async handle({ services }) {
    const usdtBalance = await services.market.usdtBalance();
    const buyingPower = await services.market.buyingPower();

    const message = [
      "💰 USDT Balance Information:",
      `  💵 Total USDT: ${usdtBalance.toFixed(2)} USDT`,
      `  📈 Current BTC Price: ${formatUsd(buyingPower.btcPrice)}`,
      `  🔢 Usable USDT (after fees): ${buyingPower.usableUsdt.toFixed(2)}`,
      `  ₿ Max BTC Buyable: ${formatBtc(buyingPower.maxBtcBuyable)}`,
      ...formatTestnetNotice(services.settings.testnet),
    ].join("\n");

    return {
      responseType: "usdt_balance_info",
      data: { kind: "balance", usdtBalance, buyingPower },
      message,
      success: true,
      requiresTradeConfirmation: false,
    };
  },
};

const portfolioValue: IntentHandler = {
  name: "portfolio_value",
  errorLabel: "Error calculating portfolio value",
  async handle({ services }) {
    const portfolio = await services.market.portfolioValue();

    const message = [
      "📊 Portfolio Summary:",
      `  ₿ BTC Holdings: ${formatBtc(portfolio.btcBalance)}`,
      `  📈 BTC Price: ${formatUsd(portfolio.btcPrice)}`,
      `  💰 BTC Value: ${formatUsd(portfolio.btcValue)} USDT`,
      `  💵 USDT Balance: ${formatUsd(portfolio.usdtBalance)} USDT`,
      `  ${"=".repeat(40)}`,
      `  🏦 Total Portfolio: ${formatUsd(portfolio.totalValue)} USDT`,
      `  📊 BTC Allocation: ${portfolio.btcAllocationPct.toFixed(1)}%`,
      `  📊 USDT Allocation: ${portfolio.usdtAllocationPct.toFixed(1)}%`,
      ...formatTestnetNotice(services.settings.testnet),
    ].join("\n");

    return {
      responseType: "portfolio_value",
      data: { kind: "portfolio", portfolio },
      message,
      success: true,
      requiresTradeConfirmation: false,
    };
  },
};

// ─── Model Analysis ─────────────────────────────────────────

const marketAnalysis: IntentHandler = {
  name: "market_analysis",
  errorLabel: "Error processing market analysis",
  async handle(request) {
    const { text } = await marketData(request, request.services.settings.priceAnalysisDays);
    const outcome = await runAnalysis(request, { focus: "market", marketData: text });
    return analysisResponse(outcome, { responseType: "market_analysis", title: "📊 Market Analysis:" });
  },
};

const riskAssessment: IntentHandler = {
  name: "risk_assessment",
  errorLabel: "Error processing risk assessment",
  async handle(request) {
    const { text } = await marketData(request, request.services.settings.priceAnalysisDays);
    const outcome = await runAnalysis(request, { focus: "risk", marketData: text });
    return analysisResponse(outcome, {
      responseType: "risk_assessment",
      title: "⚠️ Risk Assessment:",
      suggestionLabel: "Recommendation",
    });
  },
};

const tradingDecision: IntentHandler = {
  name: "trading_decision",
  errorLabel: "Error processing trading decision",
  async handle(request) {
    const { market } = request.services;
    const { text } = await marketData(request, request.services.settings.priceAnalysisDays);
    const usdt = await market.usdtBalance();
    const btc = await market.btcBalance();

    const outcome = await runAnalysis(request, {
      focus: "trading",
      marketData: text,
      supplement: `ACCOUNT BALANCE: ${usdt.toFixed(2)} USDT, ${btc.toFixed(6)} BTC`,
    });
    return analysisResponse(outcome, {
      responseType: "trading_decision",
      title: "🎯 Trading Decision:",
      suggestionLabel: "Recommendation",
    });
  },
};

const volatileMarket: IntentHandler = {
  name: "volatile_market",
  errorLabel: "Error analyzing volatile market",
  async handle(request) {
    const { candles, text } = await marketData(request, 7);
    const stats = volatilityStats(candles);
    const volatility =
      `Daily volatility: ${stats.dailyVolatilityPct.toFixed(2)}%, ` +
      `widest daily range: ${stats.maxDailyRangePct.toFixed(2)}%, ` +
      `average daily range: ${stats.averageDailyRangePct.toFixed(2)}%`;

    const outcome = await runAnalysis(request, {
      focus: "volatile",
      marketData: text,
      supplement: `VOLATILITY INDICATORS: ${volatility}`,
    });
    return analysisResponse(outcome, {
      responseType: "volatile_market",
      title: "🌪️ Volatile Market Analysis:",
      preamble: [`📉 ${volatility}`],
      suggestionLabel: "Conservative Recommendation",
      footer: ["⚠️ Note: Extra caution recommended during volatile periods"],
    });
  },
};

const portfolioAnalysis: IntentHandler = {
  name: "portfolio_analysis",
  errorLabel: "Error analyzing portfolio",
  async handle(request) {
    const portfolio = await request.services.market.portfolioValue();
    const { text } = await marketData(request, request.services.settings.priceAnalysisDays);

    const allocation = [
      `  🏦 Total Value: ${formatUsd(portfolio.totalValue)} USDT`,
      `  ₿ BTC: ${portfolio.btcAllocationPct.toFixed(1)}% (${formatUsd(portfolio.btcValue)})`,
      `  💵 USDT: ${portfolio.usdtAllocationPct.toFixed(1)}% (${formatUsd(portfolio.usdtBalance)})`,
    ];

    const outcome = await runAnalysis(request, {
      focus: "portfolio",
      marketData: text,
      supplement: `CURRENT PORTFOLIO:\n${allocation.join("\n")}`,
    });
    return analysisResponse(outcome, {
      responseType: "portfolio_analysis",
      title: "📊 Portfolio Analysis:",
      preamble: ["Current Allocation:", ...allocation, "", "Market-Based Recommendation:"],
      portfolio,
    });
  },
};

function formatLevel(value: number | null): string {
  return value === null ? "n/a" : formatUsd(value);
}

const technicalAnalysis: IntentHandler = {
  name: "technical_analysis",
  errorLabel: "Error running technical analysis",
  async handle(request) {
    const days = Math.max(request.services.settings.priceAnalysisDays, TECHNICAL_MIN_DAYS);
    const { candles, text } = await marketData(request, days);
    const t = technicalSnapshot(candles);

    const indicators = [
      `  SMA(7): ${formatLevel(t.sma7)} · SMA(20): ${formatLevel(t.sma20)} · EMA(12): ${formatLevel(t.ema12)}`,
      `  RSI(14): ${t.rsi14 === null ? "n/a" : t.rsi14.toFixed(2)}`,
      `  Support: ${formatLevel(t.support)} · Resistance: ${formatLevel(t.resistance)}`,
      `  Trend vs moving average: ${t.trend}`,
    ];

    const outcome = await runAnalysis(request, {
      focus: "technical",
      marketData: text,
      supplement: `INDICATORS:\n${indicators.join("\n")}`,
    });
    return analysisResponse(outcome, {
      responseType: "technical_analysis",
      title: "📐 Technical Analysis:",
      preamble: [...indicators, ""],
    });
  },
};

const newsSentiment: IntentHandler = {
  name: "news_sentiment",
  errorLabel: "Error analyzing market sentiment",
  async handle(request) {
    const { text } = await marketData(request, request.services.settings.priceAnalysisDays);
    const outcome = await runAnalysis(request, { focus: "news", marketData: text });
    return analysisResponse(outcome, {
      responseType: "news_sentiment",
      title: "📰 News & Sentiment Analysis:",
      footer: ["ℹ️ No live news feed is connected; sentiment is read from price action."],
    });
  },
};

const educationalMode: IntentHandler = {
  name: "educational_mode",
  errorLabel: "Error preparing explanation",
  async handle(request) {
    const { text } = await marketData(request, request.services.settings.priceAnalysisDays);
    const outcome = await runAnalysis(request, { focus: "educational", marketData: text });
    return analysisResponse(outcome, {
      responseType: "educational_mode",
      title: "📚 Educational Insight:",
      suggestionLabel: "Takeaway",
    });
  },
};

// ─── Computed Tools ─────────────────────────────────────────

const priceAlerts: IntentHandler = {
  name: "price_alerts",
  errorLabel: "Error computing alert levels",
  async handle({ services }) {
    const currentPrice = await services.market.currentPrice();
    const candles = await services.market.history(7);

    const levels: PriceLevel[] = [];
    if (candles.length > 0) {
      const high = Math.max(...candles.map((c) => c.high));
      const low = Math.min(...candles.map((c) => c.low));
      levels.push({ label: "7-day high", price: high, distancePct: distancePct(high, currentPrice) });
      levels.push({ label: "7-day low", price: low, distancePct: distancePct(low, currentPrice) });
    }
    const up = currentPrice * (1 + ALERT_BAND_PCT / 100);
    const down = currentPrice * (1 - ALERT_BAND_PCT / 100);
    levels.push({ label: `+${ALERT_BAND_PCT}% breakout`, price: up, distancePct: ALERT_BAND_PCT });
    levels.push({ label: `-${ALERT_BAND_PCT}% drop`, price: down, distancePct: -ALERT_BAND_PCT });

    const message = [
      "🔔 Price Alert Levels:",
      `  📈 Current BTC Price: ${formatUsd(currentPrice)}`,
      ...levels.map((l) => `  • ${l.label}: ${formatUsd(l.price)} (${formatPct(l.distancePct)})`),
      "ℹ️ Alerts are not stored. Set them on your exchange or ask again later.",
    ].join("\n");

    return {
      responseType: "price_alerts",
      data: { kind: "alerts", currentPrice, levels },
      message,
      success: true,
      requiresTradeConfirmation: false,
    };
  },
};

const tradeHistory: IntentHandler = {
  name: "trade_history",
  errorLabel: "Error fetching trade history",
  async handle({ services }) {
    const candles = await services.market.history(7);

    const message = [
      "📜 Trade History:",
      "  All trades are simulated and none have been recorded.",
      "",
      `Last ${candles.length} daily closes:`,
      ...candles.map((c) => `  ${formatDate(c.openTime)}: ${formatUsd(c.close)}`),
    ].join("\n");

    return {
      responseType: "trade_history",
      data: { kind: "history", candles },
      message,
      success: true,
      requiresTradeConfirmation: false,
    };
  },
};

const stopLossManagement: IntentHandler = {
  name: "stop_loss_management",
  errorLabel: "Error computing stop-loss levels",
  async handle({ services }) {
    const currentPrice = await services.market.currentPrice();
    const btcBalance = await services.market.btcBalance();

    const levels: StopLossLevel[] = STOP_LOSS_PCTS.map((pct) => {
      const price = currentPrice * (1 - pct / 100);
      return { pct, price, loss: btcBalance * (currentPrice - price) };
    });

    const message = [
      "🛡️ Stop-Loss Levels:",
      `  📈 Current BTC Price: ${formatUsd(currentPrice)}`,
      `  ₿ Holdings: ${formatBtc(btcBalance)}`,
      ...levels.map(
        (l) => `  • ${l.pct}% below spot: ${formatUsd(l.price)} (max loss ${formatUsd(l.loss)})`,
      ),
      "ℹ️ Tighter stops trigger more often; wider stops risk more per trade.",
    ].join("\n");

    return {
      responseType: "stop_loss_management",
      data: { kind: "stop_loss", currentPrice, btcBalance, levels },
      message,
      success: true,
      requiresTradeConfirmation: false,
    };
  },
};

const dcaStrategy: IntentHandler = {
  name: "dca_strategy",
  errorLabel: "Error building DCA plan",
  async handle({ services }) {
    const currentPrice = await services.market.currentPrice();
    const usdtBalance = await services.market.usdtBalance();

    const plans: DcaPlan[] = DCA_WEEKS.map((weeks) => {
      const perBuyUsdt = usdtBalance / weeks;
      return { weeks, perBuyUsdt, perBuyBtc: currentPrice > 0 ? perBuyUsdt / currentPrice : 0 };
    });

    const message = [
      `📅 DCA Plans for ${usdtBalance.toFixed(2)} USDT at ${formatUsd(currentPrice)}:`,
      ...plans.map(
        (p) =>
          `  • ${p.weeks} weekly buys: ${p.perBuyUsdt.toFixed(2)} USDT ≈ ${formatBtc(p.perBuyBtc)} each`,
      ),
      "ℹ️ BTC amounts use today's price; each buy fills at the price of its week.",
    ].join("\n");

    return {
      responseType: "dca_strategy",
      data: { kind: "dca", currentPrice, usdtBalance, plans },
      message,
      success: true,
      requiresTradeConfirmation: false,
    };
  },
};

function changeOver(candles: Candle[], days: number): number {
  const last = candles[candles.length - 1];
  const reference = candles[Math.max(0, candles.length - 1 - days)];
  if (!last || !reference || reference.close === 0) return 0;
  return ((last.close - reference.close) / reference.close) * 100;
}

function trendLabel(changes: TimeframeChange[]): string {
  if (changes.every((c) => c.changePct > 0)) return "bullish across all timeframes";
  if (changes.every((c) => c.changePct < 0)) return "bearish across all timeframes";
  return "mixed";
}

const multiTimeframe: IntentHandler = {
  name: "multi_timeframe",
  errorLabel: "Error comparing timeframes",
  async handle({ services }) {
    // One extra candle so the longest window has a close exactly N days back
    const candles = await services.market.history(Math.max(...TIMEFRAME_DAYS) + 1);
    const last = candles[candles.length - 1];
    if (!last) {
      throw new Error("No price history available");
    }

    const changes: TimeframeChange[] = TIMEFRAME_DAYS.map((days) => ({
      days,
      changePct: changeOver(candles, days),
    }));
    const trend = trendLabel(changes);

    const message = [
      "🕰️ Multi-Timeframe View:",
      `  📈 Last close: ${formatUsd(last.close)}`,
      ...changes.map((c) => `  • ${c.days}-day change: ${formatPct(c.changePct)}`),
      `  🧭 Trend: ${trend}`,
    ].join("\n");

    return {
      responseType: "multi_timeframe",
      data: { kind: "timeframes", currentPrice: last.close, changes, trend },
      message,
      success: true,
      requiresTradeConfirmation: false,
    };
  },
};

// ─── Help & Recovery ────────────────────────────────────────

export const HELP_TEXT = `🤖 BTC Trading Assistant Help:

Available Functions:
• 📈 Price Information: current BTC price
• 💰 Balance Checking: USDT balance and buying power
• 📊 Portfolio: total value and allocation
• 🎯 Market Analysis, Risk Assessment and Trading Decisions
• 📐 Technical Analysis: moving averages, RSI, support and resistance
• 📰 Sentiment: market mood read from price action
• 🔔 Alert levels, 🛡️ stop-loss levels and 📅 DCA plans
• 🕰️ Multi-timeframe trend and 📚 explanations of trading concepts

Commands:
/price, /balance, /portfolio, /status, /ai, /help

💬 Natural Language: just ask, for example
"What's BTC price?", "Should I buy?", "How's my portfolio?"
Add "with openai" or "with gemini" for a premium second opinion.

⚠️ Note: All trades are simulated and require your confirmation.`;

const generalConsult: IntentHandler = {
  name: "general_consult",
  errorLabel: "Error in general consultation",
  async handle() {
    return {
      responseType: "general_consult",
      data: { kind: "empty" },
      message: HELP_TEXT,
      success: true,
      requiresTradeConfirmation: false,
    };
  },
};

const RECOVERY_TIPS = `Please try:
• Being more specific with your question
• Using commands like /help, /price, /balance
• Asking direct questions like:
  - "What's the current BTC price?"
  - "How much USDT do I have?"
  - "Should I buy Bitcoin now?"`;

const errorRecovery: IntentHandler = {
  name: "error_recovery",
  errorLabel: "Error in error recovery",
  async handle({ error }) {
    const message = error
      ? `❌ Error Processing Request:\n${error}\n\n${RECOVERY_TIPS}`
      : `❓ I didn't quite understand your request.\n\n${RECOVERY_TIPS}\n\nType /help for more information.`;

    return {
      responseType: "error_recovery",
      data: error ? { kind: "error", error } : { kind: "empty" },
      message,
      success: false,
      requiresTradeConfirmation: false,
    };
  },
};

// ─── Table ──────────────────────────────────────────────────

/** One handler per intent; a missing entry is a compile error. */
export const HANDLERS: HandlerTable = {
  btc_price_info: btcPriceInfo,
  usdt_balance_info: usdtBalanceInfo,
  portfolio_value: portfolioValue,
  market_analysis: marketAnalysis,
  risk_assessment: riskAssessment,
  trading_decision: tradingDecision,
  volatile_market: volatileMarket,
  portfolio_analysis: portfolioAnalysis,
  general_consult: generalConsult,
  error_recovery: errorRecovery,
  price_alerts: priceAlerts,
  trade_history: tradeHistory,
  technical_analysis: technicalAnalysis,
  news_sentiment: newsSentiment,
  stop_loss_management: stopLossManagement,
  dca_strategy: dcaStrategy,
  multi_timeframe: multiTimeframe,
  educational_mode: educationalMode,
};
