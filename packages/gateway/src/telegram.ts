import { Bot, GrammyError, InlineKeyboard, type Context } from "grammy";
import { getLogger, type OutgoingMessage } from "@coinsage/core";
import type { ChannelContext, GatewayDeps } from "./types.js";
import type { ChannelAdapter, ChannelStatus } from "./channel-adapter.js";
import { formatMessage } from "./formatter.js";
import { CommandRouter } from "./router.js";
import { RateLimiter } from "./rate-limiter.js";

const logger = getLogger("telegram");

const TYPING_REFRESH_MS = 4000;

function keyboardFor(message: OutgoingMessage): InlineKeyboard | undefined {
  if (!message.buttons?.length) return undefined;
  const keyboard = new InlineKeyboard();
  for (const button of message.buttons) {
    keyboard.text(button.label, button.data);
  }
  return keyboard;
}

/** Model text can carry stray `*` or `_` that legacy Markdown rejects. */
function isEntityParseError(err: unknown): boolean {
  return err instanceof GrammyError && err.description.includes("can't parse entities");
}

/**
 * Send with the requested parse mode, and once more as plain text when
 * Telegram refuses the markup.
 */
async function sendFormatted(
  send: (text: string, parseMode: OutgoingMessage["parseMode"]) => Promise<unknown>,
  message: OutgoingMessage,
): Promise<void> {
  const text = formatMessage(message.text, "telegram");
  try {
    await send(text, message.parseMode);
  } catch (err) {
    if (!message.parseMode || !isEntityParseError(err)) throw err;
    logger.warn("Markdown rejected by Telegram, resending as plain text");
    await send(text, undefined);
  }
}

// ─── Telegram ↔ ChannelContext helpers ───────────────────────

function baseContext(ctx: Context): Omit<ChannelContext, "sendReply"> {
  return {
    userId: ctx.from?.id.toString() ?? "unknown",
    userName: ctx.from?.username,
    chatId: String(ctx.chat?.id ?? 0),
    platform: "telegram",
  };
}

function makeTelegramContext(ctx: Context): ChannelContext {
  return {
    ...baseContext(ctx),
    sendReply: (message) =>
      sendFormatted(
        (text, parseMode) =>
          ctx.reply(text, {
            ...(parseMode ? { parse_mode: parseMode } : {}),
            reply_markup: keyboardFor(message),
          }),
        message,
      ),
  };
}

/** Replies to a button press edit the message that carried the buttons. */
function makeCallbackContext(ctx: Context): ChannelContext {
  return {
    ...baseContext(ctx),
    sendReply: (message) =>
      sendFormatted(
        (text, parseMode) => ctx.editMessageText(text, parseMode ? { parse_mode: parseMode } : {}),
        message,
      ),
  };
}

// ─── TelegramAdapter ─────────────────────────────────────────

export class TelegramAdapter implements ChannelAdapter {
  readonly id = "telegram";
  readonly label = "Telegram";

  private bot: Bot | null = null;
  private status: ChannelStatus = {
    connected: false,
    lastMessageAt: null,
    lastError: null,
  };

  constructor(private token: string) {}

  async start(deps: GatewayDeps): Promise<void> {
    const bot = new Bot(this.token);
    this.bot = bot;
    const router = new CommandRouter(deps);
    const rateLimiter = new RateLimiter();

    // ─── Rate limiting middleware ─────────────────────────────
    bot.use(async (ctx, next) => {
      const userId = ctx.from?.id.toString();
      if (userId && rateLimiter.isLimited(userId)) {
        const waitS = Math.ceil(rateLimiter.retryAfterMs(userId) / 1000);
        logger.warn({ userId, waitS }, "Rate limited");
        await ctx.reply(`You're sending messages too fast. Please wait ${waitS}s.`);
        return;
      }
      await next();
    });

    // ─── Trade confirmation buttons ───────────────────────────
    bot.callbackQuery(/^(execute:|cancel$)/, async (ctx) => {
      this.status.lastMessageAt = Date.now();
      await ctx.answerCallbackQuery();
      await router.handleTradeCallback(makeCallbackContext(ctx), ctx.callbackQuery.data);
    });

    // ─── Commands → Router ────────────────────────────────────

    bot.command("start", async (ctx) => {
      await router.handleStart(makeTelegramContext(ctx));
    });

    bot.command("help", async (ctx) => {
      await router.handleHelp(makeTelegramContext(ctx));
    });

    bot.command("price", async (ctx) => {
      await ctx.replyWithChatAction("typing");
      await router.handlePrice(makeTelegramContext(ctx));
    });

    bot.command("balance", async (ctx) => {
      await ctx.replyWithChatAction("typing");
      await router.handleBalance(makeTelegramContext(ctx));
    });

    bot.command("portfolio", async (ctx) => {
      await ctx.replyWithChatAction("typing");
      await router.handlePortfolio(makeTelegramContext(ctx));
    });

    bot.command("status", async (ctx) => {
      await router.handleStatus(makeTelegramContext(ctx));
    });

    bot.command("ai", async (ctx) => {
      await ctx.replyWithChatAction("typing");
      await router.handleAi(makeTelegramContext(ctx));
    });

    // ─── Natural language handler (catch-all) ─────────────────
    bot.on("message:text", async (ctx) => {
      this.status.lastMessageAt = Date.now();
      await ctx.replyWithChatAction("typing");

      // Model calls can outlast one typing indicator
      const typingInterval = setInterval(() => {
        ctx.replyWithChatAction("typing").catch((err: unknown) => {
          logger.debug({ err }, "Typing indicator failed");
        });
      }, TYPING_REFRESH_MS);

      try {
        await router.handleMessage(makeTelegramContext(ctx), ctx.message.text);
      } finally {
        clearInterval(typingInterval);
      }
    });

    // ─── Error handler ────────────────────────────────────────
    bot.catch((err) => {
      this.status.lastError = String(err.error);
      logger.error({ err: err.error, update: err.ctx.update.update_id }, "Bot error");
    });

    // Long polling runs until stop(); start() resolves once it is launched
    bot
      .start({
        onStart: (botInfo) => {
          this.status.connected = true;
          logger.info({ username: botInfo.username }, "Telegram bot started");
        },
      })
      .catch((err: unknown) => {
        this.status.connected = false;
        this.status.lastError = String(err);
        logger.error({ err }, "Telegram polling stopped with an error");
      });
  }

  async stop(): Promise<void> {
    if (this.bot) {
      await this.bot.stop();
      this.bot = null;
      this.status.connected = false;
    }
  }

  getStatus(): ChannelStatus {
    return { ...this.status };
  }
}
