import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { getLogger, type OutgoingMessage, type ReplyButton } from "@coinsage/core";
import type { ChannelContext, GatewayDeps } from "./types.js";
import type { ChannelAdapter, ChannelStatus } from "./channel-adapter.js";
import { formatMessage } from "./formatter.js";
import { CommandRouter } from "./router.js";

const logger = getLogger("console");

const PROMPT = "💬 You: ";
const RULE = "=".repeat(60);

const BANNER = [
  "",
  RULE,
  "🤖 CRYPTO TRADING BOT - CONSOLE MODE",
  RULE,
  "💡 Commands: /help /price /balance /portfolio /status /ai /quit",
  "💬 Or ask anything, e.g. 'Should I buy Bitcoin now?'",
  RULE,
  "",
].join("\n");

export interface ConsoleAdapterOptions {
  input?: Readable;
  output?: Writable;
  /** Called after /quit or /exit, or when input ends. */
  onQuit?: () => void;
}

type CommandRoute = (router: CommandRouter, ctx: ChannelContext) => Promise<void>;

const COMMANDS: Record<string, CommandRoute> = {
  "/start": (r, ctx) => r.handleStart(ctx),
  "/help": (r, ctx) => r.handleHelp(ctx),
  "/price": (r, ctx) => r.handlePrice(ctx),
  "/balance": (r, ctx) => r.handleBalance(ctx),
  "/portfolio": (r, ctx) => r.handlePortfolio(ctx),
  "/status": (r, ctx) => r.handleStatus(ctx),
  "/ai": (r, ctx) => r.handleAi(ctx),
};

/**
 * Line-oriented REPL over stdin/stdout. Buttons are listed as numbered
 * choices; the next line picks one.
 */
export class ConsoleAdapter implements ChannelAdapter {
  readonly id = "console";
  readonly label = "Console";

  private rl: Interface | null = null;
  private pendingButtons: ReplyButton[] = [];
  private queue: Promise<void> = Promise.resolve();
  private status: ChannelStatus = {
    connected: false,
    lastMessageAt: null,
    lastError: null,
  };

  constructor(private options: ConsoleAdapterOptions = {}) {}

  private get output(): Writable {
    return this.options.output ?? process.stdout;
  }

  private write(text: string): void {
    this.output.write(text);
  }

  private context(): ChannelContext {
    return {
      userId: "console",
      chatId: "console",
      platform: "console",
      sendReply: async (message) => this.print(message),
    };
  }

  private print(message: OutgoingMessage): void {
    this.write(`\n🤖 Bot:\n${formatMessage(message.text, "console")}\n`);
    this.pendingButtons = message.buttons ?? [];
    if (this.pendingButtons.length > 0) {
      const choices = this.pendingButtons.map((b, i) => `  ${i + 1}) ${b.label}`);
      this.write(`${choices.join("\n")}\nReply with a number to choose.\n`);
    }
    this.write("\n");
  }

  /** Handles one input line. Exposed for tests; the REPL calls it in order. */
  async handleLine(router: CommandRouter, line: string): Promise<"quit" | "continue"> {
    const input = line.trim();
    if (!input) return "continue";
    this.status.lastMessageAt = Date.now();
    const ctx = this.context();

    const buttons = this.pendingButtons;
    this.pendingButtons = [];
    const choice = buttons[Number(input) - 1];
    if (/^\d+$/.test(input) && choice) {
      await router.handleTradeCallback(ctx, choice.data);
      return "continue";
    }

    const command = input.split(/\s+/)[0]?.toLowerCase() ?? "";
    if (command === "/quit" || command === "/exit") {
      this.write("👋 Goodbye!\n");
      return "quit";
    }

    const route = COMMANDS[command];
    if (route) {
      await route(router, ctx);
    } else {
      this.write("🤖 Analyzing your request...\n");
      await router.handleMessage(ctx, input);
    }
    return "continue";
  }

  async start(deps: GatewayDeps): Promise<void> {
    const router = new CommandRouter(deps);
    const rl = createInterface({
      input: this.options.input ?? process.stdin,
      output: this.output,
      prompt: PROMPT,
    });
    this.rl = rl;

    this.write(BANNER);

    rl.on("line", (line) => {
      // Lines are processed one at a time so replies never interleave
      this.queue = this.queue
        .then(async () => {
          const next = await this.handleLine(router, line);
          if (next === "quit") {
            rl.close();
            return;
          }
          rl.prompt();
        })
        .catch((err: unknown) => {
          this.status.lastError = String(err);
          logger.error({ err }, "Console line failed");
          this.write("❌ Error processing request.\n");
          rl.prompt();
        });
    });

    rl.on("close", () => {
      this.status.connected = false;
      this.rl = null;
      this.options.onQuit?.();
    });

    this.status.connected = true;
    rl.prompt();
  }

  async stop(): Promise<void> {
    await this.queue;
    this.rl?.close();
  }

  getStatus(): ChannelStatus {
    return { ...this.status };
  }
}
