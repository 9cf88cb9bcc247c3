// ─── Message Types ──────────────────────────────────────────

export type Platform = "telegram" | "console" | "web";

export interface ReplyButton {
  label: string;
  /** Callback payload returned when the button is pressed. */
  data: string;
}

export interface OutgoingMessage {
  text: string;
  parseMode?: "Markdown" | "HTML";
  /** One row of inline buttons; adapters without buttons list them as text. */
  buttons?: ReplyButton[];
}
