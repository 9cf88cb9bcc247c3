/**
 * Converts replies between platform markdown dialects.
 *
 * Replies are written in Telegram-style markdown (bold = *text*,
 * italic = _text_, code = `text`) and converted here for each platform.
 */
import type { Platform } from "@coinsage/core";

export function formatMessage(text: string, platform: Platform): string {
  switch (platform) {
    case "telegram":
      return text;
    case "console":
      return toPlainText(text);
    case "web":
      return toHtml(text);
  }
}

const BOLD = /(?<!\*)\*(?!\*)(.+?)(?<!\*)\*(?!\*)/g;

/** Terminal output: markers dropped, text kept. */
function toPlainText(text: string): string {
  return text
    .replace(/`([^`]+)`/g, "$1")
    .replace(BOLD, "$1")
    .replace(/(^|\s)_(\S(?:.*?\S)?)_(?=\s|$|[.,!?:])/g, "$1$2");
}

function toHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/`([^`]+)`/g, "<code>$1</code>")
    .replace(BOLD, "<strong>$1</strong>")
    .replace(/(^|\s)_(\S(?:.*?\S)?)_(?=\s|$|[.,!?:])/g, "$1<em>$2</em>")
    .replace(/\n/g, "<br>");
}
