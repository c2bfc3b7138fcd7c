import type { OutboundMessage } from "../agent/types.js";

export const MAX_MESSAGE_LENGTH = 4000;
export const TRUNCATED_LENGTH = 3900;

/** Strips the markdown a chat client on a phone would show literally. */
export function stripMarkdown(text: string): string {
  return text
    .replace(/\*\*(.+?)\*\*/g, "$1")
    .replace(/__(.+?)__/g, "$1")
    .replace(/\*(.+?)\*/g, "$1")
    .replace(/(?<!\w)_(.+?)_(?!\w)/g, "$1")
    .replace(/`(.+?)`/g, "$1")
    .replace(/^#{1,6}\s+/gm, "");
}

export function truncateMessage(text: string): string {
  if (text.length <= MAX_MESSAGE_LENGTH) return text;
  return `${text.slice(0, TRUNCATED_LENGTH)}\n\n[truncated]`;
}

/** Chat text for an outbound message, tagged with the tier that wrote it. */
export function formatOutbound(message: OutboundMessage): string {
  const prefix = message.priority === "alert" && !message.failed ? "🚨 " : "";
  const signature = message.tier === "system" ? "" : `\n\n— ${message.tier}`;
  return `${prefix}${message.text}${signature}`;
}
