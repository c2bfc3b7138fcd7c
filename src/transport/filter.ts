import type { ConversationEntry } from "../agent/types.js";
import type { InboundMessage } from "./types.js";

export interface TriggerFilterOptions {
  allowedGroups: string[];
  triggerToken: string;
  contextBufferSize: number;
}

export type FilterDecision =
  | { accepted: true; via: "mention" | "token" }
  | { accepted: false; reason: "group" | "no-trigger" };

/**
 * Decides which inbound messages start an escalation cycle. Every message from
 * an allowed group is kept as recent context, triggering or not.
 */
export class TriggerFilter {
  private allowedGroups: Set<string>;
  private token: string;
  private bufferSize: number;
  private buffer: ConversationEntry[] = [];

  constructor(options: TriggerFilterOptions) {
    this.allowedGroups = new Set(options.allowedGroups);
    this.token = options.triggerToken.trim().toLowerCase();
    this.bufferSize = options.contextBufferSize;
  }

  accept(message: InboundMessage): FilterDecision {
    if (!this.allowedGroups.has(message.group)) {
      return { accepted: false, reason: "group" };
    }

    this.remember(message);

    if (message.mentions.length > 0) {
      return { accepted: true, via: "mention" };
    }
    if (this.token && message.text.toLowerCase().includes(this.token)) {
      return { accepted: true, via: "token" };
    }
    return { accepted: false, reason: "no-trigger" };
  }

  /** Adds one of our own replies to the context buffer. */
  recordReply(sender: string, text: string): void {
    this.push({ sender, text });
  }

  recentContext(): ConversationEntry[] {
    return [...this.buffer];
  }

  private remember(message: InboundMessage): void {
    this.push({ sender: message.sender, text: message.text });
  }

  private push(entry: ConversationEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.bufferSize) {
      this.buffer = this.buffer.slice(-this.bufferSize);
    }
  }
}
