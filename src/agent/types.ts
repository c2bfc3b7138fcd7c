import type { ChangeEvent } from "../rules/types.js";
import type { InboundMessage } from "../transport/types.js";

export type Trigger =
  | { type: "message"; message: InboundMessage }
  | { type: "events"; events: ChangeEvent[] }
  | { type: "heartbeat" }
  | { type: "crash-recovery"; logTail?: string }
  | { type: "startup-recovery"; alerts: string[] }
  | { type: "history-compression"; request: string };

export type TriggerType = Trigger["type"];

export interface ConversationEntry {
  sender: string;
  text: string;
}

export interface PromptContext {
  opsLog: string;
  statusSummary: string;
  conversation: ConversationEntry[];
}

export type MessageTier = "observer" | "actor" | "system";

export interface OutboundMessage {
  text: string;
  tier: MessageTier;
  trigger: TriggerType;
  escalated: boolean;
  failed: boolean;
  // Nothing worth telling a human (an "All clear" from a monitoring pass)
  silent: boolean;
  priority: "normal" | "alert";
  verification?: string;
  timestamp: number;
}
