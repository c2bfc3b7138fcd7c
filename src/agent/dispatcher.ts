import { EventEmitter } from "events";
import type { EscalationConfig } from "../config/loader.js";
import { SessionExpiredError, errorMessage, type AgentTier } from "../errors.js";
import type { SessionStore } from "../memory/sessions.js";
import { buildActorPrompt, buildObserverPrompt, buildVerificationPrompt } from "./promptBuilder.js";
import type { AgentInvoker, InvokeResult } from "./runner.js";
import type { OutboundMessage, PromptContext, Trigger } from "./types.js";

export type ContextSource = PromptContext | (() => Promise<PromptContext>);

const ALL_CLEAR = /^all clear\b/i;
const ALERT_PREFIX = /^alert:/i;

/**
 * Returns the escalation reason if `text` starts with the marker
 * (case-insensitive, after trimming), otherwise null.
 */
export function extractEscalation(text: string, marker: string): string | null {
  const trimmed = text.trim();
  if (!trimmed.toUpperCase().startsWith(marker.toUpperCase())) return null;
  return trimmed.slice(marker.length).trim() || "Action required";
}

export function isMonitoringTrigger(trigger: Trigger): boolean {
  return trigger.type === "events" || trigger.type === "heartbeat";
}

/** Triggers the actor handles without an observer pass. */
export function isActorTask(trigger: Trigger): boolean {
  return trigger.type === "startup-recovery" || trigger.type === "history-compression";
}

// Bookkeeping the actor does on its own; its replies are not chat messages
const isHousekeeping = (trigger: Trigger): boolean => trigger.type === "history-compression";

/**
 * Runs one escalation cycle per trigger: the observer first, the actor only
 * when the observer asks for it, then an optional read-only verification.
 * Cycles run one at a time in arrival order and `handle` never rejects.
 *
 * Emits "message" with every OutboundMessage it returns.
 */
export class EscalationDispatcher extends EventEmitter {
  private invoker: AgentInvoker;
  private sessions: SessionStore;
  private config: EscalationConfig;
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;
  private abortController = new AbortController();

  constructor(invoker: AgentInvoker, sessions: SessionStore, config: EscalationConfig) {
    super();
    this.invoker = invoker;
    this.sessions = sessions;
    this.config = config;
  }

  get busy(): boolean {
    return this.pending > 0;
  }

  handle(trigger: Trigger, context: ContextSource): Promise<OutboundMessage> {
    this.pending++;
    const cycle = this.queue.then(() => this.runCycle(trigger, context));
    this.queue = cycle.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return cycle;
  }

  /** Resolves once every queued cycle has finished. */
  async idle(): Promise<void> {
    while (this.pending > 0) {
      await this.queue;
    }
  }

  /** Cancels the in-flight agent process and any that start afterwards. */
  cancel(): void {
    this.abortController.abort();
  }

  private async runCycle(trigger: Trigger, source: ContextSource): Promise<OutboundMessage> {
    let message: OutboundMessage;
    try {
      const context = typeof source === "function" ? await source() : source;
      message = await this.escalate(trigger, context);
    } catch (error) {
      console.error("[Dispatcher] Cycle failed:", errorMessage(error));
      message = this.failure("system", trigger, errorMessage(error), false);
    }

    try {
      this.emit("message", message);
    } catch (error) {
      console.error("[Dispatcher] Message listener failed:", errorMessage(error));
    }
    return message;
  }

  private async escalate(trigger: Trigger, context: PromptContext): Promise<OutboundMessage> {
    if (trigger.type === "message" && this.isDirectActorRequest(trigger.message.text)) {
      console.log("[Dispatcher] Direct actor request, skipping observer");
      return this.act(trigger, context, null);
    }
    if (isActorTask(trigger)) {
      console.log(`[Dispatcher] ${trigger.type} goes straight to the actor`);
      return this.act(trigger, context, null);
    }

    let observed: InvokeResult;
    try {
      observed = await this.invokeTier("observer", buildObserverPrompt(trigger, context, this.config.marker));
    } catch (error) {
      return this.failure("observer", trigger, errorMessage(error), false);
    }

    const reason = extractEscalation(observed.text, this.config.marker);
    if (reason === null) {
      return this.observation(trigger, observed.text);
    }

    console.log(`[Dispatcher] Observer escalated: ${reason}`);
    return this.act(trigger, context, reason);
  }

  private observation(trigger: Trigger, text: string): OutboundMessage {
    const monitoring = isMonitoringTrigger(trigger);
    const silent = monitoring && ALL_CLEAR.test(text.trim());
    if (silent) {
      console.log("[Dispatcher] Observer: All clear");
    }

    return {
      text,
      tier: "observer",
      trigger: trigger.type,
      escalated: false,
      failed: false,
      silent,
      priority: monitoring && ALERT_PREFIX.test(text.trim()) ? "alert" : "normal",
      timestamp: Date.now(),
    };
  }

  private async act(trigger: Trigger, context: PromptContext, reason: string | null): Promise<OutboundMessage> {
    const escalated = reason !== null;

    let acted: InvokeResult;
    try {
      acted = await this.invokeTier("actor", buildActorPrompt(trigger, context, reason));
    } catch (error) {
      return this.failure("actor", trigger, errorMessage(error), escalated);
    }

    const message: OutboundMessage = {
      text: acted.text,
      tier: "actor",
      trigger: trigger.type,
      escalated,
      failed: false,
      silent: isHousekeeping(trigger),
      priority: "normal",
      timestamp: Date.now(),
    };

    if (this.config.verifyAfterAction && !isHousekeeping(trigger)) {
      try {
        const verified = await this.invokeTier("observer", buildVerificationPrompt(context, acted.text));
        message.verification = verified.text;
        message.text = `${acted.text}\n\nVerification: ${verified.text}`;
        if (ALERT_PREFIX.test(verified.text.trim())) {
          message.priority = "alert";
        }
      } catch (error) {
        console.error("[Dispatcher] Verification failed:", errorMessage(error));
      }
    }

    return message;
  }

  /**
   * Invokes one tier on its own session. An expired session is dropped and
   * the call retried once on a fresh one.
   */
  private async invokeTier(tier: AgentTier, prompt: string): Promise<InvokeResult> {
    const session = await this.sessions.get(tier);
    const signal = this.abortController.signal;

    let result: InvokeResult;
    try {
      result = await this.invoker.invoke({ tier, prompt, sessionId: session?.sessionId ?? null, signal });
    } catch (error) {
      if (!(error instanceof SessionExpiredError)) throw error;
      console.warn(`[Dispatcher] ${tier} session expired, starting a fresh one`);
      await this.sessions.invalidate(tier);
      result = await this.invoker.invoke({ tier, prompt, sessionId: null, signal });
    }

    if (result.sessionId) {
      try {
        await this.sessions.set(tier, result.sessionId);
      } catch (error) {
        console.error(`[Dispatcher] Failed to save ${tier} session:`, errorMessage(error));
      }
    }
    return result;
  }

  private failure(tier: OutboundMessage["tier"], trigger: Trigger, reason: string, escalated: boolean): OutboundMessage {
    console.error(`[Dispatcher] ${tier} failed: ${reason}`);
    return {
      text: `[!!] ${tier} failed: ${reason}`,
      tier,
      trigger: trigger.type,
      escalated,
      failed: true,
      silent: isHousekeeping(trigger),
      priority: "alert",
      timestamp: Date.now(),
    };
  }

  private isDirectActorRequest(text: string): boolean {
    const token = this.config.directActorToken.trim().toLowerCase();
    return token.length > 0 && text.toLowerCase().includes(token);
  }
}
