import type { TransportConfig } from "../config/loader.js";
import { TransportError, errorMessage } from "../errors.js";
import { stripMarkdown, truncateMessage } from "../notifications/format.js";
import { debugLog } from "../utils/debug.js";
import { runProcess, type ProcessRunner } from "../utils/process.js";
import { sleep } from "../utils/timeout.js";
import type { InboundMessage, SendResult, Transport, TransportHealth } from "./types.js";

const SEEN_LIMIT = 1000;

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function stringField(value: unknown, key: string): string | undefined {
  const result = field(value, key);
  return typeof result === "string" ? result : undefined;
}

/** Extracts a group text message from one line of `signal-cli --output json receive`. */
export function parseEnvelope(raw: unknown): InboundMessage | null {
  const envelope = field(raw, "envelope") ?? raw;
  const data = field(envelope, "dataMessage");
  const text = stringField(data, "message");
  const group = stringField(field(data, "groupInfo"), "groupId");
  if (!text || !group) return null;

  const timestamp = field(envelope, "timestamp") ?? field(data, "timestamp");
  const mentionsRaw = field(data, "mentions");
  const mentions = Array.isArray(mentionsRaw)
    ? mentionsRaw
        .map((m: unknown) => stringField(m, "number") ?? stringField(m, "uuid") ?? stringField(m, "name"))
        .filter((m): m is string => m !== undefined)
    : [];

  return {
    sender: stringField(envelope, "sourceName") || stringField(envelope, "source") || stringField(envelope, "sourceNumber") || "unknown",
    group,
    text,
    timestamp: typeof timestamp === "number" ? timestamp : Date.now(),
    mentions,
  };
}

export function parseReceiveOutput(stdout: string): InboundMessage[] {
  const messages: InboundMessage[] = [];
  for (const line of stdout.split("\n")) {
    if (!line.trim()) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      console.warn(`[Signal] Skipping unparseable line: ${errorMessage(error)}`);
      continue;
    }
    const message = parseEnvelope(parsed);
    if (message) messages.push(message);
  }
  return messages;
}

export interface SignalTransportOptions {
  run?: ProcessRunner;
  backoffBaseMs?: number;
}

/** Group chat over the signal-cli command line client. */
export class SignalCliTransport implements Transport {
  private config: TransportConfig;
  private run: ProcessRunner;
  private backoffBaseMs: number;
  private seen: Set<number> = new Set();
  private receiveFailures = 0;
  private sendFailures = 0;

  constructor(config: TransportConfig, options: SignalTransportOptions = {}) {
    this.config = config;
    this.run = options.run ?? runProcess;
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
  }

  async *receive(signal: AbortSignal): AsyncGenerator<InboundMessage> {
    while (!signal.aborted) {
      for (const message of await this.poll(signal)) {
        yield message;
      }
      await sleep(this.config.receiveInterval * 1000, signal);
    }
  }

  /** One receive call. Failures are counted and logged, never thrown. */
  async poll(signal?: AbortSignal): Promise<InboundMessage[]> {
    let stdout: string;
    try {
      const result = await this.run(
        this.config.signalCliPath,
        ["-u", this.config.account, "--output", "json", "receive"],
        { timeoutMs: this.config.receiveTimeoutMs, signal }
      );
      if (result.aborted) return [];
      if (result.timedOut) {
        throw new TransportError("receive", `signal-cli receive timed out after ${this.config.receiveTimeoutMs}ms`);
      }
      if (result.exitCode !== 0) {
        throw new TransportError("receive", `signal-cli receive exited with ${result.exitCode}: ${result.stderr.trim().slice(0, 200)}`);
      }
      stdout = result.stdout;
    } catch (error) {
      this.receiveFailures++;
      console.warn(`[Signal] Receive failed (${this.receiveFailures} in a row): ${errorMessage(error)}`);
      return [];
    }

    this.receiveFailures = 0;
    const fresh: InboundMessage[] = [];
    for (const message of parseReceiveOutput(stdout)) {
      if (this.seen.has(message.timestamp)) continue;
      this.remember(message.timestamp);
      fresh.push(message);
    }

    debugLog("Signal", `received ${fresh.length} new messages`);
    return fresh;
  }

  private remember(timestamp: number): void {
    this.seen.add(timestamp);
    if (this.seen.size > SEEN_LIMIT) {
      // Sets iterate in insertion order; drop the oldest half
      this.seen = new Set([...this.seen].slice(-SEEN_LIMIT / 2));
    }
  }

  async send(text: string, group?: string): Promise<SendResult> {
    const groups = group ? [group] : this.config.allowedGroups;
    const message = truncateMessage(stripMarkdown(text));

    let attempts = 0;
    let lastError: string | undefined;
    let allSent = true;

    for (const groupId of groups) {
      const result = await this.sendToGroup(groupId, message);
      attempts += result.attempts;
      if (!result.success) {
        allSent = false;
        lastError = result.error;
      }
    }

    if (allSent) {
      this.sendFailures = 0;
      console.log(`[Signal] -> ${message.split("\n")[0].slice(0, 80)}`);
    } else {
      this.sendFailures++;
    }

    return { success: allSent, attempts, error: lastError };
  }

  private async sendToGroup(groupId: string, message: string): Promise<SendResult> {
    let lastError = "";
    const maxAttempts = Math.max(1, this.config.sendRetries);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const result = await this.run(
          this.config.signalCliPath,
          ["-u", this.config.account, "send", "-g", groupId, "--message-from-stdin"],
          { input: message, timeoutMs: 30000 }
        );
        if (result.exitCode === 0) {
          return { success: true, attempts: attempt };
        }
        lastError = result.timedOut ? "timed out" : result.stderr.trim().slice(0, 200) || `exit code ${result.exitCode}`;
      } catch (error) {
        lastError = errorMessage(error);
      }

      console.error(`[Signal] Send to ${groupId} failed (attempt ${attempt}/${maxAttempts}): ${lastError}`);
      if (attempt < maxAttempts) {
        await sleep(this.backoffBaseMs * 2 ** (attempt - 1));
      }
    }

    return { success: false, attempts: maxAttempts, error: lastError };
  }

  health(): TransportHealth {
    return {
      receiving: this.receiveFailures < this.config.failureThreshold,
      sending: this.sendFailures < this.config.failureThreshold,
      consecutiveReceiveFailures: this.receiveFailures,
      consecutiveSendFailures: this.sendFailures,
    };
  }
}
