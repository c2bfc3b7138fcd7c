import type { OutboundMessage } from "../agent/types.js";
import type { DiscordConfig } from "../config/loader.js";
import { errorMessage } from "../errors.js";
import type { ProbeAlert, Severity } from "../probes/types.js";

interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  fields?: { name: string; value: string; inline?: boolean }[];
  timestamp?: string;
  footer?: { text: string };
}

interface DiscordMessage {
  content?: string;
  embeds?: DiscordEmbed[];
}

const TIER_COLORS: Record<OutboundMessage["tier"], number> = {
  observer: 0x0099ff, // Blue
  actor: 0x4ecca3, // Green
  system: 0x808080, // Gray
};

function severityColor(severity: Severity): number {
  switch (severity) {
    case "critical":
      return 0xff0000;
    case "warning":
      return 0xffa500;
    case "info":
      return 0x0099ff;
  }
}

/** Mirrors outbound chat traffic and probe alerts to a Discord webhook. */
export class DiscordNotifier {
  private webhookUrl: string;
  private enabled: boolean;
  private mirrorObserver: boolean;
  private fetchImpl: typeof fetch;

  constructor(config: DiscordConfig, fetchImpl: typeof fetch = fetch) {
    const url = config.webhookUrl;
    const isValidWebhook =
      url.startsWith("https://discord.com/api/webhooks/") || url.startsWith("https://discordapp.com/api/webhooks/");
    this.webhookUrl = isValidWebhook ? url : "";
    this.enabled = config.enabled && isValidWebhook;
    this.mirrorObserver = config.mirrorObserver;
    this.fetchImpl = fetchImpl;

    if (config.enabled && !isValidWebhook) {
      if (url) {
        console.warn("[Discord] Invalid webhook URL, notifications disabled");
      } else {
        console.log("[Discord] Webhook URL not configured, notifications disabled");
      }
    }
  }

  async sendOutbound(message: OutboundMessage): Promise<boolean> {
    if (!this.enabled || message.silent) return false;
    if (message.tier === "observer" && !message.failed && !this.mirrorObserver) return false;

    const title = message.failed
      ? `❌ ${message.tier} failed`
      : message.priority === "alert"
        ? `🚨 Alert from ${message.tier}`
        : message.tier === "actor"
          ? "🔧 Actor response"
          : "👀 Observer response";

    const embed: DiscordEmbed = {
      title,
      description: message.text.slice(0, 2000),
      color: message.failed || message.priority === "alert" ? 0xff0000 : TIER_COLORS[message.tier],
      fields: [
        { name: "Trigger", value: message.trigger, inline: true },
        { name: "Escalated", value: message.escalated ? "yes" : "no", inline: true },
      ],
      timestamp: new Date(message.timestamp).toISOString(),
    };

    return this.send({
      content: message.priority === "alert" ? "@here" : undefined,
      embeds: [embed],
    });
  }

  async sendProbeAlerts(alerts: ProbeAlert[]): Promise<boolean> {
    if (!this.enabled || alerts.length === 0) return false;

    const worst: Severity = alerts.some((a) => a.severity === "critical") ? "critical" : "warning";
    const embed: DiscordEmbed = {
      title: `🚨 ${alerts.length} probe alert${alerts.length === 1 ? "" : "s"}`,
      description: alerts.map((a) => `• [${a.source}] ${a.message}`).join("\n").slice(0, 2000),
      color: severityColor(worst),
      timestamp: new Date().toISOString(),
    };

    return this.send({ embeds: [embed] });
  }

  async sendCustomMessage(title: string, message: string, urgent: boolean = false): Promise<boolean> {
    if (!this.enabled) return false;

    const embed: DiscordEmbed = {
      title,
      description: message.slice(0, 2000),
      color: urgent ? 0xff0000 : 0x0099ff,
      timestamp: new Date().toISOString(),
    };

    return this.send({
      content: urgent ? "@here" : undefined,
      embeds: [embed],
    });
  }

  private async send(message: DiscordMessage): Promise<boolean> {
    if (!this.webhookUrl) return false;

    try {
      const response = await this.fetchImpl(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(message),
      });

      if (!response.ok) {
        console.error(`[Discord] Failed to send message: ${response.status} ${response.statusText}`);
        return false;
      }

      return true;
    } catch (error) {
      console.error("[Discord] Error sending notification:", errorMessage(error));
      return false;
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}
