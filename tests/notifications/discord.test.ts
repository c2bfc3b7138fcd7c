import { describe, it, expect, beforeEach, vi } from "vitest";
import { DiscordNotifier } from "../../src/notifications/discord.js";
import type { OutboundMessage } from "../../src/agent/types.js";
import type { DiscordConfig } from "../../src/config/loader.js";

const WEBHOOK = "https://discord.com/api/webhooks/000/test-token";

interface Posted {
  url: string;
  body: unknown;
}

function fakeFetch(posted: Posted[], status = 204): typeof fetch {
  return async (input, init) => {
    posted.push({ url: String(input), body: JSON.parse(String(init?.body)) });
    return new Response(null, { status });
  };
}

const outbound = (overrides: Partial<OutboundMessage>): OutboundMessage => ({
  text: "Stream healthy",
  tier: "observer",
  trigger: "heartbeat",
  escalated: false,
  failed: false,
  silent: false,
  priority: "normal",
  timestamp: Date.UTC(2026, 9, 18, 12, 0),
  ...overrides,
});

describe("DiscordNotifier", () => {
  let posted: Posted[];
  const config: DiscordConfig = { enabled: true, webhookUrl: WEBHOOK, mirrorObserver: true };

  beforeEach(() => {
    posted = [];
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("rejects webhook URLs that are not Discord's", async () => {
    const notifier = new DiscordNotifier({ ...config, webhookUrl: "https://example.com/hook" }, fakeFetch(posted));
    expect(notifier.isEnabled()).toBe(false);
    expect(await notifier.sendCustomMessage("t", "m")).toBe(false);
    expect(posted).toEqual([]);
  });

  it("mirrors an actor reply as an embed", async () => {
    const notifier = new DiscordNotifier(config, fakeFetch(posted));

    expect(await notifier.sendOutbound(outbound({ tier: "actor", text: "Restarted OBS.", escalated: true }))).toBe(true);
    expect(posted[0].url).toBe(WEBHOOK);
    expect(posted[0].body).toEqual({
      embeds: [
        {
          title: "🔧 Actor response",
          description: "Restarted OBS.",
          color: 0x4ecca3,
          fields: [
            { name: "Trigger", value: "heartbeat", inline: true },
            { name: "Escalated", value: "yes", inline: true },
          ],
          timestamp: "2026-10-18T12:00:00.000Z",
        },
      ],
    });
  });

  it("pings for alerts", async () => {
    const notifier = new DiscordNotifier(config, fakeFetch(posted));
    await notifier.sendOutbound(outbound({ priority: "alert", text: "ALERT: offline" }));
    expect(posted[0].body).toMatchObject({ content: "@here", embeds: [{ title: "🚨 Alert from observer", color: 0xff0000 }] });
  });

  it("skips silent messages and, when configured, observer chatter", async () => {
    const quiet = new DiscordNotifier({ ...config, mirrorObserver: false }, fakeFetch(posted));

    expect(await quiet.sendOutbound(outbound({ silent: true }))).toBe(false);
    expect(await quiet.sendOutbound(outbound({}))).toBe(false);
    expect(await quiet.sendOutbound(outbound({ failed: true, priority: "alert", text: "[!!] observer failed: x" }))).toBe(true);
    expect(posted).toHaveLength(1);
  });

  it("summarizes probe alerts by worst severity", async () => {
    const notifier = new DiscordNotifier(config, fakeFetch(posted));
    await notifier.sendProbeAlerts([
      { metric: "cpu_percent", severity: "warning", message: "CPU high: 96%", source: "resource" },
      { metric: "disk_percent", severity: "critical", message: "Disk high: 90%", source: "resource" },
    ]);

    expect(posted[0].body).toMatchObject({
      embeds: [
        {
          title: "🚨 2 probe alerts",
          description: "• [resource] CPU high: 96%\n• [resource] Disk high: 90%",
          color: 0xff0000,
        },
      ],
    });
  });

  it("returns false when the webhook responds with an error", async () => {
    const notifier = new DiscordNotifier(config, fakeFetch(posted, 500));
    expect(await notifier.sendCustomMessage("VIGIL", "offline")).toBe(false);
  });
});
