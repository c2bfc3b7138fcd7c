import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { EscalationDispatcher, extractEscalation } from "../../src/agent/dispatcher.js";
import type { InvokeRequest, InvokeResult } from "../../src/agent/runner.js";
import type { OutboundMessage, PromptContext, Trigger } from "../../src/agent/types.js";
import { defaultConfig, type EscalationConfig } from "../../src/config/loader.js";
import { AgentInvocationError, SessionExpiredError } from "../../src/errors.js";
import { SessionStore } from "../../src/memory/sessions.js";
import { ScriptedInvoker } from "../helpers.js";

const context: PromptContext = {
  opsLog: "# Ops Log",
  statusSummary: "- VPS: CPU 10%",
  conversation: [],
};

const message = (text: string): Trigger => ({
  type: "message",
  message: { sender: "alice", group: "g1", text, timestamp: 1, mentions: [] },
});

const events: Trigger = {
  type: "events",
  events: [{ metric: "gpu_temp", kind: "absolute", oldValue: 70, newValue: 85, timestamp: 0 }],
};

describe("extractEscalation", () => {
  it("detects the marker at the start of the reply", () => {
    expect(extractEscalation("ESCALATE: restart OBS", "ESCALATE:")).toBe("restart OBS");
    expect(extractEscalation("  escalate:   free disk  ", "ESCALATE:")).toBe("free disk");
    expect(extractEscalation("ESCALATE:", "ESCALATE:")).toBe("Action required");
    expect(extractEscalation("I would not ESCALATE: this", "ESCALATE:")).toBeNull();
  });
});

describe("EscalationDispatcher", () => {
  let dir: string;
  let sessions: SessionStore;
  let invoker: ScriptedInvoker;
  let config: EscalationConfig;

  const dispatcher = () => new EscalationDispatcher(invoker, sessions, config);

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), "vigil-dispatch-"));
    sessions = new SessionStore(dir);
    invoker = new ScriptedInvoker();
    config = { ...defaultConfig.escalation };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("answers with the observer alone when it does not escalate", async () => {
    invoker.reply("observer", "Stream looks healthy.");

    const reply = await dispatcher().handle(message("how is the stream?"), context);

    expect(invoker.tiers()).toEqual(["observer"]);
    expect(reply).toMatchObject({
      text: "Stream looks healthy.",
      tier: "observer",
      trigger: "message",
      escalated: false,
      failed: false,
      silent: false,
      priority: "normal",
    });
    expect(invoker.calls[0].prompt).toContain('"how is the stream?"');
  });

  it("hands over to the actor when the observer escalates", async () => {
    invoker.reply("observer", "ESCALATE: restart the encoder").reply("actor", "Encoder restarted.");

    const reply = await dispatcher().handle(message("please restart the encoder"), context);

    expect(invoker.tiers()).toEqual(["observer", "actor"]);
    expect(reply).toMatchObject({ text: "Encoder restarted.", tier: "actor", escalated: true, failed: false });
    expect(invoker.calls[1].prompt).toContain("## Escalated by the observer\nrestart the encoder");
  });

  it("reports an observer failure without calling the actor", async () => {
    invoker.reply("observer", new AgentInvocationError("observer", "timed out after 60000ms"));

    const reply = await dispatcher().handle(events, context);

    expect(invoker.tiers()).toEqual(["observer"]);
    expect(reply).toMatchObject({
      text: "[!!] observer failed: timed out after 60000ms",
      tier: "observer",
      failed: true,
      escalated: false,
      priority: "alert",
    });
  });

  it("reports an actor failure as escalated", async () => {
    invoker.reply("observer", "ESCALATE: fix it").reply("actor", new Error("exited with code 1: boom"));

    const reply = await dispatcher().handle(events, context);

    expect(reply).toMatchObject({
      text: "[!!] actor failed: exited with code 1: boom",
      tier: "actor",
      failed: true,
      escalated: true,
    });
  });

  it("goes straight to the actor on the direct token", async () => {
    invoker.reply("actor", "Cleared the temp directory.");

    const reply = await dispatcher().handle(message("!act clear tmp"), context);

    expect(invoker.tiers()).toEqual(["actor"]);
    expect(reply).toMatchObject({ tier: "actor", escalated: false });
    expect(invoker.calls[0].prompt).not.toContain("Escalated by the observer");
  });

  it("keeps an all-clear monitoring pass silent", async () => {
    invoker.reply("observer", "All clear.");
    const reply = await dispatcher().handle({ type: "heartbeat" }, context);
    expect(reply.silent).toBe(true);
  });

  it("does not silence an all-clear reply to a person", async () => {
    invoker.reply("observer", "All clear. Nothing to report.");
    const reply = await dispatcher().handle(message("anything wrong?"), context);
    expect(reply.silent).toBe(false);
  });

  it("raises the priority of observer alerts on monitoring passes", async () => {
    invoker.reply("observer", "ALERT: GPU at 85C");
    const reply = await dispatcher().handle(events, context);
    expect(reply).toMatchObject({ priority: "alert", silent: false, failed: false });
  });

  it("verifies the actor's work when configured", async () => {
    config.verifyAfterAction = true;
    invoker
      .reply("observer", "ESCALATE: restart OBS", "ALERT: Fix did not hold - still offline")
      .reply("actor", "Restarted OBS.");

    const reply = await dispatcher().handle(events, context);

    expect(invoker.tiers()).toEqual(["observer", "actor", "observer"]);
    expect(reply.text).toBe("Restarted OBS.\n\nVerification: ALERT: Fix did not hold - still offline");
    expect(reply.verification).toBe("ALERT: Fix did not hold - still offline");
    expect(reply.priority).toBe("alert");
  });

  it("resumes stored sessions and records new ones", async () => {
    await sessions.set("observer", "observer-old", 1);
    invoker.reply("observer", "Fine.");

    await dispatcher().handle(message("status"), context);

    expect(invoker.calls[0].sessionId).toBe("observer-old");
    expect((await sessions.get("observer"))?.sessionId).toBe("observer-session");
  });

  it("retries once on a fresh session when the stored one expired", async () => {
    await sessions.set("observer", "observer-old", 1);
    invoker.reply("observer", new SessionExpiredError("observer", "observer-old", "expired"), "Fine.");

    const reply = await dispatcher().handle(message("status"), context);

    expect(reply.text).toBe("Fine.");
    expect(invoker.calls.map((c) => c.sessionId)).toEqual(["observer-old", null]);
    expect((await sessions.get("observer"))?.sessionId).toBe("observer-session");
  });

  it("runs cycles one at a time in arrival order", async () => {
    const order: string[] = [];
    let active = 0;
    let maxActive = 0;
    const slow = (label: string) => async (request: InvokeRequest): Promise<InvokeResult> => {
      active++;
      maxActive = Math.max(maxActive, active);
      order.push(`start ${label}`);
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push(`end ${label}`);
      active--;
      return { tier: request.tier, text: label, sessionId: null };
    };
    invoker.reply("observer", slow("first"), slow("second"));

    const d = dispatcher();
    expect(d.busy).toBe(false);
    const first = d.handle(message("one"), context);
    const second = d.handle(message("two"), context);
    expect(d.busy).toBe(true);

    const replies = await Promise.all([first, second]);
    await d.idle();

    expect(replies.map((r) => r.text)).toEqual(["first", "second"]);
    expect(order).toEqual(["start first", "end first", "start second", "end second"]);
    expect(maxActive).toBe(1);
    expect(d.busy).toBe(false);
  });

  it("turns a context failure into a failure message", async () => {
    const reply = await dispatcher().handle({ type: "heartbeat" }, async () => {
      throw new Error("ops log unreadable");
    });

    expect(reply).toMatchObject({ tier: "system", failed: true, text: "[!!] system failed: ops log unreadable" });
    expect(invoker.calls).toEqual([]);
  });

  it("hands startup alerts straight to the actor", async () => {
    invoker.reply("actor", "Restarted OBS.");

    const reply = await dispatcher().handle({ type: "startup-recovery", alerts: ["GPU at 92C", "OBS not running"] }, context);

    expect(invoker.tiers()).toEqual(["actor"]);
    expect(reply).toMatchObject({ tier: "actor", trigger: "startup-recovery", escalated: false, silent: false });
    expect(invoker.calls[0].prompt).toContain("detected these issues:\n- GPU at 92C\n- OBS not running");
  });

  it("keeps history compression quiet and unverified", async () => {
    config.verifyAfterAction = true;
    invoker.reply("actor", "No updates needed.", new Error("exited with code 1: boom"));
    const d = dispatcher();
    const trigger: Trigger = { type: "history-compression", request: "Review these recent events" };

    const done = await d.handle(trigger, context);
    const failed = await d.handle(trigger, context);

    expect(invoker.tiers()).toEqual(["actor", "actor"]);
    expect(invoker.calls[0].prompt).toContain("## Memory maintenance\nReview these recent events");
    expect(done).toMatchObject({ text: "No updates needed.", silent: true, failed: false });
    expect(done.verification).toBeUndefined();
    expect(failed).toMatchObject({ silent: true, failed: true, text: "[!!] actor failed: exited with code 1: boom" });
  });

  it("still resolves when a message listener throws", async () => {
    invoker.reply("observer", "Fine.", "Still fine.");
    const d = dispatcher();
    d.on("message", () => {
      throw new Error("listener broke");
    });

    await expect(d.handle(message("hi"), context)).resolves.toMatchObject({ text: "Fine." });
    await expect(d.handle(message("again"), context)).resolves.toMatchObject({ text: "Still fine." });
    expect(console.error).toHaveBeenCalledWith("[Dispatcher] Message listener failed:", "listener broke");
  });

  it("emits every outbound message and passes the cancel signal to the agent", async () => {
    invoker.reply("observer", "Fine.");
    const d = dispatcher();
    const emitted: OutboundMessage[] = [];
    d.on("message", (m: OutboundMessage) => emitted.push(m));

    await d.handle(message("hi"), context);
    d.cancel();

    expect(emitted).toHaveLength(1);
    expect(invoker.calls[0].signal?.aborted).toBe(true);
  });
});
