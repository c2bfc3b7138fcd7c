import { describeEvents } from "../rules/engine.js";
import type { PromptContext, Trigger } from "./types.js";

export const PLAIN_TEXT_RULES = `FORMAT FOR CHAT (read on a phone):
- NO MARKDOWN. No **bold**, no \`code\`, no # headers
- Plain text only. Use [OK] [!!] [ALERT] for status
- Short lines that fit on a phone screen
- No ASCII art, no tables
- Lead with the answer, details after
- Simple dashes for lists (- item)
- Max 3-4 short paragraphs`;

const ROLE = "You are the ops administrator for a 24/7 AI livestream and the machine it runs on.";

function formatContext(context: PromptContext): string {
  const conversation =
    context.conversation.length > 0
      ? context.conversation
          .slice(-10)
          .map((m) => `- ${m.sender}: ${m.text}`)
          .join("\n")
      : "(none)";

  return `${ROLE}

## Current Status
${context.statusSummary}

---
## Operational Memory
${context.opsLog.trim()}
---

## Recent Conversation
${conversation}`;
}

export function describeTrigger(trigger: Trigger): string {
  switch (trigger.type) {
    case "message":
      return `## Message from ${trigger.message.sender}
"${trigger.message.text}"`;
    case "events":
      return `## Monitoring trigger: significant change
${describeEvents(trigger.events)}`;
    case "heartbeat":
      return `## Monitoring trigger: scheduled check
No specific change was detected. This is a periodic sanity pass.`;
    case "crash-recovery":
      return `## Startup after crash
The system just restarted after an unexpected shutdown (the run marker was still present).

## Supervisor log tail
${trigger.logTail?.trim() || "Log not available"}`;
    case "startup-recovery":
      return `## Startup recovery
The system just restarted and detected these issues:
${trigger.alerts.map((a) => `- ${a}`).join("\n")}

Assess the situation and attempt to fix critical issues. Lead with what you did, then a brief status.`;
    case "history-compression":
      return `## Memory maintenance
${trigger.request}`;
  }
}

function observerInstructions(trigger: Trigger, marker: string): string {
  if (trigger.type === "message") {
    return `Be conversational and helpful. Engage with what they said; if they ask a question, answer it.
Check the Recent Conversation section for context.

ESCALATION: You have read-only access. If they are asking you to DO something (edit files, restart services, fix issues), respond with exactly: "${marker} <what they want done>"`;
  }

  if (trigger.type === "crash-recovery") {
    return `Analyze what might have caused the crash:
1. Look for errors or warnings in the logs
2. Check if any probes showed problems before shutdown
3. Note any patterns or suspicious activity

Respond concisely with the likely cause (or "Unknown cause") and a recommended action, if any.`;
  }

  return `Review the system state. Is everything okay?
- If all clear, respond with just: "All clear."
- If there's a concern worth flagging, explain briefly (2-3 lines max).
- If immediate attention is needed, say "ALERT: <issue>"
- If something must be fixed now and you cannot do it read-only, respond with "${marker} <what needs doing>"`;
}

export function buildObserverPrompt(trigger: Trigger, context: PromptContext, marker: string): string {
  return `${formatContext(context)}

${describeTrigger(trigger)}

---
${observerInstructions(trigger, marker)}

${PLAIN_TEXT_RULES}`;
}

export function buildActorPrompt(trigger: Trigger, context: PromptContext, reason: string | null): string {
  const escalation = reason ? `\n## Escalated by the observer\n${reason}\n` : "";

  return `${formatContext(context)}

${describeTrigger(trigger)}
${escalation}
---
You have full system access. Carry out what is needed, then report what you did.
Record anything worth remembering in the Active Issues or Standing Instructions sections of the ops log.

${PLAIN_TEXT_RULES}`;
}

export function buildVerificationPrompt(context: PromptContext, actorReply: string): string {
  return `${formatContext(context)}

## Action just taken
${actorReply}

---
A fix was just applied. Verify if it worked.
- If fixed, respond: "Fix verified: <brief summary>"
- If the issue persists, respond: "ALERT: Fix did not hold - <details>"

${PLAIN_TEXT_RULES}`;
}
