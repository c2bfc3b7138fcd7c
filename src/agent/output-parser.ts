export interface AgentOutput {
  text: string;
  sessionId: string | null;
  isError: boolean;
}

type AgentEvent = Record<string, unknown>;

function isEvent(value: unknown): value is AgentEvent {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseEvents(stdout: string): AgentEvent[] {
  const trimmed = stdout.trim();
  if (!trimmed) return [];

  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (Array.isArray(parsed)) return parsed.filter(isEvent);
    if (isEvent(parsed)) return [parsed];
  } catch {
    // not a single document; try one event per line
  }

  const events: AgentEvent[] = [];
  for (const line of trimmed.split("\n")) {
    if (!line.trim()) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      if (isEvent(parsed)) events.push(parsed);
    } catch {
      continue;
    }
  }
  return events;
}

/**
 * Reads the agent CLI's JSON output: a single result object, an array of
 * events, or one event per line. The terminal `result` event carries the
 * reply text and session id. Returns null when there is no result event.
 */
export function parseAgentOutput(stdout: string): AgentOutput | null {
  const events = parseEvents(stdout);

  let result: AgentEvent | undefined;
  for (let i = events.length - 1; i >= 0; i--) {
    const event = events[i];
    if (event.type === "result" || (event.type === undefined && typeof event.result === "string")) {
      result = event;
      break;
    }
  }
  if (!result) return null;

  let sessionId = typeof result.session_id === "string" ? result.session_id : null;
  if (!sessionId) {
    // Fall back to the id announced by an earlier init event
    const withId = events.find((e) => typeof e.session_id === "string");
    sessionId = withId && typeof withId.session_id === "string" ? withId.session_id : null;
  }

  return {
    text: typeof result.result === "string" ? result.result.trim() : "",
    sessionId,
    isError: result.is_error === true || (typeof result.subtype === "string" && result.subtype.startsWith("error")),
  };
}
