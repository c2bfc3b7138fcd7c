export type ErrorCode =
  | "PROBE_FAILURE"
  | "AGENT_INVOCATION_FAILED"
  | "SESSION_EXPIRED"
  | "TRANSPORT_FAILURE"
  | "CONFIG_INVALID";

export type AgentTier = "observer" | "actor";

export class VigilError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A probe threw or did not answer within its poll timeout.
 * Absorbed by the aggregator into a degraded snapshot.
 */
export class ProbeFailure extends VigilError {
  readonly probe: string;

  constructor(probe: string, message: string, options?: { cause?: unknown }) {
    super("PROBE_FAILURE", message, options);
    this.probe = probe;
  }
}

export class AgentInvocationError extends VigilError {
  readonly tier: AgentTier;

  constructor(
    tier: AgentTier,
    message: string,
    options?: { cause?: unknown; code?: ErrorCode }
  ) {
    super(options?.code ?? "AGENT_INVOCATION_FAILED", message, options);
    this.tier = tier;
  }
}

/** The agent rejected the resume reference; the session must be recreated. */
export class SessionExpiredError extends AgentInvocationError {
  readonly sessionId: string;

  constructor(tier: AgentTier, sessionId: string, message: string) {
    super(tier, message, { code: "SESSION_EXPIRED" });
    this.sessionId = sessionId;
  }
}

export class TransportError extends VigilError {
  readonly direction: "send" | "receive";

  constructor(direction: "send" | "receive", message: string, options?: { cause?: unknown }) {
    super("TRANSPORT_FAILURE", message, options);
    this.direction = direction;
  }
}

export class ConfigError extends VigilError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super("CONFIG_INVALID", `Invalid configuration:\n- ${problems.join("\n- ")}`);
    this.problems = problems;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
