import type { AgentConfig } from "../config/loader.js";
import { AgentInvocationError, SessionExpiredError, errorMessage, type AgentTier } from "../errors.js";
import { runProcess, type ProcessRunner, type RunResult } from "../utils/process.js";
import { parseAgentOutput } from "./output-parser.js";

export interface InvokeRequest {
  tier: AgentTier;
  prompt: string;
  sessionId?: string | null;
  signal?: AbortSignal;
}

export interface InvokeResult {
  tier: AgentTier;
  text: string;
  sessionId: string | null;
}

export interface AgentInvoker {
  invoke(request: InvokeRequest): Promise<InvokeResult>;
}

const SESSION_EXPIRED = /no conversation found|session\b.*\b(not found|expired|invalid)|expired session/i;

function excerpt(text: string, max: number = 300): string {
  const flat = text.trim().replace(/\s+/g, " ");
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

/** Runs the external agent CLI headless, one process per invocation. */
export class AgentRunner implements AgentInvoker {
  private config: AgentConfig;
  private run: ProcessRunner;

  constructor(config: AgentConfig, run: ProcessRunner = runProcess) {
    this.config = config;
    this.run = run;
  }

  buildArgs(tier: AgentTier, prompt: string, sessionId?: string | null): string[] {
    const tierConfig = this.config[tier];
    const args = [
      ...this.config.args,
      "-p",
      prompt,
      "--output-format",
      "json",
      "--model",
      tierConfig.model,
      "--allowedTools",
      tierConfig.allowedTools.join(","),
      "--max-turns",
      String(tierConfig.maxTurns),
    ];
    if (sessionId) {
      args.push("--resume", sessionId);
    }
    return args;
  }

  async invoke({ tier, prompt, sessionId, signal }: InvokeRequest): Promise<InvokeResult> {
    const tierConfig = this.config[tier];
    if (tier === "actor") {
      console.warn(`[Agent] Calling actor (${tierConfig.model}) with tools: ${tierConfig.allowedTools.join(",")}`);
    } else {
      console.log(`[Agent] Calling observer (${tierConfig.model})`);
    }

    let result: RunResult;
    try {
      result = await this.run(this.config.command, this.buildArgs(tier, prompt, sessionId), {
        cwd: this.config.workingDirectory,
        timeoutMs: tierConfig.timeoutMs,
        killGraceMs: this.config.killGraceMs,
        signal,
      });
    } catch (error) {
      throw new AgentInvocationError(tier, `failed to start ${this.config.command}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (result.timedOut) {
      throw new AgentInvocationError(tier, `timed out after ${tierConfig.timeoutMs}ms`);
    }
    if (result.aborted) {
      throw new AgentInvocationError(tier, "cancelled by shutdown");
    }

    const output = parseAgentOutput(result.stdout);

    if (sessionId && SESSION_EXPIRED.test(`${result.stderr}\n${output?.text ?? ""}`)) {
      throw new SessionExpiredError(tier, sessionId, `session ${sessionId} is no longer available`);
    }

    if (result.exitCode !== 0) {
      const detail = excerpt(result.stderr) || excerpt(output?.text ?? "") || "no output";
      throw new AgentInvocationError(tier, `exited with code ${String(result.exitCode ?? result.signal)}: ${detail}`);
    }

    if (!output) {
      throw new AgentInvocationError(tier, `malformed output: ${excerpt(result.stdout, 120) || "empty"}`);
    }

    if (output.isError) {
      throw new AgentInvocationError(tier, output.text || "agent reported an error");
    }

    return {
      tier,
      text: output.text || "Done (no output)",
      sessionId: output.sessionId,
    };
  }
}
