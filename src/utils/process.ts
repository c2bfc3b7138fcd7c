import { spawn } from "child_process";

export interface RunOptions {
  cwd?: string;
  input?: string;
  timeoutMs?: number;
  /** Time between SIGTERM and SIGKILL once the run is cancelled. */
  killGraceMs?: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export interface RunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
}

export type ProcessRunner = (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;

/**
 * Runs a command to completion and collects its output. Never rejects for a
 * non-zero exit; rejects only when the command cannot be spawned at all.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) => {
  const { cwd, input, timeoutMs, killGraceMs = 5000, signal, env } = options;

  return new Promise<RunResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env: env ?? process.env,
      stdio: ["pipe", "pipe", "pipe"],
      // Own process group, so cancelling also reaches anything the command started
      detached: true,
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let aborted = false;
    let settled = false;

    const killGroup = (sig: NodeJS.Signals) => {
      try {
        if (child.pid !== undefined) {
          process.kill(-child.pid, sig);
          return;
        }
      } catch {
        // group already gone; fall back to the direct child
      }
      child.kill(sig);
    };

    const terminate = () => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      killGroup("SIGTERM");
      // Not cleared on exit: it also reaches leftovers that ignored SIGTERM
      setTimeout(() => killGroup("SIGKILL"), killGraceMs);
    };

    const timeoutTimer =
      timeoutMs !== undefined && timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            terminate();
          }, timeoutMs)
        : null;

    const onAbort = () => {
      aborted = true;
      terminate();
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    const cleanup = () => {
      if (timeoutTimer) clearTimeout(timeoutTimer);
      signal?.removeEventListener("abort", onAbort);
    };

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    const finish = (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve({ exitCode, signal: exitSignal, stdout, stderr, timedOut, aborted });
    };

    child.on("error", (error) => {
      if (settled) return;
      settled = true;
      cleanup();
      reject(error);
    });

    // A cancelled run ends when the child exits, even if a leftover process still holds its pipes
    child.on("exit", (exitCode, exitSignal) => {
      if (!timedOut && !aborted) return;
      child.stdout.destroy();
      child.stderr.destroy();
      finish(exitCode, exitSignal);
    });

    child.on("close", finish);

    // The child may exit before reading stdin
    child.stdin.on("error", () => undefined);
    if (input !== undefined) {
      child.stdin.end(input);
    } else {
      child.stdin.end();
    }
  });
};
