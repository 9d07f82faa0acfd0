/**
 * Child process execution behind an injectable interface.
 */

import { spawn, type ChildProcess } from "child_process";

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** "inherit" streams the child's output to the terminal; "pipe" captures it */
  stdio?: "inherit" | "pipe";
  /**
   * Stop a child still running after this many milliseconds. The child gets its own
   * process group so wrapped commands (`npm start`, `sh -c`) are stopped with it.
   */
  timeoutMs?: number;
  /** Time between SIGTERM and SIGKILL for a timed-out child (default 2000) */
  killGraceMs?: number;
}

export interface RunResult {
  /** Exit code, or null when the child could not be spawned or was killed */
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Spawn error message (e.g. ENOENT) */
  error?: string;
}

export interface ProcessRunner {
  /** Resolves when the child exits. Never rejects. */
  run(command: string, args: readonly string[], options?: RunOptions): Promise<RunResult>;
}

const DEFAULT_KILL_GRACE_MS = 2_000;

function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Signal the child's whole process group, falling back to the child alone where
 * groups are unavailable.
 */
function signalGroup(proc: ChildProcess, signal: NodeJS.Signals): void {
  if (proc.pid === undefined) return;
  try {
    process.kill(-proc.pid, signal);
  } catch (err) {
    if (errnoCode(err) !== "ESRCH") {
      proc.kill(signal);
    }
  }
}

function groupAlive(proc: ChildProcess): boolean {
  if (proc.pid === undefined) return false;
  try {
    process.kill(-proc.pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === "EPERM";
  }
}

export function createProcessRunner(): ProcessRunner {
  return {
    run(command, args, options = {}) {
      return new Promise((resolve) => {
        let stdout = "";
        let stderr = "";
        let timedOut = false;
        let exitCode: number | null = null;
        let settled = false;
        let timer: NodeJS.Timeout | undefined;
        let escalation: NodeJS.Timeout | undefined;

        const limited = options.timeoutMs !== undefined && options.timeoutMs > 0;

        const proc = spawn(command, [...args], {
          cwd: options.cwd,
          env: options.env,
          stdio: options.stdio === "inherit" ? "inherit" : ["ignore", "pipe", "pipe"],
          detached: limited,
        });

        const finish = (result: Omit<RunResult, "stdout" | "stderr" | "timedOut">) => {
          if (settled) return;
          settled = true;
          if (timer) clearTimeout(timer);
          if (escalation) clearTimeout(escalation);
          if (timedOut) {
            // Descendants that left the group may still hold the pipes
            proc.stdout?.destroy();
            proc.stderr?.destroy();
          }
          resolve({ ...result, stdout: stdout.trim(), stderr: stderr.trim(), timedOut });
        };

        proc.stdout?.on("data", (chunk: Buffer) => {
          stdout += chunk.toString();
        });
        proc.stderr?.on("data", (chunk: Buffer) => {
          stderr += chunk.toString();
        });

        if (limited) {
          timer = setTimeout(() => {
            timedOut = true;
            signalGroup(proc, "SIGTERM");
            escalation = setTimeout(() => {
              signalGroup(proc, "SIGKILL");
              finish({ code: exitCode });
            }, options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
          }, options.timeoutMs);
        }

        proc.on("error", (err) => {
          finish({ code: null, error: err.message });
        });
        proc.on("exit", (code) => {
          exitCode = code;
          // After a timeout the group may outlive the direct child; wait for it or the SIGKILL
          if (timedOut && !groupAlive(proc)) {
            finish({ code });
          }
        });
        proc.on("close", (code) => {
          if (timedOut && groupAlive(proc)) return;
          finish({ code });
        });
      });
    },
  };
}

/**
 * One-line explanation of a failed run for log output.
 */
export function describeFailure(result: RunResult): string {
  if (result.error) {
    return result.error;
  }
  const lastLine = result.stderr.split("\n").filter(Boolean).pop();
  const status = result.code === null ? "was terminated" : `exited with code ${result.code}`;
  return lastLine ? `${status}: ${lastLine}` : status;
}
