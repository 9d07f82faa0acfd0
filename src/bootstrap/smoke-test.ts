import type { ResolvedConfig } from "../config/index.js";
import { describeFailure, type ProcessRunner } from "../process/runner.js";
import { childEnv, type ConnectionDescriptor } from "./backends.js";
import { BootstrapError } from "./errors.js";

export interface SmokeTestDependencies {
  runner: ProcessRunner;
  cwd: string;
  env?: NodeJS.ProcessEnv;
  stdio?: "inherit" | "pipe";
}

/**
 * "exited": the application ran to completion with code 0.
 * "still-running": it was alive at the end of the startup window and was stopped.
 */
export type SmokeTestOutcome = "exited" | "still-running";

/**
 * Run the application once with DATABASE_URL set.
 *
 * @throws BootstrapError with code ApplicationStartFailed
 */
export async function smokeTestApplication(
  descriptor: ConnectionDescriptor,
  settings: ResolvedConfig["application"],
  deps: SmokeTestDependencies,
): Promise<SmokeTestOutcome> {
  const [command, ...args] = settings.command;
  const result = await deps.runner.run(command, args, {
    cwd: deps.cwd,
    env: childEnv(descriptor, deps.env),
    stdio: deps.stdio,
    timeoutMs: settings.startupWindowMs > 0 ? settings.startupWindowMs : undefined,
  });

  if (result.timedOut) {
    return "still-running";
  }
  if (result.code !== 0) {
    throw new BootstrapError(
      "ApplicationStartFailed",
      `Application failed to start: ${describeFailure(result)}`,
    );
  }
  return "exited";
}
