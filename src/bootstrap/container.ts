/**
 * Container runtime operations for the containerized PostgreSQL backend
 */

import type { ResolvedConfig } from "../config/index.js";
import { describeFailure, type ProcessRunner } from "../process/runner.js";
import { BootstrapError } from "./errors.js";

export interface ContainerSettings {
  container: ResolvedConfig["container"];
  postgres: ResolvedConfig["postgres"];
}

/** How the database container ended up running */
export type ContainerStartOutcome = "created" | "restarted" | "already-running";

/**
 * @throws BootstrapError with code RuntimeUnavailable when `<runtime> info` fails
 */
export async function ensureContainerRuntime(runner: ProcessRunner, runtime: string): Promise<void> {
  const result = await runner.run(runtime, ["info"]);
  if (result.code !== 0) {
    throw new BootstrapError(
      "RuntimeUnavailable",
      `${runtime} is not installed or not running (${describeFailure(result)})`,
    );
  }
}

export function containerRunArgs({ container, postgres }: ContainerSettings): string[] {
  const args = ["run", "-d", "--name", container.name];
  if (postgres.user !== "postgres") {
    args.push("-e", `POSTGRES_USER=${postgres.user}`);
  }
  args.push(
    "-e",
    `POSTGRES_PASSWORD=${postgres.password}`,
    "-e",
    `POSTGRES_DB=${postgres.database}`,
    "-p",
    `${postgres.port}:5432`,
    container.image,
  );
  return args;
}

/**
 * Make sure the named database container is running. An existing container is
 * reused (started if stopped); otherwise a new one is created.
 *
 * @throws BootstrapError with code ContainerStartFailed
 */
export async function startDatabaseContainer(
  runner: ProcessRunner,
  settings: ContainerSettings,
): Promise<ContainerStartOutcome> {
  const { runtime, name } = settings.container;

  const inspect = await runner.run(runtime, ["container", "inspect", "--format", "{{.State.Running}}", name]);

  if (inspect.code === 0) {
    if (inspect.stdout.trim() === "true") {
      return "already-running";
    }
    const started = await runner.run(runtime, ["start", name]);
    if (started.code !== 0) {
      throw new BootstrapError(
        "ContainerStartFailed",
        `Failed to start existing container ${name}: ${describeFailure(started)}`,
      );
    }
    return "restarted";
  }

  const created = await runner.run(runtime, containerRunArgs(settings));
  if (created.code !== 0) {
    throw new BootstrapError(
      "ContainerStartFailed",
      `Failed to start container ${name} from ${settings.container.image}: ${describeFailure(created)}`,
    );
  }
  return "created";
}
