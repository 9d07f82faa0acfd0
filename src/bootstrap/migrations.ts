/**
 * Migration step: an external command, or the built-in Kysely runner
 */

import * as path from "path";
import type { ResolvedConfig } from "../config/index.js";
import type { ApplyMigrationsOptions, ApplyMigrationsResult } from "../migrations/apply.js";
import { describeFailure, type ProcessRunner } from "../process/runner.js";
import { childEnv, type ConnectionDescriptor } from "./backends.js";
import { BootstrapError, errorMessage } from "./errors.js";

export interface MigrationStepDependencies {
  runner: ProcessRunner;
  applyMigrations: (options: ApplyMigrationsOptions) => Promise<ApplyMigrationsResult>;
  cwd: string;
  env?: NodeJS.ProcessEnv;
  stdio?: "inherit" | "pipe";
}

export type MigrationReport =
  | { mode: "command"; command: string }
  | { mode: "built-in"; applied: string[] };

/**
 * Run the migrations in the configured directory against the chosen database.
 *
 * @throws BootstrapError with code MigrationFailed
 */
export async function runMigrations(
  descriptor: ConnectionDescriptor,
  settings: ResolvedConfig["migrations"],
  deps: MigrationStepDependencies,
): Promise<MigrationReport> {
  const directory = path.resolve(deps.cwd, settings.directory);

  if (settings.command) {
    const [command, ...args] = settings.command;
    const result = await deps.runner.run(command, args, {
      cwd: directory,
      env: childEnv(descriptor, deps.env),
      stdio: deps.stdio,
    });
    if (result.code !== 0) {
      throw new BootstrapError("MigrationFailed", `Migration command failed: ${describeFailure(result)}`);
    }
    return { mode: "command", command: settings.command.join(" ") };
  }

  try {
    const { results } = await deps.applyMigrations({
      migrationsFolder: directory,
      dialect: descriptor.dialect,
      connectionUrl: descriptor.url,
      cwd: deps.cwd,
    });
    return { mode: "built-in", applied: results.map((result) => result.migrationName) };
  } catch (err) {
    throw new BootstrapError("MigrationFailed", `Migration failed: ${errorMessage(err)}`);
  }
}
