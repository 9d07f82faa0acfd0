/**
 * The bootstrap run: select a backend, provision it, migrate, smoke test.
 *
 * Every external call goes through `BootstrapDependencies` so a run can be driven
 * entirely in-process.
 */

import type { ResolvedConfig } from "../config/index.js";
import type { LogFn } from "../log.js";
import { applyMigrations } from "../migrations/apply.js";
import { createProcessRunner, type ProcessRunner } from "../process/runner.js";
import { redactUrl, selectBackend, type ConnectionDescriptor } from "./backends.js";
import { ensureContainerRuntime, startDatabaseContainer } from "./container.js";
import { BootstrapError, errorMessage } from "./errors.js";
import { runMigrations, type MigrationStepDependencies } from "./migrations.js";
import { createConnectionProbe, sleep, waitForDatabase, type ConnectionProbe } from "./readiness.js";
import { smokeTestApplication } from "./smoke-test.js";

export type StepName =
  | "select-backend"
  | "container-runtime"
  | "container-start"
  | "database-ready"
  | "migrations"
  | "smoke-test";

export type StepStatus = "ok" | "skipped" | "failed";

export interface StepReport {
  step: StepName;
  status: StepStatus;
  detail?: string;
}

export interface BootstrapResult {
  descriptor?: ConnectionDescriptor;
  steps: StepReport[];
  error?: Error;
  exitCode: 0 | 1;
}

export interface BootstrapDependencies {
  runner: ProcessRunner;
  probe: ConnectionProbe;
  applyMigrations: MigrationStepDependencies["applyMigrations"];
  sleep: (ms: number) => Promise<void>;
  now: () => number;
  /** Base environment for child processes (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface BootstrapOptions {
  cwd: string;
  config: ResolvedConfig;
  /** Returns the raw menu answer */
  chooseBackend: () => Promise<string>;
  log: LogFn;
  /** Child output handling; the ink UI captures it instead of streaming */
  childStdio?: "inherit" | "pipe";
  deps?: Partial<BootstrapDependencies>;
}

function defaultDependencies(cwd: string): BootstrapDependencies {
  return {
    runner: createProcessRunner(),
    probe: createConnectionProbe(cwd),
    applyMigrations,
    sleep,
    now: Date.now,
  };
}

export async function runBootstrap(options: BootstrapOptions): Promise<BootstrapResult> {
  const { cwd, config, log } = options;
  const deps: BootstrapDependencies = { ...defaultDependencies(cwd), ...options.deps };
  const stdio = options.childStdio ?? "inherit";
  const steps: StepReport[] = [];
  const record = (step: StepName, status: StepStatus, detail?: string) => {
    steps.push(detail === undefined ? { step, status } : { step, status, detail });
  };

  let current: StepName = "select-backend";
  let descriptor: ConnectionDescriptor | undefined;

  try {
    descriptor = selectBackend(await options.chooseBackend(), config);
    record("select-backend", "ok", descriptor.label);
    log("success", `Backend: ${descriptor.label}`);
    log("info", `DATABASE_URL=${redactUrl(descriptor.url)}`);

    if (descriptor.requiresContainer) {
      const { runtime, name, image } = config.container;

      current = "container-runtime";
      log("info", `Checking for ${runtime}...`);
      await ensureContainerRuntime(deps.runner, runtime);
      record("container-runtime", "ok", runtime);

      current = "container-start";
      log("info", `Starting container ${name} (${image})...`);
      const outcome = await startDatabaseContainer(deps.runner, config);
      record("container-start", "ok", outcome);
      log("success", outcome === "already-running" ? `Container ${name} already running` : `Container ${name} ${outcome}`);

      current = "database-ready";
      log("info", "Waiting for database to accept connections...");
      const attempts = await waitForDatabase(descriptor, config.readiness, {
        probe: deps.probe,
        sleep: deps.sleep,
        now: deps.now,
        onRetry: (attempt, delayMs, error) => {
          log("warning", `Attempt ${attempt} failed (${error}), retrying in ${delayMs}ms`);
        },
      });
      record("database-ready", "ok", `${attempts} attempt(s)`);
      log("success", "Database is ready");
    } else {
      record("container-runtime", "skipped");
      record("container-start", "skipped");
      record("database-ready", "skipped");
    }

    current = "migrations";
    log("info", "Running migrations...");
    const migrationReport = await runMigrations(descriptor, config.migrations, {
      runner: deps.runner,
      applyMigrations: deps.applyMigrations,
      cwd,
      env: deps.env,
      stdio,
    });
    if (migrationReport.mode === "command") {
      record("migrations", "ok", migrationReport.command);
      log("success", "Migrations complete");
    } else {
      record("migrations", "ok", migrationReport.applied.join(", "));
      log(
        "success",
        migrationReport.applied.length > 0
          ? `Applied ${migrationReport.applied.length} migration(s): ${migrationReport.applied.join(", ")}`
          : "Migrations up to date",
      );
    }

    current = "smoke-test";
    log("info", `Running ${config.application.command.join(" ")}...`);
    const smokeOutcome = await smokeTestApplication(descriptor, config.application, {
      runner: deps.runner,
      cwd,
      env: deps.env,
      stdio,
    });
    record("smoke-test", "ok", smokeOutcome);
    log(
      "success",
      smokeOutcome === "still-running"
        ? `Application started (still running after ${config.application.startupWindowMs}ms, stopped)`
        : "Application ran successfully",
    );
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    record(current, "failed", error.message);
    log("error", err instanceof BootstrapError ? error.message : `Error: ${errorMessage(err)}`);
    return { descriptor, steps, error, exitCode: 1 };
  }

  log("success", "Setup complete");
  return { descriptor, steps, exitCode: 0 };
}
