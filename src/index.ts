/**
 * smartmemo-setup - database bootstrapper for the Smart Memo API
 *
 * Chooses one of three database backends, provisions it, applies the schema
 * migrations and starts the application once to confirm it boots.
 *
 * @packageDocumentation
 */

// Bootstrap run
export {
  runBootstrap,
  type BootstrapOptions,
  type BootstrapDependencies,
  type BootstrapResult,
  type StepName,
  type StepStatus,
  type StepReport,
} from "./bootstrap/run.js";
export {
  BACKEND_OPTIONS,
  selectBackend,
  buildPostgresUrl,
  buildSqliteUrl,
  redactUrl,
  childEnv,
  type BackendChoice,
  type BackendKind,
  type BackendOption,
  type ConnectionDescriptor,
} from "./bootstrap/backends.js";
export {
  ensureContainerRuntime,
  startDatabaseContainer,
  containerRunArgs,
  type ContainerSettings,
  type ContainerStartOutcome,
} from "./bootstrap/container.js";
export {
  waitForDatabase,
  createConnectionProbe,
  type ConnectionProbe,
  type ReadinessOptions,
} from "./bootstrap/readiness.js";
export { runMigrations, type MigrationReport } from "./bootstrap/migrations.js";
export { smokeTestApplication, type SmokeTestOutcome } from "./bootstrap/smoke-test.js";
export { BootstrapError, type BootstrapErrorCode } from "./bootstrap/errors.js";

// Migrations
export { applyMigrations, type ApplyMigrationsOptions, type ApplyMigrationsResult } from "./migrations/apply.js";
export { type MigrationContext } from "./migrations/types.js";

// Process execution
export { createProcessRunner, type ProcessRunner, type RunOptions, type RunResult } from "./process/runner.js";

// Configuration
export { defineConfig, resolveConfig, type SmartMemoConfig, type ResolvedConfig } from "./config/index.js";
export { setPromptProvider, type PromptProvider } from "./cli/prompt-provider.js";

// Kysely integration
export {
  createKyselyAdapter,
  checkConnection,
  parseSqliteUrl,
  type KyselyAdapter,
  type DatabaseDialect,
} from "./sql/kysely-adapter.js";
