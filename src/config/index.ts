/**
 * Configuration utilities for smartmemo-setup
 *
 * Every field is optional. Anything left out falls back to the stock Smart Memo
 * development setup (PostgreSQL 15 on port 5432, database "memo").
 */

import { z } from "zod";
import { BootstrapError } from "../bootstrap/errors.js";

const commandSchema = z.tuple([z.string().min(1)]).rest(z.string());

export const SmartMemoConfigSchema = z.object({
  /** Credentials and address shared by the container and local PostgreSQL backends */
  postgres: z
    .object({
      user: z.string().min(1).default("postgres"),
      password: z.string().default("mark42"),
      host: z.string().min(1).default("localhost"),
      port: z.number().int().min(1).max(65535).default(5432),
      database: z.string().min(1).default("memo"),
    })
    .default({}),
  sqlite: z
    .object({
      /** Database file, relative to the working directory */
      file: z.string().min(1).default("./memo.db"),
      /** ro = read-only, rw = must exist, rwc = create if missing */
      mode: z.enum(["ro", "rw", "rwc"]).default("rwc"),
    })
    .default({}),
  container: z
    .object({
      runtime: z.string().min(1).default("docker"),
      name: z.string().min(1).default("smartmemo-postgres"),
      image: z.string().min(1).default("postgres:15"),
    })
    .default({}),
  /** Connection polling after the container starts */
  readiness: z
    .object({
      timeoutMs: z.number().int().min(0).default(60_000),
      initialDelayMs: z.number().int().min(1).default(500),
      maxDelayMs: z.number().int().min(1).default(5_000),
      backoffMultiplier: z.number().min(1).max(5).default(2),
    })
    .default({}),
  migrations: z
    .object({
      /** Working directory of the migration runner, relative to the working directory */
      directory: z.string().min(1).default("migration"),
      /** External migration command. When unset the built-in Kysely runner is used. */
      command: commandSchema.optional(),
    })
    .default({}),
  application: z
    .object({
      command: commandSchema.default(["npm", "start"]),
      /** How long a still-running application is watched before it counts as started. 0 waits for exit. */
      startupWindowMs: z.number().int().min(0).default(10_000),
    })
    .default({}),
});

export type SmartMemoConfig = z.input<typeof SmartMemoConfigSchema>;
export type ResolvedConfig = z.output<typeof SmartMemoConfigSchema>;

/**
 * Define smartmemo-setup configuration
 *
 * @example
 * ```ts
 * // smartmemo.config.ts
 * import { defineConfig } from "smartmemo-setup";
 *
 * export default defineConfig({
 *   postgres: { password: process.env.POSTGRES_PASSWORD },
 *   application: { command: ["node", "dist/server.js"], startupWindowMs: 5000 },
 * });
 * ```
 */
export function defineConfig(config: SmartMemoConfig): SmartMemoConfig {
  return config;
}

/**
 * Validate a raw config value and fill in defaults.
 */
export function resolveConfig(raw: unknown = {}): ResolvedConfig {
  const parsed = SmartMemoConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new BootstrapError("ConfigInvalid", `Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
