/**
 * Backend menu and connection descriptors
 */

import { resolveConfig, type ResolvedConfig } from "../config/index.js";
import type { DatabaseDialect } from "../sql/kysely-adapter.js";
import { BootstrapError } from "./errors.js";

export type BackendKind = "container-postgres" | "sqlite" | "local-postgres";

export type BackendChoice = "1" | "2" | "3";

export interface BackendOption {
  choice: BackendChoice;
  backend: BackendKind;
  label: string;
  description: string;
}

export interface ConnectionDescriptor {
  backend: BackendKind;
  choice: BackendChoice;
  label: string;
  dialect: DatabaseDialect;
  /** Value handed to child processes as DATABASE_URL */
  url: string;
  requiresContainer: boolean;
}

export const BACKEND_OPTIONS: readonly BackendOption[] = [
  {
    choice: "1",
    backend: "container-postgres",
    label: "PostgreSQL in a container",
    description: "Start a PostgreSQL container and connect to it",
  },
  {
    choice: "2",
    backend: "sqlite",
    label: "SQLite file",
    description: "Use a local SQLite database file, created if missing",
  },
  {
    choice: "3",
    backend: "local-postgres",
    label: "Local PostgreSQL",
    description: "Connect to a PostgreSQL server already running on this machine",
  },
];

export function buildPostgresUrl(postgres: ResolvedConfig["postgres"]): string {
  const user = encodeURIComponent(postgres.user);
  const password = encodeURIComponent(postgres.password);
  const database = encodeURIComponent(postgres.database);
  return `postgres://${user}:${password}@${postgres.host}:${postgres.port}/${database}`;
}

export function buildSqliteUrl(sqlite: ResolvedConfig["sqlite"]): string {
  return `sqlite://${sqlite.file}?mode=${sqlite.mode}`;
}

/**
 * Map a menu answer to its connection descriptor.
 *
 * @throws BootstrapError with code InvalidChoice for anything but 1, 2 or 3
 */
export function selectBackend(input: string, config: ResolvedConfig = resolveConfig()): ConnectionDescriptor {
  const answer = input.trim();
  const option = BACKEND_OPTIONS.find((candidate) => candidate.choice === answer);

  if (!option) {
    throw new BootstrapError("InvalidChoice", `Invalid choice "${answer}". Enter 1, 2 or 3.`);
  }

  if (option.backend === "sqlite") {
    return {
      backend: option.backend,
      choice: option.choice,
      label: option.label,
      dialect: "sqlite",
      url: buildSqliteUrl(config.sqlite),
      requiresContainer: false,
    };
  }

  return {
    backend: option.backend,
    choice: option.choice,
    label: option.label,
    dialect: "postgres",
    url: buildPostgresUrl(config.postgres),
    requiresContainer: option.backend === "container-postgres",
  };
}

/**
 * Hide the password of a connection URL before it is logged.
 */
export function redactUrl(url: string): string {
  return url.replace(/^([a-z][a-z0-9+.-]*:\/\/[^:/@]+:)[^@]*@/i, "$1****@");
}

/**
 * Environment for a child process that needs the database: the parent's
 * environment plus DATABASE_URL. The parent's own environment is left alone.
 */
export function childEnv(
  descriptor: ConnectionDescriptor,
  base: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  return { ...base, DATABASE_URL: descriptor.url };
}
