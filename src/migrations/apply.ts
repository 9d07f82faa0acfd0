/**
 * Apply migrations using Kysely's migrator
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { Migration, MigrationProvider } from "kysely";
import { Migrator } from "kysely";
import type { DatabaseDialect } from "../sql/kysely-adapter.js";
import { createKyselyAdapter } from "../sql/kysely-adapter.js";
import type { MigrationContext } from "./types.js";

export interface ApplyMigrationsOptions {
  migrationsFolder: string;
  dialect: DatabaseDialect;
  connectionUrl: string;
  /** Base directory for relative SQLite paths */
  cwd?: string;
}

export interface ApplyMigrationsResult {
  results: Array<{ migrationName: string; status: string }>;
}

const MIGRATION_FILE = /\.(ts|js|mjs|cjs)$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function toMigration(mod: unknown, file: string, context: MigrationContext): Migration {
  const candidate = isRecord(mod) && isRecord(mod.default) ? mod.default : mod;
  const up = isRecord(candidate) ? candidate.up : undefined;
  const down = isRecord(candidate) ? candidate.down : undefined;
  if (typeof up !== "function") {
    throw new Error(`Migration file is missing an up export: ${file}`);
  }

  return {
    up: async (db) => {
      await up.call(candidate, db, context);
    },
    down:
      typeof down === "function"
        ? async (db) => {
            await down.call(candidate, db, context);
          }
        : undefined,
  };
}

export async function applyMigrations(options: ApplyMigrationsOptions): Promise<ApplyMigrationsResult> {
  const { db, destroy } = await createKyselyAdapter<unknown>({
    dialect: options.dialect,
    connectionUrl: options.connectionUrl,
    cwd: options.cwd,
  });

  try {
    const { default: jiti } = await import("jiti");
    const loader = jiti(import.meta.url, { interopDefault: true });
    const context: MigrationContext = { dialect: options.dialect };

    const provider: MigrationProvider = {
      async getMigrations() {
        const entries = await fs.readdir(options.migrationsFolder);
        const files = entries
          .filter((file) => MIGRATION_FILE.test(file) && !file.endsWith(".d.ts"))
          .sort((a, b) => a.localeCompare(b));

        const migrations: Record<string, Migration> = {};

        for (const file of files) {
          const mod: unknown = loader(path.join(options.migrationsFolder, file));
          migrations[path.parse(file).name] = toMigration(mod, file, context);
        }

        return migrations;
      },
    };

    const migrator = new Migrator({ db, provider });

    const { error, results } = await migrator.migrateToLatest();

    if (error) {
      throw error;
    }

    return {
      results:
        results?.map((result) => ({
          migrationName: result.migrationName,
          status: result.status,
        })) ?? [],
    };
  } finally {
    await destroy();
  }
}
