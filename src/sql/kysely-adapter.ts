/**
 * Kysely database adapter
 *
 * Opens a Kysely instance for a DATABASE_URL. Used by the readiness probe and the
 * built-in migration runner.
 */

import * as path from "path";
import { Kysely, PostgresDialect, SqliteDialect, sql, type Dialect } from "kysely";

export type DatabaseDialect = "sqlite" | "postgres";

export type SqliteMode = "ro" | "rw" | "rwc";

export interface KyselyAdapterOptions {
  dialect: DatabaseDialect;
  /** postgres:// URL, or sqlite:// URL / file path */
  connectionUrl: string;
  /** Base directory for relative SQLite paths (default: process.cwd()) */
  cwd?: string;
  /** Connection pool settings (PostgreSQL only) */
  pool?: {
    min?: number;
    max?: number;
    connectionTimeoutMillis?: number;
  };
}

export interface KyselyAdapter<DB> {
  db: Kysely<DB>;
  destroy: () => Promise<void>;
}

export interface SqliteLocation {
  path: string;
  mode: SqliteMode;
}

function isSqliteMode(value: string): value is SqliteMode {
  return value === "ro" || value === "rw" || value === "rwc";
}

/**
 * Split a SQLite URL into file path and open mode.
 *
 * Accepts `sqlite://./memo.db?mode=rwc`, `sqlite:memo.db`, `file:memo.db` and bare paths.
 * The mode defaults to rwc.
 */
export function parseSqliteUrl(url: string): SqliteLocation {
  let rest = url;
  for (const prefix of ["sqlite://", "sqlite:", "file:"]) {
    if (rest.startsWith(prefix)) {
      rest = rest.slice(prefix.length);
      break;
    }
  }

  const queryStart = rest.indexOf("?");
  const filePath = queryStart === -1 ? rest : rest.slice(0, queryStart);
  const params = new URLSearchParams(queryStart === -1 ? "" : rest.slice(queryStart + 1));
  const mode = params.get("mode") ?? "rwc";

  if (!filePath) {
    throw new Error(`SQLite URL has no file path: ${url}`);
  }
  if (!isSqliteMode(mode)) {
    throw new Error(`Unsupported SQLite mode "${mode}" (expected ro, rw or rwc)`);
  }

  return { path: filePath, mode };
}

export async function createKyselyAdapter<DB>(options: KyselyAdapterOptions): Promise<KyselyAdapter<DB>> {
  // Drivers are imported lazily so a run only loads the one it needs
  let dialect: Dialect;

  switch (options.dialect) {
    case "sqlite": {
      const { default: Database } = await import("better-sqlite3");
      const location = parseSqliteUrl(options.connectionUrl);
      const filename =
        location.path === ":memory:" ? location.path : path.resolve(options.cwd ?? process.cwd(), location.path);

      dialect = new SqliteDialect({
        database: new Database(filename, {
          readonly: location.mode === "ro",
          fileMustExist: location.mode !== "rwc",
        }),
      });
      break;
    }

    case "postgres": {
      const { default: pg } = await import("pg");

      dialect = new PostgresDialect({
        pool: new pg.Pool({
          connectionString: options.connectionUrl,
          min: options.pool?.min ?? 0,
          max: options.pool?.max ?? 10,
          connectionTimeoutMillis: options.pool?.connectionTimeoutMillis,
        }),
      });
      break;
    }

    default: {
      const unsupported: never = options.dialect;
      throw new Error(`Unsupported dialect: ${String(unsupported)}`);
    }
  }

  const db = new Kysely<DB>({ dialect });

  return {
    db,
    destroy: async () => {
      await db.destroy();
    },
  };
}

/**
 * Open a connection, run `SELECT 1` and close it again. Rejects when the database
 * cannot be reached.
 */
export async function checkConnection(options: KyselyAdapterOptions): Promise<void> {
  const { db, destroy } = await createKyselyAdapter<unknown>({
    ...options,
    pool: { max: 1, connectionTimeoutMillis: 2_000, ...options.pool },
  });

  try {
    await sql`select 1`.execute(db);
  } finally {
    await destroy();
  }
}
