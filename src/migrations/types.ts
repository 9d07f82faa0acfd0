import type { DatabaseDialect } from "../sql/kysely-adapter.js";

/**
 * Second argument of every migration's `up` and `down`, after the Kysely instance.
 * Lets one migration emit dialect-specific column types.
 */
export interface MigrationContext {
  dialect: DatabaseDialect;
}
