import type { Kysely } from "kysely";
import type { MigrationContext } from "../src/migrations/types.js";

export async function up(db: Kysely<unknown>, { dialect }: MigrationContext): Promise<void> {
  const binary = dialect === "postgres" ? "bytea" : "blob";

  await db.schema
    .createTable("users")
    .ifNotExists()
    .addColumn("id", "uuid", (col) => col.notNull().primaryKey())
    .addColumn("username", "varchar(255)", (col) => col.notNull())
    .addColumn("email", "varchar(255)", (col) => col.notNull().unique())
    .addColumn("password", "varchar(255)", (col) => col.notNull())
    .addColumn("created_at", "timestamp", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("voice_memos1")
    .ifNotExists()
    .addColumn("id", "uuid", (col) => col.notNull().primaryKey())
    .addColumn("user_id", "uuid", (col) => col.notNull())
    .addColumn("title", "varchar(255)", (col) => col.notNull())
    .addColumn("audio_blob", binary)
    .addColumn("transcript", "text")
    .addColumn("translate", "text")
    .addColumn("summary", "text")
    .addColumn("tags", "text")
    .addColumn("duration", "varchar(255)", (col) => col.notNull())
    .addColumn("created_at", "timestamp", (col) => col.notNull())
    .addForeignKeyConstraint("voice_memos1_user_id_fkey", ["user_id"], "users", ["id"], (fk) =>
      fk.onDelete("cascade"),
    )
    .execute();

  // Per-user API keys for the transcription and speech services
  await db.schema
    .createTable("helperApp")
    .ifNotExists()
    .addColumn("id", "uuid", (col) => col.notNull().primaryKey())
    .addColumn("gemini_key", "varchar(255)")
    .addColumn("elevenlabs_key", "varchar(255)")
    .addColumn("user_id", "uuid", (col) => col.notNull())
    .addColumn("action", "varchar(255)", (col) => col.notNull())
    .addColumn("timestamp", "timestamp", (col) => col.notNull())
    .addForeignKeyConstraint("helperApp_user_id_fkey", ["user_id"], "users", ["id"], (fk) =>
      fk.onDelete("cascade"),
    )
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("helperApp").ifExists().execute();
  await db.schema.dropTable("voice_memos1").ifExists().execute();
  await db.schema.dropTable("users").ifExists().execute();
}
