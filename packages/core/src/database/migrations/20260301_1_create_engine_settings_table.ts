import { Kysely } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("engine_settings")
    .ifNotExists()
    .addColumn("id", "smallint", (col) => col.primaryKey())
    .addColumn("owner", "varchar(42)", (col) => col.notNull())
    .addColumn("min_stake_wei", "varchar(78)", (col) => col.notNull())
    .addColumn("max_stake_wei", "varchar(78)", (col) => col.notNull())
    .addColumn("timeout_ms", "integer", (col) => col.notNull())
    .addColumn("next_match_id", "integer", (col) => col.notNull().defaultTo(0))
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("engine_settings").execute();
}
