import { Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("rps_matches")
    .ifNotExists()
    .addColumn("id", "integer", (col) => col.primaryKey())
    .addColumn("stake_wei", "varchar(78)", (col) => col.notNull())
    .addColumn("phase", "varchar(32)", (col) => col.notNull())
    .addColumn("creator", "varchar(42)", (col) => col.notNull())
    .addColumn("creator_commitment", "varchar(66)")
    .addColumn("creator_move", "smallint")
    .addColumn("joiner", "varchar(42)")
    .addColumn("joiner_commitment", "varchar(66)")
    .addColumn("joiner_move", "smallint")
    .addColumn("created_at", "timestamptz", (col) => col.notNull())
    .addColumn("deadline", "timestamptz", (col) => col.notNull())
    .addColumn("result", "text")
    .addColumn("updated_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createIndex("rps_matches_creator_idx")
    .ifNotExists()
    .on("rps_matches")
    .column("creator")
    .execute();

  await db.schema
    .createIndex("rps_matches_joiner_idx")
    .ifNotExists()
    .on("rps_matches")
    .column("joiner")
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("rps_matches").execute();
}
