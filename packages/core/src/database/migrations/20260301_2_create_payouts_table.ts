import { Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("payouts")
    .ifNotExists()
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("match_id", "integer", (col) =>
      col.notNull().references("rps_matches.id")
    )
    .addColumn("recipient", "varchar(42)", (col) => col.notNull())
    .addColumn("amount_wei", "varchar(78)", (col) => col.notNull())
    .addColumn("reason", "varchar(32)", (col) => col.notNull())
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createIndex("payouts_recipient_idx")
    .ifNotExists()
    .on("payouts")
    .column("recipient")
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("payouts").execute();
}
