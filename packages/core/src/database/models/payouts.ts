import { Kysely } from "kysely";
import { Database, Payout } from "../types";
import { Transfer } from "../../types/events";

export async function createPayouts(
  db: Kysely<Database>,
  transfers: readonly Transfer[]
): Promise<void> {
  if (transfers.length === 0) return;
  await db
    .insertInto("payouts")
    .values(
      transfers.map((t) => ({
        match_id: t.matchId,
        recipient: t.to,
        amount_wei: t.amountWei.toString(),
        reason: t.reason,
      }))
    )
    .execute();
}

export async function findPayoutsByRecipient(
  db: Kysely<Database>,
  recipient: string,
  limit = 50
): Promise<Payout[]> {
  return db
    .selectFrom("payouts")
    .where("recipient", "=", recipient)
    .selectAll()
    .orderBy("id", "desc")
    .limit(limit)
    .execute();
}
