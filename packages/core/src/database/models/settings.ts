import { Kysely } from "kysely";
import { Database } from "../types";
import { EngineSettings } from "../../types/match";

const SETTINGS_ROW_ID = 1;

export interface StoredSettings {
  settings: EngineSettings;
  nextMatchId: number;
}

export async function findSettings(db: Kysely<Database>): Promise<StoredSettings | undefined> {
  const row = await db
    .selectFrom("engine_settings")
    .where("id", "=", SETTINGS_ROW_ID)
    .selectAll()
    .executeTakeFirst();
  if (!row) {
    return undefined;
  }
  return {
    settings: {
      owner: row.owner,
      minStakeWei: BigInt(row.min_stake_wei),
      maxStakeWei: BigInt(row.max_stake_wei),
      timeoutMs: row.timeout_ms,
    },
    nextMatchId: row.next_match_id,
  };
}

export async function saveSettings(
  db: Kysely<Database>,
  stored: StoredSettings
): Promise<void> {
  const values = {
    owner: stored.settings.owner,
    min_stake_wei: stored.settings.minStakeWei.toString(),
    max_stake_wei: stored.settings.maxStakeWei.toString(),
    timeout_ms: stored.settings.timeoutMs,
    next_match_id: stored.nextMatchId,
  };
  await db
    .insertInto("engine_settings")
    .values({ id: SETTINGS_ROW_ID, ...values })
    .onConflict((oc) => oc.column("id").doUpdateSet(values))
    .execute();
}
