import { Kysely } from "kysely";
import {
  Database,
  Payout,
  createPayouts,
  findAllMatches,
  findPayoutsByRecipient,
  findSettings,
  saveSettings,
  upsertMatch,
} from "@rps-arena/core";
import { EngineSnapshot, PreparedTransition } from "@rps-arena/engine";

/**
 * Durable home of engine state. A transition is saved before the engine
 * commits it, so whatever `loadState` returns is never behind the engine.
 */
export interface MatchRepository {
  /** Stored state, or null for a fresh database. */
  loadState(): Promise<EngineSnapshot | null>;
  /** Persist the match, settings and payouts of a transition in one unit. */
  saveTransition(transition: PreparedTransition): Promise<void>;
  findPayouts(recipient: string, limit: number): Promise<Payout[]>;
  close(): Promise<void>;
}

export class PostgresMatchRepository implements MatchRepository {
  constructor(private db: Kysely<Database>) {}

  async loadState(): Promise<EngineSnapshot | null> {
    const stored = await findSettings(this.db);
    if (!stored) {
      return null;
    }
    const matches = await findAllMatches(this.db);
    return { settings: stored.settings, nextMatchId: stored.nextMatchId, matches };
  }

  async saveTransition(transition: PreparedTransition): Promise<void> {
    await this.db.transaction().execute(async (trx) => {
      if (transition.match) {
        await upsertMatch(trx, transition.match);
      }
      await saveSettings(trx, {
        settings: transition.settings,
        nextMatchId: transition.nextMatchId,
      });
      await createPayouts(trx, transition.transfers);
    });
  }

  findPayouts(recipient: string, limit: number): Promise<Payout[]> {
    return findPayoutsByRecipient(this.db, recipient, limit);
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
