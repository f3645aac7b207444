import { EngineSettings, Payout, RpsMatch } from "@rps-arena/core";
import { EngineSnapshot, PreparedTransition, cloneMatch } from "@rps-arena/engine";
import { MatchRepository } from "./MatchRepository";

/**
 * Process-local repository for `DATABASE_URL=memory` and tests. State is
 * lost on exit.
 */
export class InMemoryMatchRepository implements MatchRepository {
  private settings: EngineSettings | null = null;
  private nextMatchId = 0;
  private matches = new Map<number, RpsMatch>();
  private payouts: Payout[] = [];
  private failures: Error[] = [];

  /** Make the next `saveTransition` reject with `err`. */
  failNextSave(err: Error): void {
    this.failures.push(err);
  }

  async loadState(): Promise<EngineSnapshot | null> {
    if (!this.settings) {
      return null;
    }
    return {
      settings: { ...this.settings },
      nextMatchId: this.nextMatchId,
      matches: Array.from(this.matches.values(), cloneMatch),
    };
  }

  async saveTransition(transition: PreparedTransition): Promise<void> {
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    if (transition.match) {
      this.matches.set(transition.match.id, cloneMatch(transition.match));
    }
    this.settings = { ...transition.settings };
    this.nextMatchId = transition.nextMatchId;
    for (const transfer of transition.transfers) {
      this.payouts.push({
        id: this.payouts.length + 1,
        match_id: transfer.matchId,
        recipient: transfer.to,
        amount_wei: transfer.amountWei.toString(),
        reason: transfer.reason,
        created_at: new Date(),
      });
    }
  }

  async findPayouts(recipient: string, limit: number): Promise<Payout[]> {
    return this.payouts
      .filter((p) => p.recipient === recipient)
      .reverse()
      .slice(0, limit);
  }

  async close(): Promise<void> {}
}
