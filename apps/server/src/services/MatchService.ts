import Logger from "bunyan";
import { EngineSettings, EventRecord, Payout } from "@rps-arena/core";
import { CommittedTransition, MatchCommand, MatchEngine } from "@rps-arena/engine";
import { MatchRepository } from "./MatchRepository";
import defaultLog from "../logger";

export interface MatchServiceOptions {
  /** Owner of a fresh database */
  owner: string;
  /** Initial bounds of a fresh database */
  settings?: Partial<Omit<EngineSettings, "owner">>;
  now?: () => number;
  log?: Logger;
}

/**
 * Runs engine commands on behalf of authenticated callers. Commands are
 * applied one at a time: each is prepared, saved through the repository and
 * only then committed to the in-memory engine.
 */
export class MatchService {
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(
    readonly engine: MatchEngine,
    private repository: MatchRepository,
    private log: Logger
  ) {}

  /** Rebuild the engine from the repository, or start fresh from `options`. */
  static async load(repository: MatchRepository, options: MatchServiceOptions): Promise<MatchService> {
    const log = options.log ?? defaultLog;
    const snapshot = await repository.loadState();
    const engineLog = (err: unknown, record: EventRecord) =>
      log.error({ err, event: record.event.type }, "Event listener failed");

    let engine: MatchEngine;
    if (snapshot) {
      engine = MatchEngine.restore(snapshot, { now: options.now, onListenerError: engineLog });
      log.info(
        { matches: snapshot.matches.length, nextMatchId: snapshot.nextMatchId },
        "Engine state restored"
      );
    } else {
      engine = new MatchEngine({
        owner: options.owner,
        settings: options.settings,
        now: options.now,
        onListenerError: engineLog,
      });
      log.info({ owner: engine.getSettings().owner }, "Starting with empty engine state");
    }
    return new MatchService(engine, repository, log);
  }

  /**
   * Queue a command. Resolves once it is persisted and committed; rejects
   * with the engine error (or the repository failure) otherwise.
   */
  submit(command: MatchCommand): Promise<CommittedTransition> {
    const run = this.queue.then(() => this.apply(command));
    // the chain must survive a rejected command; `run` still carries the error
    this.queue = run.catch(() => undefined);
    return run;
  }

  findPayouts(recipient: string, limit = 50): Promise<Payout[]> {
    return this.repository.findPayouts(recipient, limit);
  }

  async close(): Promise<void> {
    await this.queue;
    await this.repository.close();
  }

  private async apply(command: MatchCommand): Promise<CommittedTransition> {
    const prepared = this.engine.prepare(command);
    try {
      await this.repository.saveTransition(prepared);
    } catch (err) {
      this.log.error({ err, command: command.type, matchId: prepared.match?.id }, "Failed to persist transition");
      throw err;
    }
    const committed = this.engine.commit(prepared);
    this.log.info(
      {
        command: command.type,
        caller: command.caller,
        matchId: committed.match?.id,
        events: committed.events.map((r) => r.event.type),
        transfers: committed.transfers.length,
      },
      "Transition committed"
    );
    return committed;
  }
}
