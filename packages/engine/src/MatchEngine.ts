import {
  EngineEvent,
  EngineSettings,
  EventRecord,
  MatchPhase,
  MatchResult,
  Move,
  PlayerSlot,
  RpsMatch,
  SettingName,
  Transfer,
  computeCommitmentFromCode,
  isBytes32,
  isValidCommitment,
  moveFromCode,
  moveToCode,
  normalizeAddress,
} from "@rps-arena/core";
import { MatchCommand } from "./commands";
import { MatchEngineError } from "./errors";
import { FundsGateway, InMemoryLedger } from "./FundsGateway";
import { decideRound } from "./rules";
import { assertValidSettings, defaultSettings, readSetting } from "./settings";

export interface MatchEngineOptions {
  /** Administrator identity allowed to change settings */
  owner: string;
  settings?: Partial<Omit<EngineSettings, "owner">>;
  funds?: FundsGateway;
  /** Clock in epoch milliseconds */
  now?: () => number;
  /** Called when an event listener throws; the transition itself stays committed. */
  onListenerError?: (err: unknown, record: EventRecord) => void;
}

/** Everything needed to resume the engine after a restart. */
export interface EngineSnapshot {
  settings: EngineSettings;
  nextMatchId: number;
  matches: RpsMatch[];
}

/**
 * The outcome of validating a command against the current state, not yet
 * applied. Hand it to `commit` once the transfers (and anything else the
 * host needs, such as persistence) have succeeded.
 */
export interface PreparedTransition {
  readonly command: MatchCommand;
  /** Engine version the transition was computed against */
  readonly version: number;
  readonly timestamp: number;
  /** Post-state of the affected match, if any */
  readonly match: RpsMatch | null;
  readonly settings: EngineSettings;
  readonly nextMatchId: number;
  readonly events: readonly EngineEvent[];
  readonly transfers: readonly Transfer[];
}

export interface CommittedTransition {
  match: RpsMatch | null;
  events: EventRecord[];
  transfers: readonly Transfer[];
}

export type EventListener = (record: EventRecord) => void;

type Side = "creator" | "joiner";

function cloneSlot(slot: PlayerSlot): PlayerSlot {
  return { ...slot };
}

function cloneResult(result: MatchResult): MatchResult {
  return result.kind === "timeout"
    ? { kind: "timeout", refunded: [...result.refunded] }
    : { ...result };
}

export function cloneMatch(match: RpsMatch): RpsMatch {
  return {
    ...match,
    creator: cloneSlot(match.creator),
    joiner: match.joiner ? cloneSlot(match.joiner) : null,
    result: match.result ? cloneResult(match.result) : null,
  };
}

/**
 * Holds every Rock-Paper-Scissors match and the stake escrowed for it.
 *
 * Each state-changing call is a `MatchCommand`. `dispatch` validates it,
 * pays out through the funds gateway and installs the new state; if any
 * step throws, nothing changes. Hosts that must persist before applying
 * use `prepare` and `commit` directly.
 */
export class MatchEngine {
  private settings: EngineSettings;
  private matches = new Map<number, RpsMatch>();
  private playerIndex = new Map<string, number[]>();
  private nextMatchId = 0;
  private version = 0;
  private log: EventRecord[] = [];
  private listeners = new Set<EventListener>();
  private readonly funds: FundsGateway;
  private readonly now: () => number;
  private readonly onListenerError: (err: unknown, record: EventRecord) => void;

  constructor(opts: MatchEngineOptions) {
    const owner = normalizeAddress(opts.owner);
    if (!owner) {
      throw new MatchEngineError("InvalidIdentity", `Invalid owner address: ${opts.owner}`);
    }
    const defaults = defaultSettings(owner);
    this.settings = {
      owner,
      minStakeWei: opts.settings?.minStakeWei ?? defaults.minStakeWei,
      maxStakeWei: opts.settings?.maxStakeWei ?? defaults.maxStakeWei,
      timeoutMs: opts.settings?.timeoutMs ?? defaults.timeoutMs,
    };
    assertValidSettings(this.settings);
    this.funds = opts.funds ?? new InMemoryLedger();
    this.now = opts.now ?? Date.now;
    this.onListenerError =
      opts.onListenerError ??
      ((err, record) => console.error(`Event listener failed on ${record.event.type}`, err));
  }

  /**
   * Rebuild an engine from stored state. The owner comes from the snapshot.
   */
  static restore(
    snapshot: EngineSnapshot,
    opts: Omit<MatchEngineOptions, "owner" | "settings"> = {}
  ): MatchEngine {
    const { owner, ...bounds } = snapshot.settings;
    const engine = new MatchEngine({ ...opts, owner, settings: bounds });
    for (const match of snapshot.matches) {
      if (match.id >= snapshot.nextMatchId) {
        throw new Error(`Match ${match.id} is beyond the stored id counter ${snapshot.nextMatchId}`);
      }
      engine.install(cloneMatch(match));
    }
    engine.nextMatchId = snapshot.nextMatchId;
    return engine;
  }

  snapshot(): EngineSnapshot {
    return {
      settings: this.getSettings(),
      nextMatchId: this.nextMatchId,
      matches: Array.from(this.matches.values(), cloneMatch),
    };
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  createMatch(caller: string, stakeWei: bigint): CommittedTransition {
    return this.dispatch({ type: "create", caller, valueWei: stakeWei });
  }

  joinMatch(caller: string, matchId: number, valueWei: bigint): CommittedTransition {
    return this.dispatch({ type: "join", caller, matchId, valueWei });
  }

  commitMove(caller: string, matchId: number, commitment: string): CommittedTransition {
    return this.dispatch({ type: "commit", caller, matchId, commitment });
  }

  revealMove(caller: string, matchId: number, move: Move | number, nonce: string): CommittedTransition {
    const code = typeof move === "number" ? move : moveToCode(move);
    return this.dispatch({ type: "reveal", caller, matchId, move: code, nonce });
  }

  timeoutMatch(caller: string, matchId: number): CommittedTransition {
    return this.dispatch({ type: "timeout", caller, matchId });
  }

  setMinStake(caller: string, valueWei: bigint): CommittedTransition {
    return this.dispatch({ type: "updateSetting", caller, setting: "minStake", value: valueWei });
  }

  setMaxStake(caller: string, valueWei: bigint): CommittedTransition {
    return this.dispatch({ type: "updateSetting", caller, setting: "maxStake", value: valueWei });
  }

  setTimeout(caller: string, timeoutMs: number): CommittedTransition {
    return this.dispatch({ type: "updateSetting", caller, setting: "timeout", value: timeoutMs });
  }

  transferOwnership(caller: string, newOwner: string): CommittedTransition {
    return this.dispatch({ type: "transferOwnership", caller, newOwner });
  }

  dispatch(command: MatchCommand): CommittedTransition {
    const prepared = this.prepare(command);
    if (prepared.transfers.length > 0) {
      try {
        this.funds.execute(prepared.transfers);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new MatchEngineError(
          "TransferFailed",
          `Payout failed, operation aborted: ${reason}`,
          prepared.match?.id,
          { cause: err }
        );
      }
    }
    return this.commit(prepared);
  }

  /**
   * Validate a command and compute its effects without changing anything.
   */
  prepare(command: MatchCommand): PreparedTransition {
    const now = this.now();
    switch (command.type) {
      case "create":
        return this.prepareCreate(command, now);
      case "join":
        return this.prepareJoin(command, now);
      case "commit":
        return this.prepareCommit(command, now);
      case "reveal":
        return this.prepareReveal(command, now);
      case "timeout":
        return this.prepareTimeout(command, now);
      case "updateSetting":
        return this.prepareSetting(command, now);
      case "transferOwnership":
        return this.prepareOwnership(command, now);
    }
  }

  /**
   * Apply a prepared transition. Fails with StaleTransition if anything was
   * committed since it was prepared.
   */
  commit(prepared: PreparedTransition): CommittedTransition {
    if (prepared.version !== this.version) {
      throw new MatchEngineError(
        "StaleTransition",
        "Engine state changed since this transition was prepared; prepare it again",
        prepared.match?.id
      );
    }

    if (prepared.match) {
      this.install(cloneMatch(prepared.match));
    }
    this.settings = { ...prepared.settings };
    this.nextMatchId = prepared.nextMatchId;
    this.version++;

    const records = prepared.events.map((event) => {
      const record: EventRecord = {
        sequence: this.log.length,
        timestamp: prepared.timestamp,
        event,
      };
      this.log.push(record);
      return record;
    });
    for (const record of records) {
      this.notify(record);
    }

    return {
      match: prepared.match ? cloneMatch(prepared.match) : null,
      events: records,
      transfers: prepared.transfers,
    };
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getMatch(matchId: number): RpsMatch | undefined {
    const match = this.matches.get(matchId);
    return match ? cloneMatch(match) : undefined;
  }

  getPlayerMatches(address: string): number[] {
    const normalized = normalizeAddress(address);
    return normalized ? [...(this.playerIndex.get(normalized) ?? [])] : [];
  }

  getPlayerMatchCount(address: string): number {
    return this.getPlayerMatches(address).length;
  }

  /** Matches still waiting for an opponent, oldest first. */
  getOpenMatches(): number[] {
    const open: number[] = [];
    for (const match of this.matches.values()) {
      if (match.phase === MatchPhase.AWAITING_OPPONENT && match.joiner === null) {
        open.push(match.id);
      }
    }
    return open.sort((a, b) => a - b);
  }

  getOpenMatchCount(): number {
    return this.getOpenMatches().length;
  }

  /** Number of matches ever created; also the next id to be assigned. */
  getMatchCount(): number {
    return this.nextMatchId;
  }

  getSettings(): EngineSettings {
    return { ...this.settings };
  }

  getVersion(): number {
    return this.version;
  }

  /** Stake currently held for a match: one stake, two once joined, none once settled. */
  getEscrowedBalance(matchId: number): bigint {
    const match = this.matches.get(matchId);
    if (!match || match.phase === MatchPhase.SETTLED) {
      return 0n;
    }
    return match.joiner ? match.stakeWei * 2n : match.stakeWei;
  }

  getTotalEscrowed(): bigint {
    let total = 0n;
    for (const id of this.matches.keys()) {
      total += this.getEscrowedBalance(id);
    }
    return total;
  }

  /** Events with a sequence number greater than `afterSequence`, oldest first. */
  getEvents(afterSequence = -1, limit = 100): EventRecord[] {
    // sequence numbers are log indexes; a cursor below -1 still means "from the start"
    const start = Math.max(afterSequence, -1) + 1;
    return this.log.slice(start, start + Math.max(limit, 0));
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Transitions
  // ---------------------------------------------------------------------------

  private prepareCreate(
    command: Extract<MatchCommand, { type: "create" }>,
    now: number
  ): PreparedTransition {
    const creator = this.identity(command.caller);
    const stake = command.valueWei;
    const { minStakeWei, maxStakeWei, timeoutMs } = this.settings;
    if (stake <= 0n || stake < minStakeWei || stake > maxStakeWei) {
      throw new MatchEngineError(
        "InvalidStake",
        `Stake must be between ${minStakeWei} and ${maxStakeWei} wei, got ${stake}`
      );
    }

    const match: RpsMatch = {
      id: this.nextMatchId,
      stakeWei: stake,
      creator: { address: creator, commitment: null, move: null },
      joiner: null,
      phase: MatchPhase.AWAITING_OPPONENT,
      createdAt: now,
      deadline: now + timeoutMs,
      result: null,
    };

    return this.transition(command, now, {
      match,
      nextMatchId: this.nextMatchId + 1,
      events: [{ type: "MatchCreated", matchId: match.id, creator, stakeWei: stake }],
    });
  }

  private prepareJoin(
    command: Extract<MatchCommand, { type: "join" }>,
    now: number
  ): PreparedTransition {
    const joiner = this.identity(command.caller);
    const match = this.openMatch(command.matchId);

    if (match.phase !== MatchPhase.AWAITING_OPPONENT || match.joiner !== null) {
      throw new MatchEngineError("AlreadyJoined", "Match already has two players", match.id);
    }
    if (joiner === match.creator.address) {
      throw new MatchEngineError("SelfJoin", "Cannot join your own match", match.id);
    }
    if (command.valueWei !== match.stakeWei) {
      throw new MatchEngineError(
        "StakeMismatch",
        `Deposit must equal the stake of ${match.stakeWei} wei, got ${command.valueWei}`,
        match.id
      );
    }
    this.assertNotExpired(match, now);

    return this.transition(command, now, {
      match: {
        ...match,
        joiner: { address: joiner, commitment: null, move: null },
        phase: MatchPhase.AWAITING_COMMITMENTS,
      },
      events: [{ type: "PlayerJoined", matchId: match.id, joiner }],
    });
  }

  private prepareCommit(
    command: Extract<MatchCommand, { type: "commit" }>,
    now: number
  ): PreparedTransition {
    const caller = this.identity(command.caller);
    const match = this.openMatch(command.matchId);
    const side = this.sideOf(match, caller);

    if (match.phase !== MatchPhase.AWAITING_COMMITMENTS) {
      throw new MatchEngineError("WrongPhase", `Cannot commit while ${match.phase}`, match.id);
    }
    this.assertNotExpired(match, now);
    if (!isValidCommitment(command.commitment)) {
      throw new MatchEngineError(
        "InvalidCommitment",
        "Commitment must be a non-zero 32-byte hex string",
        match.id
      );
    }
    const slot = this.slot(match, side);
    if (slot.commitment !== null) {
      throw new MatchEngineError("AlreadyCommitted", "Move already committed", match.id);
    }

    const commitment = command.commitment.toLowerCase();
    const next = this.withSlot(match, side, { ...slot, commitment });
    if (next.creator.commitment !== null && next.joiner?.commitment) {
      next.phase = MatchPhase.AWAITING_REVEALS;
    }

    return this.transition(command, now, {
      match: next,
      events: [{ type: "MoveCommitted", matchId: match.id, player: caller, commitment }],
    });
  }

  private prepareReveal(
    command: Extract<MatchCommand, { type: "reveal" }>,
    now: number
  ): PreparedTransition {
    const caller = this.identity(command.caller);
    const match = this.openMatch(command.matchId);
    const side = this.sideOf(match, caller);

    if (match.phase !== MatchPhase.AWAITING_REVEALS) {
      throw new MatchEngineError("WrongPhase", `Cannot reveal while ${match.phase}`, match.id);
    }
    this.assertNotExpired(match, now);
    const move = moveFromCode(command.move);
    if (move === null) {
      throw new MatchEngineError("InvalidMove", `Invalid move code ${command.move}`, match.id);
    }
    if (!isBytes32(command.nonce)) {
      throw new MatchEngineError("InvalidNonce", "Nonce must be a 32-byte hex string", match.id);
    }
    const slot = this.slot(match, side);
    if (slot.move !== null) {
      throw new MatchEngineError("AlreadyRevealed", "Move already revealed", match.id);
    }
    const expected = computeCommitmentFromCode(command.move, command.nonce, caller);
    if (expected !== slot.commitment) {
      throw new MatchEngineError(
        "CommitmentMismatch",
        "Move and nonce do not match the stored commitment",
        match.id
      );
    }

    const next = this.withSlot(match, side, { ...slot, move });
    const events: EngineEvent[] = [
      { type: "MoveRevealed", matchId: match.id, player: caller, move, nonce: command.nonce },
    ];

    const creatorMove = next.creator.move;
    const joinerMove = next.joiner?.move ?? null;
    if (creatorMove === null || joinerMove === null || next.joiner === null) {
      return this.transition(command, now, { match: next, events });
    }

    const settlement = this.settle(next, creatorMove, joinerMove, next.joiner.address);
    events.push(settlement.event);
    return this.transition(command, now, {
      match: { ...next, phase: MatchPhase.SETTLED, result: settlement.result },
      events,
      transfers: settlement.transfers,
    });
  }

  private settle(
    match: RpsMatch,
    creatorMove: Move,
    joinerMove: Move,
    joiner: string
  ): { result: MatchResult; transfers: Transfer[]; event: EngineEvent } {
    const stake = match.stakeWei;
    const creator = match.creator.address;
    const outcome = decideRound(creatorMove, joinerMove);

    if (outcome === "tie") {
      return {
        result: { kind: "tie", refundWei: stake },
        transfers: [
          { matchId: match.id, to: creator, amountWei: stake, reason: "tie_refund" },
          { matchId: match.id, to: joiner, amountWei: stake, reason: "tie_refund" },
        ],
        event: { type: "GameFinished", matchId: match.id, winner: null, amountWei: 0n },
      };
    }

    const [winner, loser] = outcome === "creator" ? [creator, joiner] : [joiner, creator];
    const prize = stake * 2n;
    return {
      result: { kind: "win", winner, loser, amountWei: prize },
      transfers: [{ matchId: match.id, to: winner, amountWei: prize, reason: "win" }],
      event: { type: "GameFinished", matchId: match.id, winner, amountWei: prize },
    };
  }

  private prepareTimeout(
    command: Extract<MatchCommand, { type: "timeout" }>,
    now: number
  ): PreparedTransition {
    this.identity(command.caller);
    const match = this.openMatch(command.matchId);
    if (now < match.deadline) {
      throw new MatchEngineError(
        "NotYetExpired",
        `Match has not timed out yet (deadline ${new Date(match.deadline).toISOString()})`,
        match.id
      );
    }

    const refunded = [match.creator.address];
    if (match.joiner) {
      refunded.push(match.joiner.address);
    }
    const transfers: Transfer[] = refunded.map((to) => ({
      matchId: match.id,
      to,
      amountWei: match.stakeWei,
      reason: "timeout_refund",
    }));

    return this.transition(command, now, {
      match: { ...match, phase: MatchPhase.SETTLED, result: { kind: "timeout", refunded } },
      events: [{ type: "GameTimeout", matchId: match.id }],
      transfers,
    });
  }

  private prepareSetting(
    command: Extract<MatchCommand, { type: "updateSetting" }>,
    now: number
  ): PreparedTransition {
    this.assertOwner(command.caller);
    const next = this.applySetting(command.setting, command.value);
    assertValidSettings(next);

    return this.transition(command, now, {
      settings: next,
      events: [
        {
          type: "SettingChanged",
          setting: command.setting,
          oldValue: readSetting(this.settings, command.setting),
          newValue: readSetting(next, command.setting),
        },
      ],
    });
  }

  private applySetting(setting: SettingName, value: bigint | number): EngineSettings {
    switch (setting) {
      case "minStake":
      case "maxStake":
        if (typeof value !== "bigint") {
          throw new MatchEngineError("InvalidSetting", `${setting} must be given in wei as a bigint`);
        }
        return setting === "minStake"
          ? { ...this.settings, minStakeWei: value }
          : { ...this.settings, maxStakeWei: value };
      case "timeout":
        if (typeof value !== "number") {
          throw new MatchEngineError("InvalidSetting", "timeout must be given in milliseconds");
        }
        return { ...this.settings, timeoutMs: value };
    }
  }

  private prepareOwnership(
    command: Extract<MatchCommand, { type: "transferOwnership" }>,
    now: number
  ): PreparedTransition {
    const previousOwner = this.assertOwner(command.caller);
    const newOwner = this.identity(command.newOwner);

    return this.transition(command, now, {
      settings: { ...this.settings, owner: newOwner },
      events: [{ type: "OwnershipTransferred", previousOwner, newOwner }],
    });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private transition(
    command: MatchCommand,
    timestamp: number,
    effects: {
      match?: RpsMatch;
      settings?: EngineSettings;
      nextMatchId?: number;
      events: EngineEvent[];
      transfers?: Transfer[];
    }
  ): PreparedTransition {
    return {
      command,
      version: this.version,
      timestamp,
      match: effects.match ?? null,
      settings: effects.settings ?? { ...this.settings },
      nextMatchId: effects.nextMatchId ?? this.nextMatchId,
      events: effects.events,
      transfers: effects.transfers ?? [],
    };
  }

  private install(match: RpsMatch): void {
    const previous = this.matches.get(match.id);
    this.matches.set(match.id, match);
    if (!previous) {
      this.index(match.creator.address, match.id);
    }
    if (match.joiner && !previous?.joiner) {
      this.index(match.joiner.address, match.id);
    }
  }

  private index(address: string, matchId: number): void {
    const ids = this.playerIndex.get(address);
    if (ids) {
      ids.push(matchId);
    } else {
      this.playerIndex.set(address, [matchId]);
    }
  }

  private notify(record: EventRecord): void {
    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (err) {
        this.onListenerError(err, record);
      }
    }
  }

  private identity(raw: string): string {
    const address = normalizeAddress(raw);
    if (!address) {
      throw new MatchEngineError("InvalidIdentity", `Not a valid address: ${raw}`);
    }
    return address;
  }

  private assertOwner(caller: string): string {
    const address = this.identity(caller);
    if (address !== this.settings.owner) {
      throw new MatchEngineError("NotOwner", "Only the owner can change engine settings");
    }
    return address;
  }

  /** A stored match that can still change. */
  private openMatch(matchId: number): RpsMatch {
    const match = this.matches.get(matchId);
    if (!match) {
      throw new MatchEngineError("MatchNotFound", `Match ${matchId} not found`, matchId);
    }
    if (match.phase === MatchPhase.SETTLED) {
      throw new MatchEngineError("AlreadySettled", `Match ${matchId} is already settled`, matchId);
    }
    return match;
  }

  private assertNotExpired(match: RpsMatch, now: number): void {
    if (now >= match.deadline) {
      throw new MatchEngineError("Expired", `Match ${match.id} has expired`, match.id);
    }
  }

  private sideOf(match: RpsMatch, caller: string): Side {
    if (caller === match.creator.address) return "creator";
    if (match.joiner && caller === match.joiner.address) return "joiner";
    throw new MatchEngineError("NotAParticipant", "Only the match's players can do this", match.id);
  }

  private slot(match: RpsMatch, side: Side): PlayerSlot {
    const slot = side === "creator" ? match.creator : match.joiner;
    if (!slot) {
      throw new MatchEngineError("NotAParticipant", "Match has no joiner yet", match.id);
    }
    return slot;
  }

  private withSlot(match: RpsMatch, side: Side, slot: PlayerSlot): RpsMatch {
    return side === "creator" ? { ...match, creator: slot } : { ...match, joiner: slot };
  }
}
