export type ErrorCategory =
  | "validation"
  | "state"
  | "temporal"
  | "authorization"
  | "not_found"
  | "settlement";

const CATEGORIES = {
  InvalidStake: "validation",
  InvalidIdentity: "validation",
  SelfJoin: "validation",
  StakeMismatch: "validation",
  InvalidCommitment: "validation",
  InvalidMove: "validation",
  InvalidNonce: "validation",
  CommitmentMismatch: "validation",
  InvalidSetting: "validation",

  MatchNotFound: "not_found",

  AlreadyJoined: "state",
  WrongPhase: "state",
  AlreadyCommitted: "state",
  AlreadyRevealed: "state",
  AlreadySettled: "state",
  StaleTransition: "state",

  Expired: "temporal",
  NotYetExpired: "temporal",

  NotAParticipant: "authorization",
  NotOwner: "authorization",

  TransferFailed: "settlement",
} as const satisfies Record<string, ErrorCategory>;

export type MatchErrorCode = keyof typeof CATEGORIES;

/**
 * Every rejected engine call throws one of these. A rejected call never
 * leaves a trace in engine state.
 */
export class MatchEngineError extends Error {
  readonly category: ErrorCategory;

  constructor(
    readonly code: MatchErrorCode,
    message: string,
    readonly matchId?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "MatchEngineError";
    this.category = CATEGORIES[code];
  }
}

export function isMatchEngineError(err: unknown): err is MatchEngineError {
  return err instanceof MatchEngineError;
}
