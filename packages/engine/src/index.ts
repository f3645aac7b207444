export { MatchEngine, cloneMatch } from "./MatchEngine";
export type {
  MatchEngineOptions,
  EngineSnapshot,
  PreparedTransition,
  CommittedTransition,
  EventListener,
} from "./MatchEngine";
export type { MatchCommand, MatchCommandType } from "./commands";
export { MatchEngineError, isMatchEngineError } from "./errors";
export type { MatchErrorCode, ErrorCategory } from "./errors";
export { InMemoryLedger, TransferRefusedError } from "./FundsGateway";
export type { FundsGateway } from "./FundsGateway";
export { BEATS, beats, decideRound } from "./rules";
export type { RoundOutcome } from "./rules";
export {
  MAX_TIMEOUT_MS,
  DEFAULT_MIN_STAKE_WEI,
  DEFAULT_MAX_STAKE_WEI,
  DEFAULT_TIMEOUT_MS,
  defaultSettings,
  assertValidSettings,
} from "./settings";
