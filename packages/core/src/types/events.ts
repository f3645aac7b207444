import { Move, SettingName } from "./match";

export type EngineEvent =
  | { type: "MatchCreated"; matchId: number; creator: string; stakeWei: bigint }
  | { type: "PlayerJoined"; matchId: number; joiner: string }
  | { type: "MoveCommitted"; matchId: number; player: string; commitment: string }
  | { type: "MoveRevealed"; matchId: number; player: string; move: Move; nonce: string }
  /** `winner` is null on a tie, in which case `amountWei` is 0 */
  | { type: "GameFinished"; matchId: number; winner: string | null; amountWei: bigint }
  | { type: "GameTimeout"; matchId: number }
  | {
      type: "SettingChanged";
      setting: SettingName;
      oldValue: bigint | number;
      newValue: bigint | number;
    }
  | { type: "OwnershipTransferred"; previousOwner: string; newOwner: string };

export type EngineEventType = EngineEvent["type"];

/** An event as it sits in the engine's log. */
export interface EventRecord {
  sequence: number;
  timestamp: number;
  event: EngineEvent;
}

export type TransferReason = "win" | "tie_refund" | "timeout_refund";

export interface Transfer {
  matchId: number;
  to: string;
  amountWei: bigint;
  reason: TransferReason;
}
