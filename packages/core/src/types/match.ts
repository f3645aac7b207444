export type Move = "rock" | "paper" | "scissors";

export const MOVES: readonly Move[] = ["rock", "paper", "scissors"];

/** Wire codes for moves. 0 means "no move" and is never a valid reveal. */
export const MOVE_NONE = 0;

export function moveToCode(move: Move): number {
  switch (move) {
    case "rock":
      return 1;
    case "paper":
      return 2;
    case "scissors":
      return 3;
  }
}

export function moveFromCode(code: number): Move | null {
  switch (code) {
    case 1:
      return "rock";
    case 2:
      return "paper";
    case 3:
      return "scissors";
    default:
      return null;
  }
}

export function parseMove(raw: string): Move | null {
  const value = raw.trim().toLowerCase();
  return MOVES.find((m) => m === value || m[0] === value) ?? null;
}

export enum MatchPhase {
  AWAITING_OPPONENT = "awaiting_opponent",
  AWAITING_COMMITMENTS = "awaiting_commitments",
  AWAITING_REVEALS = "awaiting_reveals",
  SETTLED = "settled",
}

/** One side of a match. `null` fields have not been submitted yet. */
export interface PlayerSlot {
  address: string;
  commitment: string | null;
  move: Move | null;
}

export type MatchResult =
  | { kind: "win"; winner: string; loser: string; amountWei: bigint }
  | { kind: "tie"; refundWei: bigint }
  | { kind: "timeout"; refunded: string[] };

export interface RpsMatch {
  id: number;
  stakeWei: bigint;
  creator: PlayerSlot;
  joiner: PlayerSlot | null;
  phase: MatchPhase;
  /** Epoch milliseconds */
  createdAt: number;
  /** Epoch milliseconds; fixed at creation */
  deadline: number;
  result: MatchResult | null;
}

export interface EngineSettings {
  owner: string;
  minStakeWei: bigint;
  maxStakeWei: bigint;
  timeoutMs: number;
}

export type SettingName = "minStake" | "maxStake" | "timeout";

export function hasRevealed(slot: PlayerSlot | null): boolean {
  return slot !== null && slot.move !== null;
}

export function hasCommitted(slot: PlayerSlot | null): boolean {
  return slot !== null && slot.commitment !== null;
}
