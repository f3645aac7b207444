import { MatchPhase, Move, SettingName } from "./match";
import { EngineEventType } from "./events";

// ---------------------------------------------------------------------------
// JSON shapes exchanged between the server and its clients.
// All wei amounts travel as decimal strings.
// ---------------------------------------------------------------------------

export interface WirePlayerSlot {
  address: string;
  commitment: string | null;
  move: Move | null;
  revealed: boolean;
}

export type WireMatchResult =
  | { kind: "win"; winner: string; loser: string; amountWei: string }
  | { kind: "tie"; refundWei: string }
  | { kind: "timeout"; refunded: string[] };

export interface WireMatch {
  id: number;
  stakeWei: string;
  creator: WirePlayerSlot;
  joiner: WirePlayerSlot | null;
  phase: MatchPhase;
  createdAt: number;
  deadline: number;
  result: WireMatchResult | null;
}

export interface WireSettings {
  owner: string;
  minStakeWei: string;
  maxStakeWei: string;
  timeoutMs: number;
}

export interface WireEvent {
  sequence: number;
  timestamp: number;
  type: EngineEventType;
  payload: Record<string, string | number | null>;
}

/** What an authorization signature covers besides the signer and time. */
export interface SignedRequest {
  method: string;
  /** Path without the query string, e.g. `/api/matches/0/commit` */
  path: string;
  /** Body fields other than the authorization fields */
  params: Record<string, unknown>;
}

/** Fields every authenticated request body carries. */
export interface AuthPayload {
  playerId: string;
  signature: string;
  timestamp: number;
}

export interface CreateMatchRequest extends AuthPayload {
  stakeWei: string;
}

export interface JoinMatchRequest extends AuthPayload {
  valueWei: string;
}

export interface CommitMoveRequest extends AuthPayload {
  commitment: string;
}

export interface RevealMoveRequest extends AuthPayload {
  move: number;
  nonce: string;
}

export interface UpdateSettingRequest extends AuthPayload {
  setting: SettingName;
  value: string;
}

export interface TransferOwnershipRequest extends AuthPayload {
  newOwner: string;
}

export interface MatchListResponse {
  matchIds: number[];
  count: number;
}

export interface MatchResponse {
  match: WireMatch;
  escrowedWei: string;
}

/** Reply to every successful state-changing request. */
export interface TransitionResponse {
  match: WireMatch | null;
  events: WireEvent[];
}

export interface ConfigResponse {
  settings: WireSettings;
  matchCount: number;
  totalEscrowedWei: string;
}

export interface EventListResponse {
  events: WireEvent[];
}

export interface WirePayout {
  matchId: number;
  amountWei: string;
  reason: string;
  createdAt: string;
}

export interface PayoutListResponse {
  payouts: WirePayout[];
}

export interface ErrorResponse {
  error: string;
  code: string;
}

export interface EventStreamMessage {
  type: "EVENT";
  event: WireEvent;
}
