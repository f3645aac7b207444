import { SettingName } from "@rps-arena/core";

/**
 * Every state-changing engine operation, as data. `caller` is the identity
 * submitting it; `valueWei` is the amount attached to the call.
 */
export type MatchCommand =
  | { type: "create"; caller: string; valueWei: bigint }
  | { type: "join"; caller: string; matchId: number; valueWei: bigint }
  | { type: "commit"; caller: string; matchId: number; commitment: string }
  | { type: "reveal"; caller: string; matchId: number; move: number; nonce: string }
  | { type: "timeout"; caller: string; matchId: number }
  | { type: "updateSetting"; caller: string; setting: SettingName; value: bigint | number }
  | { type: "transferOwnership"; caller: string; newOwner: string };

export type MatchCommandType = MatchCommand["type"];
