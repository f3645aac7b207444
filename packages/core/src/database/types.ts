import { Generated, Selectable, Insertable, Updateable } from "kysely";

// ---- rps_matches ----

export interface RpsMatchesTable {
  id: number;
  stake_wei: string;
  phase: string;
  creator: string;
  creator_commitment: string | null;
  /** Move wire code (1-3), null until revealed */
  creator_move: number | null;
  joiner: string | null;
  joiner_commitment: string | null;
  joiner_move: number | null;
  created_at: Date;
  deadline: Date;
  result: string | null; // JSON
  updated_at: Generated<Date>;
}

export type RpsMatchRow = Selectable<RpsMatchesTable>;
export type NewRpsMatchRow = Insertable<RpsMatchesTable>;
export type RpsMatchRowUpdate = Updateable<RpsMatchesTable>;

// ---- engine_settings (single row, id = 1) ----

export interface EngineSettingsTable {
  id: number;
  owner: string;
  min_stake_wei: string;
  max_stake_wei: string;
  timeout_ms: number;
  next_match_id: number;
}

export type EngineSettingsRow = Selectable<EngineSettingsTable>;
export type NewEngineSettingsRow = Insertable<EngineSettingsTable>;

// ---- payouts ----

export interface PayoutsTable {
  id: Generated<number>;
  match_id: number;
  recipient: string;
  amount_wei: string;
  reason: string;
  created_at: Generated<Date>;
}

export type Payout = Selectable<PayoutsTable>;
export type NewPayout = Insertable<PayoutsTable>;

// ---- master Database interface ----

export interface Database {
  rps_matches: RpsMatchesTable;
  engine_settings: EngineSettingsTable;
  payouts: PayoutsTable;
}
