export { createDb, getPoolConfig } from "./database";

export type {
  Database,
  RpsMatchesTable,
  RpsMatchRow,
  NewRpsMatchRow,
  RpsMatchRowUpdate,
  EngineSettingsTable,
  EngineSettingsRow,
  NewEngineSettingsRow,
  PayoutsTable,
  Payout,
  NewPayout,
} from "./types";

export {
  findAllMatches,
  findMatchById,
  upsertMatch,
  matchFromRow,
  matchToRow,
} from "./models/matches";

export { findSettings, saveSettings } from "./models/settings";
export type { StoredSettings } from "./models/settings";

export { createPayouts, findPayoutsByRecipient } from "./models/payouts";

// Migration — NOT re-exported here to keep `fs` out of client bundles.
// Server-only consumers should import from "@rps-arena/core/migrate" instead.

export { getDatabaseUrl } from "./config";
