import { parseEther } from "ethers";
import { EngineSettings, SettingName } from "@rps-arena/core";
import { MatchEngineError } from "./errors";

/** Upper bound on the match timeout (24 hours). */
export const MAX_TIMEOUT_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_MIN_STAKE_WEI = parseEther("0.001");
export const DEFAULT_MAX_STAKE_WEI = parseEther("1");
export const DEFAULT_TIMEOUT_MS = 60 * 60 * 1000;

export function defaultSettings(owner: string): EngineSettings {
  return {
    owner,
    minStakeWei: DEFAULT_MIN_STAKE_WEI,
    maxStakeWei: DEFAULT_MAX_STAKE_WEI,
    timeoutMs: DEFAULT_TIMEOUT_MS,
  };
}

/**
 * Throws InvalidSetting unless the bounds are mutually consistent:
 * 0 ≤ min < max and 0 < timeout ≤ 24h.
 */
export function assertValidSettings(settings: EngineSettings): void {
  if (settings.minStakeWei < 0n) {
    throw new MatchEngineError("InvalidSetting", "Minimum stake cannot be negative");
  }
  if (settings.minStakeWei >= settings.maxStakeWei) {
    throw new MatchEngineError(
      "InvalidSetting",
      `Minimum stake (${settings.minStakeWei}) must be below maximum stake (${settings.maxStakeWei})`
    );
  }
  if (!Number.isInteger(settings.timeoutMs) || settings.timeoutMs <= 0 || settings.timeoutMs > MAX_TIMEOUT_MS) {
    throw new MatchEngineError(
      "InvalidSetting",
      `Timeout must be an integer number of milliseconds in (0, ${MAX_TIMEOUT_MS}]`
    );
  }
}

/** Value of a single setting, for change events. */
export function readSetting(settings: EngineSettings, setting: SettingName): bigint | number {
  switch (setting) {
    case "minStake":
      return settings.minStakeWei;
    case "maxStake":
      return settings.maxStakeWei;
    case "timeout":
      return settings.timeoutMs;
  }
}
