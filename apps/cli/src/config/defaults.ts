import { Wallet } from "ethers";

export interface ConfigData {
  serverUrl: string;
  /** Base URL of the event stream; follows `serverUrl` unless set */
  wsUrl: string;
  privateKey: string;
}

export type ConfigKey = keyof ConfigData;

export const CONFIG_KEYS: readonly ConfigKey[] = ["serverUrl", "wsUrl", "privateKey"];

export const DEFAULT_SERVER_URL = "http://localhost:8080";

export const ENV_VARS: Record<ConfigKey, string> = {
  serverUrl: "RPS_SERVER_URL",
  wsUrl: "RPS_WS_URL",
  privateKey: "RPS_PRIVATE_KEY",
};

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

function baseUrl(key: ConfigKey, raw: string, protocols: readonly string[]): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`${key} must be a URL, got "${raw}"`);
  }
  if (!protocols.includes(url.protocol)) {
    throw new Error(`${key} must use ${protocols.map((p) => p.replace(":", "")).join(" or ")}`);
  }
  return url.toString().replace(/\/+$/, "");
}

/** Event stream URL served by the same host as `serverUrl`. */
export function eventStreamUrlFor(serverUrl: string): string {
  const url = new URL(serverUrl);
  url.protocol = url.protocol === "https:" ? "wss:" : "ws:";
  return url.toString().replace(/\/+$/, "");
}

/** Canonical form of a config value; throws when it is unusable. */
export function normalizeConfigValue(key: ConfigKey, raw: string): string {
  const value = raw.trim();
  switch (key) {
    case "serverUrl":
      return baseUrl(key, value, ["http:", "https:"]);
    case "wsUrl":
      return baseUrl(key, value, ["ws:", "wss:"]);
    case "privateKey":
      try {
        return new Wallet(value).privateKey;
      } catch {
        throw new Error("privateKey must be a 0x-prefixed 32-byte hex key");
      }
  }
}
