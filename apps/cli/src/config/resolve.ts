import {
  CONFIG_KEYS,
  ConfigData,
  ConfigKey,
  DEFAULT_SERVER_URL,
  ENV_VARS,
  eventStreamUrlFor,
  normalizeConfigValue,
} from "./defaults";
import { readConfigFile } from "./configFile";

export type ConfigSource = "default" | "file" | "env" | "flag";

export interface ConfigLayers {
  file: Partial<ConfigData>;
  env: Record<string, string | undefined>;
  flags: Partial<ConfigData>;
}

export interface ResolvedConfig {
  config: ConfigData;
  sources: Record<ConfigKey, ConfigSource>;
}

function fromEnv(env: Record<string, string | undefined>): Partial<ConfigData> {
  const values: Partial<ConfigData> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[ENV_VARS[key]];
    if (value !== undefined) {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Defaults, then the config file, then the environment, then flags. Every
 * value that is set gets validated; an unset `wsUrl` follows `serverUrl`.
 */
export function resolveConfig({ file, env, flags }: ConfigLayers): ResolvedConfig {
  const config: ConfigData = { serverUrl: DEFAULT_SERVER_URL, wsUrl: "", privateKey: "" };
  const sources: Record<ConfigKey, ConfigSource> = {
    serverUrl: "default",
    wsUrl: "default",
    privateKey: "default",
  };

  const layers: [ConfigSource, Partial<ConfigData>][] = [
    ["file", file],
    ["env", fromEnv(env)],
    ["flag", flags],
  ];
  for (const [source, values] of layers) {
    for (const key of CONFIG_KEYS) {
      const value = values[key];
      if (value === undefined || value.trim() === "") {
        continue;
      }
      try {
        config[key] = normalizeConfigValue(key, value);
      } catch (err) {
        throw new Error(`${err instanceof Error ? err.message : String(err)} (from ${source})`);
      }
      sources[key] = source;
    }
  }

  if (sources.wsUrl === "default") {
    config.wsUrl = eventStreamUrlFor(config.serverUrl);
  }
  return { config, sources };
}

const flags: Partial<ConfigData> = {};
let active: ResolvedConfig | null = null;

export function setCliOverride(key: ConfigKey, value: string): void {
  flags[key] = value;
}

/** Resolve from the config file, `process.env` and flags, and make it current. */
export async function loadConfig(): Promise<ResolvedConfig> {
  active = resolveConfig({ file: await readConfigFile(), env: process.env, flags });
  return active;
}

export function getConfig(): ConfigData {
  if (!active) {
    throw new Error("Configuration has not been loaded");
  }
  return active.config;
}
