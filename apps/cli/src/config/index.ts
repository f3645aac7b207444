export type { ConfigData, ConfigKey } from "./defaults";
export { CONFIG_KEYS, ENV_VARS, isConfigKey, normalizeConfigValue } from "./defaults";
export { readConfigFile, editConfigFile, getConfigDir, getConfigPath } from "./configFile";
export type { ConfigSource, ResolvedConfig } from "./resolve";
export { resolveConfig, loadConfig, getConfig, setCliOverride } from "./resolve";
