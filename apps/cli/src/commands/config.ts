import { Command } from "commander";
import { Wallet } from "ethers";
import {
  CONFIG_KEYS,
  ConfigKey,
  ConfigSource,
  ENV_VARS,
  editConfigFile,
  getConfigPath,
  isConfigKey,
  loadConfig,
  normalizeConfigValue,
  readConfigFile,
} from "../config/index";

function configKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }
  return key;
}

/** Private keys are only ever printed in part. */
export function displayValue(key: ConfigKey, value: string): string {
  if (key !== "privateKey") {
    return value || "(not set)";
  }
  return value ? `${value.slice(0, 6)}…${value.slice(-4)}` : "(not set)";
}

function describeSource(key: ConfigKey, source: ConfigSource): string {
  switch (source) {
    case "default":
      return key === "wsUrl" ? "derived from serverUrl" : "default";
    case "file":
      return "config file";
    case "env":
      return `env ${ENV_VARS[key]}`;
    case "flag":
      return "command line";
  }
}

async function printConfig(): Promise<void> {
  const { config, sources } = await loadConfig();
  console.log(`Config file: ${getConfigPath()}`);
  for (const key of CONFIG_KEYS) {
    console.log(`  ${key.padEnd(10)} ${displayValue(key, config[key])}  (${describeSource(key, sources[key])})`);
  }
  if (config.privateKey) {
    console.log(`  address    ${new Wallet(config.privateKey).address}`);
  }
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Show or change CLI settings (~/.rps-arena/config.json)")
    .action(printConfig);

  configCmd.command("list").description("Show every setting and where it comes from").action(printConfig);

  configCmd
    .command("get <key>")
    .description("Print one setting")
    .action(async (key: string) => {
      const name = configKey(key);
      const { config } = await loadConfig();
      console.log(displayValue(name, config[name]));
    });

  configCmd
    .command("set <key> <value>")
    .description("Store a setting in the config file")
    .action(async (key: string, value: string) => {
      const name = configKey(key);
      const normalized = normalizeConfigValue(name, value);
      await editConfigFile((data) => {
        data[name] = normalized;
      });
      console.log(`Set ${name} = ${displayValue(name, normalized)}`);
    });

  configCmd
    .command("unset <key>")
    .description("Remove a setting from the config file")
    .action(async (key: string) => {
      const name = configKey(key);
      await editConfigFile((data) => {
        delete data[name];
      });
      console.log(`Removed ${name}`);
    });

  configCmd
    .command("new-key")
    .description("Generate a private key and store it in the config file")
    .option("--force", "Replace a stored key")
    .action(async (opts: { force?: boolean }) => {
      const existing = await readConfigFile();
      if (existing.privateKey && !opts.force) {
        throw new Error("A private key is already stored. Pass --force to replace it.");
      }
      const generated = Wallet.createRandom();
      await editConfigFile((data) => {
        data.privateKey = generated.privateKey;
      });
      console.log(`Stored a new key for ${generated.address}`);
    });
}
