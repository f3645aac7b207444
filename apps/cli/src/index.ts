import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { Command, program } from "commander";
import { loadConfig, setCliOverride } from "./config/index";
import { registerConfigCommand } from "./commands/config";
import { registerMatchCommands } from "./commands/match";
import { registerAdminCommands } from "./commands/admin";

program
  .name("rps")
  .description("rps-arena - commit-reveal Rock-Paper-Scissors with escrowed stakes")
  .version("0.1.0", "-v, --version")
  .option("-k, --key <privateKey>", "Ethereum private key")
  .option("-s, --server <url>", "Server URL");

function isConfigCommand(command: Command): boolean {
  return command.name() === "config" || command.parent?.name() === "config";
}

program.hook("preAction", async (_program, actionCommand) => {
  const opts = program.opts<{ key?: string; server?: string }>();
  if (opts.key) {
    setCliOverride("privateKey", opts.key);
  }
  if (opts.server) {
    setCliOverride("serverUrl", opts.server);
  }
  // config commands load it themselves, so a bad value can still be fixed
  if (!isConfigCommand(actionCommand)) {
    await loadConfig();
  }
});

registerConfigCommand(program);
registerMatchCommands(program);
registerAdminCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
