import { Command } from "commander";
import { formatEther } from "ethers";
import { formatAddress } from "@rps-arena/core";
import * as api from "../transport/httpClient";
import { describeEvent } from "../format";
import { parseStake } from "./match";

export function registerAdminCommands(program: Command): void {
  program
    .command("status")
    .description("Show the server's stake bounds, timeout and owner")
    .action(async () => {
      const { settings, matchCount, totalEscrowedWei } = await api.getServerConfig();
      console.log(`Owner:      ${formatAddress(settings.owner)}`);
      console.log(`Stake:      ${formatEther(settings.minStakeWei)} - ${formatEther(settings.maxStakeWei)} ETH`);
      console.log(`Timeout:    ${Math.round(settings.timeoutMs / 60_000)} minutes`);
      console.log(`Matches:    ${matchCount}`);
      console.log(`Escrowed:   ${formatEther(totalEscrowedWei)} ETH`);
    });

  const admin = program.command("admin").description("Owner-only settings");

  admin
    .command("min-stake <ETH>")
    .description("Set the minimum stake")
    .action(async (value: string) => {
      const result = await api.updateSetting("minStake", parseStake(value).toString());
      result.events.forEach((e) => console.log(describeEvent(e)));
    });

  admin
    .command("max-stake <ETH>")
    .description("Set the maximum stake")
    .action(async (value: string) => {
      const result = await api.updateSetting("maxStake", parseStake(value).toString());
      result.events.forEach((e) => console.log(describeEvent(e)));
    });

  admin
    .command("timeout <minutes>")
    .description("Set the match timeout for new matches (at most 24 hours)")
    .action(async (value: string) => {
      const minutes = Number(value);
      if (!Number.isFinite(minutes) || minutes <= 0) {
        throw new Error(`Invalid timeout "${value}"`);
      }
      const result = await api.updateSetting("timeout", String(Math.round(minutes * 60_000)));
      result.events.forEach((e) => console.log(describeEvent(e)));
    });

  admin
    .command("transfer-owner <address>")
    .description("Hand the owner role to another address")
    .action(async (address: string) => {
      const result = await api.transferOwnership(address);
      result.events.forEach((e) => console.log(describeEvent(e)));
    });
}
