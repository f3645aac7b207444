import { Command } from "commander";
import { parseEther, formatEther } from "ethers";
import {
  TransitionResponse,
  computeCommitment,
  moveToCode,
  parseMove,
  randomNonce,
} from "@rps-arena/core";
import * as api from "../transport/httpClient";
import { ApiError } from "../transport/httpClient";
import { streamEvents } from "../transport/eventStream";
import { getConfig } from "../config/resolve";
import { getAddress } from "../wallet/signer";
import { CommittedMove, MoveSecret, SecretKey, SecretStore } from "../secrets/SecretStore";
import { describeEvent, describeMatch } from "../format";

/** Codes after which a stored secret can never be used again. */
const SECRET_SPENT_CODES = new Set(["AlreadyRevealed", "AlreadySettled"]);

export function parseMatchId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Invalid match id "${raw}"`);
  }
  return parseInt(raw, 10);
}

export function parseStake(raw: string): bigint {
  try {
    return parseEther(raw);
  } catch {
    throw new Error(`Invalid stake amount: "${raw}". Use a decimal ETH value (e.g. 0.01, 1.5)`);
  }
}

function secretKey(matchId: number): SecretKey {
  return { serverUrl: getConfig().serverUrl, matchId, player: getAddress() };
}

function printTransition(result: TransitionResponse): void {
  for (const event of result.events) {
    console.log(describeEvent(event));
  }
}

function committedMove({ move, nonce, commitment, savedAt }: MoveSecret): CommittedMove {
  return { move, nonce, commitment, savedAt };
}

/**
 * Commit a move and keep its secret locally. Refuses to overwrite a stored
 * secret unless forced, since that secret may be the only way to reveal.
 * A forced commit keeps the secret it replaces until the server accepts the
 * new commitment.
 */
export async function commitWithSecret(
  store: SecretStore,
  key: SecretKey,
  moveArg: string,
  force: boolean,
  send: (commitment: string) => Promise<TransitionResponse>,
): Promise<TransitionResponse> {
  const move = parseMove(moveArg);
  if (!move) {
    throw new Error(`Unknown move "${moveArg}". Use rock, paper or scissors`);
  }
  const previous = await store.get(key);
  if (previous && !force) {
    throw new Error(
      `A committed move for match #${key.matchId} is already stored. Reveal it, or pass --force to replace it.`,
    );
  }

  const nonce = randomNonce();
  const secret: CommittedMove = {
    move,
    nonce,
    commitment: computeCommitment(move, nonce, key.player),
    savedAt: Date.now(),
  };
  const earlier = previous ? [committedMove(previous), ...(previous.earlier ?? [])] : [];
  await store.save(key, earlier.length > 0 ? { ...secret, earlier } : secret);

  let result: TransitionResponse;
  try {
    result = await send(secret.commitment);
  } catch (err) {
    // the server saw and rejected it: whatever it holds is not this commitment
    if (err instanceof ApiError && err.status < 500) {
      if (previous) {
        await store.save(key, previous);
      } else {
        await store.remove(key);
      }
    }
    throw err;
  }
  await store.save(key, secret);
  return result;
}

/**
 * Reveal the stored move for a match, falling back to moves a forced commit
 * replaced when the server holds one of those. The secret is dropped once spent.
 */
export async function revealFromSecret(
  store: SecretStore,
  key: SecretKey,
  send: (move: number, nonce: string) => Promise<TransitionResponse>,
): Promise<TransitionResponse> {
  const secret = await store.get(key);
  if (!secret) {
    throw new Error(`No stored move for match #${key.matchId}. Commit one with "rps commit".`);
  }
  const candidates = [committedMove(secret), ...(secret.earlier ?? [])];

  let lastError: unknown;
  for (const candidate of candidates) {
    try {
      const result = await send(moveToCode(candidate.move), candidate.nonce);
      await store.remove(key);
      return result;
    } catch (err) {
      lastError = err;
      if (err instanceof ApiError && err.code === "CommitmentMismatch") {
        continue;
      }
      if (err instanceof ApiError && SECRET_SPENT_CODES.has(err.code)) {
        await store.remove(key);
      }
      throw err;
    }
  }
  throw lastError;
}

export function registerMatchCommands(program: Command): void {
  program
    .command("create")
    .description("Open a match and escrow your stake")
    .requiredOption("--stake <ETH>", "Stake in ETH (e.g. 0.01)")
    .action(async (opts: { stake: string }) => {
      const stakeWei = parseStake(opts.stake);
      const result = await api.createMatch(stakeWei);
      printTransition(result);
      if (result.match) {
        console.log(`\nShare the id with your opponent: rps join ${result.match.id}`);
      }
    });

  program
    .command("join <matchId>")
    .description("Join an open match, depositing the same stake")
    .action(async (idArg: string) => {
      const matchId = parseMatchId(idArg);
      const { match } = await api.getMatch(matchId);
      console.log(`Joining match #${matchId} for ${formatEther(match.stakeWei)} ETH`);
      printTransition(await api.joinMatch(matchId, BigInt(match.stakeWei)));
    });

  program
    .command("commit <matchId> <move>")
    .description("Commit rock, paper or scissors (the move stays secret until you reveal)")
    .option("--force", "Replace a move already stored for this match")
    .action(async (idArg: string, moveArg: string, opts: { force?: boolean }) => {
      const matchId = parseMatchId(idArg);
      const result = await commitWithSecret(
        new SecretStore(),
        secretKey(matchId),
        moveArg,
        opts.force ?? false,
        (commitment) => api.commitMove(matchId, commitment),
      );
      printTransition(result);
      console.log(`\nRun "rps reveal ${matchId}" once your opponent has committed.`);
    });

  program
    .command("reveal <matchId>")
    .description("Reveal your stored move")
    .action(async (idArg: string) => {
      const matchId = parseMatchId(idArg);
      const result = await revealFromSecret(new SecretStore(), secretKey(matchId), (move, nonce) =>
        api.revealMove(matchId, move, nonce),
      );
      printTransition(result);
    });

  program
    .command("timeout <matchId>")
    .description("Settle an expired match, refunding its stakes")
    .action(async (idArg: string) => {
      printTransition(await api.timeoutMatch(parseMatchId(idArg)));
    });

  program
    .command("show <matchId>")
    .description("Show a match")
    .action(async (idArg: string) => {
      const { match, escrowedWei } = await api.getMatch(parseMatchId(idArg));
      console.log(describeMatch(match, escrowedWei).join("\n"));
    });

  program
    .command("open")
    .description("List matches waiting for an opponent")
    .action(async () => {
      const { matchIds, count } = await api.listOpenMatches();
      if (count === 0) {
        console.log("No open matches. Create one with: rps create --stake 0.01");
        return;
      }
      for (const id of matchIds) {
        const { match, escrowedWei } = await api.getMatch(id);
        console.log(describeMatch(match, escrowedWei)[0] + `  (${formatEther(match.stakeWei)} ETH)`);
      }
    });

  program
    .command("mine")
    .description("List your matches")
    .action(async () => {
      const { matchIds } = await api.listPlayerMatches(getAddress());
      if (matchIds.length === 0) {
        console.log("You have not played any matches yet.");
        return;
      }
      for (const id of matchIds) {
        const { match, escrowedWei } = await api.getMatch(id);
        console.log(describeMatch(match, escrowedWei).join("\n"));
        console.log("");
      }
    });

  program
    .command("watch")
    .description("Follow match events as they happen")
    .option("--after <sequence>", "Replay events after this sequence number first")
    .action(async (opts: { after?: string }) => {
      const after = opts.after === undefined ? undefined : parseInt(opts.after, 10);
      const subscription = streamEvents((event) => console.log(describeEvent(event)), after);
      process.once("SIGINT", () => subscription.close());
      await subscription.done;
    });
}
