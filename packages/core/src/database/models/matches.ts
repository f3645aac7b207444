import { Kysely } from "kysely";
import { Database, NewRpsMatchRow, RpsMatchRow } from "../types";
import { MatchPhase, PlayerSlot, RpsMatch, moveFromCode, moveToCode } from "../../types/match";
import { canonicalEncode, decodeMatchResult } from "../../libs/Encoding";

const PHASES: readonly string[] = Object.values(MatchPhase);

function isPhase(value: string): value is MatchPhase {
  return PHASES.includes(value);
}

function slotFromRow(
  address: string,
  commitment: string | null,
  moveCode: number | null
): PlayerSlot {
  return {
    address,
    commitment,
    move: moveCode === null ? null : moveFromCode(moveCode),
  };
}

export function matchFromRow(row: RpsMatchRow): RpsMatch {
  if (!isPhase(row.phase)) {
    throw new Error(`Match ${row.id} has unknown phase "${row.phase}"`);
  }
  return {
    id: row.id,
    stakeWei: BigInt(row.stake_wei),
    creator: slotFromRow(row.creator, row.creator_commitment, row.creator_move),
    joiner: row.joiner
      ? slotFromRow(row.joiner, row.joiner_commitment, row.joiner_move)
      : null,
    phase: row.phase,
    createdAt: row.created_at.getTime(),
    deadline: row.deadline.getTime(),
    result: row.result ? decodeMatchResult(row.result) : null,
  };
}

export function matchToRow(match: RpsMatch): NewRpsMatchRow {
  return {
    id: match.id,
    stake_wei: match.stakeWei.toString(),
    phase: match.phase,
    creator: match.creator.address,
    creator_commitment: match.creator.commitment,
    creator_move: match.creator.move ? moveToCode(match.creator.move) : null,
    joiner: match.joiner?.address ?? null,
    joiner_commitment: match.joiner?.commitment ?? null,
    joiner_move: match.joiner?.move ? moveToCode(match.joiner.move) : null,
    created_at: new Date(match.createdAt),
    deadline: new Date(match.deadline),
    result: match.result ? canonicalEncode(match.result) : null,
  };
}

export async function findAllMatches(db: Kysely<Database>): Promise<RpsMatch[]> {
  const rows = await db
    .selectFrom("rps_matches")
    .selectAll()
    .orderBy("id", "asc")
    .execute();
  return rows.map(matchFromRow);
}

export async function findMatchById(
  db: Kysely<Database>,
  id: number
): Promise<RpsMatch | undefined> {
  const row = await db
    .selectFrom("rps_matches")
    .where("id", "=", id)
    .selectAll()
    .executeTakeFirst();
  return row ? matchFromRow(row) : undefined;
}

export async function upsertMatch(db: Kysely<Database>, match: RpsMatch): Promise<void> {
  const row = matchToRow(match);
  const { id: _id, ...update } = row;
  await db
    .insertInto("rps_matches")
    .values(row)
    .onConflict((oc) => oc.column("id").doUpdateSet({ ...update, updated_at: new Date() }))
    .execute();
}
