import { Move } from "@rps-arena/core";

/** The move each move defeats. */
export const BEATS: Readonly<Record<Move, Move>> = {
  rock: "scissors",
  paper: "rock",
  scissors: "paper",
};

export function beats(a: Move, b: Move): boolean {
  return BEATS[a] === b;
}

export type RoundOutcome = "creator" | "joiner" | "tie";

/** Decide a round from the creator's and joiner's moves. Order of reveal is irrelevant. */
export function decideRound(creatorMove: Move, joinerMove: Move): RoundOutcome {
  if (creatorMove === joinerMove) {
    return "tie";
  }
  return beats(creatorMove, joinerMove) ? "creator" : "joiner";
}
