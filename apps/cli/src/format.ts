import { formatEther } from "ethers";
import {
  MatchPhase,
  WireEvent,
  WireMatch,
  WireMatchResult,
  WirePlayerSlot,
  formatAddress,
  formatRelativeTime,
} from "@rps-arena/core";

const PHASE_LABELS: Record<MatchPhase, string> = {
  [MatchPhase.AWAITING_OPPONENT]: "waiting for an opponent",
  [MatchPhase.AWAITING_COMMITMENTS]: "waiting for commitments",
  [MatchPhase.AWAITING_REVEALS]: "waiting for reveals",
  [MatchPhase.SETTLED]: "settled",
};

function eth(wei: string): string {
  return `${formatEther(wei)} ETH`;
}

function slotStatus(slot: WirePlayerSlot): string {
  if (slot.move) return `revealed ${slot.move}`;
  if (slot.commitment) return "committed";
  return "no move yet";
}

function describeResult(result: WireMatchResult): string {
  switch (result.kind) {
    case "win":
      return `${formatAddress(result.winner)} won ${eth(result.amountWei)}`;
    case "tie":
      return `tie, ${eth(result.refundWei)} refunded to each player`;
    case "timeout":
      return `timed out, refunded ${result.refunded.map((a) => formatAddress(a)).join(" and ")}`;
  }
}

/** Human-readable lines for `rps show`. */
export function describeMatch(match: WireMatch, escrowedWei: string, now: number = Date.now()): string[] {
  const lines = [
    `Match #${match.id}: ${PHASE_LABELS[match.phase]}`,
    `  Stake:    ${eth(match.stakeWei)} (escrowed ${eth(escrowedWei)})`,
    `  Creator:  ${formatAddress(match.creator.address)}  ${slotStatus(match.creator)}`,
    `  Joiner:   ${match.joiner ? `${formatAddress(match.joiner.address)}  ${slotStatus(match.joiner)}` : "-"}`,
  ];
  if (match.result) {
    lines.push(`  Result:   ${describeResult(match.result)}`);
  } else {
    const verb = match.deadline > now ? "expires" : "expired";
    lines.push(`  Deadline: ${verb} ${formatRelativeTime(match.deadline, now)}`);
  }
  return lines;
}

/** One line per event for `rps watch`. */
export function describeEvent(event: WireEvent): string {
  const p = event.payload;
  const who = (key: string) => {
    const value = p[key];
    return typeof value === "string" ? formatAddress(value) : "-";
  };
  const amount = (key: string) => {
    const value = p[key];
    return typeof value === "string" ? eth(value) : "?";
  };

  const prefix = `#${event.sequence}`;
  switch (event.type) {
    case "MatchCreated":
      return `${prefix} match ${p.matchId} created by ${who("creator")} for ${amount("stakeWei")}`;
    case "PlayerJoined":
      return `${prefix} ${who("joiner")} joined match ${p.matchId}`;
    case "MoveCommitted":
      return `${prefix} ${who("player")} committed in match ${p.matchId}`;
    case "MoveRevealed":
      return `${prefix} ${who("player")} revealed ${p.move} in match ${p.matchId}`;
    case "GameFinished":
      return p.winner === null
        ? `${prefix} match ${p.matchId} ended in a tie`
        : `${prefix} ${who("winner")} won match ${p.matchId} (${amount("amountWei")})`;
    case "GameTimeout":
      return `${prefix} match ${p.matchId} timed out`;
    case "SettingChanged":
      return `${prefix} ${p.setting} changed from ${p.oldValue} to ${p.newValue}`;
    case "OwnershipTransferred":
      return `${prefix} ownership moved from ${who("previousOwner")} to ${who("newOwner")}`;
  }
}
