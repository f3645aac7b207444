import { EngineEvent, EventRecord } from "../types/events";
import { EngineSettings, MatchResult, PlayerSlot, RpsMatch } from "../types/match";
import {
  WireEvent,
  WireMatch,
  WireMatchResult,
  WirePlayerSlot,
  WireSettings,
} from "../types/protocol";

/**
 * Canonical JSON encoding: keys sorted alphabetically, no whitespace,
 * no undefined values, bigints as decimal strings.
 */
export function canonicalEncode(obj: unknown): string {
  return JSON.stringify(obj, (_, value: unknown) => {
    if (typeof value === "bigint") {
      return value.toString();
    }
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .reduce<Record<string, unknown>>((sorted, [key, entry]) => {
          if (entry !== undefined) {
            sorted[key] = entry;
          }
          return sorted;
        }, {});
    }
    return value;
  });
}

function toWireSlot(slot: PlayerSlot): WirePlayerSlot {
  return {
    address: slot.address,
    commitment: slot.commitment,
    move: slot.move,
    revealed: slot.move !== null,
  };
}

function toWireResult(result: MatchResult): WireMatchResult {
  switch (result.kind) {
    case "win":
      return { ...result, amountWei: result.amountWei.toString() };
    case "tie":
      return { kind: "tie", refundWei: result.refundWei.toString() };
    case "timeout":
      return { kind: "timeout", refunded: [...result.refunded] };
  }
}

export function toWireMatch(match: RpsMatch): WireMatch {
  return {
    id: match.id,
    stakeWei: match.stakeWei.toString(),
    creator: toWireSlot(match.creator),
    joiner: match.joiner ? toWireSlot(match.joiner) : null,
    phase: match.phase,
    createdAt: match.createdAt,
    deadline: match.deadline,
    result: match.result ? toWireResult(match.result) : null,
  };
}

export function fromWireResult(result: WireMatchResult): MatchResult {
  switch (result.kind) {
    case "win":
      return { ...result, amountWei: BigInt(result.amountWei) };
    case "tie":
      return { kind: "tie", refundWei: BigInt(result.refundWei) };
    case "timeout":
      return { kind: "timeout", refunded: [...result.refunded] };
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Parse a stored JSON match result (the canonical encoding of a MatchResult).
 */
export function decodeMatchResult(json: string): MatchResult {
  const parsed: unknown = JSON.parse(json);
  if (parsed && typeof parsed === "object" && "kind" in parsed) {
    if (
      parsed.kind === "win" &&
      "winner" in parsed && typeof parsed.winner === "string" &&
      "loser" in parsed && typeof parsed.loser === "string" &&
      "amountWei" in parsed && typeof parsed.amountWei === "string"
    ) {
      return fromWireResult({
        kind: "win",
        winner: parsed.winner,
        loser: parsed.loser,
        amountWei: parsed.amountWei,
      });
    }
    if (parsed.kind === "tie" && "refundWei" in parsed && typeof parsed.refundWei === "string") {
      return fromWireResult({ kind: "tie", refundWei: parsed.refundWei });
    }
    if (parsed.kind === "timeout" && "refunded" in parsed && isStringArray(parsed.refunded)) {
      return fromWireResult({ kind: "timeout", refunded: parsed.refunded });
    }
  }
  throw new Error(`Malformed match result: ${json}`);
}

export function toWireSettings(settings: EngineSettings): WireSettings {
  return {
    owner: settings.owner,
    minStakeWei: settings.minStakeWei.toString(),
    maxStakeWei: settings.maxStakeWei.toString(),
    timeoutMs: settings.timeoutMs,
  };
}

function eventPayload(event: EngineEvent): WireEvent["payload"] {
  const payload: WireEvent["payload"] = {};
  for (const [key, value] of Object.entries(event)) {
    if (key === "type") continue;
    payload[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return payload;
}

export function toWireEvent(record: EventRecord): WireEvent {
  return {
    sequence: record.sequence,
    timestamp: record.timestamp,
    type: record.event.type,
    payload: eventPayload(record.event),
  };
}
