import WebSocket from "ws";
import { EngineEventType, WireEvent } from "@rps-arena/core";
import { getConfig } from "../config/resolve";

const EVENT_TYPES: readonly EngineEventType[] = [
  "MatchCreated",
  "PlayerJoined",
  "MoveCommitted",
  "MoveRevealed",
  "GameFinished",
  "GameTimeout",
  "SettingChanged",
  "OwnershipTransferred",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isWireEvent(value: unknown): value is WireEvent {
  return (
    isRecord(value) &&
    typeof value.sequence === "number" &&
    typeof value.timestamp === "number" &&
    EVENT_TYPES.some((t) => t === value.type) &&
    isRecord(value.payload)
  );
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/** Pull the event out of a `{ type: "EVENT", event }` frame, if it is one. */
export function parseEventFrame(raw: string): WireEvent | null {
  const message = parseJson(raw);
  if (!isRecord(message) || message.type !== "EVENT") {
    return null;
  }
  const event = message.event;
  return isWireEvent(event) ? event : null;
}

export interface EventSubscription {
  close(): void;
  /** Settles when the connection ends */
  done: Promise<void>;
}

/**
 * Follow the server's event stream. With `after`, the server first replays
 * events with a higher sequence number.
 */
export function streamEvents(onEvent: (event: WireEvent) => void, after?: number): EventSubscription {
  const query = after === undefined ? "" : `?after=${after}`;
  const ws = new WebSocket(`${getConfig().wsUrl}/ws/events${query}`);

  const done = new Promise<void>((resolve, reject) => {
    ws.on("message", (data) => {
      const event = parseEventFrame(data.toString());
      if (event) {
        onEvent(event);
      }
    });
    ws.on("error", reject);
    ws.on("close", () => resolve());
  });

  return {
    close: () => ws.close(),
    done,
  };
}
