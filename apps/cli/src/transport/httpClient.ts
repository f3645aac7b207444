import {
  ConfigResponse,
  EventListResponse,
  MatchListResponse,
  MatchResponse,
  SettingName,
  TransitionResponse,
  WireMatch,
} from "@rps-arena/core";
import { getConfig } from "../config/resolve";
import { buildAuth } from "../wallet/signer";

/** A non-2xx reply from the server. */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

type Guard<T> = (value: unknown) => value is T;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isWireMatch(value: unknown): value is WireMatch {
  return (
    isRecord(value) &&
    typeof value.id === "number" &&
    typeof value.stakeWei === "string" &&
    typeof value.phase === "string" &&
    isRecord(value.creator)
  );
}

const isTransition: Guard<TransitionResponse> = (value): value is TransitionResponse =>
  isRecord(value) && (value.match === null || isWireMatch(value.match)) && Array.isArray(value.events);

const isMatchResponse: Guard<MatchResponse> = (value): value is MatchResponse =>
  isRecord(value) && isWireMatch(value.match) && typeof value.escrowedWei === "string";

const isMatchList: Guard<MatchListResponse> = (value): value is MatchListResponse =>
  isRecord(value) && Array.isArray(value.matchIds) && typeof value.count === "number";

const isConfig: Guard<ConfigResponse> = (value): value is ConfigResponse =>
  isRecord(value) && isRecord(value.settings) && typeof value.matchCount === "number";

const isEventList: Guard<EventListResponse> = (value): value is EventListResponse =>
  isRecord(value) && Array.isArray(value.events);

async function request<T>(path: string, guard: Guard<T>, opts?: RequestInit): Promise<T> {
  const base = getConfig().serverUrl;
  const res = await fetch(`${base}${path}`, {
    ...opts,
    headers: { "Content-Type": "application/json", ...opts?.headers },
  });
  const body: unknown = await res.json().catch(() => null);
  if (!res.ok) {
    const error = isRecord(body) && typeof body.error === "string" ? body.error : `HTTP ${res.status}`;
    const code = isRecord(body) && typeof body.code === "string" ? body.code : "Unknown";
    throw new ApiError(res.status, code, error);
  }
  if (!guard(body)) {
    throw new Error(`Unexpected response from ${path}`);
  }
  return body;
}

/** POST a signed body to a state-changing endpoint. */
async function signedPost(path: string, body: Record<string, unknown> = {}): Promise<TransitionResponse> {
  const auth = await buildAuth({ method: "POST", path, params: body });
  return request(path, isTransition, {
    method: "POST",
    body: JSON.stringify({ ...auth, ...body }),
  });
}

export function getServerConfig(): Promise<ConfigResponse> {
  return request("/api/config", isConfig);
}

export function getMatch(matchId: number): Promise<MatchResponse> {
  return request(`/api/matches/${matchId}`, isMatchResponse);
}

export function listOpenMatches(): Promise<MatchListResponse> {
  return request("/api/matches/open", isMatchList);
}

export function listPlayerMatches(address: string): Promise<MatchListResponse> {
  return request(`/api/players/${address}/matches`, isMatchList);
}

export function listEvents(after: number, limit = 100): Promise<EventListResponse> {
  return request(`/api/events?after=${after}&limit=${limit}`, isEventList);
}

export function createMatch(stakeWei: bigint): Promise<TransitionResponse> {
  return signedPost("/api/matches", { stakeWei: stakeWei.toString() });
}

export function joinMatch(matchId: number, valueWei: bigint): Promise<TransitionResponse> {
  return signedPost(`/api/matches/${matchId}/join`, { valueWei: valueWei.toString() });
}

export function commitMove(matchId: number, commitment: string): Promise<TransitionResponse> {
  return signedPost(`/api/matches/${matchId}/commit`, { commitment });
}

export function revealMove(matchId: number, move: number, nonce: string): Promise<TransitionResponse> {
  return signedPost(`/api/matches/${matchId}/reveal`, { move, nonce });
}

export function timeoutMatch(matchId: number): Promise<TransitionResponse> {
  return signedPost(`/api/matches/${matchId}/timeout`);
}

export function updateSetting(setting: SettingName, value: string): Promise<TransitionResponse> {
  return signedPost("/api/admin/settings", { setting, value });
}

export function transferOwnership(newOwner: string): Promise<TransitionResponse> {
  return signedPost("/api/admin/owner", { newOwner });
}
