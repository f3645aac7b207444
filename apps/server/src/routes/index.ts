import { Express, Request, Response } from "express";
import {
  ConfigResponse,
  EventListResponse,
  MatchListResponse,
  MatchResponse,
  PayoutListResponse,
  SettingName,
  SignedRequest,
  TransitionResponse,
  buildAuthMessage,
  isEvmAddress,
  normalizeAddress,
  signedParams,
  toWireEvent,
  toWireMatch,
  toWireSettings,
  validateAuth,
} from "@rps-arena/core";
import { CommittedTransition, MatchCommand } from "@rps-arena/engine";
import { MatchService } from "../services/MatchService";
import { UsedAuthorizations } from "../services/UsedAuthorizations";
import { HttpError, asyncHandler } from "./errors";
import config from "../config";

const WEI_RE = /^\d+$/;
const SETTINGS: readonly SettingName[] = ["minStake", "maxStake", "timeout"];

function field(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) {
    return undefined;
  }
  const entry = Object.entries(body).find(([k]) => k === key);
  return entry?.[1];
}

function readString(body: unknown, key: string): string {
  const value = field(body, key);
  if (typeof value !== "string" || value.length === 0) {
    throw new HttpError(400, `${key} required`);
  }
  return value;
}

function readWei(body: unknown, key: string): bigint {
  const value = readString(body, key);
  if (!WEI_RE.test(value)) {
    throw new HttpError(400, `${key} must be a decimal amount in wei`);
  }
  return BigInt(value);
}

function readInt(body: unknown, key: string): number {
  const value = field(body, key);
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new HttpError(400, `${key} must be an integer`);
  }
  return value;
}

function isSettingName(value: string): value is SettingName {
  return SETTINGS.some((s) => s === value);
}

function matchIdParam(req: Request): number {
  const raw = req.params.matchId;
  if (!WEI_RE.test(raw)) {
    throw new HttpError(400, "matchId must be a non-negative integer");
  }
  return parseInt(raw, 10);
}

function addressParam(req: Request): string {
  const address = normalizeAddress(req.params.address);
  if (!address) {
    throw new HttpError(400, "address must be a valid EVM address");
  }
  return address;
}

function queryInt(req: Request, key: string, fallback: number): number {
  const raw = req.query[key];
  if (raw === undefined) {
    return fallback;
  }
  if (typeof raw !== "string" || !/^-?\d+$/.test(raw)) {
    throw new HttpError(400, `${key} must be an integer`);
  }
  return parseInt(raw, 10);
}

/**
 * Validate playerId + signature + timestamp from the request body against
 * this route and its parameters. Each signed message is accepted once.
 * Returns the authenticated, checksummed playerId.
 */
function requireAuth(req: Request, used: UsedAuthorizations): string {
  const playerId = field(req.body, "playerId");
  if (!isEvmAddress(playerId)) {
    throw new HttpError(400, "playerId must be a valid EVM address (0x followed by 40 hex characters)");
  }
  const signature = field(req.body, "signature");
  const timestamp = field(req.body, "timestamp");
  if (typeof signature !== "string" || typeof timestamp !== "number") {
    throw new HttpError(400, "signature and timestamp required for authentication");
  }
  const request: SignedRequest = { method: req.method, path: req.path, params: signedParams(req.body) };
  if (!validateAuth(playerId, signature, timestamp, request)) {
    throw new HttpError(401, "Invalid signature or expired timestamp", "Unauthorized");
  }
  if (!used.claim(buildAuthMessage(playerId, timestamp, request), timestamp)) {
    throw new HttpError(401, "Signature has already been used", "Unauthorized");
  }
  return normalizeAddress(playerId) ?? playerId;
}

function sendTransition(res: Response, transition: CommittedTransition): void {
  const response: TransitionResponse = {
    match: transition.match ? toWireMatch(transition.match) : null,
    events: transition.events.map(toWireEvent),
  };
  res.json(response);
}

export function bindRoutes(app: Express, matchService: MatchService) {
  const engine = matchService.engine;
  const usedAuthorizations = new UsedAuthorizations();

  const submit = (build: (req: Request, caller: string) => MatchCommand) =>
    asyncHandler(async (req, res) => {
      const caller = requireAuth(req, usedAuthorizations);
      const transition = await matchService.submit(build(req, caller));
      sendTransition(res, transition);
    });

  // Health check
  app.get("/health/check", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.get("/api/config", (_req, res) => {
    const response: ConfigResponse = {
      settings: toWireSettings(engine.getSettings()),
      matchCount: engine.getMatchCount(),
      totalEscrowedWei: engine.getTotalEscrowed().toString(),
    };
    res.json(response);
  });

  // Matches still waiting for an opponent
  app.get("/api/matches/open", (_req, res) => {
    const matchIds = engine.getOpenMatches();
    const response: MatchListResponse = { matchIds, count: matchIds.length };
    res.json(response);
  });

  app.get(
    "/api/matches/:matchId",
    asyncHandler(async (req, res) => {
      const matchId = matchIdParam(req);
      const match = engine.getMatch(matchId);
      if (!match) {
        throw new HttpError(404, `Match ${matchId} not found`, "MatchNotFound");
      }
      const response: MatchResponse = {
        match: toWireMatch(match),
        escrowedWei: engine.getEscrowedBalance(matchId).toString(),
      };
      res.json(response);
    })
  );

  app.get(
    "/api/players/:address/matches",
    asyncHandler(async (req, res) => {
      const matchIds = engine.getPlayerMatches(addressParam(req));
      const response: MatchListResponse = { matchIds, count: matchIds.length };
      res.json(response);
    })
  );

  app.get(
    "/api/players/:address/payouts",
    asyncHandler(async (req, res) => {
      const limit = Math.min(Math.max(queryInt(req, "limit", 50), 1), 100);
      const payouts = await matchService.findPayouts(addressParam(req), limit);
      const response: PayoutListResponse = {
        payouts: payouts.map((p) => ({
          matchId: p.match_id,
          amountWei: p.amount_wei,
          reason: p.reason,
          createdAt: p.created_at.toISOString(),
        })),
      };
      res.json(response);
    })
  );

  // Events after a sequence number, oldest first
  app.get(
    "/api/events",
    asyncHandler(async (req, res) => {
      const after = queryInt(req, "after", -1);
      const limit = Math.min(Math.max(queryInt(req, "limit", 100), 1), config.maxEventPage);
      const response: EventListResponse = {
        events: engine.getEvents(after, limit).map(toWireEvent),
      };
      res.json(response);
    })
  );

  // ---- Match operations (signed) ----

  app.post(
    "/api/matches",
    submit((req, caller) => ({ type: "create", caller, valueWei: readWei(req.body, "stakeWei") }))
  );

  app.post(
    "/api/matches/:matchId/join",
    submit((req, caller) => ({
      type: "join",
      caller,
      matchId: matchIdParam(req),
      valueWei: readWei(req.body, "valueWei"),
    }))
  );

  app.post(
    "/api/matches/:matchId/commit",
    submit((req, caller) => ({
      type: "commit",
      caller,
      matchId: matchIdParam(req),
      commitment: readString(req.body, "commitment"),
    }))
  );

  app.post(
    "/api/matches/:matchId/reveal",
    submit((req, caller) => ({
      type: "reveal",
      caller,
      matchId: matchIdParam(req),
      move: readInt(req.body, "move"),
      nonce: readString(req.body, "nonce"),
    }))
  );

  app.post(
    "/api/matches/:matchId/timeout",
    submit((req, caller) => ({ type: "timeout", caller, matchId: matchIdParam(req) }))
  );

  // ---- Owner operations (signed by the owner) ----

  app.post(
    "/api/admin/settings",
    submit((req, caller) => {
      const setting = readString(req.body, "setting");
      if (!isSettingName(setting)) {
        throw new HttpError(400, `setting must be one of ${SETTINGS.join(", ")}`);
      }
      if (setting === "timeout") {
        const raw = readString(req.body, "value");
        if (!WEI_RE.test(raw)) {
          throw new HttpError(400, "value must be a whole number of milliseconds");
        }
        return { type: "updateSetting", caller, setting, value: Number(raw) };
      }
      return { type: "updateSetting", caller, setting, value: readWei(req.body, "value") };
    })
  );

  app.post(
    "/api/admin/owner",
    submit((req, caller) => ({
      type: "transferOwnership",
      caller,
      newOwner: readString(req.body, "newOwner"),
    }))
  );
}
