import { strict as assert } from "assert";
import bunyan from "bunyan";
import { Wallet, parseEther } from "ethers";
import { buildAuthMessage, computeCommitment } from "@rps-arena/core";
import { InMemoryMatchRepository } from "../services/InMemoryMatchRepository";
import { MatchService } from "../services/MatchService";
import { HttpWsServer, createHttpWsServer } from "../ws/server";
import { statusForCategory } from "./errors";

const owner = new Wallet("0x" + "11".repeat(32));
const alice = new Wallet("0x" + "22".repeat(32));
const bob = new Wallet("0x" + "33".repeat(32));
const STAKE = parseEther("0.01");

const quiet = bunyan.createLogger({ name: "routes-test", level: "fatal" });

/** Walk `path` through nested JSON objects. */
function pick(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = Object.entries(current).find(([k]) => k === key)?.[1];
  }
  return current;
}

/** `body` plus an authorization for POSTing it to `path`. */
async function signed(
  wallet: Wallet,
  path: string,
  body: Record<string, unknown> = {}
): Promise<Record<string, unknown>> {
  const timestamp = Date.now();
  const message = buildAuthMessage(wallet.address, timestamp, { method: "POST", path, params: body });
  const signature = await wallet.signMessage(message);
  return { ...body, playerId: wallet.address, signature, timestamp };
}

describe("HTTP routes", () => {
  let server: HttpWsServer;
  let baseUrl: string;

  async function get(path: string): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`);
    return { status: res.status, body: await res.json() };
  }

  async function post(path: string, body: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  async function act(
    wallet: Wallet,
    path: string,
    body: Record<string, unknown> = {}
  ): Promise<{ status: number; body: unknown }> {
    return post(path, await signed(wallet, path, body));
  }

  beforeEach(async () => {
    const service = await MatchService.load(new InMemoryMatchRepository(), {
      owner: owner.address,
      log: quiet,
    });
    server = createHttpWsServer(service);
    await new Promise<void>((resolve) => server.httpServer.listen(0, "127.0.0.1", resolve));
    const address = server.httpServer.address();
    assert.ok(address && typeof address === "object");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await server.close();
  });

  it("should map error categories to statuses", () => {
    assert.equal(statusForCategory("validation"), 400);
    assert.equal(statusForCategory("authorization"), 403);
    assert.equal(statusForCategory("not_found"), 404);
    assert.equal(statusForCategory("state"), 409);
    assert.equal(statusForCategory("temporal"), 409);
    assert.equal(statusForCategory("settlement"), 502);
  });

  it("should expose the settings", async () => {
    const { status, body } = await get("/api/config");
    assert.equal(status, 200);
    assert.equal(pick(body, "settings", "owner"), owner.address);
    assert.equal(pick(body, "settings", "minStakeWei"), "1000000000000000");
    assert.equal(pick(body, "matchCount"), 0);
    assert.equal(pick(body, "totalEscrowedWei"), "0");
  });

  it("should create and join a match for signed callers", async () => {
    const created = await act(alice, "/api/matches", { stakeWei: STAKE.toString() });
    assert.equal(created.status, 200);
    assert.equal(pick(created.body, "match", "id"), 0);
    assert.equal(pick(created.body, "match", "phase"), "awaiting_opponent");

    const joined = await act(bob, "/api/matches/0/join", { valueWei: STAKE.toString() });
    assert.equal(joined.status, 200);
    assert.equal(pick(joined.body, "match", "joiner", "address"), bob.address);

    const shown = await get("/api/matches/0");
    assert.equal(pick(shown.body, "escrowedWei"), (STAKE * 2n).toString());

    const mine = await get(`/api/players/${bob.address.toLowerCase()}/matches`);
    assert.deepEqual(mine.body, { matchIds: [0], count: 1 });

    const events = await get("/api/events?after=0");
    assert.equal(pick(events.body, "events", "0", "type"), "PlayerJoined");
    assert.equal(pick(events.body, "events", "0", "sequence"), 1);
  });

  it("should report engine rejections with their code", async () => {
    const tooSmall = await act(alice, "/api/matches", { stakeWei: "1" });
    assert.equal(tooSmall.status, 400);
    assert.equal(pick(tooSmall.body, "code"), "InvalidStake");

    const missing = await act(bob, "/api/matches/7/join", { valueWei: STAKE.toString() });
    assert.equal(missing.status, 404);
    assert.equal(pick(missing.body, "code"), "MatchNotFound");

    await act(alice, "/api/matches", { stakeWei: STAKE.toString() });
    const early = await act(bob, "/api/matches/0/timeout");
    assert.equal(early.status, 409);
    assert.equal(pick(early.body, "code"), "NotYetExpired");

    const notOwner = await act(alice, "/api/admin/settings", { setting: "timeout", value: "60000" });
    assert.equal(notOwner.status, 403);
    assert.equal(pick(notOwner.body, "code"), "NotOwner");
  });

  it("should let the owner change settings", async () => {
    const { status } = await act(owner, "/api/admin/settings", {
      setting: "maxStake",
      value: parseEther("2").toString(),
    });
    assert.equal(status, 200);
    const config = await get("/api/config");
    assert.equal(pick(config.body, "settings", "maxStakeWei"), parseEther("2").toString());
  });

  it("should reject requests that are not properly signed", async () => {
    const body = await signed(alice, "/api/matches", { stakeWei: STAKE.toString() });
    const forged = await post("/api/matches", { ...body, playerId: bob.address });
    assert.equal(forged.status, 401);

    const unsigned = await post("/api/matches", { playerId: alice.address, stakeWei: STAKE.toString() });
    assert.equal(unsigned.status, 400);
  });

  it("should refuse an authorization that is used twice", async () => {
    const body = await signed(alice, "/api/matches", { stakeWei: STAKE.toString() });
    assert.equal((await post("/api/matches", body)).status, 200);

    const replayed = await post("/api/matches", body);
    assert.equal(replayed.status, 401);
    assert.equal(pick(replayed.body, "error"), "Signature has already been used");
    assert.equal(pick(await get("/api/config"), "body", "matchCount"), 1);
  });

  it("should not let an authorization act on another route or body", async () => {
    await act(bob, "/api/matches", { stakeWei: STAKE.toString() });
    const join = await signed(alice, "/api/matches/0/join", { valueWei: STAKE.toString() });
    assert.equal((await post("/api/matches/0/join", join)).status, 200);

    // someone who saw the join tries to commit and reveal as alice
    const nonce = "0x" + "0c".repeat(32);
    const commitment = computeCommitment("scissors", nonce, alice.address);
    const auth = { playerId: join.playerId, signature: join.signature, timestamp: join.timestamp };
    const commit = await post("/api/matches/0/commit", { ...auth, commitment });
    assert.equal(commit.status, 401);

    const swapped = await post("/api/matches/0/join", { ...auth, valueWei: "1" });
    assert.equal(swapped.status, 401);

    const shown = await get("/api/matches/0");
    assert.equal(pick(shown.body, "match", "creator", "commitment"), null);
    assert.equal(pick(shown.body, "match", "joiner", "commitment"), null);
  });

  it("should page events from the start for negative cursors", async () => {
    await act(alice, "/api/matches", { stakeWei: STAKE.toString() });
    await act(bob, "/api/matches/0/join", { valueWei: STAKE.toString() });
    await act(alice, "/api/matches", { stakeWei: (STAKE * 2n).toString() });

    const { status, body } = await get("/api/events?after=-3");
    assert.equal(status, 200);
    const events = pick(body, "events");
    assert.ok(Array.isArray(events));
    assert.deepEqual(events.map((e: unknown) => pick(e, "sequence")), [0, 1, 2]);
  });

  it("should reject malformed parameters", async () => {
    const badId = await get("/api/matches/abc");
    assert.equal(badId.status, 400);

    const unknown = await get("/api/matches/3");
    assert.equal(unknown.status, 404);

    const badAmount = await act(alice, "/api/matches", { stakeWei: "0.5" });
    assert.equal(badAmount.status, 400);
    assert.equal(pick(badAmount.body, "error"), "stakeWei must be a decimal amount in wei");
  });
});
