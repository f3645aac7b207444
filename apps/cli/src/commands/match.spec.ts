import { strict as assert } from "assert";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TransitionResponse, computeCommitment } from "@rps-arena/core";
import { SecretStore } from "../secrets/SecretStore";
import { ApiError } from "../transport/httpClient";
import { commitWithSecret, parseMatchId, parseStake, revealFromSecret } from "./match";

const ALICE = "0x1111111111111111111111111111111111111111";
const KEY = { serverUrl: "http://localhost:8080", matchId: 3, player: ALICE };
const OK: TransitionResponse = { match: null, events: [] };

describe("match commands", () => {
  let dir: string;
  let store: SecretStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rps-cli-"));
    store = new SecretStore(join(dir, "secrets.json"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("parsing", () => {
    it("should parse match ids", () => {
      assert.equal(parseMatchId("12"), 12);
      assert.throws(() => parseMatchId("-1"), /Invalid match id/);
      assert.throws(() => parseMatchId("1.5"), /Invalid match id/);
    });

    it("should parse stakes in ETH", () => {
      assert.equal(parseStake("0.01"), 10_000_000_000_000_000n);
      assert.throws(() => parseStake("ten"), /Invalid stake amount/);
    });
  });

  describe("commitWithSecret", () => {
    it("should store the secret behind the submitted commitment", async () => {
      const sent: string[] = [];
      await commitWithSecret(store, KEY, "r", false, async (commitment) => {
        sent.push(commitment);
        return OK;
      });

      const secret = await store.get(KEY);
      assert.ok(secret);
      assert.equal(secret.move, "rock");
      assert.deepEqual(sent, [secret.commitment]);
      assert.equal(secret.commitment, computeCommitment("rock", secret.nonce, ALICE));
    });

    it("should not replace a stored secret unless forced", async () => {
      await commitWithSecret(store, KEY, "rock", false, async () => OK);
      const first = await store.get(KEY);

      await assert.rejects(
        commitWithSecret(store, KEY, "paper", false, async () => OK),
        /already stored/
      );
      assert.deepEqual(await store.get(KEY), first);

      await commitWithSecret(store, KEY, "paper", true, async () => OK);
      assert.equal((await store.get(KEY))?.move, "paper");
    });

    it("should reject unknown moves before touching the store", async () => {
      await assert.rejects(commitWithSecret(store, KEY, "lizard", false, async () => OK), /Unknown move/);
      assert.equal(await store.count(), 0);
    });

    it("should drop the secret when the server rejects the commitment", async () => {
      await assert.rejects(
        commitWithSecret(store, KEY, "rock", false, async () => {
          throw new ApiError(409, "WrongPhase", "Cannot commit while awaiting_opponent");
        }),
        /Cannot commit/
      );
      assert.equal(await store.get(KEY), undefined);
    });

    it("should keep the secret when the outcome is unknown", async () => {
      await assert.rejects(
        commitWithSecret(store, KEY, "rock", false, async () => {
          throw new Error("socket hang up");
        }),
        /socket hang up/
      );
      assert.equal((await store.get(KEY))?.move, "rock");
    });
  });

  describe("forced commits", () => {
    const unknownOutcome = async (): Promise<TransitionResponse> => {
      throw new Error("socket hang up");
    };

    it("should restore the replaced secret when the server already holds a commitment", async () => {
      await assert.rejects(commitWithSecret(store, KEY, "rock", false, unknownOutcome), /socket hang up/);
      const first = await store.get(KEY);
      assert.ok(first);

      await assert.rejects(
        commitWithSecret(store, KEY, "paper", true, async () => {
          throw new ApiError(409, "AlreadyCommitted", "Player already committed in match 3");
        }),
        /already committed/,
      );
      assert.deepEqual(await store.get(KEY), first);
    });

    it("should drop the replaced secret once the new commitment is accepted", async () => {
      await commitWithSecret(store, KEY, "rock", false, unknownOutcome).catch(() => undefined);
      await commitWithSecret(store, KEY, "scissors", true, async () => OK);

      const stored = await store.get(KEY);
      assert.equal(stored?.move, "scissors");
      assert.equal(stored?.earlier, undefined);
    });

    it("should reveal a replaced move when that is what the server holds", async () => {
      await commitWithSecret(store, KEY, "rock", false, unknownOutcome).catch(() => undefined);
      const first = await store.get(KEY);
      assert.ok(first);
      const firstNonce = first.nonce;
      await commitWithSecret(store, KEY, "paper", true, unknownOutcome).catch(() => undefined);

      const stored = await store.get(KEY);
      assert.equal(stored?.move, "paper");
      assert.deepEqual(stored?.earlier, [first]);

      const sent: number[] = [];
      await revealFromSecret(store, KEY, async (move, nonce) => {
        sent.push(move);
        if (nonce !== firstNonce) {
          throw new ApiError(400, "CommitmentMismatch", "Revealed move does not match the commitment");
        }
        return OK;
      });

      assert.deepEqual(sent, [2, 1]);
      assert.equal(await store.get(KEY), undefined);
    });

    it("should report the mismatch when no stored move fits", async () => {
      await commitWithSecret(store, KEY, "rock", false, async () => OK);
      await assert.rejects(
        revealFromSecret(store, KEY, async () => {
          throw new ApiError(400, "CommitmentMismatch", "Revealed move does not match the commitment");
        }),
        /does not match/,
      );
      assert.equal((await store.get(KEY))?.move, "rock");
    });
  });

  describe("revealFromSecret", () => {
    it("should send the stored move code and nonce, then forget them", async () => {
      await commitWithSecret(store, KEY, "scissors", false, async () => OK);
      const secret = await store.get(KEY);
      assert.ok(secret);

      const sent: [number, string][] = [];
      await revealFromSecret(store, KEY, async (move, nonce) => {
        sent.push([move, nonce]);
        return OK;
      });

      assert.deepEqual(sent, [[3, secret.nonce]]);
      assert.equal(await store.get(KEY), undefined);
    });

    it("should fail without a stored secret", async () => {
      await assert.rejects(revealFromSecret(store, KEY, async () => OK), /No stored move for match #3/);
    });

    it("should forget a secret the server reports as spent", async () => {
      await commitWithSecret(store, KEY, "rock", false, async () => OK);
      await assert.rejects(
        revealFromSecret(store, KEY, async () => {
          throw new ApiError(409, "AlreadySettled", "Match 3 is already settled");
        })
      );
      assert.equal(await store.get(KEY), undefined);
    });

    it("should keep the secret after other rejections", async () => {
      await commitWithSecret(store, KEY, "rock", false, async () => OK);
      await assert.rejects(
        revealFromSecret(store, KEY, async () => {
          throw new ApiError(409, "WrongPhase", "Cannot reveal while awaiting_commitments");
        })
      );
      assert.equal((await store.get(KEY))?.move, "rock");
    });
  });
});
