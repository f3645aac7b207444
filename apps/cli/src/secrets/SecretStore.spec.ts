import { strict as assert } from "assert";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CommittedMove, MoveSecret, SecretStore } from "./SecretStore";

const ALICE = "0x1111111111111111111111111111111111111111";
const BOB = "0x2222222222222222222222222222222222222222";
const SERVER = "http://localhost:8080";

const secret: MoveSecret = {
  move: "paper",
  nonce: "0x" + "ab".repeat(32),
  commitment: "0x" + "cd".repeat(32),
  savedAt: 1_700_000_000_000,
};

describe("SecretStore", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rps-secrets-"));
    path = join(dir, "nested", "secrets.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should keep secrets across store instances", async () => {
    await new SecretStore(path).save({ serverUrl: SERVER, matchId: 3, player: ALICE }, secret);

    const reopened = new SecretStore(path);
    assert.deepEqual(await reopened.get({ serverUrl: SERVER, matchId: 3, player: ALICE }), secret);
    assert.equal(await reopened.count(), 1);
  });

  it("should key secrets by server, player and match", async () => {
    const store = new SecretStore(path);
    await store.save({ serverUrl: SERVER, matchId: 3, player: ALICE }, secret);

    assert.equal(await store.get({ serverUrl: SERVER, matchId: 4, player: ALICE }), undefined);
    assert.equal(await store.get({ serverUrl: SERVER, matchId: 3, player: BOB }), undefined);
    assert.equal(await store.get({ serverUrl: "http://other:8080", matchId: 3, player: ALICE }), undefined);
    assert.deepEqual(
      await store.get({ serverUrl: `${SERVER}/`, matchId: 3, player: ALICE.toLowerCase() }),
      secret
    );
  });

  it("should report whether a secret was removed", async () => {
    const store = new SecretStore(path);
    const key = { serverUrl: SERVER, matchId: 1, player: ALICE };
    await store.save(key, secret);

    assert.equal(await store.remove(key), true);
    assert.equal(await store.remove(key), false);
    assert.equal(await store.get(key), undefined);
  });

  it("should keep replaced moves with the current one", async () => {
    const store = new SecretStore(path);
    const key = { serverUrl: SERVER, matchId: 2, player: ALICE };
    const replaced: CommittedMove = { ...secret, move: "rock", nonce: "0x" + "ee".repeat(32) };
    await store.save(key, { ...secret, earlier: [replaced] });

    assert.deepEqual(await new SecretStore(path).get(key), { ...secret, earlier: [replaced] });
  });

  it("should start empty when the file does not exist", async () => {
    assert.equal(await new SecretStore(path).count(), 0);
  });

  it("should skip malformed entries", async () => {
    const file = join(dir, "secrets.json");
    await writeFile(
      file,
      JSON.stringify({
        good: secret,
        badMove: { ...secret, move: "lizard" },
        missingNonce: { move: "rock", commitment: secret.commitment, savedAt: 1 },
      })
    );
    assert.equal(await new SecretStore(file).count(), 1);
  });

  it("should refuse to read a file that is not an object", async () => {
    const file = join(dir, "secrets.json");
    await writeFile(file, "[]");
    await assert.rejects(new SecretStore(file).count(), /does not contain a JSON object/);
  });
});
