import { strict as assert } from "assert";
import { Wallet } from "ethers";
import { signedParams, validateAuth } from "@rps-arena/core";
import { signRequest } from "./signer";

describe("signRequest", () => {
  const wallet = new Wallet("0x" + "44".repeat(32));
  const timestamp = 1_700_000_000_000;
  const reveal = {
    method: "POST",
    path: "/api/matches/2/reveal",
    params: { move: 1, nonce: "0x" + "09".repeat(32) },
  };

  it("should authorize the signed request only", async () => {
    const auth = await signRequest(wallet, reveal, timestamp);

    assert.equal(auth.playerId, wallet.address);
    assert.equal(auth.timestamp, timestamp);
    assert.ok(validateAuth(auth.playerId, auth.signature, timestamp, reveal, timestamp));

    const otherMove = { ...reveal, params: { ...reveal.params, move: 3 } };
    assert.ok(!validateAuth(auth.playerId, auth.signature, timestamp, otherMove, timestamp));
  });

  it("should match what the server reads back from the JSON body", async () => {
    const auth = await signRequest(wallet, reveal, timestamp);
    const received: unknown = JSON.parse(JSON.stringify({ ...auth, ...reveal.params }));
    const request = { ...reveal, params: signedParams(received) };
    assert.ok(validateAuth(auth.playerId, auth.signature, timestamp, request, timestamp));
  });
});
