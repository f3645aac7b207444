import { strict as assert } from "assert";
import { MatchPhase, WireMatch } from "@rps-arena/core";
import { describeEvent, describeMatch } from "./format";

const ALICE = "0x1111111111111111111111111111111111111111";
const BOB = "0x2222222222222222222222222222222222222222";
const NOW = 1_700_000_000_000;

function match(overrides: Partial<WireMatch> = {}): WireMatch {
  return {
    id: 4,
    stakeWei: "10000000000000000",
    creator: { address: ALICE, commitment: "0x" + "01".repeat(32), move: null, revealed: false },
    joiner: { address: BOB, commitment: null, move: null, revealed: false },
    phase: MatchPhase.AWAITING_COMMITMENTS,
    createdAt: NOW - 60_000,
    deadline: NOW + 90_000,
    result: null,
    ...overrides,
  };
}

describe("describeMatch", () => {
  it("should show players, stake and time left", () => {
    assert.deepEqual(describeMatch(match(), "20000000000000000", NOW), [
      "Match #4: waiting for commitments",
      "  Stake:    0.01 ETH (escrowed 0.02 ETH)",
      "  Creator:  0x1111…1111  committed",
      "  Joiner:   0x2222…2222  no move yet",
      "  Deadline: expires in 1m 30s",
    ]);
  });

  it("should show an expired deadline", () => {
    const lines = describeMatch(match({ joiner: null, deadline: NOW - 5 * 60_000 }), "10000000000000000", NOW);
    assert.equal(lines[3], "  Joiner:   -");
    assert.equal(lines[4], "  Deadline: expired 5m ago");
  });

  it("should show the result of a settled match", () => {
    const settled = match({
      phase: MatchPhase.SETTLED,
      creator: { address: ALICE, commitment: "0x" + "01".repeat(32), move: "rock", revealed: true },
      joiner: { address: BOB, commitment: "0x" + "02".repeat(32), move: "paper", revealed: true },
      result: { kind: "win", winner: BOB, loser: ALICE, amountWei: "20000000000000000" },
    });
    const lines = describeMatch(settled, "0", NOW);
    assert.equal(lines[0], "Match #4: settled");
    assert.equal(lines[2], "  Creator:  0x1111…1111  revealed rock");
    assert.equal(lines[4], "  Result:   0x2222…2222 won 0.02 ETH");
  });
});

describe("describeEvent", () => {
  it("should describe wins and ties", () => {
    assert.equal(
      describeEvent({
        sequence: 7,
        timestamp: NOW,
        type: "GameFinished",
        payload: { matchId: 4, winner: null, amountWei: "0" },
      }),
      "#7 match 4 ended in a tie"
    );
    assert.equal(
      describeEvent({
        sequence: 8,
        timestamp: NOW,
        type: "GameFinished",
        payload: { matchId: 5, winner: ALICE, amountWei: "20000000000000000" },
      }),
      "#8 0x1111…1111 won match 5 (0.02 ETH)"
    );
  });

  it("should describe joins", () => {
    assert.equal(
      describeEvent({ sequence: 1, timestamp: NOW, type: "PlayerJoined", payload: { matchId: 0, joiner: BOB } }),
      "#1 0x2222…2222 joined match 0"
    );
  });
});
