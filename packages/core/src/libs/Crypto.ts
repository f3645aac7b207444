import { hexlify, isHexString, randomBytes, solidityPackedKeccak256, ZeroHash } from "ethers";
import { Move, moveToCode } from "../types/match";

/**
 * Commitment binding a move to a secret nonce and the committer's address:
 * keccak256(uint8 move ‖ bytes32 nonce ‖ address player), tightly packed.
 */
export function computeCommitment(move: Move, nonce: string, player: string): string {
  return computeCommitmentFromCode(moveToCode(move), nonce, player);
}

export function computeCommitmentFromCode(moveCode: number, nonce: string, player: string): string {
  return solidityPackedKeccak256(["uint8", "bytes32", "address"], [moveCode, nonce, player]);
}

/** Fresh 32-byte nonce as 0x-prefixed hex. */
export function randomNonce(): string {
  return hexlify(randomBytes(32));
}

export function isBytes32(value: unknown): value is string {
  return typeof value === "string" && isHexString(value, 32);
}

/** A commitment must be 32 bytes and must not be the all-zero hash. */
export function isValidCommitment(value: unknown): value is string {
  return isBytes32(value) && value !== ZeroHash;
}
