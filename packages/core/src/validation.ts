import { verifyMessage, getAddress, id } from "ethers";
import { canonicalEncode } from "./libs/Encoding";
import { SignedRequest } from "./types/protocol";

const EVM_ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

/**
 * Returns true if `value` is a valid EVM address (0x followed by 40 hex chars).
 */
export function isEvmAddress(value: unknown): value is string {
  return typeof value === "string" && EVM_ADDRESS_RE.test(value);
}

/**
 * Checksummed form of `value`, or null if it is not an address.
 * Mixed-case input with a bad checksum is rejected.
 */
export function normalizeAddress(value: unknown): string | null {
  if (!isEvmAddress(value)) {
    return null;
  }
  try {
    return getAddress(value);
  } catch {
    return null;
  }
}

/** Maximum age of a signed authentication message (5 minutes). */
export const AUTH_MESSAGE_MAX_AGE_MS = 5 * 60 * 1000;

/** Body fields that carry the authorization rather than being covered by it. */
export const AUTH_FIELDS = ["playerId", "signature", "timestamp"] as const;

/** The body fields of a signed request, without the authorization fields. */
export function signedParams(body: unknown): Record<string, unknown> {
  if (typeof body !== "object" || body === null) {
    return {};
  }
  return Object.fromEntries(
    Object.entries(body).filter(([key]) => !AUTH_FIELDS.some((field) => field === key))
  );
}

/** keccak256 of the canonical JSON of the request parameters. */
export function requestDigest(params: Record<string, unknown>): string {
  return id(canonicalEncode(params));
}

/**
 * Build the canonical message that clients sign to authorize one request.
 * It names the signer, the time, the route and a digest of the parameters,
 * so a signature only ever vouches for the request it was made for.
 */
export function buildAuthMessage(playerId: string, timestamp: number, request: SignedRequest): string {
  return [
    `rps-arena authentication for ${playerId} at ${timestamp}`,
    `${request.method.toUpperCase()} ${request.path}`,
    `params ${requestDigest(request.params)}`,
  ].join("\n");
}

/**
 * Verify that `signature` was produced by the private key controlling `claimedAddress`
 * (EIP-191 personal_sign).
 */
export function verifySignature(
  claimedAddress: string,
  message: string,
  signature: string
): boolean {
  try {
    const recovered = verifyMessage(message, signature);
    return getAddress(recovered) === getAddress(claimedAddress);
  } catch {
    return false;
  }
}

/**
 * Validate a full authentication payload for `request`: checks timestamp
 * freshness and signature validity. Replays are the host's concern.
 */
export function validateAuth(
  playerId: string,
  signature: string,
  timestamp: number,
  request: SignedRequest,
  now: number = Date.now()
): boolean {
  if (Math.abs(now - timestamp) > AUTH_MESSAGE_MAX_AGE_MS) {
    return false;
  }
  const message = buildAuthMessage(playerId, timestamp, request);
  return verifySignature(playerId, message, signature);
}
