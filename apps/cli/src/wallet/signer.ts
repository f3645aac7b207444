import { Signer, Wallet } from "ethers";
import { AuthPayload, SignedRequest, buildAuthMessage } from "@rps-arena/core";
import { getConfig } from "../config/resolve";

let wallet: Wallet | null = null;

export function getWallet(): Wallet {
  if (!wallet) {
    const { privateKey } = getConfig();
    if (!privateKey) {
      throw new Error("Private key not set. Run 'rps config new-key' or 'rps config set privateKey <key>'.");
    }
    wallet = new Wallet(privateKey);
  }
  return wallet;
}

export function getAddress(): string {
  return getWallet().address;
}

/**
 * EIP-191 signature authorizing exactly `request`: the server rejects it on
 * any other route, with other parameters, or a second time.
 */
export async function signRequest(
  signer: Signer,
  request: SignedRequest,
  timestamp: number = Date.now(),
): Promise<AuthPayload> {
  const playerId = await signer.getAddress();
  const signature = await signer.signMessage(buildAuthMessage(playerId, timestamp, request));
  return { playerId, signature, timestamp };
}

export function buildAuth(request: SignedRequest): Promise<AuthPayload> {
  return signRequest(getWallet(), request);
}
