import { AUTH_MESSAGE_MAX_AGE_MS } from "@rps-arena/core";

/**
 * Signed messages already accepted, kept until their timestamp falls out of
 * the authentication window, after which the signature is refused anyway.
 */
export class UsedAuthorizations {
  private expiries = new Map<string, number>();

  constructor(
    private readonly windowMs: number = AUTH_MESSAGE_MAX_AGE_MS,
    private readonly now: () => number = Date.now
  ) {}

  /** Records `message`; false if it was already used. */
  claim(message: string, timestamp: number): boolean {
    this.prune();
    if (this.expiries.has(message)) {
      return false;
    }
    this.expiries.set(message, timestamp + this.windowMs);
    return true;
  }

  get size(): number {
    return this.expiries.size;
  }

  private prune(): void {
    const now = this.now();
    for (const [message, expiry] of this.expiries) {
      if (expiry < now) {
        this.expiries.delete(message);
      }
    }
  }
}
