import { Transfer } from "@rps-arena/core";

/**
 * Moves escrowed funds out of the engine. `execute` must apply the whole
 * batch or nothing, and throw to refuse it.
 */
export interface FundsGateway {
  execute(transfers: readonly Transfer[]): void;
}

export class TransferRefusedError extends Error {
  constructor(readonly recipient: string) {
    super(`Recipient ${recipient} refused the transfer`);
    this.name = "TransferRefusedError";
  }
}

/**
 * Credits payouts to in-memory balances. Recipients can be marked as
 * refusing funds, which fails any batch that pays them.
 */
export class InMemoryLedger implements FundsGateway {
  private balances = new Map<string, bigint>();
  private refusing = new Set<string>();
  private history: Transfer[] = [];

  execute(transfers: readonly Transfer[]): void {
    for (const transfer of transfers) {
      if (this.refusing.has(transfer.to)) {
        throw new TransferRefusedError(transfer.to);
      }
    }
    for (const transfer of transfers) {
      this.balances.set(transfer.to, this.balanceOf(transfer.to) + transfer.amountWei);
      this.history.push(transfer);
    }
  }

  balanceOf(address: string): bigint {
    return this.balances.get(address) ?? 0n;
  }

  refuse(address: string): void {
    this.refusing.add(address);
  }

  accept(address: string): void {
    this.refusing.delete(address);
  }

  getTransfers(): readonly Transfer[] {
    return this.history;
  }
}
