export interface IncomingTransfer {
  from: string;
  to: string;
  amount: bigint;
}

/** Code that runs when an address receives currency. Throwing rejects the transfer. */
export type ReceiveHook = (transfer: IncomingTransfer) => void;

export type BalanceSnapshot = ReadonlyMap<string, bigint>;

export class InsufficientBalanceError extends Error {
  constructor(readonly account: string, readonly balance: bigint, readonly requested: bigint) {
    super(`${account} holds ${balance}, cannot send ${requested}`);
    this.name = 'InsufficientBalanceError';
  }
}

export class TransferRejectedError extends Error {
  constructor(readonly recipient: string, readonly amount: bigint, cause: unknown) {
    super(`${recipient} rejected a transfer of ${amount}`, { cause });
    this.name = 'TransferRejectedError';
  }
}

/**
 * Currency ledger the markets hold custody in. Balances only move through
 * `transfer`; `mint` exists for faucets and test fixtures.
 */
export class Bank {
  private balances = new Map<string, bigint>();
  private hooks = new Map<string, ReceiveHook>();

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    let total = 0n;
    this.balances.forEach((balance) => {
      total += balance;
    });
    return total;
  }

  mint(account: string, amount: bigint) {
    if (amount <= 0n) {
      throw new RangeError('mint amount must be positive');
    }
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  onReceive(account: string, hook: ReceiveHook) {
    this.hooks.set(account, hook);
  }

  clearReceiveHook(account: string) {
    this.hooks.delete(account);
  }

  transfer(from: string, to: string, amount: bigint) {
    if (amount < 0n) {
      throw new RangeError('transfer amount must not be negative');
    }
    if (amount === 0n) return;

    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new InsufficientBalanceError(from, balance, amount);
    }

    const before = this.snapshot();
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    const hook = this.hooks.get(to);
    if (!hook) return;
    try {
      hook({ from, to, amount });
    } catch (error) {
      this.restore(before);
      throw new TransferRejectedError(to, amount, error);
    }
  }

  snapshot(): BalanceSnapshot {
    return new Map(this.balances);
  }

  restore(snapshot: BalanceSnapshot) {
    this.balances = new Map(snapshot);
  }
}
