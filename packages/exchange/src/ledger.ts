import type { AssetBalance, Balance } from '@tradegate/types';
import { AMOUNT_PRECISION, EXCHANGE_ERROR_CODES, ExchangeError, round } from '@tradegate/utils';

interface Holding {
  free: number;
  used: number;
}

const normalize = (amount: number): number => round(amount, AMOUNT_PRECISION);

/**
 * In-memory balances for the mock backend. Every mutation is synchronous;
 * callers group the mutations of one order transition in `transaction`.
 */
export class Ledger {
  private holdings: Map<string, Holding> = new Map();

  constructor(startingBalance: Readonly<Record<string, number>>) {
    for (const [asset, amount] of Object.entries(startingBalance)) {
      this.holdings.set(asset, { free: normalize(amount), used: 0 });
    }
  }

  get(asset: string): AssetBalance {
    const holding = this.holdings.get(asset) ?? { free: 0, used: 0 };
    return { free: holding.free, used: holding.used, total: normalize(holding.free + holding.used) };
  }

  snapshot(): Balance {
    const balance: Balance = {};
    for (const asset of this.holdings.keys()) {
      balance[asset] = this.get(asset);
    }
    return balance;
  }

  credit(asset: string, amount: number): void {
    const holding = this.holding(asset);
    holding.free = normalize(holding.free + amount);
  }

  debit(asset: string, amount: number): void {
    const holding = this.holding(asset);
    this.ensureAvailable(asset, holding.free, amount);
    holding.free = normalize(holding.free - amount);
  }

  /**
   * Move funds from free to used for a resting order
   */
  reserve(asset: string, amount: number): void {
    const holding = this.holding(asset);
    this.ensureAvailable(asset, holding.free, amount);
    holding.free = normalize(holding.free - amount);
    holding.used = normalize(holding.used + amount);
  }

  /**
   * Move funds back from used to free
   */
  release(asset: string, amount: number): void {
    const holding = this.holding(asset);
    const released = Math.min(amount, holding.used);
    holding.used = normalize(holding.used - released);
    holding.free = normalize(holding.free + released);
  }

  /**
   * Run `fn` against the ledger; if it throws, every balance is restored
   * to what it was before the call
   */
  transaction<T>(fn: () => T): T {
    const saved = new Map<string, Holding>();
    for (const [asset, holding] of this.holdings) {
      saved.set(asset, { ...holding });
    }
    try {
      return fn();
    } catch (error) {
      this.holdings = saved;
      throw error;
    }
  }

  private holding(asset: string): Holding {
    let holding = this.holdings.get(asset);
    if (!holding) {
      holding = { free: 0, used: 0 };
      this.holdings.set(asset, holding);
    }
    return holding;
  }

  private ensureAvailable(asset: string, free: number, amount: number): void {
    if (normalize(amount) > free) {
      throw new ExchangeError(
        EXCHANGE_ERROR_CODES.NEW_ORDER_REJECTED,
        `Account has insufficient ${asset} balance for requested action (free ${free}, needed ${normalize(amount)})`
      );
    }
  }
}
