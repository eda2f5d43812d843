import { toCents, toDecimal } from '../common/utils/decimal.util';

// Flat round-turn costs for one contract.
export const DEFAULT_COMMISSION_PER_CONTRACT = 0.78;
export const DEFAULT_FEES_PER_CONTRACT = 1.12;

export interface TradeCosts {
  commissions: number;
  fees: number;
}

/** Suggested commissions and fees for a new trade */
export function defaultCosts(contracts: number): TradeCosts {
  return {
    commissions: toCents(toDecimal(DEFAULT_COMMISSION_PER_CONTRACT).times(contracts)),
    fees: toCents(toDecimal(DEFAULT_FEES_PER_CONTRACT).times(contracts)),
  };
}

/** Commissions plus fees for one contract ($1.90) */
export function costPerContract(): number {
  return toCents(toDecimal(DEFAULT_COMMISSION_PER_CONTRACT).plus(DEFAULT_FEES_PER_CONTRACT));
}
