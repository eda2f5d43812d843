import Decimal from 'decimal.js';
import { parseDecimal, parseInteger, toCents } from '../common/utils/decimal.util';

/** Dollars per point per contract when the instrument is not recognized */
export const DEFAULT_POINT_VALUE = new Decimal(1);

// Matched by substring, first hit wins.
const POINT_VALUES: ReadonlyArray<readonly [string, Decimal]> = [
  ['NASDAQ', new Decimal(2)],
  ['ES Futures', new Decimal(5)],
];

/**
 * Dollar value of a one-point move for a single contract.
 * Unknown instruments fall back to DEFAULT_POINT_VALUE.
 */
export function resolvePointValue(instrument: string): Decimal {
  const match = POINT_VALUES.find(([marker]) => instrument.includes(marker));
  return match ? match[1] : DEFAULT_POINT_VALUE;
}

/**
 * Points won or lost. Only the exact string "Short" flips the sign:
 * "short", "SHORT" and anything else count as Long.
 */
export function signedPoints(entryPrice: Decimal, exitPrice: Decimal, direction: string): Decimal {
  const priceDifference = exitPrice.minus(entryPrice);
  return direction === 'Short' ? priceDifference.negated() : priceDifference;
}

/**
 * Net P&L in dollars, rounded half-up to cents.
 *
 * Returns 0 when any of the prices, contracts, commissions or fees does not
 * parse. That 0 is a fallback, not a flat trade. Never throws.
 *
 * @param commissions - dollars for the whole trade
 * @param fees - dollars for the whole trade
 */
export function computeNetPnL(
  entryPriceText: string,
  exitPriceText: string,
  instrument: string,
  direction: string,
  contracts: number | string,
  commissions: number | string,
  fees: number | string,
): number {
  const entryPrice = parseDecimal(entryPriceText);
  const exitPrice = parseDecimal(exitPriceText);
  const contractCount = parseInteger(contracts);
  const commissionAmount = parseDecimal(commissions);
  const feeAmount = parseDecimal(fees);

  if (!entryPrice || !exitPrice || !contractCount || !commissionAmount || !feeAmount) {
    return 0;
  }

  const pointValue = resolvePointValue(typeof instrument === 'string' ? instrument : '');
  const gross = signedPoints(entryPrice, exitPrice, direction)
    .times(pointValue)
    .times(contractCount);

  return toCents(gross.minus(commissionAmount).minus(feeAmount));
}
