import Decimal from 'decimal.js';
import { VenueFeeSchedule } from '../types/venue.type.js';

// Isolated Decimal constructor configured for financial precision.
// Uses Decimal.clone() to avoid mutating the global Decimal settings,
// so other modules can safely import decimal.js with their own config.
export const FinancialDecimal = Decimal.clone({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -18,
  toExpPos: 20,
});

/**
 * Pure financial math utility for leg pricing and edge calculations.
 * All methods use decimal.js, never native `number`, for financial calculations.
 */
export class FinancialMath {
  /**
   * All-in cost of buying one contract on a venue.
   * Formula: price * (1 + tradingFeeRate) + fixedCost
   *
   * @param price - contract price (0-1 decimal probability)
   */
  static calculateLegCost(price: Decimal, fees: VenueFeeSchedule): Decimal {
    FinancialMath.validateDecimalInput(price, 'price');
    FinancialMath.validateNumberInput(fees.tradingFeeRate, 'tradingFeeRate');
    FinancialMath.validateNumberInput(fees.fixedCost, 'fixedCost');

    return price
      .mul(new FinancialDecimal(1).plus(fees.tradingFeeRate))
      .plus(fees.fixedCost);
  }

  /**
   * Gross edge of buying complementary outcomes on two venues.
   * Formula: 1 - (legCostA + legCostB). Negative when the pair costs more than the payout.
   */
  static calculateGrossEdge(legCostA: Decimal, legCostB: Decimal): Decimal {
    FinancialMath.validateDecimalInput(legCostA, 'legCostA');
    FinancialMath.validateDecimalInput(legCostB, 'legCostB');

    return new FinancialDecimal(1).minus(legCostA.plus(legCostB));
  }

  /**
   * Relative edge realised by buying at one average fill and selling at another.
   * Formula: (sellPrice - buyPrice) / buyPrice
   */
  static calculateFillEdge(buyPrice: Decimal, sellPrice: Decimal): Decimal {
    FinancialMath.validateDecimalInput(buyPrice, 'buyPrice');
    FinancialMath.validateDecimalInput(sellPrice, 'sellPrice');

    if (buyPrice.isZero()) {
      throw new Error(
        'FinancialMath: buyPrice must not be zero (division by zero)',
      );
    }

    return sellPrice.minus(buyPrice).div(buyPrice);
  }

  /**
   * Check if an edge meets the minimum threshold (inclusive).
   *
   * @param edge - decimal, e.g. 0.02 = 2%
   * @param threshold - decimal, e.g. 0.02 = 2%
   */
  static isAboveThreshold(edge: Decimal, threshold: Decimal): boolean {
    FinancialMath.validateDecimalInput(edge, 'edge');
    FinancialMath.validateDecimalInput(threshold, 'threshold');

    return edge.gte(threshold);
  }

  private static validateDecimalInput(value: Decimal, name: string): void {
    if (value.isNaN()) {
      throw new Error(`FinancialMath: ${name} must not be NaN`);
    }
    if (!value.isFinite()) {
      throw new Error(`FinancialMath: ${name} must not be Infinity`);
    }
  }

  private static validateNumberInput(value: number, name: string): void {
    if (Number.isNaN(value)) {
      throw new Error(`FinancialMath: ${name} must not be NaN`);
    }
    if (!Number.isFinite(value)) {
      throw new Error(`FinancialMath: ${name} must not be Infinity`);
    }
  }
}
