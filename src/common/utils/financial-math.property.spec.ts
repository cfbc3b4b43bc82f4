import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { FinancialMath, FinancialDecimal } from './financial-math.js';
import { VenueFeeSchedule, VenueId } from '../types/index.js';

// ── Arbitraries ──

const priceArb = fc
  .double({ min: 0, max: 1, noNaN: true, noDefaultInfinity: true })
  .map((v) => new FinancialDecimal(v));

const feesArb = fc
  .record({
    tradingFeeRate: fc.double({
      min: 0,
      max: 0.1,
      noNaN: true,
      noDefaultInfinity: true,
    }),
    fixedCost: fc.double({
      min: 0,
      max: 0.05,
      noNaN: true,
      noDefaultInfinity: true,
    }),
  })
  .map(
    (f): VenueFeeSchedule => ({
      venue: VenueId.PREDYX,
      tradingFeeRate: f.tradingFeeRate,
      fixedCost: f.fixedCost,
    }),
  );

// ── calculateLegCost properties ──

describe('FinancialMath.calculateLegCost property tests', () => {
  it('fees never reduce the cost below the raw price', { timeout: 30000 }, () => {
    fc.assert(
      fc.property(priceArb, feesArb, (price, fees) => {
        const cost = FinancialMath.calculateLegCost(price, fees);
        expect(cost.gte(price)).toBe(true);
      }),
      { numRuns: 1000 },
    );
  });
});

// ── calculateGrossEdge properties ──

describe('FinancialMath.calculateGrossEdge property tests', () => {
  it('is symmetric in its legs', { timeout: 30000 }, () => {
    fc.assert(
      fc.property(priceArb, priceArb, (a, b) => {
        expect(FinancialMath.calculateGrossEdge(a, b).toFixed(18)).toBe(
          FinancialMath.calculateGrossEdge(b, a).toFixed(18),
        );
      }),
      { numRuns: 1000 },
    );
  });

  it(
    'higher fees on either leg never increase the edge',
    { timeout: 30000 },
    () => {
      fc.assert(
        fc.property(priceArb, priceArb, feesArb, (a, b, fees) => {
          const noFees: VenueFeeSchedule = {
            venue: VenueId.PREDYX,
            tradingFeeRate: 0,
            fixedCost: 0,
          };
          const base = FinancialMath.calculateGrossEdge(
            FinancialMath.calculateLegCost(a, noFees),
            FinancialMath.calculateLegCost(b, noFees),
          );
          const withFees = FinancialMath.calculateGrossEdge(
            FinancialMath.calculateLegCost(a, fees),
            FinancialMath.calculateLegCost(b, noFees),
          );
          expect(withFees.lte(base)).toBe(true);
        }),
        { numRuns: 1000 },
      );
    },
  );
});
