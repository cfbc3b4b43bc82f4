import { describe, it, expect } from 'vitest';
import { detectRiskFactors, requiresHumanReview } from './risk-factors.js';
import { MarketType, RiskFactor, VenueId } from '../../common/types/index.js';
import { makeEvent } from '../../test/mock-factories.js';

describe('detectRiskFactors', () => {
  const eventA = makeEvent({ venue: VenueId.POLYMARKET });

  it('returns no factors for an aligned pair', () => {
    expect(
      detectRiskFactors(eventA, makeEvent({ venue: VenueId.PREDYX }), 0),
    ).toEqual([]);
  });

  it('flags different resolution sources after trimming', () => {
    const same = makeEvent({
      venue: VenueId.PREDYX,
      resolutionSourceUrl: '  https://example.com/btc-index ',
    });
    const different = makeEvent({
      venue: VenueId.PREDYX,
      resolutionSourceUrl: 'https://example.org/other-index',
    });

    expect(detectRiskFactors(eventA, same, 0)).toEqual([]);
    expect(detectRiskFactors(eventA, different, 0)).toEqual([
      RiskFactor.DIFFERENT_RESOLUTION_SOURCES,
    ]);
  });

  it('does not flag sources when one side has none', () => {
    const missing = makeEvent({
      venue: VenueId.PREDYX,
      resolutionSourceUrl: null,
    });
    expect(detectRiskFactors(eventA, missing, 0)).toEqual([]);
  });

  it('flags deadlines more than a week apart', () => {
    const eventB = makeEvent({ venue: VenueId.PREDYX });
    expect(detectRiskFactors(eventA, eventB, 7)).toEqual([]);
    expect(detectRiskFactors(eventA, eventB, 8)).toEqual([
      RiskFactor.DEADLINE_MISMATCH_GT_WEEK,
    ]);
    expect(detectRiskFactors(eventA, eventB, null)).toEqual([]);
  });

  it('flags differing market types', () => {
    const multi = makeEvent({
      venue: VenueId.PREDYX,
      marketType: MarketType.MULTI_OUTCOME,
    });
    expect(detectRiskFactors(eventA, multi, 0)).toEqual([
      RiskFactor.DIFFERENT_MARKET_TYPES,
    ]);
  });
});

describe('requiresHumanReview', () => {
  it('passes a confident, clean, aligned match', () => {
    expect(requiresHumanReview(0.9, [], 1)).toBe(false);
  });

  it('requires review below 0.9 confidence', () => {
    expect(requiresHumanReview(0.89, [], 0)).toBe(true);
  });

  it('requires review when any risk factor is present', () => {
    expect(
      requiresHumanReview(1, [RiskFactor.DIFFERENT_MARKET_TYPES], 0),
    ).toBe(true);
  });

  it('requires review when deadlines differ by more than a day', () => {
    expect(requiresHumanReview(1, [], 2)).toBe(true);
  });

  it('requires review when the deadline gap is unknown', () => {
    expect(requiresHumanReview(1, [], null)).toBe(true);
  });
});
