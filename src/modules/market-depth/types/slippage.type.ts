import { VenueId } from '../../../common/types/index.js';

export type TradeSide = 'buy' | 'sell';

export interface FilledLevel {
  readonly price: number;
  readonly size: number;
}

/** Simulated fill of `nominalSize` against one side of the book. */
export interface SlippageEstimate {
  readonly marketId: string;
  readonly side: TradeSide;
  readonly nominalSize: number;
  readonly averageFillPrice: number | null;
  /** Best quote on the consumed side */
  readonly expectedFillPrice: number | null;
  readonly slippageAbsolute: number | null;
  /** |average - best| / best */
  readonly slippagePercentage: number | null;
  /** |average - mid| / mid */
  readonly priceImpact: number | null;
  /** Filled size / total depth on the consumed side */
  readonly liquidityConsumed: number | null;
  readonly canExecute: boolean;
  readonly maxExecutableSize: number;
  readonly depthExhausted: boolean;
  readonly levelsConsumed: readonly FilledLevel[];
}

export interface MarketRef {
  readonly marketId: string;
  readonly venue: VenueId | null;
}

export interface ArbitrageSlippage {
  readonly buyLeg: SlippageEstimate;
  readonly sellLeg: SlippageEstimate;
  readonly buyVenue: MarketRef;
  readonly sellVenue: MarketRef;
}
