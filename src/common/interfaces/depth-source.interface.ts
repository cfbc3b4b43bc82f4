import { RawPriceLevel } from '../types/index.js';

export interface IDepthSource {
  /** Raw, unsorted levels for one venue market. Throws on fetch failure. */
  getPriceLevels(marketId: string): Promise<RawPriceLevel[]>;
}
