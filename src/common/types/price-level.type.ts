/** Raw, unsorted order-book rung as delivered by a depth source. */
export interface RawPriceLevel {
  price: number;
  side: 'BUY' | 'SELL';
  size: number;
}
