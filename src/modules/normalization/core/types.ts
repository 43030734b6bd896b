/**
 * Currency and price year an amount is, or should be, expressed in.
 * `currency` is an ISO3 country code, `USD` or `I$`.
 */
export interface PriceBase {
  readonly currency: string;
  readonly year: number;
}

export interface RebaserOptions {
  /**
   * Economy whose GDP deflator re-prices international dollars between years.
   * Defaults to USA.
   */
  deflatorCountry?: string;
}
