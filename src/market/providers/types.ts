import type { HistoryRange, LiveQuote, RawSeries } from "../types";

/**
* Read-only access to a market-data provider. Implementations hold no state
* between calls.
*
* Both methods throw `NoDataError` when the provider has nothing for the symbol
* and `TransientFetchError` for network, rate-limit or provider-side failures.
*/
export interface MarketDataGateway {
  fetchHistory(symbol: string, range: HistoryRange, signal?: AbortSignal): Promise<RawSeries>;
  fetchQuote(symbol: string, signal?: AbortSignal): Promise<LiveQuote>;
}
