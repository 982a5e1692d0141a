/**
 * services/yahoo-finance.ts — Market data from Yahoo Finance (no API key needed)
 */

import yahooFinance from "yahoo-finance2";
import type { MarketDataClient, Quote } from "./types.js";

export function createYahooMarketDataClient(): MarketDataClient {
    return {
        async quote(ticker): Promise<Quote | null> {
            const q = await yahooFinance.quote(ticker);
            if (!q || typeof q.regularMarketPrice !== "number") return null;
            return {
                symbol: q.symbol,
                price: q.regularMarketPrice,
                currency: q.currency ?? null,
                marketTime: q.regularMarketTime ?? null,
            };
        },
    };
}
