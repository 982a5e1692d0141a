/**
 * tools/finance.ts — Latest market price for a ticker symbol
 */

import { z } from "zod";
import type { MarketDataClient } from "../services/types.js";
import { ToolFailure } from "./errors.js";
import { defineTool } from "./types.js";

export const quoteResultSchema = z.object({
    ticker: z.string(),
    price: z.number(),
    currency: z.string().nullable(),
    marketTime: z.string().nullable(),
});

export function createFinanceTool(market: MarketDataClient) {
    return defineTool({
        name: "yahoo_finance",
        description:
            "Fetch the latest market price for a stock, ETF, index or crypto ticker symbol (e.g. AAPL, TQQQ, BTC-USD).",
        params: z.object({
            ticker: z
                .string()
                .trim()
                .min(1)
                .max(16)
                .describe("Ticker symbol, e.g. AAPL"),
        }),
        result: quoteResultSchema,
        returns: "{ ticker, price, currency, marketTime } for the latest quote",

        async execute({ ticker }, { logger }) {
            const symbol = ticker.toUpperCase();
            logger.info("Quote requested", { ticker: symbol });

            const quote = await market.quote(symbol);
            if (!quote) {
                throw new ToolFailure("downstream_failure", `Could not fetch price for ${symbol}`);
            }

            return {
                ticker: quote.symbol,
                price: quote.price,
                currency: quote.currency,
                marketTime: quote.marketTime ? quote.marketTime.toISOString() : null,
            };
        },
    });
}
