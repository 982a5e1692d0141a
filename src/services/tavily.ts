/**
 * services/tavily.ts — Web search and page extraction via Tavily
 *
 * Tavily is purpose-built for AI agents: it returns clean, scored results,
 * an optional LLM-ready answer summary, and raw page content through extract().
 * Free tier: 1,000 credits/month — https://app.tavily.com
 */

import { tavily } from "@tavily/core";
import type { WebClient, WebSearchResponse } from "./types.js";

type TavilyClient = ReturnType<typeof tavily>;

export function createTavilyWebClient(apiKey: string): WebClient {
    // Built on first use so a missing key never fails at startup
    let client: TavilyClient | null = null;
    const getClient = (): TavilyClient => {
        if (!client) client = tavily({ apiKey });
        return client;
    };

    return {
        async search(query, { maxResults, signal }): Promise<WebSearchResponse> {
            signal?.throwIfAborted();
            const response = await getClient().search(query, {
                maxResults,
                searchDepth: "basic",
                includeAnswer: true,
            });
            return {
                answer: response.answer || null,
                results: response.results.map((r) => ({
                    title: r.title ?? "",
                    url: r.url,
                    content: (r.content ?? "").trim(),
                    score: r.score ?? 0,
                    publishedDate: r.publishedDate || null,
                })),
            };
        },

        async extract(url, options): Promise<string | null> {
            options?.signal?.throwIfAborted();
            const response = await getClient().extract([url]);
            const page = response.results.find((r) => r.url === url) ?? response.results[0];
            return page?.rawContent || null;
        },
    };
}
