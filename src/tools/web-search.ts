/**
 * tools/web-search.ts — Web search via Tavily
 *
 * Tool schema:
 *   web_search(query, count?)
 *     - query: the search string
 *     - count: number of results to return (1-10, default 5)
 */

import { z } from "zod";
import type { WebClient } from "../services/types.js";
import { defineTool } from "./types.js";

export const webSearchResultSchema = z.object({
    query: z.string(),
    answer: z.string().nullable(),
    results: z.array(
        z.object({
            rank: z.number().int().positive(),
            title: z.string(),
            url: z.string(),
            snippet: z.string(),
            publishedDate: z.string().nullable(),
        })
    ),
});

export function createWebSearchTool(web: WebClient) {
    return defineTool({
        name: "web_search",
        description:
            "Search the web and return the top results with titles, snippets, and URLs, " +
            "plus a short summary answer when one is available. Use this for current " +
            "information, news, or facts that may have changed recently.",
        params: z.object({
            query: z.string().trim().min(1).describe("The search query to look up"),
            count: z
                .number()
                .int()
                .min(1)
                .max(10)
                .default(5)
                .describe("Number of results to return (1-10). Default 5."),
        }),
        result: webSearchResultSchema,
        returns: "{ query, answer, results: [{ rank, title, url, snippet, publishedDate }] } ranked best first",
        requires: ["tavily"],

        async execute({ query, count }, { signal, logger }) {
            logger.info("web_search called", { query, count });

            const response = await web.search(query, { maxResults: count, signal });
            logger.debug("search complete", { results: response.results.length });

            return {
                query,
                answer: response.answer,
                results: response.results.slice(0, count).map((r, i) => ({
                    rank: i + 1,
                    title: r.title,
                    url: r.url,
                    snippet: r.content || "(no description)",
                    publishedDate: r.publishedDate ? r.publishedDate.slice(0, 10) : null,
                })),
            };
        },
    });
}
