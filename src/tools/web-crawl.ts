/**
 * tools/web-crawl.ts — Fetch the readable content of a web page.
 *
 * Accepts either an absolute http(s) URL, which is extracted directly, or a
 * search query: the query is searched first and the top-ranked result is
 * extracted. Content is cut to maxChars to keep replies bounded.
 */

import { z } from "zod";
import type { WebClient } from "../services/types.js";
import { ToolFailure } from "./errors.js";
import { defineTool } from "./types.js";

function asHttpUrl(value: string): string | null {
    try {
        const url = new URL(value);
        return url.protocol === "http:" || url.protocol === "https:" ? url.href : null;
    } catch {
        return null;
    }
}

export const crawlResultSchema = z.object({
    url: z.string(),
    content: z.string(),
    truncated: z.boolean(),
});

export function createWebCrawlTool(web: WebClient, maxChars: number) {
    return defineTool({
        name: "web_crawl",
        description:
            "Crawl a web page and return its text. Pass a URL to read that page, or a search " +
            "query to search the web and read the top result.",
        params: z.object({
            query: z.string().trim().min(1).describe("Search query, or an absolute http(s) URL"),
        }),
        result: crawlResultSchema,
        returns: "{ url, content, truncated } for the crawled page",
        requires: ["tavily"],

        async execute({ query }, { signal, logger }) {
            let url = asHttpUrl(query);

            if (!url) {
                const search = await web.search(query, { maxResults: 1, signal });
                const top = search.results[0];
                if (!top) {
                    throw new ToolFailure("downstream_failure", `No search results to crawl for: "${query}"`);
                }
                url = top.url;
            }

            logger.info("Crawling page", { url });
            const content = await web.extract(url, { signal });
            if (!content) {
                throw new ToolFailure("downstream_failure", `No content could be extracted from ${url}`);
            }

            return {
                url,
                content: content.slice(0, maxChars),
                truncated: content.length > maxChars,
            };
        },
    });
}
