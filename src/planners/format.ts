/**
 * planners/format.ts — Turn invocation envelopes into plain-language text.
 */

import type { InvocationFailure } from "../tools/types.js";
import { dateResultSchema } from "../tools/current-date.js";
import { embedResultSchema, indexResultSchema } from "../tools/embed.js";
import { quoteResultSchema } from "../tools/finance.js";
import { hybridSearchResultSchema } from "../tools/hybrid-search.js";
import { crawlResultSchema } from "../tools/web-crawl.js";
import { webSearchResultSchema } from "../tools/web-search.js";

/** Hybrid-search snippets are cut to this length in answers */
const SNIPPET_CHARS = 300;

function fallback(result: unknown): string {
    return typeof result === "string" ? result : JSON.stringify(result, null, 2);
}

/** Render a successful tool result as an answer */
export function formatResult(tool: string, result: unknown): string {
    switch (tool) {
        case "yahoo_finance": {
            const q = quoteResultSchema.safeParse(result);
            if (!q.success) break;
            const currency = q.data.currency ? ` ${q.data.currency}` : "";
            return `The latest price for ${q.data.ticker} is ${q.data.price}${currency}.`;
        }
        case "web_search": {
            const s = webSearchResultSchema.safeParse(result);
            if (!s.success) break;
            if (s.data.results.length === 0 && !s.data.answer) {
                return `No results found for: "${s.data.query}"`;
            }
            const lines: string[] = [];
            if (s.data.answer) lines.push(s.data.answer, "");
            for (const r of s.data.results) {
                lines.push(`${r.rank}. ${r.title} — ${r.url}`);
            }
            return lines.join("\n").trimEnd();
        }
        case "web_crawl": {
            const c = crawlResultSchema.safeParse(result);
            if (!c.success) break;
            const more = c.data.truncated ? "\n\n[content truncated]" : "";
            return `Content of ${c.data.url}:\n\n${c.data.content}${more}`;
        }
        case "embed_text": {
            const e = embedResultSchema.safeParse(result);
            if (!e.success) break;
            const head = e.data.embedding.slice(0, 3).join(", ");
            return `Embedded the text with ${e.data.model} into a ${e.data.dimensions}-dimensional vector (starts ${head}, …).`;
        }
        case "index_document": {
            const d = indexResultSchema.safeParse(result);
            if (!d.success) break;
            return `Indexed the text as document ${d.data.id}.`;
        }
        case "hybrid_search": {
            const h = hybridSearchResultSchema.safeParse(result);
            if (!h.success) break;
            if (h.data.results.length === 0) return "No similar documents found.";
            const note = h.data.mode === "keyword" ? " (keyword match only)" : "";
            const docs = h.data.results.map(
                (r) => `${r.rank}. [${r.score.toFixed(3)}] ${r.content.slice(0, SNIPPET_CHARS)}`
            );
            return `Most similar documents${note}:\n${docs.join("\n")}`;
        }
        case "current_date": {
            const d = dateResultSchema.safeParse(result);
            if (!d.success) break;
            return `Current date is: ${d.data.date}`;
        }
    }
    return fallback(result);
}

/** Explain a failure envelope without exposing it raw */
export function explainFailure(response: InvocationFailure): string {
    const { tool, error } = response;
    switch (error.kind) {
        case "unknown_tool":
            return `the tool "${tool}" isn't available on the tool server`;
        case "invalid_arguments":
            return `the request to ${tool} was rejected (${error.message})`;
        case "missing_credential":
            return `${tool} is switched off because its API key isn't configured (${error.message})`;
        case "downstream_failure":
            return `${tool} couldn't get an answer from its provider (${error.message})`;
    }
}
