/**
 * tools/hybrid-search.ts — Semantic + keyword retrieval over the document index
 *
 * The vector half needs an embedding. When embeddings are unavailable (no
 * OpenAI key, or the embedding call fails) the configured fallback decides:
 *   "keyword" → answer with keyword-only results, mode: "keyword"
 *   "none"    → report the failure
 */

import { z } from "zod";
import type { DocumentIndex, EmbeddingClient, ScoredDocument } from "../services/types.js";
import { ToolFailure, describeError } from "./errors.js";
import { defineTool } from "./types.js";

export type HybridFallback = "none" | "keyword";

export interface HybridSearchOptions {
    /** Whether the embedding credential is configured */
    vectorEnabled: boolean;
    fallback: HybridFallback;
}

function ranked(docs: ScoredDocument[]) {
    return docs.map((d, i) => ({
        rank: i + 1,
        id: d.id,
        content: d.content,
        source: d.source,
        score: d.score,
    }));
}

export const hybridSearchResultSchema = z.object({
    query: z.string(),
    mode: z.enum(["hybrid", "keyword"]),
    results: z.array(
        z.object({
            rank: z.number().int().positive(),
            id: z.string(),
            content: z.string(),
            source: z.string().nullable(),
            score: z.number(),
        })
    ),
});

export function createHybridSearchTool(
    embeddings: EmbeddingClient,
    index: DocumentIndex,
    options: HybridSearchOptions
) {
    return defineTool({
        name: "hybrid_search",
        description:
            "Search previously indexed documents by meaning and by keyword together. " +
            "Returns the most similar documents with their scores.",
        params: z.object({
            query: z.string().trim().min(1).describe("What to look for"),
            limit: z.number().int().min(1).max(20).default(5).describe("Maximum documents to return (1-20). Default 5."),
        }),
        result: hybridSearchResultSchema,
        returns: "{ query, mode, results: [{ rank, id, content, source, score }] } most similar first",
        requires: ["supabase"],

        async execute({ query, limit }, { signal, logger }) {
            const keywordOnly = async () => ({
                query,
                mode: "keyword" as const,
                results: ranked(await index.keywordSearch(query, limit)),
            });

            if (!options.vectorEnabled) {
                if (options.fallback === "keyword") return keywordOnly();
                throw new ToolFailure(
                    "missing_credential",
                    "Tool \"hybrid_search\" needs OPENAI_API_KEY for its vector half (set HYBRID_SEARCH_FALLBACK=keyword to allow keyword-only results)"
                );
            }

            let embedding: number[];
            try {
                embedding = await embeddings.embed(query, { signal });
            } catch (err) {
                if (options.fallback !== "keyword" || signal.aborted) throw err;
                logger.warn("Embedding failed, falling back to keyword search", { error: describeError(err) });
                return keywordOnly();
            }

            return {
                query,
                mode: "hybrid" as const,
                results: ranked(await index.hybridSearch(query, embedding, limit)),
            };
        },
    });
}
