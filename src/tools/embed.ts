/**
 * tools/embed.ts — Text embedding and indexing
 *
 *   embed_text(text)              → the embedding vector itself
 *   index_document(text, source?) → embeds the text and adds it to the hybrid index
 */

import { z } from "zod";
import type { DocumentIndex, EmbeddingClient } from "../services/types.js";
import { ToolFailure } from "./errors.js";
import { defineTool } from "./types.js";

async function embedChecked(
    embeddings: EmbeddingClient,
    text: string,
    signal: AbortSignal
): Promise<number[]> {
    const vector = await embeddings.embed(text, { signal });
    if (vector.length !== embeddings.dimensions) {
        throw new ToolFailure(
            "downstream_failure",
            `Embedding has ${vector.length} dimensions, expected ${embeddings.dimensions}`
        );
    }
    return vector;
}

export const embedResultSchema = z.object({
    model: z.string(),
    dimensions: z.number().int().positive(),
    embedding: z.array(z.number()),
});

export const indexResultSchema = z.object({ id: z.string(), dimensions: z.number().int().positive() });

export function createEmbedTool(embeddings: EmbeddingClient) {
    return defineTool({
        name: "embed_text",
        description: "Compute a fixed-length embedding vector for a piece of text.",
        params: z.object({ text: z.string().trim().min(1).describe("The text to embed") }),
        result: embedResultSchema,
        returns: "{ model, dimensions, embedding } where embedding has exactly `dimensions` numbers",
        requires: ["openai"],

        async execute({ text }, { signal }) {
            const embedding = await embedChecked(embeddings, text, signal);
            return { model: embeddings.model, dimensions: embedding.length, embedding };
        },
    });
}

export function createIndexDocumentTool(embeddings: EmbeddingClient, index: DocumentIndex) {
    return defineTool({
        name: "index_document",
        description:
            "Add a piece of text to the document index so hybrid_search can find it later.",
        params: z.object({
            text: z.string().trim().min(1).describe("The document text to index"),
            source: z.string().optional().describe("Where the text came from (URL, file name, ...)"),
        }),
        result: indexResultSchema,
        returns: "{ id, dimensions } of the stored document",
        requires: ["supabase", "openai"],

        async execute({ text, source }, { signal, logger }) {
            const embedding = await embedChecked(embeddings, text, signal);
            const { id } = await index.add({ content: text, source: source ?? null, embedding });
            logger.info("Document indexed", { id, chars: text.length });
            return { id, dimensions: embedding.length };
        },
    });
}
