/**
 * services/embeddings.ts — OpenAI embeddings
 *
 * Default model text-embedding-3-small (1536 dims, ~$0.02/M tokens).
 */

import OpenAI from "openai";
import type { EmbeddingClient } from "./types.js";

/** Inputs beyond this many characters are trimmed before embedding */
const MAX_INPUT_CHARS = 8192;

export function createOpenAIEmbeddingClient(
    apiKey: string,
    model: string,
    dimensions: number
): EmbeddingClient {
    let client: OpenAI | null = null;

    return {
        model,
        dimensions,

        async embed(text, options) {
            if (!client) client = new OpenAI({ apiKey });
            const response = await client.embeddings.create(
                { model, input: text.slice(0, MAX_INPUT_CHARS), dimensions },
                { signal: options?.signal }
            );
            const first = response.data[0];
            if (!first) throw new Error("OpenAI returned no embedding");
            return first.embedding;
        },
    };
}
