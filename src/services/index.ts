/**
 * services/index.ts — Build the shared third-party clients from a configuration record.
 *
 * Each client connects lazily on first use and is then reused by every
 * invocation, so concurrent agent sessions share one connection pool per service.
 */

import type { Config } from "../config.js";
import { createOpenAIEmbeddingClient } from "./embeddings.js";
import { createSupabaseDocumentIndex } from "./supabase-index.js";
import { createTavilyWebClient } from "./tavily.js";
import type { Services } from "./types.js";
import { createYahooMarketDataClient } from "./yahoo-finance.js";

export function createServices(cfg: Config): Services {
    return {
        web: createTavilyWebClient(cfg.TAVILY_API_KEY),
        embeddings: createOpenAIEmbeddingClient(
            cfg.OPENAI_API_KEY,
            cfg.EMBEDDING_MODEL,
            cfg.EMBEDDING_DIMENSIONS
        ),
        index: createSupabaseDocumentIndex(
            cfg.SUPABASE_URL,
            cfg.SUPABASE_SERVICE_ROLE_KEY,
            cfg.SUPABASE_DOCUMENTS_TABLE
        ),
        market: createYahooMarketDataClient(),
        now: () => new Date(),
    };
}

