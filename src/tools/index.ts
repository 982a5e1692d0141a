/**
 * tools/index.ts — The tool catalog
 *
 * Every tool the server exposes is registered here, once, at startup.
 *
 * Adding a new tool:
 *   1. Create src/tools/my-tool.ts exporting a defineTool(...) result (or a factory for one)
 *   2. Add a register() call below
 */

import { availableCredentials, type Config } from "../config.js";
import type { Services } from "../services/types.js";
import { createCurrentDateTool } from "./current-date.js";
import { createEmbedTool, createIndexDocumentTool } from "./embed.js";
import { createFinanceTool } from "./finance.js";
import { helloTool } from "./hello.js";
import { createHybridSearchTool } from "./hybrid-search.js";
import { ToolRegistry } from "./registry.js";
import { createWebCrawlTool } from "./web-crawl.js";
import { createWebSearchTool } from "./web-search.js";

export function createToolRegistry(cfg: Config, services: Services): ToolRegistry {
    const credentials = availableCredentials(cfg);

    return new ToolRegistry({ credentials, timeoutMs: cfg.TOOL_TIMEOUT_MS })
        .register(createWebSearchTool(services.web))
        .register(createWebCrawlTool(services.web, cfg.CRAWL_MAX_CHARS))
        .register(createFinanceTool(services.market))
        .register(createEmbedTool(services.embeddings))
        .register(createIndexDocumentTool(services.embeddings, services.index))
        .register(
            createHybridSearchTool(services.embeddings, services.index, {
                vectorEnabled: credentials.has("openai"),
                fallback: cfg.HYBRID_SEARCH_FALLBACK,
            })
        )
        .register(helloTool)
        .register(createCurrentDateTool(services.now));
}

export { ToolRegistry } from "./registry.js";
