#!/usr/bin/env node
/**
 * server.ts — Tool server entry point
 *
 * Validates config, builds the registry, serves MCP at POST /mcp.
 * Handles graceful shutdown on SIGINT / SIGTERM.
 */

import { availableCredentials, config } from "./config.js";
import { logger } from "./logger.js";
import { createHttpApp } from "./mcp/server.js";
import { createServices } from "./services/index.js";
import { createToolRegistry } from "./tools/index.js";

async function main() {
    const registry = createToolRegistry(config, createServices(config));
    const credentials = [...availableCredentials(config)];

    logger.info("🚀 Tool server starting up…", {
        tools: registry.describe().map((t) => t.name),
        credentials,
        timeoutMs: config.TOOL_TIMEOUT_MS,
    });

    const app = createHttpApp(registry);
    const server = await new Promise<ReturnType<typeof app.listen>>((resolve, reject) => {
        const s = app.listen(config.TOOL_SERVER_PORT, config.TOOL_SERVER_HOST, () => resolve(s));
        s.once("error", reject);
    });
    logger.info(`✅ Listening on http://${config.TOOL_SERVER_HOST}:${config.TOOL_SERVER_PORT}/mcp`);

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down…`);
        server.close((err) => {
            if (err) logger.error("Error while closing the HTTP server", { error: err.message });
            process.exit(err ? 1 : 0);
        });
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
    console.error("Fatal error during startup:", err);
    process.exit(1);
});
