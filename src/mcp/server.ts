/**
 * mcp/server.ts — Expose a ToolRegistry over the Model Context Protocol
 *
 * tools/list advertises every descriptor (JSON Schema inputSchema in parameter
 * order, result description under _meta.returns). tools/call runs registry.invoke()
 * and returns the invocation envelope both as structuredContent and as JSON
 * text, so plain MCP clients can read it too.
 *
 * HTTP: stateless Streamable HTTP on POST /mcp. Every request gets its own
 * Server + transport pair; the registry and the service clients behind it are
 * shared.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    type CallToolResult,
    type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { logger } from "../logger.js";
import type { ToolRegistry } from "../tools/registry.js";
import { toJsonSchema } from "../tools/schema.js";
import type { InvocationResponse, ToolDescriptor } from "../tools/types.js";

const log = logger.child("mcp");

export const SERVER_INFO = { name: "tool-relay", version: "1.0.0" } as const;

export function toMcpTool(descriptor: ToolDescriptor): Tool {
    return {
        name: descriptor.name,
        description: descriptor.description,
        inputSchema: toJsonSchema(descriptor.params),
        _meta: { returns: descriptor.returns },
    };
}

export function toCallToolResult(response: InvocationResponse): CallToolResult {
    return {
        content: [{ type: "text", text: JSON.stringify(response) }],
        structuredContent: response,
        isError: response.status === "failure",
    };
}

export function createMcpServer(registry: ToolRegistry): Server {
    const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: registry.describe().map(toMcpTool),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        log.debug("tools/call", { tool: name });
        const response = await registry.invoke({ tool: name, arguments: args ?? {} });
        return toCallToolResult(response);
    });

    return server;
}

// ── HTTP ──────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
    constructor(
        public statusCode: number,
        message: string
    ) {
        super(message);
        this.name = "ApiError";
    }
}

function methodNotAllowed(_req: Request, res: Response): void {
    res.status(405).json({
        jsonrpc: "2.0",
        error: { code: -32000, message: "Method not allowed: this server is stateless, use POST" },
        id: null,
    });
}

export function createHttpApp(registry: ToolRegistry): Express {
    const app = express();
    app.use(express.json({ limit: "1mb" }));

    app.get("/health", (_req, res) => {
        res.json({ status: "ok", tools: registry.describe().length });
    });

    app.post("/mcp", async (req, res, next) => {
        const server = createMcpServer(registry);
        const transport = new StreamableHTTPServerTransport({
            sessionIdGenerator: undefined,
            enableJsonResponse: true,
        });
        res.on("close", () => {
            void transport.close();
            void server.close();
        });
        try {
            await server.connect(transport);
            await transport.handleRequest(req, res, req.body);
        } catch (err) {
            next(err);
        }
    });

    app.get("/mcp", methodNotAllowed);
    app.delete("/mcp", methodNotAllowed);

    app.use((req, _res, next) => {
        next(new ApiError(404, `No route for ${req.method} ${req.path}`));
    });

    app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof ApiError) {
            res.status(error.statusCode).json({ error: error.message });
            return;
        }
        log.error("Error handling request", {
            error: error.message,
            path: req.path,
            method: req.method,
        });
        if (res.headersSent) return;
        res.status(500).json({ error: "Internal server error" });
    });

    return app;
}
