/**
 * mcp/client.ts — ToolClient over @modelcontextprotocol/sdk
 *
 * Connects to the tool server's Streamable HTTP endpoint (or any transport
 * handed to connect(), e.g. an in-memory pair in tests), discovers the tools
 * once, and turns every tools/call into an InvocationResponse. Transport
 * faults never escape invoke(): they come back as downstream_failure.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { logger } from "../logger.js";
import type { ToolClient } from "../tool-client.js";
import { describeError } from "../tools/errors.js";
import { paramsFromJsonSchema } from "../tools/schema.js";
import {
    failure,
    parseInvocationResponse,
    type InvocationRequest,
    type InvocationResponse,
    type ResultSpec,
    type ToolDescriptor,
} from "../tools/types.js";
import type { McpServerConfig, McpServerStatus } from "./types.js";

const log = logger.child("mcp");

const DEFAULT_CONNECT_TIMEOUT_MS = 15000;

const metaSchema = z.object({
    returns: z.object({
        type: z.enum(["string", "number", "object", "array"]),
        description: z.string(),
    }),
});

async function withTimeout<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    try {
        return await Promise.race([
            promise,
            new Promise<never>((_, reject) => {
                timer = setTimeout(() => reject(new Error(`${what} timeout`)), ms);
            }),
        ]);
    } finally {
        clearTimeout(timer);
    }
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

export function toDescriptor(tool: Tool): ToolDescriptor {
    const meta = metaSchema.safeParse(tool._meta);
    const returns: ResultSpec = meta.success
        ? meta.data.returns
        : { type: "object", description: "" };
    return {
        name: tool.name,
        description: tool.description ?? "",
        params: paramsFromJsonSchema(tool.inputSchema),
        returns,
    };
}

/** Read the invocation envelope out of a tools/call result */
export function toInvocationResponse(toolName: string, raw: unknown): InvocationResponse {
    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
        return failure(toolName, "downstream_failure", "Tool server sent a malformed tools/call result");
    }

    const fromStructured = parseInvocationResponse(parsed.data.structuredContent);
    if (fromStructured) return fromStructured;

    let text = "";
    for (const block of parsed.data.content) {
        if (block.type === "text") {
            text = block.text;
            break;
        }
    }
    const fromText = parseInvocationResponse(parseJson(text));
    if (fromText) return fromText;

    return parsed.data.isError
        ? failure(toolName, "downstream_failure", text || "Tool server reported an error")
        : { status: "success", tool: toolName, result: text };
}

export class McpToolClient implements ToolClient {
    private client: Client | null = null;
    private _tools: ToolDescriptor[] = [];
    private _connected = false;
    private _error: string | undefined;

    constructor(private readonly cfg: McpServerConfig) { }

    get connected(): boolean {
        return this._connected;
    }

    status(): McpServerStatus {
        const status: McpServerStatus = {
            name: this.cfg.name,
            url: this.cfg.url,
            connected: this._connected,
            toolCount: this._tools.length,
        };
        if (this._error !== undefined) status.error = this._error;
        return status;
    }

    /** Connect to the tool server and discover its tools. Never throws; check `connected`. */
    async connect(transport?: Transport): Promise<void> {
        const timeoutMs = this.cfg.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
        try {
            const client = new Client(
                { name: "tool-relay-agent", version: "1.0.0" },
                { capabilities: {} }
            );
            this.client = client;

            await withTimeout(
                client.connect(transport ?? new StreamableHTTPClientTransport(new URL(this.cfg.url))),
                timeoutMs,
                "Connection"
            );

            const listed = await withTimeout(client.listTools(), timeoutMs, "Tool discovery");
            this._tools = listed.tools.map(toDescriptor);
            this._connected = true;
            this._error = undefined;

            log.info(`Connected to "${this.cfg.name}"`, { url: this.cfg.url, tools: this._tools.length });
        } catch (err) {
            this.client = null;
            this._connected = false;
            this._error = describeError(err);
            log.error(`Failed to connect to "${this.cfg.name}"`, { error: this._error });
        }
    }

    async listTools(): Promise<ToolDescriptor[]> {
        if (!this._connected) await this.connect();
        if (!this._connected) {
            throw new Error(`Tool server "${this.cfg.name}" is unreachable: ${this._error ?? "unknown"}`);
        }
        return this._tools;
    }

    async invoke(request: InvocationRequest): Promise<InvocationResponse> {
        if (!this.client || !this._connected) {
            return failure(
                request.tool,
                "downstream_failure",
                `Tool server "${this.cfg.name}" is not connected${this._error ? `: ${this._error}` : ""}`
            );
        }

        try {
            const result = await this.client.callTool({
                name: request.tool,
                arguments: request.arguments,
            });
            return toInvocationResponse(request.tool, result);
        } catch (err) {
            const msg = describeError(err);
            log.warn("tools/call failed", { tool: request.tool, error: msg });
            return failure(request.tool, "downstream_failure", `Calling "${request.tool}" on "${this.cfg.name}" failed: ${msg}`);
        }
    }

    /** Disconnect cleanly */
    async close(): Promise<void> {
        if (this.client) {
            try {
                await this.client.close();
            } catch (err) {
                log.debug("Disconnect error ignored", { error: describeError(err) });
            }
            this.client = null;
        }
        this._connected = false;
        this._tools = [];
    }
}
