/**
 * tool-client.ts — How the agent reaches a tool registry
 *
 * McpToolClient (mcp/client.ts) talks to a remote tool server over HTTP;
 * LocalToolClient runs the registry in the same process (`--local`, tests).
 */

import type { ToolRegistry } from "./tools/registry.js";
import type { InvocationRequest, InvocationResponse, ToolDescriptor } from "./tools/types.js";

export interface ToolClient {
    /** Descriptors of every tool the registry exposes */
    listTools(): Promise<ToolDescriptor[]>;
    invoke(request: InvocationRequest): Promise<InvocationResponse>;
    close(): Promise<void>;
}

export class LocalToolClient implements ToolClient {
    constructor(private readonly registry: ToolRegistry) { }

    async listTools(): Promise<ToolDescriptor[]> {
        return this.registry.describe();
    }

    invoke(request: InvocationRequest): Promise<InvocationResponse> {
        return this.registry.invoke(request);
    }

    async close(): Promise<void> { }
}
