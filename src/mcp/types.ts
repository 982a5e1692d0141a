/**
 * mcp/types.ts — Shared types for the MCP tool client
 */

/** Where and how the agent connects to a tool server */
export interface McpServerConfig {
    /** Label used in logs */
    name: string;
    /** HTTP URL of the Streamable HTTP endpoint, e.g. http://127.0.0.1:8000/mcp */
    url: string;
    /** Give up connecting (and discovering tools) after this many milliseconds */
    connectTimeoutMs?: number;
}

/** Runtime status of the connection */
export interface McpServerStatus {
    name: string;
    url: string;
    connected: boolean;
    toolCount: number;
    error?: string;
}
