/**
 * tools/types.ts — The tool-invocation contract
 *
 * These shapes cross the wire between the agent and the tool server, so the
 * field names are stable. Envelope types are plain type aliases (not
 * interfaces) so they can travel as MCP structuredContent.
 */

import { z } from "zod";
import type { CredentialName } from "../config.js";
import type { Logger } from "../logger.js";

// ── Descriptors ───────────────────────────────────────────────────────────────

export type ParamType = "string" | "number" | "integer" | "boolean";

export interface ParamSpec {
    name: string;
    type: ParamType;
    required: boolean;
    description: string;
}

export interface ResultSpec {
    type: "string" | "number" | "object" | "array";
    description: string;
}

/** What the agent sees of a tool: enough to decide whether and how to call it */
export interface ToolDescriptor {
    name: string;
    description: string;
    /** Ordered parameter list */
    params: ParamSpec[];
    returns: ResultSpec;
}

// ── Invocation envelope ───────────────────────────────────────────────────────

export type ToolErrorKind =
    | "unknown_tool"
    | "invalid_arguments"
    | "downstream_failure"
    | "missing_credential";

export type ToolError = {
    kind: ToolErrorKind;
    message: string;
    /** The offending parameter, for invalid_arguments */
    parameter?: string;
};

export type InvocationRequest = {
    tool: string;
    arguments: Record<string, unknown>;
};

export type InvocationSuccess = {
    status: "success";
    tool: string;
    result: unknown;
};

export type InvocationFailure = {
    status: "failure";
    tool: string;
    error: ToolError;
};

export type InvocationResponse = InvocationSuccess | InvocationFailure;

const toolErrorSchema = z.object({
    kind: z.enum(["unknown_tool", "invalid_arguments", "downstream_failure", "missing_credential"]),
    message: z.string(),
    parameter: z.string().optional(),
});

const invocationResponseSchema = z.discriminatedUnion("status", [
    z.object({ status: z.literal("success"), tool: z.string(), result: z.unknown() }),
    z.object({ status: z.literal("failure"), tool: z.string(), error: toolErrorSchema }),
]);

/** Read an envelope received over the wire; null when the value is not one */
export function parseInvocationResponse(value: unknown): InvocationResponse | null {
    const parsed = invocationResponseSchema.safeParse(value);
    if (!parsed.success) return null;
    const data = parsed.data;
    if (data.status === "success") {
        return { status: "success", tool: data.tool, result: data.result };
    }
    const error: ToolError = { kind: data.error.kind, message: data.error.message };
    if (data.error.parameter !== undefined) error.parameter = data.error.parameter;
    return { status: "failure", tool: data.tool, error };
}

export function failure(
    tool: string,
    kind: ToolErrorKind,
    message: string,
    parameter?: string
): InvocationFailure {
    const error: ToolError = { kind, message };
    if (parameter !== undefined) error.parameter = parameter;
    return { status: "failure", tool, error };
}

// ── Definitions ───────────────────────────────────────────────────────────────

export interface ToolContext {
    /** Aborted when the invocation times out */
    signal: AbortSignal;
    logger: Logger;
}

/**
 * A tool as registered on the server. Parameters are a zod object schema;
 * the advertised ParamSpec list is derived from it.
 */
export interface ToolDefinition<P extends z.ZodRawShape, R> {
    name: string;
    description: string;
    params: z.ZodObject<P>;
    /** Shape the result must have before it is put in a success envelope */
    result: z.ZodType<R, z.ZodTypeDef, unknown>;
    /** Human-readable description of the result */
    returns: string;
    /** Credentials that must be configured before the tool may run */
    requires?: CredentialName[];
    /** Overrides the registry's default timeout */
    timeoutMs?: number;
    execute(args: z.output<z.ZodObject<P>>, ctx: ToolContext): Promise<R>;
}

/** Identity helper so each tool file gets its argument types inferred */
export function defineTool<P extends z.ZodRawShape, R>(
    definition: ToolDefinition<P, R>
): ToolDefinition<P, R> {
    return definition;
}
