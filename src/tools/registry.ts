/**
 * tools/registry.ts — Tool registry and the single invoke() boundary
 *
 * Tools are added by an explicit register() call each (see tools/index.ts).
 * invoke() never throws: every fault is reported in-band as a failure
 * envelope, and the registry keeps serving afterwards.
 *
 * Order of checks for one invocation:
 *   1. unknown tool         → unknown_tool
 *   2. argument validation  → invalid_arguments (tool never runs)
 *   3. credentials          → missing_credential (no network call)
 *   4. execute with timeout → downstream_failure on throw / timeout / bad result
 */

import type { z } from "zod";
import { CREDENTIAL_ENV, type CredentialName } from "../config.js";
import { logger } from "../logger.js";
import { ToolFailure, ToolTimeoutError, describeError } from "./errors.js";
import { describeParams, describeResult } from "./schema.js";
import {
    failure,
    type InvocationRequest,
    type InvocationResponse,
    type ToolContext,
    type ToolDefinition,
    type ToolDescriptor,
    type ToolError,
} from "./types.js";

const log = logger.child("registry");

export interface ToolRegistryOptions {
    /** Credentials present in the configuration record */
    credentials: ReadonlySet<CredentialName>;
    /** Default per-invocation timeout */
    timeoutMs: number;
}

type Prepared =
    | { ok: true; run(ctx: ToolContext): Promise<unknown> }
    | { ok: false; error: ToolError };

interface RegisteredTool {
    descriptor: ToolDescriptor;
    requires: readonly CredentialName[];
    timeoutMs: number | undefined;
    prepare(raw: unknown): Prepared;
}

function argumentError(error: z.ZodError): ToolError {
    const issue = error.issues[0];
    const key = issue?.path[0];
    if (!issue || key === undefined) {
        return { kind: "invalid_arguments", message: "Arguments must be an object" };
    }
    const parameter = String(key);
    const missing = issue.code === "invalid_type" && issue.received === "undefined";
    return {
        kind: "invalid_arguments",
        message: missing
            ? `Missing required argument "${parameter}"`
            : `Invalid argument "${parameter}": ${issue.message}`,
        parameter,
    };
}

async function runWithTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const err = new ToolTimeoutError(timeoutMs);
            controller.abort(err);
            reject(err);
        }, timeoutMs);
    });
    try {
        return await Promise.race([task(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
    }
}

export class ToolRegistry {
    private readonly tools = new Map<string, RegisteredTool>();

    constructor(private readonly options: ToolRegistryOptions) { }

    register<P extends z.ZodRawShape, R>(definition: ToolDefinition<P, R>): this {
        const { name } = definition;
        if (this.tools.has(name)) {
            throw new Error(`Tool "${name}" is already registered`);
        }

        const descriptor: ToolDescriptor = {
            name,
            description: definition.description,
            params: describeParams(definition.params),
            returns: describeResult(definition.result, definition.returns),
        };

        this.tools.set(name, {
            descriptor,
            requires: definition.requires ?? [],
            timeoutMs: definition.timeoutMs,
            prepare: (raw) => {
                const args = definition.params.safeParse(raw);
                if (!args.success) return { ok: false, error: argumentError(args.error) };
                return {
                    ok: true,
                    run: async (ctx) => {
                        const value = await definition.execute(args.data, ctx);
                        const checked = definition.result.safeParse(value);
                        if (!checked.success) {
                            throw new ToolFailure(
                                "downstream_failure",
                                `Tool "${name}" returned a malformed result: ${checked.error.issues[0]?.message ?? "unknown"}`
                            );
                        }
                        return checked.data;
                    },
                };
            },
        });
        return this;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    /** Descriptors in registration order */
    describe(): ToolDescriptor[] {
        return [...this.tools.values()].map((t) => t.descriptor);
    }

    async invoke(request: InvocationRequest): Promise<InvocationResponse> {
        const name = request.tool;
        const entry = this.tools.get(name);
        if (!entry) {
            log.warn("Unknown tool requested", { tool: name });
            const available = [...this.tools.keys()].join(", ") || "none";
            return failure(name, "unknown_tool", `Unknown tool "${name}". Available: ${available}`);
        }

        const prepared = entry.prepare(request.arguments);
        if (!prepared.ok) {
            log.info("Rejected invalid arguments", { tool: name, error: prepared.error.message });
            return { status: "failure", tool: name, error: prepared.error };
        }

        const missing = entry.requires.filter((c) => !this.options.credentials.has(c));
        if (missing.length > 0) {
            const vars = missing.flatMap((c) => CREDENTIAL_ENV[c]).join(", ");
            return failure(name, "missing_credential", `Tool "${name}" is disabled: ${vars} not configured`);
        }

        const timeoutMs = entry.timeoutMs ?? this.options.timeoutMs;
        const toolLog = logger.child(`tool:${name}`);
        const started = Date.now();

        try {
            const result = await runWithTimeout(
                (signal) => prepared.run({ signal, logger: toolLog }),
                timeoutMs
            );
            log.debug("Tool succeeded", { tool: name, ms: Date.now() - started });
            return { status: "success", tool: name, result };
        } catch (err) {
            if (err instanceof ToolFailure) {
                log.warn("Tool reported failure", { tool: name, kind: err.kind, error: err.message });
                return failure(name, err.kind, err.message, err.parameter);
            }
            if (err instanceof ToolTimeoutError) {
                log.warn("Tool timed out", { tool: name, timeoutMs });
                return failure(name, "downstream_failure", `Tool "${name}" ${err.message}`);
            }
            log.error("Tool threw", { tool: name, error: describeError(err) });
            return failure(name, "downstream_failure", `Tool "${name}" failed: ${describeError(err)}`);
        }
    }
}
