/**
 * tools/errors.ts — Errors a tool may throw to pick its failure kind.
 * Anything else thrown from a tool is reported as downstream_failure.
 */

import type { ToolErrorKind } from "./types.js";

export class ToolFailure extends Error {
    constructor(
        readonly kind: ToolErrorKind,
        message: string,
        readonly parameter?: string
    ) {
        super(message);
        this.name = "ToolFailure";
    }
}

export class ToolTimeoutError extends Error {
    constructor(readonly timeoutMs: number) {
        super(`timed out after ${timeoutMs}ms`);
        this.name = "ToolTimeoutError";
    }
}

/** Message of an unknown thrown value */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
