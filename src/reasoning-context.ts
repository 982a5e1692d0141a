/**
 * reasoning-context.ts — The agent's record of what happened in each turn.
 *
 * Append-only and in memory: one context per agent session, gone when the
 * process exits.
 */

import type { InvocationResponse } from "./tools/types.js";

export type TurnState = "AwaitingUserInput" | "Reasoning" | "ToolInvocation" | "AnswerReady";

/** One tool call the planner asked for */
export interface PlannedCall {
    /** Correlates the call with its result (provider tool-call id, or a generated one) */
    id: string;
    tool: string;
    arguments: Record<string, unknown>;
}

export interface InvocationRecord {
    /** Reasoning step (1-based) in which the call was planned */
    step: number;
    call: PlannedCall;
    response: InvocationResponse;
}

export interface TurnRecord {
    userTurn: string;
    invocations: InvocationRecord[];
    answer: string;
    /** States the turn passed through, in order */
    states: TurnState[];
}

export class ReasoningContext {
    private readonly records: TurnRecord[] = [];

    append(record: TurnRecord): void {
        this.records.push(record);
    }

    get turns(): readonly TurnRecord[] {
        return this.records;
    }
}
