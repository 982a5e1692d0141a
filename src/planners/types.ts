/**
 * planners/types.ts — The strategy that decides which tool, if any, to call next.
 *
 * The agent owns the loop and the state machine; a planner only looks at
 * what has happened so far in the turn and says what to do next.
 */

import type { InvocationRecord, PlannedCall, TurnRecord } from "../reasoning-context.js";
import type { ToolDescriptor } from "../tools/types.js";

export interface PlannerInput {
    userTurn: string;
    tools: readonly ToolDescriptor[];
    /** Invocations already made in this turn, oldest first */
    invocations: readonly InvocationRecord[];
    /** Earlier turns of the session */
    history: readonly TurnRecord[];
}

export type PlannerDecision =
    | { type: "invoke"; calls: PlannedCall[] }
    | { type: "answer"; text: string };

export interface Planner {
    readonly name: string;
    decide(input: PlannerInput): Promise<PlannerDecision>;
}
