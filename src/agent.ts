/**
 * agent.ts — The agentic loop
 *
 * One user turn:
 *   1. AwaitingUserInput → Reasoning: ask the planner what to do
 *   2. If it wants tools, Reasoning → ToolInvocation: issue the calls one by
 *      one and record every envelope, then back to Reasoning
 *   3. Repeat until the planner answers OR the max-iterations cap is hit
 *   4. Reasoning → AnswerReady: append the turn to the reasoning context
 *
 * Failure notes:
 *   - Failure envelopes go back to the planner, which retries, substitutes or explains
 *   - A tool client that throws is recorded as a downstream_failure (never rethrown)
 *   - A planner that throws ends the turn with a plain apology, not the raw error
 */

import { logger } from "./logger.js";
import type { Planner, PlannerDecision } from "./planners/types.js";
import {
    ReasoningContext,
    type InvocationRecord,
    type PlannedCall,
    type TurnRecord,
    type TurnState,
} from "./reasoning-context.js";
import type { ToolClient } from "./tool-client.js";
import { describeError } from "./tools/errors.js";
import { failure, type InvocationResponse, type ToolDescriptor } from "./tools/types.js";

const log = logger.child("agent");

export const MAX_ITERATIONS_REPLY =
    "⚠️ I hit my maximum tool-call limit for this turn. Please try again or rephrase your request.";

export const PLANNER_FAILED_REPLY =
    "Sorry, I couldn't work out how to answer that right now. Please try again in a moment.";

// ── Turn state machine ───────────────────────────────────────────────────────

const TRANSITIONS: Record<TurnState, readonly TurnState[]> = {
    AwaitingUserInput: ["Reasoning"],
    Reasoning: ["ToolInvocation", "AnswerReady"],
    ToolInvocation: ["Reasoning"],
    AnswerReady: [],
};

export class TurnStateMachine {
    private current: TurnState = "AwaitingUserInput";
    private readonly visited: TurnState[] = ["AwaitingUserInput"];

    get state(): TurnState {
        return this.current;
    }

    /** Every state entered so far, in order */
    get history(): TurnState[] {
        return [...this.visited];
    }

    transition(next: TurnState): void {
        if (!TRANSITIONS[this.current].includes(next)) {
            throw new Error(`Illegal turn transition ${this.current} → ${next}`);
        }
        this.current = next;
        this.visited.push(next);
    }
}

// ── Agent ────────────────────────────────────────────────────────────────────

export interface AgentOptions {
    client: ToolClient;
    planner: Planner;
    /** Reasoning steps allowed per turn */
    maxIterations: number;
    context?: ReasoningContext;
    /** Called after every invocation (the CLI uses it to echo tool calls) */
    onInvocation?: (record: InvocationRecord) => void;
}

export class Agent {
    readonly context: ReasoningContext;
    private tools: ToolDescriptor[] = [];

    constructor(private readonly options: AgentOptions) {
        this.context = options.context ?? new ReasoningContext();
    }

    get availableTools(): readonly ToolDescriptor[] {
        return this.tools;
    }

    /** Discover the tool catalog once per session. Without it the agent still answers, tool-less. */
    async start(): Promise<void> {
        try {
            this.tools = await this.options.client.listTools();
            log.info("Tools discovered", { tools: this.tools.map((t) => t.name) });
        } catch (err) {
            this.tools = [];
            log.warn("Tool discovery failed, continuing without tools", { error: describeError(err) });
        }
    }

    /** Run one full turn and return its record */
    async respond(userTurn: string): Promise<TurnRecord> {
        const text = userTurn.trim();
        const machine = new TurnStateMachine();
        const invocations: InvocationRecord[] = [];
        const history = this.context.turns.slice();

        const finish = (answer: string): TurnRecord => {
            machine.transition("AnswerReady");
            const record: TurnRecord = { userTurn: text, invocations, answer, states: machine.history };
            this.context.append(record);
            return record;
        };

        machine.transition("Reasoning");
        if (!text) return finish("(empty input)");

        for (let step = 1; step <= this.options.maxIterations; step++) {
            log.debug(`Reasoning step ${step}`, { invocations: invocations.length });

            let decision: PlannerDecision;
            try {
                decision = await this.options.planner.decide({
                    userTurn: text,
                    tools: this.tools,
                    invocations,
                    history,
                });
            } catch (err) {
                log.error("Planner failed", { planner: this.options.planner.name, error: describeError(err) });
                return finish(PLANNER_FAILED_REPLY);
            }

            if (decision.type === "answer") {
                log.debug("Turn finished", { steps: step, invocations: invocations.length });
                return finish(decision.text);
            }

            machine.transition("ToolInvocation");
            log.info(`Executing ${decision.calls.length} tool call(s)`);
            for (const call of decision.calls) {
                const response = await this.invokeSafely(call);
                const record: InvocationRecord = { step, call, response };
                invocations.push(record);
                this.options.onInvocation?.(record);
            }
            machine.transition("Reasoning");
        }

        log.warn("Agent max iterations reached", { max: this.options.maxIterations });
        return finish(MAX_ITERATIONS_REPLY);
    }

    private async invokeSafely(call: PlannedCall): Promise<InvocationResponse> {
        try {
            const response = await this.options.client.invoke({ tool: call.tool, arguments: call.arguments });
            log.debug("Tool result", { tool: call.tool, status: response.status });
            return response;
        } catch (err) {
            const msg = describeError(err);
            log.warn("Tool client failed", { tool: call.tool, error: msg });
            return failure(call.tool, "downstream_failure", `Could not reach the tool server: ${msg}`);
        }
    }
}
