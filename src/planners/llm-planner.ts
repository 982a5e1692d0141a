/**
 * planners/llm-planner.ts — Let an LLM choose tools through function calling
 *
 * The transcript is rebuilt from the reasoning context on every step:
 *   system prompt → earlier turns (user / assistant answer) → this user turn
 *   → for each step: assistant tool_calls, then one tool message per call
 *     carrying the JSON invocation envelope (success or failure alike).
 *
 * The model sees failures verbatim and decides whether to retry, switch
 * tools, or explain; it must not be shown raw transport errors, which the
 * agent has already turned into envelopes.
 */

import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { logger } from "../logger.js";
import type { LLMProvider } from "../providers/types.js";
import type { InvocationRecord } from "../reasoning-context.js";
import type { Planner, PlannerDecision, PlannerInput } from "./types.js";

const log = logger.child("llm-planner");

export const SYSTEM_PROMPT = `You are a research assistant connected to a tool server.

Tool behaviour:
- Call a tool whenever the question needs live data (prices, web pages, search results, indexed documents, the date).
- Every tool result is a JSON envelope: {"status":"success","result":...} or {"status":"failure","error":{"kind":...,"message":...}}.
- On failure, decide: retry with corrected arguments (invalid_arguments), try a different tool (downstream_failure), or explain plainly to the user what went wrong (missing_credential, unknown_tool).
- Never show the user raw JSON or error envelopes; summarise them in plain language.

Rules:
- Answer concisely and cite URLs for web content.
- Never make up prices or facts a tool could have provided.`;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Tool-call arguments as an object; malformed JSON becomes {} and is left to validation */
export function parseArguments(raw: string): Record<string, unknown> {
    try {
        const parsed: unknown = JSON.parse(raw || "{}");
        if (isRecord(parsed)) return parsed;
    } catch (err) {
        log.warn("Tool call arguments are not JSON", { raw, err: String(err) });
    }
    return {};
}

function stepMessages(records: readonly InvocationRecord[]): ChatCompletionMessageParam[] {
    const messages: ChatCompletionMessageParam[] = [];
    let i = 0;
    while (i < records.length) {
        const step = records[i]?.step;
        const group: InvocationRecord[] = [];
        for (let r = records[i]; r && r.step === step; r = records[++i]) group.push(r);

        messages.push({
            role: "assistant",
            content: null,
            tool_calls: group.map((r) => ({
                id: r.call.id,
                type: "function" as const,
                function: { name: r.call.tool, arguments: JSON.stringify(r.call.arguments) },
            })),
        });
        for (const r of group) {
            messages.push({ role: "tool", tool_call_id: r.call.id, content: JSON.stringify(r.response) });
        }
    }
    return messages;
}

export function buildMessages(input: PlannerInput, historyTurns: number): ChatCompletionMessageParam[] {
    const messages: ChatCompletionMessageParam[] = [{ role: "system", content: SYSTEM_PROMPT }];
    const history = historyTurns > 0 ? input.history.slice(-historyTurns) : [];
    for (const turn of history) {
        messages.push({ role: "user", content: turn.userTurn });
        messages.push({ role: "assistant", content: turn.answer });
    }
    messages.push({ role: "user", content: input.userTurn });
    messages.push(...stepMessages(input.invocations));
    return messages;
}

export class LlmPlanner implements Planner {
    readonly name = "llm";

    constructor(
        private readonly provider: LLMProvider,
        /** Earlier turns replayed to the model */
        private readonly historyTurns = 10
    ) { }

    async decide(input: PlannerInput): Promise<PlannerDecision> {
        const messages = buildMessages(input, this.historyTurns);
        const result = await this.provider.complete(messages, input.tools);

        if (result.toolCalls && result.toolCalls.length > 0) {
            return {
                type: "invoke",
                calls: result.toolCalls.map((tc) => ({
                    id: tc.id,
                    tool: tc.name,
                    arguments: parseArguments(tc.arguments),
                })),
            };
        }

        return { type: "answer", text: result.content ?? "(no response)" };
    }
}
