/**
 * planners/rule-planner.ts — Deterministic keyword router
 *
 * First step of a turn:
 *   - starts with "search:" / "crawl:" / "embed:" / "index:" / "find:" → that tool
 *   - a ticker-looking token ("What is TQQQ?") or known company name    → yahoo_finance
 *   - a greeting ("hello", "hi", "hey")                                → hello
 *   - a question about the date                                         → current_date
 *   - anything else                                                     → help text
 *
 * Only tools the agent discovered are called; a route to any other tool is
 * answered with a note that it is unavailable.
 *
 * After a failure:
 *   - web_crawl failed upstream   → substitute web_search with the same query
 *   - yahoo_finance failed upstream with a dotted share class (BRK.B) → retry once as BRK-B
 *   - otherwise                   → explain the failure
 */

import type { InvocationRecord, PlannedCall } from "../reasoning-context.js";
import { explainFailure, formatResult } from "./format.js";
import type { Planner, PlannerDecision, PlannerInput } from "./types.js";

/** Upper-case words that look like tickers but are not */
const STOP_WORDS = new Set([
    "A", "AN", "THE", "IS", "OF", "FOR", "I", "AI", "OK", "CEO", "CFO", "CTO", "USD", "ETF",
    "DATE", "TODAY", "HELLO", "HI", "HEY",
]);

const COMPANY_TICKERS: Record<string, string> = {
    nvidia: "NVDA",
    apple: "AAPL",
    microsoft: "MSFT",
    tesla: "TSLA",
};

const PREFIX_COMMANDS: { prefix: string; tool: string; arg: string }[] = [
    { prefix: "search:", tool: "web_search", arg: "query" },
    { prefix: "crawl:", tool: "web_crawl", arg: "query" },
    { prefix: "embed:", tool: "embed_text", arg: "text" },
    { prefix: "index:", tool: "index_document", arg: "text" },
    { prefix: "find:", tool: "hybrid_search", arg: "query" },
];

export const HELP_TEXT = [
    "I can help with:",
    "  • stock prices: \"What is TQQQ?\"",
    "  • web search: \"search: <query>\"",
    "  • reading a page: \"crawl: <query or URL>\"",
    "  • embeddings: \"embed: <text>\"",
    "  • the document index: \"index: <text>\" and \"find: <query>\"",
    "  • today's date: \"what's the date?\"",
].join("\n");

/** Ticker symbol mentioned in free text, or null */
export function findTicker(text: string): string | null {
    const lower = text.toLowerCase();
    for (const [company, ticker] of Object.entries(COMPANY_TICKERS)) {
        if (new RegExp(`\\b${company}\\b`).test(lower)) return ticker;
    }
    for (const raw of text.split(/[\s,]+/)) {
        const token = raw.replace(/^[^A-Za-z]+|[^A-Za-z.]+$/g, "").replace(/\.$/, "");
        if (/^[A-Z]{1,6}(\.[A-Z])?$/.test(token) && !STOP_WORDS.has(token)) return token;
    }
    return null;
}

export class RulePlanner implements Planner {
    readonly name = "rules";
    private sequence = 0;

    async decide(input: PlannerInput): Promise<PlannerDecision> {
        const last = input.invocations[input.invocations.length - 1];
        return last ? this.followUp(input, last) : this.route(input);
    }

    private call(tool: string, args: Record<string, unknown>): PlannerDecision {
        this.sequence++;
        const call: PlannedCall = { id: `rule-${this.sequence}`, tool, arguments: args };
        return { type: "invoke", calls: [call] };
    }

    private route(input: PlannerInput): PlannerDecision {
        const text = input.userTurn;
        const lower = text.toLowerCase();
        const available = new Set(input.tools.map((t) => t.name));
        const callIfAvailable = (tool: string, args: Record<string, unknown>): PlannerDecision =>
            available.has(tool)
                ? this.call(tool, args)
                : { type: "answer", text: `Sorry, the ${tool} tool isn't available on the tool server right now.` };

        for (const { prefix, tool, arg } of PREFIX_COMMANDS) {
            if (!lower.startsWith(prefix)) continue;
            const rest = text.slice(prefix.length).trim();
            if (!rest) return { type: "answer", text: `Add something after "${prefix}", e.g. "${prefix} typescript generics".` };
            return callIfAvailable(tool, { [arg]: rest });
        }

        const ticker = findTicker(text);
        if (ticker) return callIfAvailable("yahoo_finance", { ticker });

        if (/^(hello|hi|hey)\b/i.test(text)) return callIfAvailable("hello", {});

        if (/\b(date|today)\b/i.test(text)) return callIfAvailable("current_date", {});

        return { type: "answer", text: HELP_TEXT };
    }

    private followUp(input: PlannerInput, last: InvocationRecord): PlannerDecision {
        const { response } = last;
        const earlier = input.invocations.slice(0, -1);

        if (response.status === "success") {
            const text = formatResult(response.tool, response.result);
            const failed = earlier.flatMap((r) => (r.response.status === "failure" ? [r.response] : []));
            if (failed.length === 0) return { type: "answer", text };
            const reasons = failed.map(explainFailure).join("; ");
            return { type: "answer", text: `First attempt failed: ${reasons}. Instead:\n\n${text}` };
        }

        const tried = (tool: string) => input.invocations.filter((r) => r.call.tool === tool).length;
        const available = (tool: string) => input.tools.some((t) => t.name === tool);
        const upstream = response.error.kind === "downstream_failure";

        if (response.tool === "web_crawl" && upstream && tried("web_search") === 0 && available("web_search")) {
            return this.call("web_search", { query: last.call.arguments["query"] });
        }

        const ticker = last.call.arguments["ticker"];
        if (
            response.tool === "yahoo_finance" &&
            upstream &&
            tried("yahoo_finance") === 1 &&
            typeof ticker === "string" &&
            ticker.includes(".")
        ) {
            return this.call("yahoo_finance", { ticker: ticker.replace(/\./g, "-") });
        }

        const reasons = input.invocations
            .flatMap((r) => (r.response.status === "failure" ? [explainFailure(r.response)] : []))
            .join("; then ");
        return { type: "answer", text: `Sorry, I couldn't complete that: ${reasons}.` };
    }
}
