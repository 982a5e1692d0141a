import { describe, it, expect, vi } from "vitest";
import { Agent, MAX_ITERATIONS_REPLY, PLANNER_FAILED_REPLY, TurnStateMachine } from "../agent.js";
import { RulePlanner } from "../planners/rule-planner.js";
import type { Planner } from "../planners/types.js";
import { LocalToolClient, type ToolClient } from "../tool-client.js";
import { createToolRegistry } from "../tools/index.js";
import { fakeServices, testConfig } from "./fakes.js";

function localAgent(planner: Planner = new RulePlanner(), maxIterations = 10) {
    const services = fakeServices();
    const client = new LocalToolClient(createToolRegistry(testConfig(), services));
    return { agent: new Agent({ client, planner, maxIterations }), services };
}

const brokenClient: ToolClient = {
    listTools: async () => {
        throw new Error("connection refused");
    },
    invoke: async () => {
        throw new Error("socket hang up");
    },
    close: async () => { },
};

/** Advertises the full catalog, but every call fails in transit */
const hangingUpClient: ToolClient = {
    listTools: async () => createToolRegistry(testConfig(), fakeServices()).describe(),
    invoke: async () => {
        throw new Error("socket hang up");
    },
    close: async () => { },
};

describe("TurnStateMachine", () => {
    it("walks the legal path and records it", () => {
        const machine = new TurnStateMachine();
        machine.transition("Reasoning");
        machine.transition("ToolInvocation");
        machine.transition("Reasoning");
        machine.transition("AnswerReady");
        expect(machine.state).toBe("AnswerReady");
        expect(machine.history).toEqual(["AwaitingUserInput", "Reasoning", "ToolInvocation", "Reasoning", "AnswerReady"]);
    });

    it("rejects an illegal transition", () => {
        const machine = new TurnStateMachine();
        expect(() => machine.transition("ToolInvocation")).toThrow(
            "Illegal turn transition AwaitingUserInput → ToolInvocation"
        );
    });
});

describe("Agent", () => {
    it("answers a price question with exactly one invocation", async () => {
        const { agent, services } = localAgent();
        await agent.start();

        const turn = await agent.respond("What is TQQQ?");

        expect(turn.answer).toBe("The latest price for TQQQ is 52.1 USD.");
        expect(turn.invocations).toHaveLength(1);
        expect(turn.invocations[0]?.call).toEqual({ id: "rule-1", tool: "yahoo_finance", arguments: { ticker: "TQQQ" } });
        expect(turn.states).toEqual(["AwaitingUserInput", "Reasoning", "ToolInvocation", "Reasoning", "AnswerReady"]);
        expect(services.market.requested).toEqual(["TQQQ"]);
        expect(agent.context.turns).toEqual([turn]);
    });

    it("discovers the catalog on start", async () => {
        const { agent } = localAgent();
        await agent.start();
        expect(agent.availableTools).toHaveLength(8);
    });

    it("continues without tools when discovery fails", async () => {
        const agent = new Agent({ client: brokenClient, planner: new RulePlanner(), maxIterations: 5 });
        await agent.start();
        expect(agent.availableTools).toEqual([]);
    });

    it("never calls a tool discovery did not report", async () => {
        const registry = createToolRegistry(testConfig(), fakeServices());
        const helloOnly: ToolClient = {
            listTools: async () => registry.describe().filter((d) => d.name === "hello"),
            invoke: (request) => registry.invoke(request),
            close: async () => { },
        };
        const agent = new Agent({ client: helloOnly, planner: new RulePlanner(), maxIterations: 5 });
        await agent.start();

        const turn = await agent.respond("What is TQQQ?");

        expect(turn.invocations).toEqual([]);
        expect(turn.answer).toBe("Sorry, the yahoo_finance tool isn't available on the tool server right now.");
    });

    it("answers empty input without reasoning", async () => {
        const { agent } = localAgent();
        const turn = await agent.respond("   ");
        expect(turn.answer).toBe("(empty input)");
        expect(turn.states).toEqual(["AwaitingUserInput", "Reasoning", "AnswerReady"]);
        expect(turn.invocations).toEqual([]);
    });

    it("records a throwing client as downstream_failure and explains it", async () => {
        const agent = new Agent({ client: hangingUpClient, planner: new RulePlanner(), maxIterations: 5 });
        await agent.start();
        const turn = await agent.respond("hello");

        expect(turn.invocations[0]?.response).toEqual({
            status: "failure",
            tool: "hello",
            error: { kind: "downstream_failure", message: "Could not reach the tool server: socket hang up" },
        });
        expect(turn.answer).toBe(
            "Sorry, I couldn't complete that: hello couldn't get an answer from its provider " +
            "(Could not reach the tool server: socket hang up)."
        );
    });

    it("keeps planner errors away from the user", async () => {
        const planner: Planner = {
            name: "broken",
            decide: async () => {
                throw new Error("401 invalid api key");
            },
        };
        const { agent } = localAgent(planner);
        const turn = await agent.respond("What is TQQQ?");
        expect(turn.answer).toBe(PLANNER_FAILED_REPLY);
    });

    it("stops at the iteration cap", async () => {
        let n = 0;
        const planner: Planner = {
            name: "loop",
            decide: async () => ({ type: "invoke", calls: [{ id: `loop-${++n}`, tool: "hello", arguments: {} }] }),
        };
        const { agent } = localAgent(planner, 3);

        const turn = await agent.respond("hello");

        expect(turn.answer).toBe(MAX_ITERATIONS_REPLY);
        expect(turn.invocations.map((r) => r.step)).toEqual([1, 2, 3]);
    });

    it("issues every call of one decision in order", async () => {
        const planner: Planner = {
            name: "pair",
            decide: async ({ invocations }) =>
                invocations.length === 0
                    ? {
                        type: "invoke",
                        calls: [
                            { id: "a", tool: "hello", arguments: {} },
                            { id: "b", tool: "current_date", arguments: {} },
                        ],
                    }
                    : { type: "answer", text: `${invocations.length} calls` },
        };
        const onInvocation = vi.fn();
        const services = fakeServices();
        const client = new LocalToolClient(createToolRegistry(testConfig(), services));
        const agent = new Agent({ client, planner, maxIterations: 5, onInvocation });

        const turn = await agent.respond("both please");

        expect(turn.answer).toBe("2 calls");
        expect(turn.invocations.map((r) => [r.step, r.call.id])).toEqual([
            [1, "a"],
            [1, "b"],
        ]);
        expect(onInvocation).toHaveBeenCalledTimes(2);
    });

    it("hands earlier turns to the planner", async () => {
        const decide = vi.fn<Planner["decide"]>(async () => ({ type: "answer", text: "ok" }));
        const { agent } = localAgent({ name: "spy", decide });

        await agent.respond("first");
        await agent.respond("second");

        const second = decide.mock.calls[1]?.[0];
        expect(second?.userTurn).toBe("second");
        expect(second?.history.map((t) => t.userTurn)).toEqual(["first"]);
    });
});
