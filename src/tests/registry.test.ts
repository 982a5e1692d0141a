import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { ToolFailure } from "../tools/errors.js";
import { createToolRegistry } from "../tools/index.js";
import { helloTool, GREETING } from "../tools/hello.js";
import { ToolRegistry } from "../tools/registry.js";
import { defineTool } from "../tools/types.js";
import { createWebSearchTool } from "../tools/web-search.js";
import { fakeServices, testConfig, FakeWebClient } from "./fakes.js";

const ALL = new Set(["openai", "tavily", "supabase"] as const);

describe("ToolRegistry", () => {
    let web: FakeWebClient;
    let registry: ToolRegistry;

    beforeEach(() => {
        web = new FakeWebClient();
        registry = new ToolRegistry({ credentials: ALL, timeoutMs: 1000 })
            .register(helloTool)
            .register(createWebSearchTool(web));
    });

    it("describes tools in registration order", () => {
        expect(registry.describe().map((d) => d.name)).toEqual(["hello", "web_search"]);
        expect(registry.has("hello")).toBe(true);
        expect(registry.has("nope")).toBe(false);
    });

    it("registers the full catalog", () => {
        const full = createToolRegistry(testConfig(), fakeServices());
        expect(full.describe().map((d) => d.name)).toEqual([
            "web_search",
            "web_crawl",
            "yahoo_finance",
            "embed_text",
            "index_document",
            "hybrid_search",
            "hello",
            "current_date",
        ]);
    });

    it("rejects a duplicate name", () => {
        expect(() => registry.register(helloTool)).toThrow('Tool "hello" is already registered');
    });

    it("wraps a result in a success envelope", async () => {
        const response = await registry.invoke({ tool: "hello", arguments: {} });
        expect(response).toEqual({ status: "success", tool: "hello", result: GREETING });
    });

    it("reports an unknown tool without throwing", async () => {
        const response = await registry.invoke({ tool: "nope", arguments: {} });
        expect(response).toEqual({
            status: "failure",
            tool: "nope",
            error: { kind: "unknown_tool", message: 'Unknown tool "nope". Available: hello, web_search' },
        });
    });

    it("names a missing required argument and does not run the tool", async () => {
        const response = await registry.invoke({ tool: "web_search", arguments: {} });
        expect(response).toEqual({
            status: "failure",
            tool: "web_search",
            error: {
                kind: "invalid_arguments",
                message: 'Missing required argument "query"',
                parameter: "query",
            },
        });
        expect(web.searches).toHaveLength(0);
    });

    it("names an argument of the wrong type", async () => {
        const response = await registry.invoke({
            tool: "web_search",
            arguments: { query: "vitest", count: "five" },
        });
        expect(response).toEqual({
            status: "failure",
            tool: "web_search",
            error: {
                kind: "invalid_arguments",
                message: 'Invalid argument "count": Expected number, received string',
                parameter: "count",
            },
        });
    });

    it("reports missing credentials without calling the service", async () => {
        const bare = new ToolRegistry({ credentials: new Set(), timeoutMs: 1000 }).register(
            createWebSearchTool(web)
        );
        const response = await bare.invoke({ tool: "web_search", arguments: { query: "vitest" } });
        expect(response).toEqual({
            status: "failure",
            tool: "web_search",
            error: {
                kind: "missing_credential",
                message: 'Tool "web_search" is disabled: TAVILY_API_KEY not configured',
            },
        });
        expect(web.searches).toHaveLength(0);
    });

    it("names every variable behind a missing credential", async () => {
        const full = createToolRegistry(testConfig({ OPENAI_API_KEY: "", SUPABASE_URL: "" }), fakeServices());
        const response = await full.invoke({ tool: "index_document", arguments: { text: "notes" } });
        expect(response.status === "failure" && response.error.message).toBe(
            'Tool "index_document" is disabled: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, OPENAI_API_KEY not configured'
        );
    });

    it("validates arguments before checking credentials", async () => {
        const bare = new ToolRegistry({ credentials: new Set(), timeoutMs: 1000 }).register(
            createWebSearchTool(web)
        );
        const response = await bare.invoke({ tool: "web_search", arguments: {} });
        expect(response.status === "failure" && response.error.kind).toBe("invalid_arguments");
    });

    it("aborts a tool that outlives its timeout", async () => {
        let aborted = false;
        registry.register(
            defineTool({
                name: "slow",
                description: "never settles",
                params: z.object({}),
                result: z.string(),
                returns: "nothing",
                timeoutMs: 20,
                execute: (_args, { signal }) =>
                    new Promise<string>(() => {
                        signal.addEventListener("abort", () => {
                            aborted = true;
                        });
                    }),
            })
        );

        const response = await registry.invoke({ tool: "slow", arguments: {} });
        expect(response).toEqual({
            status: "failure",
            tool: "slow",
            error: { kind: "downstream_failure", message: 'Tool "slow" timed out after 20ms' },
        });
        expect(aborted).toBe(true);
    });

    it("turns a thrown error into downstream_failure and keeps serving", async () => {
        registry.register(
            defineTool({
                name: "boom",
                description: "always throws",
                params: z.object({}),
                result: z.string(),
                returns: "nothing",
                async execute(): Promise<string> {
                    throw new Error("kaboom");
                },
            })
        );

        const response = await registry.invoke({ tool: "boom", arguments: {} });
        expect(response).toEqual({
            status: "failure",
            tool: "boom",
            error: { kind: "downstream_failure", message: 'Tool "boom" failed: kaboom' },
        });

        const next = await registry.invoke({ tool: "hello", arguments: {} });
        expect(next.status).toBe("success");
    });

    it("keeps the kind a tool chose with ToolFailure", async () => {
        registry.register(
            defineTool({
                name: "picky",
                description: "rejects everything",
                params: z.object({}),
                result: z.string(),
                returns: "nothing",
                async execute(): Promise<string> {
                    throw new ToolFailure("invalid_arguments", "nothing is acceptable", "input");
                },
            })
        );

        const response = await registry.invoke({ tool: "picky", arguments: {} });
        expect(response).toEqual({
            status: "failure",
            tool: "picky",
            error: { kind: "invalid_arguments", message: "nothing is acceptable", parameter: "input" },
        });
    });

    it("rejects a result that does not match the result schema", async () => {
        registry.register(
            defineTool({
                name: "fractional",
                description: "returns a float where an integer is promised",
                params: z.object({}),
                result: z.number().int(),
                returns: "an integer",
                async execute() {
                    return 1.5;
                },
            })
        );

        const response = await registry.invoke({ tool: "fractional", arguments: {} });
        expect(response).toEqual({
            status: "failure",
            tool: "fractional",
            error: {
                kind: "downstream_failure",
                message: 'Tool "fractional" returned a malformed result: Expected integer, received float',
            },
        });
    });
});
