import { describe, it, expect } from "vitest";
import { ConfigError, availableCredentials, readConfig } from "../config.js";
import { createPlanner } from "../planners/index.js";
import { createProvider, providerApiKey } from "../providers/registry.js";
import { testConfig } from "./fakes.js";

describe("readConfig", () => {
    it("fills in defaults", () => {
        const cfg = readConfig({});
        expect(cfg.PLANNER).toBe("auto");
        expect(cfg.AGENT_MAX_ITERATIONS).toBe(10);
        expect(cfg.TOOL_TIMEOUT_MS).toBe(20000);
        expect(cfg.HYBRID_SEARCH_FALLBACK).toBe("none");
        expect(cfg.TOOL_SERVER_URL).toBe("http://127.0.0.1:8000/mcp");
        expect(cfg.CLI_EXIT_COMMAND).toBe("exit");
        expect(cfg.CLI_SHOW_TOOL_CALLS).toBe(false);
    });

    it("parses numbers and flags", () => {
        const cfg = readConfig({ TOOL_SERVER_PORT: "9100", CLI_SHOW_TOOL_CALLS: "1" });
        expect(cfg.TOOL_SERVER_PORT).toBe(9100);
        expect(cfg.CLI_SHOW_TOOL_CALLS).toBe(true);
    });

    it("throws a ConfigError naming each bad variable", () => {
        let caught: unknown;
        try {
            readConfig({ TOOL_TIMEOUT_MS: "soon", PLANNER: "magic" });
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ConfigError);
        if (!(caught instanceof ConfigError)) return;
        expect(caught.issues.map((i) => i.split(":")[0])).toEqual(["PLANNER", "TOOL_TIMEOUT_MS"]);
    });

    it("rejects zero for limits and timeouts", () => {
        for (const name of ["AGENT_MAX_ITERATIONS", "TOOL_TIMEOUT_MS", "EMBEDDING_DIMENSIONS", "CRAWL_MAX_CHARS"]) {
            expect(() => readConfig({ [name]: "0" }), name).toThrow(ConfigError);
        }
        expect(() => readConfig({ AGENT_MAX_ITERATIONS: "0" })).toThrow("AGENT_MAX_ITERATIONS: must be a positive integer");
        expect(readConfig({ TOOL_SERVER_PORT: "0" }).TOOL_SERVER_PORT).toBe(0);
    });
});

describe("availableCredentials", () => {
    it("needs both Supabase variables", () => {
        expect([...availableCredentials(testConfig({ SUPABASE_SERVICE_ROLE_KEY: "" }))]).toEqual(["openai", "tavily"]);
        expect([...availableCredentials(testConfig())]).toEqual(["openai", "tavily", "supabase"]);
        expect(availableCredentials(readConfig({})).size).toBe(0);
    });
});

describe("createPlanner", () => {
    it("uses rules when asked", () => {
        expect(createPlanner(testConfig(), "rules").name).toBe("rules");
    });

    it("picks the LLM planner on auto when the provider key is set", () => {
        expect(createPlanner(testConfig()).name).toBe("llm");
    });

    it("falls back to rules on auto without a key", () => {
        expect(createPlanner(readConfig({})).name).toBe("rules");
    });

    it("refuses llm without a key", () => {
        expect(() => createPlanner(readConfig({ LLM_PROVIDER: "groq" }), "llm")).toThrow(
            "PLANNER=llm needs an API key for LLM_PROVIDER=groq"
        );
    });

    it("reads the key of the configured provider", () => {
        const cfg = testConfig({ LLM_PROVIDER: "deepseek", DEEPSEEK_API_KEY: "test-secret-2" });
        expect(providerApiKey(cfg)).toBe("test-secret-2");
    });

    it("builds one OpenAI-compatible provider per configured id", () => {
        expect(createProvider(testConfig({ LLM_PROVIDER: "groq", GROQ_API_KEY: "test-secret" }))?.id).toBe("groq");
        expect(createProvider(readConfig({}))).toBeNull();
    });
});
