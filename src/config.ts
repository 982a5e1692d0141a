/**
 * config.ts — Environment validation using Zod
 *
 * Every credential is optional: a missing key disables only the tools that
 * depend on it (they answer with a missing_credential failure when invoked).
 * Secrets live in .env only — never in code or logs.
 */

import { z } from "zod";
import "dotenv/config";

const flag = z
    .string()
    .transform((v) => v === "true" || v === "1");

const count = z.string().regex(/^\d+$/).transform(Number);
const positive = z.string().regex(/^0*[1-9]\d*$/, "must be a positive integer").transform(Number);

const envSchema = z.object({
    /** Log level */
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ── Credentials (one per tool category) ───────────────────────────────────

    /** OpenAI API key — enables embed_text and the vector half of hybrid search */
    OPENAI_API_KEY: z.string().default(""),

    /** Tavily API key — enables web_search and web_crawl (https://app.tavily.com) */
    TAVILY_API_KEY: z.string().default(""),

    /** Supabase project URL (from Project Settings → API) */
    SUPABASE_URL: z.union([z.string().url(), z.literal("")]).default(""),

    /** Supabase service-role secret key — with SUPABASE_URL enables the hybrid index */
    SUPABASE_SERVICE_ROLE_KEY: z.string().default(""),

    // ── Planner ──────────────────────────────────────────────────────────────

    /** Which planning strategy drives the agent: rules, llm, or auto (llm when a key is set) */
    PLANNER: z.enum(["auto", "rules", "llm"]).default("auto"),

    /** Provider behind the llm planner */
    LLM_PROVIDER: z.enum(["openai", "groq", "deepseek"]).default("openai"),

    /** Chat model name for the llm planner */
    OPENAI_MODEL: z.string().default("gpt-4o-mini"),

    /** Groq API key (only for LLM_PROVIDER=groq) */
    GROQ_API_KEY: z.string().default(""),

    /** DeepSeek API key (only for LLM_PROVIDER=deepseek) */
    DEEPSEEK_API_KEY: z.string().default(""),

    /** Maximum reasoning steps per user turn */
    AGENT_MAX_ITERATIONS: positive.default("10"),

    // ── Tools ────────────────────────────────────────────────────────────────

    /** Milliseconds before a running tool is aborted and reported as a timeout */
    TOOL_TIMEOUT_MS: positive.default("20000"),

    /** Embedding model used by embed_text, index_document and hybrid_search */
    EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),

    /** Embedding vector length */
    EMBEDDING_DIMENSIONS: positive.default("1536"),

    /** Maximum characters of crawled page content returned by web_crawl */
    CRAWL_MAX_CHARS: positive.default("4000"),

    /** Supabase table holding indexed documents (see sql/hybrid_search.sql) */
    SUPABASE_DOCUMENTS_TABLE: z.string().default("documents"),

    /** What hybrid_search does when the vector half is unavailable: keyword-only results, or fail */
    HYBRID_SEARCH_FALLBACK: z.enum(["none", "keyword"]).default("none"),

    // ── Tool server / CLI ─────────────────────────────────────────────────────

    TOOL_SERVER_HOST: z.string().default("127.0.0.1"),

    TOOL_SERVER_PORT: count.default("8000"),

    /** MCP endpoint the CLI connects to */
    TOOL_SERVER_URL: z.string().url().default("http://127.0.0.1:8000/mcp"),

    /** Input line that ends an interactive session */
    CLI_EXIT_COMMAND: z.string().min(1).default("exit"),

    /** Print each tool invocation while chatting */
    CLI_SHOW_TOOL_CALLS: flag.default("false"),
});

export type Config = z.infer<typeof envSchema>;

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid environment configuration:\n${issues.map((i) => `  • ${i}`).join("\n")}`);
        this.name = "ConfigError";
    }
}

/** Parse a configuration record from an environment-like object. Throws ConfigError. */
export function readConfig(env: Record<string, string | undefined>): Config {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        );
    }
    return result.data;
}

function parseEnv(): Config {
    try {
        return readConfig(process.env);
    } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        console.error(`❌ ${err.message}\n`);
        console.error("Copy .env.example to .env and fix the values above.\n");
        process.exit(1);
    }
}

export const config = parseEnv();

// ── Credentials ───────────────────────────────────────────────────────────────

export type CredentialName = "openai" | "tavily" | "supabase";

/** Environment variables behind each credential, for error messages */
export const CREDENTIAL_ENV: Record<CredentialName, string[]> = {
    openai: ["OPENAI_API_KEY"],
    tavily: ["TAVILY_API_KEY"],
    supabase: ["SUPABASE_URL", "SUPABASE_SERVICE_ROLE_KEY"],
};

/** The credentials present in a configuration record */
export function availableCredentials(cfg: Config): ReadonlySet<CredentialName> {
    const present = new Set<CredentialName>();
    if (cfg.OPENAI_API_KEY) present.add("openai");
    if (cfg.TAVILY_API_KEY) present.add("tavily");
    if (cfg.SUPABASE_URL && cfg.SUPABASE_SERVICE_ROLE_KEY) present.add("supabase");
    return present;
}
