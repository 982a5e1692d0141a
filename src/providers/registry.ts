/**
 * providers/registry.ts — Pick the chat model behind the llm planner
 *
 * Every supported provider is OpenAI-compatible, so a provider is just a
 * base URL plus the API key variable it reads. OPENAI_MODEL names the model
 * for whichever one is configured (e.g. llama-3.3-70b-versatile on groq).
 */

import type { Config } from "../config.js";
import { logger } from "../logger.js";
import { createChatProvider } from "./openai-provider.js";
import type { LLMProvider } from "./types.js";

type ProviderId = Config["LLM_PROVIDER"];

const BASE_URLS: Record<ProviderId, string | undefined> = {
    openai: undefined,
    groq: "https://api.groq.com/openai/v1",
    deepseek: "https://api.deepseek.com",
};

/** API key for the configured provider ("" when absent) */
export function providerApiKey(cfg: Config): string {
    switch (cfg.LLM_PROVIDER) {
        case "openai":
            return cfg.OPENAI_API_KEY;
        case "groq":
            return cfg.GROQ_API_KEY;
        case "deepseek":
            return cfg.DEEPSEEK_API_KEY;
    }
}

/** Build the configured provider, or null when its key is not set */
export function createProvider(cfg: Config): LLMProvider | null {
    const apiKey = providerApiKey(cfg);
    if (!apiKey) return null;

    const id = cfg.LLM_PROVIDER;
    const provider = createChatProvider({ id, apiKey, model: cfg.OPENAI_MODEL, baseURL: BASE_URLS[id] });
    logger.info("LLM provider initialised", { provider: id, model: cfg.OPENAI_MODEL });
    return provider;
}
