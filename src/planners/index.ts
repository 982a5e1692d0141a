/**
 * planners/index.ts — Pick the planning strategy for a session
 */

import type { Config } from "../config.js";
import { logger } from "../logger.js";
import { createProvider } from "../providers/registry.js";
import { LlmPlanner } from "./llm-planner.js";
import { RulePlanner } from "./rule-planner.js";
import type { Planner } from "./types.js";

export type PlannerChoice = Config["PLANNER"];

export function createPlanner(cfg: Config, override?: PlannerChoice): Planner {
    const choice = override ?? cfg.PLANNER;
    if (choice === "rules") return new RulePlanner();

    const provider = createProvider(cfg);
    if (provider) return new LlmPlanner(provider);

    if (choice === "llm") {
        throw new Error(`PLANNER=llm needs an API key for LLM_PROVIDER=${cfg.LLM_PROVIDER}`);
    }
    logger.info("No LLM key configured, using the rule planner");
    return new RulePlanner();
}

export { LlmPlanner } from "./llm-planner.js";
export { RulePlanner } from "./rule-planner.js";
export type { Planner, PlannerDecision, PlannerInput } from "./types.js";
