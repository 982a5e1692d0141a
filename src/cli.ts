#!/usr/bin/env node
/**
 * cli.ts — Chat with the agent from a terminal
 *
 *   tool-relay                          interactive session against TOOL_SERVER_URL
 *   tool-relay "What is TQQQ?"          answer one message and exit
 *   tool-relay --local                  run the tool registry in this process
 *   tool-relay --server-url <url>       talk to another tool server
 *   tool-relay --planner rules|llm|auto override PLANNER
 */

import { parseArgs } from "node:util";
import { Agent } from "./agent.js";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { McpToolClient } from "./mcp/client.js";
import { createPlanner, type PlannerChoice } from "./planners/index.js";
import type { InvocationRecord } from "./reasoning-context.js";
import { runRepl } from "./repl.js";
import { createServices } from "./services/index.js";
import { LocalToolClient, type ToolClient } from "./tool-client.js";
import { createToolRegistry } from "./tools/index.js";

function parsePlanner(value: string | undefined): PlannerChoice | undefined {
    if (value === undefined) return undefined;
    if (value === "rules" || value === "llm" || value === "auto") return value;
    throw new Error(`--planner must be one of rules, llm, auto (got "${value}")`);
}

function echoInvocation(record: InvocationRecord): void {
    const { call, response } = record;
    const outcome = response.status === "success" ? "ok" : `${response.error.kind}: ${response.error.message}`;
    process.stdout.write(`  ↳ ${call.tool}(${JSON.stringify(call.arguments)}) → ${outcome}\n`);
}

async function main() {
    const { values, positionals } = parseArgs({
        options: {
            "server-url": { type: "string" },
            local: { type: "boolean", default: false },
            planner: { type: "string" },
        },
        allowPositionals: true,
    });

    const planner = createPlanner(config, parsePlanner(values.planner));

    let client: ToolClient;
    if (values.local) {
        client = new LocalToolClient(createToolRegistry(config, createServices(config)));
    } else {
        const mcp = new McpToolClient({ name: "tool-server", url: values["server-url"] ?? config.TOOL_SERVER_URL });
        await mcp.connect();
        client = mcp;
    }

    const agent = new Agent({
        client,
        planner,
        maxIterations: config.AGENT_MAX_ITERATIONS,
        onInvocation: config.CLI_SHOW_TOOL_CALLS ? echoInvocation : undefined,
    });
    await agent.start();
    logger.info("Agent ready", { planner: planner.name, tools: agent.availableTools.length });

    const respond = async (line: string) => (await agent.respond(line)).answer;

    try {
        const message = positionals.join(" ").trim();
        if (message) {
            process.stdout.write(`${await respond(message)}\n`);
        } else {
            await runRepl(respond, { input: process.stdin, output: process.stdout }, config.CLI_EXIT_COMMAND);
        }
    } finally {
        await client.close();
    }
}

main().catch((err) => {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exit(1);
});
