/**
 * tools/hello.ts — A demonstration tool.
 *
 * Intentionally trivial: it proves that the agent can reach the tool server,
 * invoke a tool by name and receive a success envelope. It takes no arguments
 * and always answers with the same greeting.
 */

import { z } from "zod";
import { defineTool } from "./types.js";

export const GREETING = "hello from tool-relay";

export const helloTool = defineTool({
    name: "hello",
    description:
        "Returns a fixed greeting from the tool server. Use this to check that tool calls are working.",
    params: z.object({}),
    result: z.string(),
    returns: "The fixed greeting text",

    async execute() {
        return GREETING;
    },
});
