/**
 * tools/current-date.ts — Today's date (UTC) as YYYY-MM-DD
 */

import { z } from "zod";
import { defineTool } from "./types.js";

export const dateResultSchema = z.object({ date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/) });

export function createCurrentDateTool(now: () => Date) {
    return defineTool({
        name: "current_date",
        description: "Returns the current date in YYYY-MM-DD form (UTC).",
        params: z.object({}),
        result: dateResultSchema,
        returns: "{ date } in YYYY-MM-DD form",

        async execute() {
            return { date: now().toISOString().slice(0, 10) };
        },
    });
}
