/**
 * repl.ts — Read a line, answer it, repeat
 *
 * Ends on the exit sentinel or end of input. Streams are injected so tests
 * can drive a session without a terminal.
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

export const PROMPT = "you> ";

export interface ReplStreams {
    input: Readable;
    output: Writable;
}

/** Anything that turns a user line into an answer (the agent, in practice) */
export type Responder = (line: string) => Promise<string>;

/** Run an interactive session. Resolves with the number of turns answered. */
export async function runRepl(
    respond: Responder,
    { input, output }: ReplStreams,
    exitCommand: string
): Promise<number> {
    const rl = createInterface({ input, terminal: false });
    let turns = 0;

    output.write(`Type "${exitCommand}" to quit.\n${PROMPT}`);
    // Leaving the loop (sentinel or end of input) closes the interface
    for await (const raw of rl) {
        const line = raw.trim();
        if (line === exitCommand) break;
        if (line) {
            const answer = await respond(line);
            turns++;
            output.write(`${answer}\n\n`);
        }
        output.write(PROMPT);
    }

    output.write("\nbye\n");
    return turns;
}
