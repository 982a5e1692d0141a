import { describe, it, expect, vi } from "vitest";
import { Readable, Writable } from "node:stream";
import { PROMPT, runRepl } from "../repl.js";

function collector() {
    const chunks: string[] = [];
    const output = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {
            chunks.push(chunk.toString());
            callback();
        },
    });
    return { output, text: () => chunks.join("") };
}

describe("runRepl", () => {
    it("answers each line until the exit sentinel", async () => {
        const respond = vi.fn(async (line: string) => `echo: ${line}`);
        const { output, text } = collector();

        const turns = await runRepl(respond, { input: Readable.from(["hello\n", "\n", "exit\n", "ignored\n"]), output }, "exit");

        expect(turns).toBe(1);
        expect(respond).toHaveBeenCalledTimes(1);
        expect(respond).toHaveBeenCalledWith("hello");
        expect(text()).toBe(`Type "exit" to quit.\n${PROMPT}echo: hello\n\n${PROMPT}${PROMPT}\nbye\n`);
    });

    it("ends cleanly at end of input", async () => {
        const { output, text } = collector();
        const turns = await runRepl(async () => "ok", { input: Readable.from(["one\n", "two\n"]), output }, "quit");

        expect(turns).toBe(2);
        expect(text().endsWith(`ok\n\n${PROMPT}\nbye\n`)).toBe(true);
    });
});
