/**
 * providers/types.ts — What the llm planner needs from a chat model
 *
 * Messages are in OpenAI chat-completions format; tools are passed as the
 * descriptors discovered from the tool server and offered to the model as
 * functions.
 */

import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { ToolDescriptor } from "../tools/types.js";

/** A function call the model asked for */
export interface ToolCall {
    /** Provider's tool-call id; the tool message answering it must echo it */
    id: string;
    name: string;
    arguments: string; // raw JSON string
}

export interface LLMResponse {
    /** Text content of the reply (null when tool calls are present) */
    content: string | null;
    /** Tool calls requested by the model (null when text reply is present) */
    toolCalls: ToolCall[] | null;
}

export interface LLMProvider {
    /** Configured LLM_PROVIDER: "openai", "groq" or "deepseek" */
    readonly id: string;

    complete(
        messages: ChatCompletionMessageParam[],
        tools: readonly ToolDescriptor[]
    ): Promise<LLMResponse>;
}
