/**
 * providers/openai-provider.ts — Chat completions over the OpenAI API format
 *
 * OpenAI, Groq and DeepSeek all speak it; only the baseURL differs
 * (see providers/registry.ts). Tool descriptors become OpenAI functions here,
 * with the result description appended so the model knows what comes back.
 */

import OpenAI from "openai";
import type { ChatCompletionTool } from "openai/resources/chat/completions";
import { logger } from "../logger.js";
import { toJsonSchema } from "../tools/schema.js";
import type { ToolDescriptor } from "../tools/types.js";
import type { LLMProvider, LLMResponse } from "./types.js";

export function toOpenAITool(descriptor: ToolDescriptor): ChatCompletionTool {
    return {
        type: "function",
        function: {
            name: descriptor.name,
            description: `${descriptor.description} Returns: ${descriptor.returns.description}`,
            parameters: { ...toJsonSchema(descriptor.params) },
        },
    };
}

export interface ChatProviderOptions {
    id: string;
    apiKey: string;
    model: string;
    /** Omit for api.openai.com */
    baseURL?: string;
}

export function createChatProvider({ id, apiKey, model, baseURL }: ChatProviderOptions): LLMProvider {
    const client = new OpenAI({ apiKey, baseURL });
    const log = logger.child(id);

    return {
        id,

        async complete(messages, descriptors): Promise<LLMResponse> {
            log.debug("complete()", { model, msgs: messages.length, tools: descriptors.length });

            const baseParams = { model, messages, temperature: 0 } as const;
            const response = await client.chat.completions.create(
                descriptors.length > 0
                    ? { ...baseParams, tools: descriptors.map(toOpenAITool), tool_choice: "auto" as const }
                    : baseParams
            );

            const msg = response.choices[0]?.message;
            if (!msg) throw new Error(`${id} returned no choices`);

            if (msg.tool_calls && msg.tool_calls.length > 0) {
                return {
                    content: null,
                    toolCalls: msg.tool_calls.map((tc) => ({
                        id: tc.id,
                        name: tc.function.name,
                        arguments: tc.function.arguments,
                    })),
                };
            }

            return { content: msg.content, toolCalls: null };
        },
    };
}
