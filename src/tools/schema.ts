/**
 * tools/schema.ts — Convert between zod schemas, ParamSpec lists and JSON Schema.
 *
 *   zod object  ──describeParams──▶  ParamSpec[]  ──toJsonSchema──▶  MCP / OpenAI inputSchema
 *                                     ▲
 *                   paramsFromJsonSchema (client side, from tools/list)
 */

import { z } from "zod";
import type { ParamSpec, ParamType, ResultSpec } from "./types.js";

export type JsonObjectSchema = {
    type: "object";
    properties: Record<string, { type: ParamType; description?: string }>;
    required: string[];
};

function describeParam(name: string, field: z.ZodTypeAny): ParamSpec {
    let inner: z.ZodTypeAny = field;
    let required = true;
    let description = field.description;

    for (;;) {
        if (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable) {
            required = false;
            inner = inner.unwrap();
        } else if (inner instanceof z.ZodDefault) {
            required = false;
            inner = inner.removeDefault();
        } else {
            break;
        }
        description ??= inner.description;
    }

    let type: ParamType;
    if (inner instanceof z.ZodString) type = "string";
    else if (inner instanceof z.ZodNumber) type = inner.isInt ? "integer" : "number";
    else if (inner instanceof z.ZodBoolean) type = "boolean";
    else throw new Error(`Parameter "${name}" has an unsupported schema type`);

    return { name, type, required, description: description ?? "" };
}

/** Ordered ParamSpec list for a tool's zod parameter schema */
export function describeParams(schema: z.AnyZodObject): ParamSpec[] {
    return Object.entries<z.ZodTypeAny>(schema.shape).map(([name, field]) => describeParam(name, field));
}

export function describeResult(schema: z.ZodTypeAny, description: string): ResultSpec {
    if (schema instanceof z.ZodString) return { type: "string", description };
    if (schema instanceof z.ZodNumber) return { type: "number", description };
    if (schema instanceof z.ZodArray) return { type: "array", description };
    return { type: "object", description };
}

export function toJsonSchema(params: readonly ParamSpec[]): JsonObjectSchema {
    const properties: JsonObjectSchema["properties"] = {};
    for (const p of params) {
        properties[p.name] = p.description
            ? { type: p.type, description: p.description }
            : { type: p.type };
    }
    return {
        type: "object",
        properties,
        required: params.filter((p) => p.required).map((p) => p.name),
    };
}

const jsonSchemaShape = z.object({
    properties: z
        .record(
            z.object({
                type: z.enum(["string", "number", "integer", "boolean"]).catch("string"),
                description: z.string().optional(),
            })
        )
        .default({}),
    required: z.array(z.string()).default([]),
});

/** Inverse of toJsonSchema for schemas advertised by a remote server */
export function paramsFromJsonSchema(schema: unknown): ParamSpec[] {
    const parsed = jsonSchemaShape.safeParse(schema);
    if (!parsed.success) return [];
    const { properties, required } = parsed.data;
    return Object.entries(properties).map(([name, prop]) => ({
        name,
        type: prop.type,
        required: required.includes(name),
        description: prop.description ?? "",
    }));
}
