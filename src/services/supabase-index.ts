/**
 * services/supabase-index.ts — Hybrid (pgvector + full-text) document index on Supabase
 *
 * The table and the two search functions live in sql/hybrid_search.sql:
 *   hybrid_search(query_text, query_embedding, match_count)  reciprocal rank fusion
 *   keyword_search(query_text, match_count)                  full-text only
 *
 * Rows coming back from PostgREST are untyped, so they are validated with zod
 * before they leave this module.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { DocumentIndex, ScoredDocument } from "./types.js";

const rowsSchema = z.array(
    z.object({
        id: z.union([z.string(), z.number()]).transform(String),
        content: z.string(),
        source: z.string().nullable().default(null),
        score: z.number(),
    })
);

const insertedSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
});

function toDocuments(data: unknown, fn: string): ScoredDocument[] {
    const parsed = rowsSchema.safeParse(data ?? []);
    if (!parsed.success) {
        throw new Error(`Supabase ${fn} returned unexpected rows: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
}

export function createSupabaseDocumentIndex(
    url: string,
    serviceRoleKey: string,
    table: string
): DocumentIndex {
    let supabase: SupabaseClient | null = null;
    const getSupabase = (): SupabaseClient => {
        if (!supabase) {
            supabase = createClient(url, serviceRoleKey, { auth: { persistSession: false } });
        }
        return supabase;
    };

    return {
        async add({ content, source, embedding }) {
            const { data, error } = await getSupabase()
                .from(table)
                .insert({ content, source, embedding })
                .select("id")
                .single();
            if (error) throw new Error(`Supabase insert failed: ${error.message}`);
            return insertedSchema.parse(data);
        },

        async hybridSearch(query, embedding, limit) {
            const { data, error } = await getSupabase().rpc("hybrid_search", {
                query_text: query,
                query_embedding: embedding,
                match_count: limit,
            });
            if (error) throw new Error(`Supabase hybrid_search failed: ${error.message}`);
            return toDocuments(data, "hybrid_search");
        },

        async keywordSearch(query, limit) {
            const { data, error } = await getSupabase().rpc("keyword_search", {
                query_text: query,
                match_count: limit,
            });
            if (error) throw new Error(`Supabase keyword_search failed: ${error.message}`);
            return toDocuments(data, "keyword_search");
        },
    };
}
