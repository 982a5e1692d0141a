/**
 * services/types.ts — Seams between tools and the third-party services they call.
 * Tests substitute in-process fakes for every one of these.
 */

export interface WebSearchHit {
    title: string;
    url: string;
    content: string;
    score: number;
    publishedDate: string | null;
}

export interface WebSearchResponse {
    /** Provider's summary answer, when it produced one */
    answer: string | null;
    results: WebSearchHit[];
}

export interface WebClient {
    search(query: string, options: { maxResults: number; signal?: AbortSignal }): Promise<WebSearchResponse>;
    /** Page text for a URL, or null when the page could not be extracted */
    extract(url: string, options?: { signal?: AbortSignal }): Promise<string | null>;
}

export interface EmbeddingClient {
    readonly model: string;
    readonly dimensions: number;
    embed(text: string, options?: { signal?: AbortSignal }): Promise<number[]>;
}

export interface ScoredDocument {
    id: string;
    content: string;
    source: string | null;
    score: number;
}

export interface DocumentIndex {
    add(doc: { content: string; source: string | null; embedding: number[] }): Promise<{ id: string }>;
    hybridSearch(query: string, embedding: number[], limit: number): Promise<ScoredDocument[]>;
    keywordSearch(query: string, limit: number): Promise<ScoredDocument[]>;
}

export interface Quote {
    symbol: string;
    price: number;
    currency: string | null;
    marketTime: Date | null;
}

export interface MarketDataClient {
    /** Latest quote, or null when the provider has no price for the symbol */
    quote(ticker: string): Promise<Quote | null>;
}

export interface Services {
    web: WebClient;
    embeddings: EmbeddingClient;
    index: DocumentIndex;
    market: MarketDataClient;
    /** Current time; injectable for tests */
    now(): Date;
}
