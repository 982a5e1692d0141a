/**
 * In-process stand-ins for the third-party services, plus a config record
 * with every credential set to a placeholder.
 */

import { readConfig, type Config } from "../config.js";
import type {
    DocumentIndex,
    EmbeddingClient,
    MarketDataClient,
    Quote,
    ScoredDocument,
    Services,
    WebClient,
    WebSearchHit,
    WebSearchResponse,
} from "../services/types.js";

export const FIXED_NOW = new Date("2026-03-14T09:30:00Z");

export function testConfig(overrides: Record<string, string> = {}): Config {
    return readConfig({
        OPENAI_API_KEY: "test-secret",
        TAVILY_API_KEY: "test-secret",
        SUPABASE_URL: "https://project.supabase.test",
        SUPABASE_SERVICE_ROLE_KEY: "test-secret",
        ...overrides,
    });
}

export class FakeWebClient implements WebClient {
    searches: { query: string; maxResults: number }[] = [];
    extracted: string[] = [];

    constructor(
        public response: WebSearchResponse = { answer: null, results: [] },
        public pages: Record<string, string> = {}
    ) { }

    async search(query: string, options: { maxResults: number }): Promise<WebSearchResponse> {
        this.searches.push({ query, maxResults: options.maxResults });
        return this.response;
    }

    async extract(url: string): Promise<string | null> {
        this.extracted.push(url);
        return this.pages[url] ?? null;
    }
}

export function hit(title: string, url: string, content = "", publishedDate: string | null = null): WebSearchHit {
    return { title, url, content, score: 0.5, publishedDate };
}

export class FakeEmbeddings implements EmbeddingClient {
    readonly model = "fake-embedding";
    readonly dimensions = 3;
    calls = 0;
    error: Error | null = null;
    vector = [0.1, 0.2, 0.3];

    async embed(): Promise<number[]> {
        this.calls++;
        if (this.error) throw this.error;
        return this.vector;
    }
}

export class FakeDocumentIndex implements DocumentIndex {
    readonly docs: { id: string; content: string; source: string | null; embedding: number[] }[] = [];
    hybridCalls = 0;

    async add(doc: { content: string; source: string | null; embedding: number[] }): Promise<{ id: string }> {
        const id = `doc-${this.docs.length + 1}`;
        this.docs.push({ id, ...doc });
        return { id };
    }

    async hybridSearch(query: string, _embedding: number[], limit: number): Promise<ScoredDocument[]> {
        this.hybridCalls++;
        return this.docs.slice(0, limit).map((d, i) => ({
            id: d.id,
            content: d.content,
            source: d.source,
            score: 1 / (i + 2),
        }));
    }

    async keywordSearch(query: string, limit: number): Promise<ScoredDocument[]> {
        const words = query.toLowerCase().split(/\s+/);
        return this.docs
            .filter((d) => words.some((w) => d.content.toLowerCase().includes(w)))
            .slice(0, limit)
            .map((d) => ({ id: d.id, content: d.content, source: d.source, score: 0.25 }));
    }
}

export class FakeMarket implements MarketDataClient {
    requested: string[] = [];
    error: Error | null = null;

    constructor(public quotes: Record<string, Quote> = {}) { }

    async quote(ticker: string): Promise<Quote | null> {
        this.requested.push(ticker);
        if (this.error) throw this.error;
        return this.quotes[ticker] ?? null;
    }
}

export const TQQQ_QUOTE: Quote = {
    symbol: "TQQQ",
    price: 52.1,
    currency: "USD",
    marketTime: new Date("2026-03-13T20:00:00Z"),
};

export interface FakeServices extends Services {
    web: FakeWebClient;
    embeddings: FakeEmbeddings;
    index: FakeDocumentIndex;
    market: FakeMarket;
}

export function fakeServices(): FakeServices {
    return {
        web: new FakeWebClient(),
        embeddings: new FakeEmbeddings(),
        index: new FakeDocumentIndex(),
        market: new FakeMarket({ TQQQ: TQQQ_QUOTE }),
        now: () => FIXED_NOW,
    };
}
