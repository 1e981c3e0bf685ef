/**
 * Tavily Search API Client
 */

import { z } from 'zod';
import type { HttpConfig } from '../config.js';
import { ApiKeyError, SearchError, errorMessage } from '../errors.js';
import { fetchWithRetry } from '../utils/http.js';
import { searchFailure, type SearchClient, type SearchHit, type SearchRequest } from './search.js';

const TAVILY_API_BASE = 'https://api.tavily.com';

const TavilyResponseSchema = z.object({
    results: z
        .array(
            z.object({
                url: z.string().nullish(),
                title: z.string().nullish(),
                content: z.string().nullish(),
                raw_content: z.string().nullish(),
            })
        )
        .default([]),
});

export class TavilyClient implements SearchClient {
    readonly provider = 'tavily' as const;
    private apiKey: string;
    private timeoutMs: number;
    private http: HttpConfig;

    constructor(apiKey: string, options: { timeoutMs: number; http: HttpConfig }) {
        if (!apiKey || apiKey.trim() === '') {
            throw new ApiKeyError(
                'TAVILY_API_KEY',
                'TAVILY_API_KEY is required.\n' +
                'Get your API key at: https://tavily.com\n' +
                'Then run: research init'
            );
        }
        this.apiKey = apiKey.trim();
        this.timeoutMs = options.timeoutMs;
        this.http = options.http;
    }

    async search(request: SearchRequest): Promise<SearchHit[]> {
        const { query, maxResults, includeRawContent, signal } = request;

        let response: Response;
        try {
            response = await fetchWithRetry(`${TAVILY_API_BASE}/search`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.apiKey}`,
                },
                body: JSON.stringify({
                    query,
                    max_results: maxResults,
                    include_raw_content: includeRawContent,
                    include_answer: false,
                    search_depth: 'basic',
                }),
            }, {
                retries: this.http.retries,
                retryDelayMs: this.http.retryDelayMs,
                timeoutMs: this.timeoutMs,
                signal,
            });
        } catch (error) {
            if (signal?.aborted) throw error;
            throw new SearchError('tavily', `Tavily request failed: ${errorMessage(error)}`, query, { cause: error });
        }

        if (!response.ok) {
            throw await searchFailure('tavily', 'TAVILY_API_KEY', response, query);
        }

        const parsed = TavilyResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new SearchError('tavily', 'Tavily returned an unexpected payload', query);
        }

        return parsed.data.results.flatMap((result) => {
            if (!result.url) return [];
            return [{
                url: result.url,
                title: result.title ?? result.url,
                content: result.content ?? '',
                rawContent: result.raw_content ?? undefined,
            }];
        });
    }
}
