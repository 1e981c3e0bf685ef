/**
 * Perplexity Sonar client
 * One answer with citations; the answer is attached to the first citation,
 * the remaining citations are kept as references only.
 */

import { z } from 'zod';
import type { HttpConfig } from '../config.js';
import { ApiKeyError, SearchError, errorMessage } from '../errors.js';
import { fetchWithRetry } from '../utils/http.js';
import { searchFailure, type SearchClient, type SearchHit, type SearchRequest } from './search.js';

const PERPLEXITY_API_BASE = 'https://api.perplexity.ai';
const PERPLEXITY_MODEL = 'sonar-pro';
const FALLBACK_CITATION = 'https://perplexity.ai';

const PerplexityResponseSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullish() }),
            })
        )
        .min(1),
    citations: z.array(z.string()).nullish(),
});

export class PerplexityClient implements SearchClient {
    readonly provider = 'perplexity' as const;
    private apiKey: string;
    private timeoutMs: number;
    private http: HttpConfig;

    constructor(apiKey: string, options: { timeoutMs: number; http: HttpConfig }) {
        if (!apiKey || apiKey.trim() === '') {
            throw new ApiKeyError(
                'PERPLEXITY_API_KEY',
                'PERPLEXITY_API_KEY is required.\n' +
                'Get your API key at: https://www.perplexity.ai/settings/api\n' +
                'Then run: research init'
            );
        }
        this.apiKey = apiKey.trim();
        this.timeoutMs = options.timeoutMs;
        this.http = options.http;
    }

    async search(request: SearchRequest): Promise<SearchHit[]> {
        const { query, loopIndex, signal } = request;

        let response: Response;
        try {
            response = await fetchWithRetry(`${PERPLEXITY_API_BASE}/chat/completions`, {
                method: 'POST',
                headers: {
                    accept: 'application/json',
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.apiKey}`,
                },
                body: JSON.stringify({
                    model: PERPLEXITY_MODEL,
                    messages: [
                        { role: 'system', content: 'Search the web and provide factual information with sources.' },
                        { role: 'user', content: query },
                    ],
                }),
            }, {
                retries: this.http.retries,
                retryDelayMs: this.http.retryDelayMs,
                timeoutMs: this.timeoutMs,
                signal,
            });
        } catch (error) {
            if (signal?.aborted) throw error;
            throw new SearchError('perplexity', `Perplexity request failed: ${errorMessage(error)}`, query, { cause: error });
        }

        if (!response.ok) {
            throw await searchFailure('perplexity', 'PERPLEXITY_API_KEY', response, query);
        }

        const parsed = PerplexityResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new SearchError('perplexity', 'Perplexity returned an unexpected payload', query);
        }

        const content = parsed.data.choices[0].message.content ?? '';
        const citations = parsed.data.citations?.length ? parsed.data.citations : [FALLBACK_CITATION];
        const searchNumber = loopIndex + 1;

        return citations.map((url, i) => i === 0
            ? {
                title: `Perplexity Search ${searchNumber}, Source 1`,
                url,
                content,
                rawContent: content,
            }
            : {
                title: `Perplexity Search ${searchNumber}, Source ${i + 1}`,
                url,
                content: 'See above for full content',
            });
    }
}
