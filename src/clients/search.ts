/**
 * Search provider contract shared by the Tavily, Perplexity and YouTube clients
 */

import type { SearchProvider } from '../config.js';
import { ApiKeyError, RateLimitError, SearchError } from '../errors.js';
import { parseErrorBody, retryAfterMs } from '../utils/http.js';

export interface SearchHit {
    url: string;
    title: string;
    content: string;
    rawContent?: string;
}

export interface SearchRequest {
    query: string;
    maxResults: number;
    includeRawContent: boolean;
    /** Zero-based loop index of the iteration issuing the search */
    loopIndex: number;
    signal?: AbortSignal;
}

export interface SearchClient {
    readonly provider: SearchProvider;
    search(request: SearchRequest): Promise<SearchHit[]>;
}

export type SearchClients = Partial<Record<SearchProvider, SearchClient>>;

const SERVICE_NAMES: Record<SearchProvider, string> = {
    tavily: 'Tavily',
    perplexity: 'Perplexity',
    youtube: 'YouTube Data API',
};

/**
 * Map a non-OK provider response to the matching error class
 */
export async function searchFailure(
    provider: SearchProvider,
    keyName: string,
    response: Response,
    query: string
): Promise<Error> {
    const service = SERVICE_NAMES[provider];
    const message = await parseErrorBody(response);

    if (response.status === 401 || response.status === 403) {
        return new ApiKeyError(
            keyName,
            `${service} authentication failed.\n` +
            `Please check your ${keyName} is valid.\n` +
            'Run: research init'
        );
    }

    if (response.status === 429) {
        return new RateLimitError(service, retryAfterMs(response));
    }

    return new SearchError(provider, `${service} error: ${response.status} - ${message}`, query);
}
