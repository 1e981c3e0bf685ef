/**
 * Web Retriever - runs one query against the configured providers
 */

import type { SearchConfig, SearchProvider } from '../config.js';
import { SearchError } from '../errors.js';
import type { SearchClient, SearchClients, SearchHit } from '../clients/search.js';
import { createLogger } from '../utils/logger.js';
import type { SourceDoc } from './types.js';

const logger = createLogger('retriever');

// Rough characters-per-token ratio used to cap raw page content
const CHARS_PER_TOKEN = 4;

export interface RetrieverOptions {
    now?: () => Date;
}

export class WebRetriever {
    private clients: SearchClients;
    private config: SearchConfig;
    private now: () => Date;

    constructor(clients: SearchClients, config: SearchConfig, options: RetrieverOptions = {}) {
        this.clients = clients;
        this.config = config;
        this.now = options.now ?? (() => new Date());
    }

    private client(provider: SearchProvider): SearchClient {
        const client = this.clients[provider];
        if (!client) {
            throw new SearchError(provider, `No search client configured for ${provider}`);
        }
        return client;
    }

    /**
     * Run the query and return the documents in provider order.
     * An empty list is a valid result.
     */
    async retrieve(query: string, loopIndex: number, signal?: AbortSignal): Promise<SourceDoc[]> {
        const { provider, includeYoutube, maxResults, fetchFullPage } = this.config;
        const request = { query, maxResults, includeRawContent: fetchFullPage, loopIndex, signal };

        const batches: { provider: SearchProvider; hits: SearchHit[] }[] = [];
        batches.push({ provider, hits: await this.client(provider).search(request) });

        if (includeYoutube && provider !== 'youtube') {
            batches.push({ provider: 'youtube', hits: await this.client('youtube').search(request) });
        }

        const retrievedAt = this.now().toISOString();
        const docs = batches.flatMap((batch) => batch.hits.map((hit): SourceDoc => Object.freeze({
            url: hit.url,
            title: hit.title,
            contentExcerpt: hit.content,
            rawContent: hit.rawContent,
            retrievedAt,
            provider: batch.provider,
        })));

        logger.debug(`${docs.length} result(s) for "${query}"`);
        return docs;
    }
}

/**
 * Render sources for the summarizer prompt.
 *
 * Each source is labelled with its citation marker and a URL repeated in the
 * batch is rendered once. Raw content is cut to roughly maxTokensPerSource tokens.
 */
export function formatSourcesForPrompt(
    sources: readonly SourceDoc[],
    labels: readonly number[],
    options: { maxTokensPerSource: number; includeRawContent: boolean }
): string {
    const charLimit = options.maxTokensPerSource * CHARS_PER_TOKEN;
    const seen = new Set<string>();
    let formatted = 'Sources:\n\n';

    sources.forEach((source, i) => {
        if (seen.has(source.url)) return;
        seen.add(source.url);

        const label = labels[i] ?? i + 1;
        formatted += `Source [${label}] ${source.title}:\n===\n`;
        formatted += `URL: ${source.url}\n===\n`;
        formatted += `Most relevant content from source: ${source.contentExcerpt}\n===\n`;

        if (options.includeRawContent) {
            let raw = source.rawContent ?? '';
            if (!source.rawContent) {
                logger.debug(`No raw content for ${source.url}`);
            }
            if (raw.length > charLimit) {
                raw = `${raw.slice(0, charLimit)}... [truncated]`;
            }
            formatted += `Full source content limited to ${options.maxTokensPerSource} tokens: ${raw}\n\n`;
        }
    });

    return formatted.trim();
}
