/**
 * Wires the research stages from a configuration
 */

import type { Config } from '../config.js';
import { ChatClient, type ChatModel } from '../clients/llm.js';
import { SmtpMailer, type Mailer } from '../clients/mailer.js';
import { PerplexityClient } from '../clients/perplexity.js';
import type { SearchClients } from '../clients/search.js';
import { TavilyClient } from '../clients/tavily.js';
import { YouTubeClient } from '../clients/youtube.js';
import { Finalizer } from './finalizer.js';
import { ResearchLoop } from './loop.js';
import { QueryGenerator } from './query-generator.js';
import { Reflector } from './reflector.js';
import { WebRetriever } from './retriever.js';
import { Summarizer } from './summarizer.js';

/**
 * Collaborators to use instead of the real network clients
 */
export interface LoopDependencies {
    chat?: ChatModel;
    searchClients?: SearchClients;
    mailer?: Mailer;
    now?: () => Date;
}

/**
 * Build the clients the configured provider selection needs.
 */
export function createSearchClients(config: Config): SearchClients {
    const { search, http } = config;
    const options = { timeoutMs: search.timeoutMs, http };
    const clients: SearchClients = {};

    if (search.provider === 'tavily') {
        clients.tavily = new TavilyClient(search.tavilyApiKey, options);
    }
    if (search.provider === 'perplexity') {
        clients.perplexity = new PerplexityClient(search.perplexityApiKey, options);
    }
    if (search.provider === 'youtube' || search.includeYoutube) {
        clients.youtube = new YouTubeClient(search.youtubeApiKey, options);
    }

    return clients;
}

export function buildResearchLoop(config: Config, deps: LoopDependencies = {}): ResearchLoop {
    const chat = deps.chat ?? new ChatClient(config.llm, config.http);
    const searchClients = deps.searchClients ?? createSearchClients(config);
    const mailer = config.email.enabled
        ? deps.mailer ?? new SmtpMailer(config.email)
        : null;

    return new ResearchLoop(config, {
        generator: new QueryGenerator(chat),
        retriever: new WebRetriever(searchClients, config.search, { now: deps.now }),
        summarizer: new Summarizer(chat, config.search),
        reflector: new Reflector(chat),
        finalizer: new Finalizer(mailer, config.email.recipient),
    });
}
