/**
 * Summarizer - folds each batch of sources into the running summary
 */

import type { ChatModel } from '../clients/llm.js';
import type { SearchConfig } from '../config.js';
import { ModelOutputError } from '../errors.js';
import { stripThinkTags } from './json.js';
import { SUMMARIZER_PROMPT } from './prompts.js';
import { formatSourcesForPrompt } from './retriever.js';
import type { SourceDoc } from './types.js';

/**
 * Unique URLs in order of first appearance.
 *
 * Citation numbers are positions in this list, so a URL keeps its number for
 * the whole run. merge(merge(a, b), c) equals merge(a, merge(b, c)).
 */
export function mergeCitations(prior: readonly string[], batch: readonly string[]): string[] {
    const seen = new Set<string>();
    const merged: string[] = [];
    for (const url of [...prior, ...batch]) {
        if (seen.has(url)) continue;
        seen.add(url);
        merged.push(url);
    }
    return merged;
}

/**
 * 1-based citation number of each source, given the sources gathered before it.
 */
export function citationLabels(prior: readonly SourceDoc[], batch: readonly SourceDoc[]): number[] {
    const order = mergeCitations(prior.map((s) => s.url), batch.map((s) => s.url));
    return batch.map((source) => order.indexOf(source.url) + 1);
}

export class Summarizer {
    private model: ChatModel;
    private config: SearchConfig;

    constructor(model: ChatModel, config: SearchConfig) {
        this.model = model;
        this.config = config;
    }

    /**
     * Returns the updated summary. With no new sources the summary is
     * returned unchanged and the model is not called.
     */
    async summarize(
        topic: string,
        existingSummary: string,
        priorSources: readonly SourceDoc[],
        newSources: readonly SourceDoc[],
        signal?: AbortSignal
    ): Promise<string> {
        if (newSources.length === 0) return existingSummary;

        const context = formatSourcesForPrompt(newSources, citationLabels(priorSources, newSources), {
            maxTokensPerSource: this.config.maxTokensPerSource,
            includeRawContent: this.config.fetchFullPage,
        });

        const message = existingSummary
            ? `<Existing Summary>\n${existingSummary}\n</Existing Summary>\n\n` +
              `<New Search Results>\n${context}\n</New Search Results>\n\n` +
              `Update the existing summary with the new search results on this topic:\n<User Input>\n${topic}\n</User Input>\n\n`
            : `<Search Results>\n${context}\n</Search Results>\n\n` +
              `Create a summary using the search results on this topic:\n<User Input>\n${topic}\n</User Input>\n\n`;

        const response = await this.model.chat([
            { role: 'system', content: SUMMARIZER_PROMPT },
            { role: 'user', content: message },
        ], {
            temperature: 0,
            signal,
        });

        const content = response.choices[0]?.message.content ?? '';
        const summary = stripThinkTags(content);
        if (!summary) {
            throw new ModelOutputError('summarize', 'model returned an empty summary', content);
        }
        return summary;
    }
}
