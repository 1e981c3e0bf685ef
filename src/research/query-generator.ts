/**
 * Query Generator - turns the topic (or the reflector's suggestion) into a search query
 */

import { z } from 'zod';
import type { ChatModel } from '../clients/llm.js';
import { ModelOutputError } from '../errors.js';
import { parseModelJson } from './json.js';
import { getQueryWriterPrompt } from './prompts.js';

const QuerySchema = z.object({
    query: z.string(),
    aspect: z.string().optional(),
    rationale: z.string().optional(),
});

export class QueryGenerator {
    private model: ChatModel;

    constructor(model: ChatModel) {
        this.model = model;
    }

    /**
     * A non-empty suggestion from the reflector is used as-is; otherwise the
     * model writes the query.
     */
    async generate(topic: string, suggested?: string, signal?: AbortSignal): Promise<string> {
        const followUp = suggested?.trim();
        if (followUp) return followUp;

        const response = await this.model.chat([
            { role: 'system', content: getQueryWriterPrompt(topic) },
            { role: 'user', content: 'Generate a query for web search:' },
        ], {
            temperature: 0,
            jsonMode: true,
            signal,
        });

        const content = response.choices[0]?.message.content ?? '';
        const parsed = parseModelJson('query', content, QuerySchema);
        const query = parsed.query.trim();
        if (!query) {
            throw new ModelOutputError('query', 'model returned an empty query', content);
        }
        return query;
    }
}
