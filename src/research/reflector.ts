/**
 * Reflector - decides whether the loop continues and with which query
 */

import { z } from 'zod';
import type { ChatModel } from '../clients/llm.js';
import { parseModelJson } from './json.js';
import { getReflectionPrompt } from './prompts.js';
import type { Decision } from './types.js';

const ReflectionSchema = z.object({
    knowledge_gap: z.string().default(''),
    follow_up_query: z.string().default(''),
    is_sufficient: z
        .union([z.boolean(), z.enum(['true', 'false'])])
        .default(false)
        .transform((value) => value === true || value === 'true'),
});

export type Reflection = z.output<typeof ReflectionSchema>;

export function fallbackQuery(topic: string): string {
    return `Tell me more about ${topic}`;
}

/**
 * Pure routing rule. The loop bound always wins, so a run never exceeds
 * maxLoops iterations whatever the model says.
 */
export function routeResearch(input: {
    topic: string;
    loopCount: number;
    maxLoops: number;
    reflection?: Reflection;
}): Decision {
    if (input.loopCount >= input.maxLoops) {
        return { kind: 'stop', reason: 'max_loops' };
    }
    if (input.reflection?.is_sufficient) {
        return { kind: 'stop', reason: 'sufficient' };
    }
    const query = input.reflection?.follow_up_query.trim() || fallbackQuery(input.topic);
    return { kind: 'continue', query };
}

export interface ReflectionResult {
    decision: Decision;
    /** Knowledge gap the model named; empty when it was not asked */
    gap: string;
}

export class Reflector {
    private model: ChatModel;

    constructor(model: ChatModel) {
        this.model = model;
    }

    async reflect(
        topic: string,
        summary: string,
        loopCount: number,
        maxLoops: number,
        signal?: AbortSignal
    ): Promise<ReflectionResult> {
        if (loopCount >= maxLoops) {
            return { decision: routeResearch({ topic, loopCount, maxLoops }), gap: '' };
        }

        const response = await this.model.chat([
            { role: 'system', content: getReflectionPrompt(topic) },
            {
                role: 'user',
                content: `Identify a knowledge gap and generate a follow-up web search query based on our existing knowledge: ${summary}`,
            },
        ], {
            temperature: 0,
            jsonMode: true,
            signal,
        });

        const content = response.choices[0]?.message.content ?? '';
        const reflection = parseModelJson('reflect', content, ReflectionSchema);

        return {
            decision: routeResearch({ topic, loopCount, maxLoops, reflection }),
            gap: reflection.knowledge_gap,
        };
    }
}
