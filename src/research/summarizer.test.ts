import { describe, it, expect } from 'vitest';
import { Summarizer, citationLabels, mergeCitations } from './summarizer.js';
import { ModelOutputError } from '../errors.js';
import { ScriptedChat, testConfig } from '../__tests__/fakes.js';
import type { SourceDoc } from './types.js';

function doc(n: number, rawContent?: string): SourceDoc {
    return {
        url: `https://example.com/${n}`,
        title: `Doc ${n}`,
        contentExcerpt: `Excerpt ${n}`,
        rawContent,
        retrievedAt: '2024-01-01T00:00:00.000Z',
        provider: 'tavily',
    };
}

describe('mergeCitations', () => {
    it('should keep first-appearance order without duplicates', () => {
        expect(mergeCitations(['a', 'b'], ['b', 'c', 'a', 'd'])).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should give the same result sequentially as in one combined batch', () => {
        const a = ['u1', 'u2'];
        const b = ['u2', 'u3'];
        const c = ['u4', 'u1', 'u5'];

        const sequential = mergeCitations(mergeCitations(a, b), c);
        const grouped = mergeCitations(a, mergeCitations(b, c));
        const combined = mergeCitations([], [...a, ...b, ...c]);

        expect(sequential).toEqual(['u1', 'u2', 'u3', 'u4', 'u5']);
        expect(grouped).toEqual(sequential);
        expect(combined).toEqual(sequential);
    });
});

describe('citationLabels', () => {
    it('should number new sources after the prior ones and reuse known numbers', () => {
        expect(citationLabels([doc(1), doc(2)], [doc(3), doc(1)])).toEqual([3, 1]);
    });
});

describe('Summarizer', () => {
    const config = testConfig({ MAX_TOKENS_PER_SOURCE: '2' });

    it('should return the summary unchanged without calling the model when there are no new sources', async () => {
        const chat = new ScriptedChat();
        const summarizer = new Summarizer(chat, config.search);

        expect(await summarizer.summarize('topic', 'Existing.', [doc(1)], [])).toBe('Existing.');
        expect(chat.calls).toHaveLength(0);
    });

    it('should ask for a new summary with labelled, truncated sources', async () => {
        const chat = new ScriptedChat({ summarize: ['<think>draft</think>New summary [1].'] });
        const summarizer = new Summarizer(chat, config.search);

        const summary = await summarizer.summarize('topic', '', [], [doc(1, 'abcdefghijkl')]);

        expect(summary).toBe('New summary [1].');
        const prompt = chat.calls[0].messages[1].content;
        expect(prompt).toContain('<Search Results>');
        expect(prompt).toContain(
            'Source [1] Doc 1:\n===\nURL: https://example.com/1\n===\nMost relevant content from source: Excerpt 1\n===\n' +
            'Full source content limited to 2 tokens: abcdefgh... [truncated]'
        );
        expect(chat.calls[0].options?.temperature).toBe(0);
    });

    it('should pass the existing summary when extending', async () => {
        const chat = new ScriptedChat({ summarize: ['Extended.'] });
        const summarizer = new Summarizer(chat, config.search);

        await summarizer.summarize('topic', 'Existing [1].', [doc(1)], [doc(2)]);

        const prompt = chat.calls[0].messages[1].content;
        expect(prompt).toContain('<Existing Summary>\nExisting [1].\n</Existing Summary>');
        expect(prompt).toContain('Source [2] Doc 2:');
    });

    it('should treat an empty reply as malformed output', async () => {
        const chat = new ScriptedChat({ summarize: ['<think>nothing to say</think>'] });
        const summarizer = new Summarizer(chat, config.search);

        await expect(summarizer.summarize('topic', '', [], [doc(1)])).rejects.toThrow(ModelOutputError);
    });
});
