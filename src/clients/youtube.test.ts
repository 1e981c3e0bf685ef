/**
 * Unit tests for the YouTube Data API client
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
    TRANSCRIPT_TIMED_OUT,
    TRANSCRIPT_UNAVAILABLE,
    YouTubeClient,
    videoUrl,
    type TranscriptSource,
} from './youtube.js';

const mockFetch = vi.fn();

const options = { timeoutMs: 5000, http: { retries: 1, retryDelayMs: 0 } };

class FakeTranscripts implements TranscriptSource {
    readonly requested: string[] = [];
    private texts: Record<string, string | Error>;

    constructor(texts: Record<string, string | Error> = {}) {
        this.texts = texts;
    }

    async fetchTranscript(videoId: string): Promise<string> {
        this.requested.push(videoId);
        const text = this.texts[videoId];
        if (text === undefined) throw new Error('Transcripts are disabled on this video');
        if (text instanceof Error) throw text;
        return text;
    }
}

function jsonReply(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('YouTubeClient', () => {
    beforeEach(() => {
        mockFetch.mockReset();
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should build watch URLs', () => {
        expect(videoUrl('abc123')).toBe('https://www.youtube.com/watch?v=abc123');
    });

    it('should query the search endpoint for videos', async () => {
        mockFetch.mockResolvedValueOnce(jsonReply({ items: [] }));
        const client = new YouTubeClient('test-youtube-key', options);

        await client.search({ query: 'rust async', maxResults: 2, includeRawContent: false, loopIndex: 0 });

        const url = new URL(mockFetch.mock.calls[0][0]);
        expect(url.origin + url.pathname).toBe('https://www.googleapis.com/youtube/v3/search');
        expect(url.searchParams.get('part')).toBe('snippet');
        expect(url.searchParams.get('type')).toBe('video');
        expect(url.searchParams.get('q')).toBe('rust async');
        expect(url.searchParams.get('maxResults')).toBe('2');
        expect(url.searchParams.get('key')).toBe('test-youtube-key');
    });

    it('should use the transcript as content and truncate the excerpt', async () => {
        const transcript = 'x'.repeat(250);
        mockFetch.mockResolvedValueOnce(jsonReply({
            items: [
                { id: { videoId: 'vid1' }, snippet: { title: 'Talk', description: 'ignored' } },
                { id: { channelId: 'chan' }, snippet: { title: 'A channel' } },
                { id: { videoId: 'vid2' }, snippet: { title: 'Short' } },
            ],
        }));
        const transcripts = new FakeTranscripts({ vid1: transcript, vid2: ' brief ' });
        const client = new YouTubeClient('test-youtube-key', { ...options, transcripts });

        const hits = await client.search({ query: 'q', maxResults: 3, includeRawContent: true, loopIndex: 0 });

        expect(transcripts.requested).toEqual(['vid1', 'vid2']);
        expect(hits).toHaveLength(2);
        expect(hits[0]).toEqual({
            url: 'https://www.youtube.com/watch?v=vid1',
            title: 'Talk',
            content: `${'x'.repeat(200)}...`,
            rawContent: transcript,
        });
        expect(hits[1].content).toBe('brief');
    });

    it('should fall back when a transcript is missing', async () => {
        mockFetch.mockResolvedValueOnce(jsonReply({ items: [{ id: { videoId: 'vid1' }, snippet: { title: 'Talk' } }] }));
        const client = new YouTubeClient('test-youtube-key', { ...options, transcripts: new FakeTranscripts() });

        const hits = await client.search({ query: 'q', maxResults: 1, includeRawContent: true, loopIndex: 0 });

        expect(hits[0].content).toBe(TRANSCRIPT_UNAVAILABLE);
        expect(hits[0].rawContent).toBe('Transcript not available.');
    });

    it('should stop waiting for a slow transcript at the search timeout', async () => {
        const stalled: TranscriptSource = { fetchTranscript: () => new Promise<string>(() => undefined) };
        const client = new YouTubeClient('test-youtube-key', { ...options, timeoutMs: 20, transcripts: stalled });

        expect(await client.transcript('vid1')).toBe(TRANSCRIPT_TIMED_OUT);
    });

    it('should report a rejected key as ApiKeyError', async () => {
        mockFetch.mockResolvedValueOnce(jsonReply({ error: { message: 'API key not valid' } }, 403));
        const client = new YouTubeClient('test-youtube-key', options);

        await expect(client.search({ query: 'q', maxResults: 3, includeRawContent: false, loopIndex: 0 }))
            .rejects.toThrow('YouTube Data API authentication failed');
    });
});
