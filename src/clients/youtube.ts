/**
 * YouTube Data API search client
 * Videos become sources; each video's transcript stands in for page content.
 */

import { z } from 'zod';
import type { HttpConfig } from '../config.js';
import { ApiKeyError, SearchError, errorMessage } from '../errors.js';
import { fetchWithRetry } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';
import { searchFailure, type SearchClient, type SearchHit, type SearchRequest } from './search.js';

const logger = createLogger('youtube');

const YOUTUBE_SEARCH_URL = 'https://www.googleapis.com/youtube/v3/search';
const EXCERPT_CHARS = 200;
const TRANSCRIPT_TIMEOUT_MS = 10_000;

export const TRANSCRIPT_UNAVAILABLE = 'Transcript not available.';
export const TRANSCRIPT_TIMED_OUT = 'Transcript retrieval timed out.';

const YouTubeSearchSchema = z.object({
    items: z
        .array(
            z.object({
                id: z.object({ videoId: z.string().optional() }),
                snippet: z.object({ title: z.string().optional() }).optional(),
            })
        )
        .default([]),
});

export function videoUrl(videoId: string): string {
    return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * Fetches the spoken text of a video
 */
export interface TranscriptSource {
    fetchTranscript(videoId: string): Promise<string>;
}

/**
 * Transcripts from the youtube-transcript package, loaded on first use
 */
export class CaptionTranscriptSource implements TranscriptSource {
    async fetchTranscript(videoId: string): Promise<string> {
        const { YoutubeTranscript } = await import('youtube-transcript');
        const segments = await YoutubeTranscript.fetchTranscript(videoId);
        return segments.map((segment) => segment.text).join(' ');
    }
}

const TIMED_OUT = Symbol('timed out');

function excerpt(text: string): string {
    return text.length > EXCERPT_CHARS ? `${text.slice(0, EXCERPT_CHARS)}...` : text;
}

export interface YouTubeClientOptions {
    timeoutMs: number;
    http: HttpConfig;
    transcripts?: TranscriptSource;
}

export class YouTubeClient implements SearchClient {
    readonly provider = 'youtube' as const;
    private apiKey: string;
    private timeoutMs: number;
    private http: HttpConfig;
    private transcripts: TranscriptSource;

    constructor(apiKey: string, options: YouTubeClientOptions) {
        if (!apiKey || apiKey.trim() === '') {
            throw new ApiKeyError(
                'YOUTUBE_API_KEY',
                'YOUTUBE_API_KEY is required.\n' +
                'Create one in the Google Cloud console (YouTube Data API v3)\n' +
                'Then run: research init'
            );
        }
        this.apiKey = apiKey.trim();
        this.timeoutMs = options.timeoutMs;
        this.http = options.http;
        this.transcripts = options.transcripts ?? new CaptionTranscriptSource();
    }

    /**
     * Transcript text, or a fixed notice when it is missing or too slow.
     * Bounded by the search timeout and never longer than ten seconds.
     */
    async transcript(videoId: string): Promise<string> {
        let timer: ReturnType<typeof setTimeout> | undefined;
        const expired = new Promise<typeof TIMED_OUT>((resolve) => {
            timer = setTimeout(() => resolve(TIMED_OUT), Math.min(TRANSCRIPT_TIMEOUT_MS, this.timeoutMs));
        });

        try {
            const text = await Promise.race([this.transcripts.fetchTranscript(videoId), expired]);
            if (text === TIMED_OUT) {
                logger.debug(`Transcript for ${videoId} timed out`);
                return TRANSCRIPT_TIMED_OUT;
            }
            return text.trim() === '' ? TRANSCRIPT_UNAVAILABLE : text.trim();
        } catch (error) {
            logger.debug(`No transcript for ${videoId}: ${errorMessage(error)}`);
            return TRANSCRIPT_UNAVAILABLE;
        } finally {
            clearTimeout(timer);
        }
    }

    async search(request: SearchRequest): Promise<SearchHit[]> {
        const { query, maxResults, signal } = request;
        const params = new URLSearchParams({
            part: 'snippet',
            q: query,
            type: 'video',
            maxResults: String(maxResults),
            key: this.apiKey,
        });

        let response: Response;
        try {
            response = await fetchWithRetry(`${YOUTUBE_SEARCH_URL}?${params.toString()}`, {
                method: 'GET',
                headers: { accept: 'application/json' },
            }, {
                retries: this.http.retries,
                retryDelayMs: this.http.retryDelayMs,
                timeoutMs: this.timeoutMs,
                signal,
            });
        } catch (error) {
            if (signal?.aborted) throw error;
            throw new SearchError('youtube', `YouTube request failed: ${errorMessage(error)}`, query, { cause: error });
        }

        if (!response.ok) {
            throw await searchFailure('youtube', 'YOUTUBE_API_KEY', response, query);
        }

        const parsed = YouTubeSearchSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new SearchError('youtube', 'YouTube returned an unexpected payload', query);
        }

        const videos = parsed.data.items.flatMap((item) => {
            const videoId = item.id.videoId;
            return videoId ? [{ videoId, title: item.snippet?.title ?? videoId }] : [];
        });

        const hits = await Promise.all(videos.map(async ({ videoId, title }): Promise<SearchHit> => {
            const transcript = await this.transcript(videoId);
            return {
                url: videoUrl(videoId),
                title,
                content: excerpt(transcript),
                rawContent: transcript,
            };
        }));

        signal?.throwIfAborted();
        return hits;
    }
}
