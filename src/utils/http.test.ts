import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fetchWithRetry, parseErrorBody, retryAfterMs } from './http.js';

const mockFetch = vi.fn();

// Sends the start of a body and never finishes it
function stalledBody(): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>({
        start(controller) {
            controller.enqueue(new TextEncoder().encode('{"results": ['));
        },
    });
}

describe('fetchWithRetry', () => {
    beforeEach(() => {
        mockFetch.mockReset();
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should return the first non-retryable response', async () => {
        mockFetch.mockResolvedValueOnce(new Response('nope', { status: 404 }));

        const response = await fetchWithRetry('https://api.example.com', {}, { retries: 3, retryDelayMs: 0, timeoutMs: 1000 });

        expect(response.status).toBe(404);
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should retry network errors until an attempt succeeds', async () => {
        mockFetch
            .mockRejectedValueOnce(new TypeError('fetch failed'))
            .mockResolvedValueOnce(new Response('ok', { status: 200 }));

        const response = await fetchWithRetry('https://api.example.com', {}, { retries: 3, retryDelayMs: 0, timeoutMs: 1000 });

        expect(response.status).toBe(200);
        expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('should return the last response when every attempt is retryable', async () => {
        mockFetch.mockImplementation(async () => new Response('busy', { status: 502 }));

        const response = await fetchWithRetry('https://api.example.com', {}, { retries: 3, retryDelayMs: 0, timeoutMs: 1000 });

        expect(response.status).toBe(502);
        expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('should time out a body that stalls after the headers', async () => {
        mockFetch.mockImplementation(async () => new Response(stalledBody(), { status: 200 }));

        await expect(fetchWithRetry('https://api.example.com', {}, { retries: 2, retryDelayMs: 0, timeoutMs: 50 }))
            .rejects.toThrow('Request timed out after 50ms');
        expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('should hand back a buffered body', async () => {
        mockFetch.mockResolvedValueOnce(new Response('{"ok":true}', { status: 200, headers: { 'X-Test': 'yes' } }));

        const response = await fetchWithRetry('https://api.example.com', {}, { retries: 1, retryDelayMs: 0, timeoutMs: 1000 });

        expect(response.headers.get('X-Test')).toBe('yes');
        expect(await response.text()).toBe('{"ok":true}');
    });

    it('should cancel the body of a response it retries', async () => {
        const cancelled: unknown[] = [];
        const body = new ReadableStream<Uint8Array>({
            cancel(reason) {
                cancelled.push(reason);
            },
        });
        mockFetch
            .mockResolvedValueOnce(new Response(body, { status: 503 }))
            .mockResolvedValueOnce(new Response('ok', { status: 200 }));

        const response = await fetchWithRetry('https://api.example.com', {}, { retries: 2, retryDelayMs: 0, timeoutMs: 1000 });

        expect(response.status).toBe(200);
        expect(cancelled).toHaveLength(1);
    });

    it('should not retry once the caller aborted', async () => {
        const controller = new AbortController();
        mockFetch.mockImplementation(async () => {
            controller.abort(new Error('cancelled by caller'));
            throw new Error('aborted');
        });

        await expect(fetchWithRetry('https://api.example.com', {}, {
            retries: 3,
            retryDelayMs: 0,
            timeoutMs: 1000,
            signal: controller.signal,
        })).rejects.toThrow('cancelled by caller');
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });
});

describe('parseErrorBody', () => {
    it('should prefer nested error messages', async () => {
        expect(await parseErrorBody(new Response(JSON.stringify({ error: { message: 'bad key' } })))).toBe('bad key');
        expect(await parseErrorBody(new Response(JSON.stringify({ detail: 'missing query' })))).toBe('missing query');
        expect(await parseErrorBody(new Response('plain failure'))).toBe('plain failure');
    });
});

describe('retryAfterMs', () => {
    it('should read seconds from the Retry-After header', () => {
        expect(retryAfterMs(new Response(null, { headers: { 'Retry-After': '3' } }))).toBe(3000);
        expect(retryAfterMs(new Response(null))).toBeUndefined();
    });
});
