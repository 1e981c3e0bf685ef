/**
 * fetch with a per-attempt timeout, cancellation and exponential backoff.
 * Shared by the model, search and YouTube clients.
 */

import { toError } from '../errors.js';

export interface RetryOptions {
    /** Total attempts, including the first one */
    retries: number;
    /** Base delay; doubled after each failed attempt (and once more for 429) */
    retryDelayMs: number;
    timeoutMs: number;
    signal?: AbortSignal;
}

export function createTimeoutSignal(timeoutMs: number, parentSignal?: AbortSignal): { signal: AbortSignal; cleanup: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort(parentSignal?.reason);

    if (parentSignal) {
        if (parentSignal.aborted) {
            controller.abort(parentSignal.reason);
        } else {
            parentSignal.addEventListener('abort', onAbort, { once: true });
        }
    }

    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    return {
        signal: controller.signal,
        cleanup: () => {
            clearTimeout(timeoutId);
            if (parentSignal && !parentSignal.aborted) {
                parentSignal.removeEventListener('abort', onAbort);
            }
        },
    };
}

function isAbortError(error: Error): boolean {
    return error.name === 'AbortError';
}

function isRetryableStatus(status: number): boolean {
    return status === 429 || status >= 500;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(toError(signal.reason ?? new Error('Aborted')));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(toError(signal?.reason ?? new Error('Aborted')));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Buffer the body while the attempt's signal is live, so a server that sends
 * headers and then stalls still hits the timeout.
 */
async function readWithin(response: Response, signal: AbortSignal): Promise<Response> {
    let release = (): void => undefined;
    const aborted = new Promise<never>((_, reject) => {
        const onAbort = () => reject(toError(signal.reason ?? new Error('Aborted')));
        if (signal.aborted) {
            onAbort();
            return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
        release = () => signal.removeEventListener('abort', onAbort);
    });

    try {
        const body = await Promise.race([response.arrayBuffer(), aborted]);
        return new Response(body.byteLength > 0 ? body : null, {
            status: response.status,
            statusText: response.statusText,
            headers: response.headers,
        });
    } finally {
        release();
    }
}

/**
 * Fetch with retry logic and exponential backoff.
 *
 * Client errors other than 429 are returned immediately. When every attempt
 * got a response the last one is returned, so callers map status codes.
 * The returned body is already buffered; the timeout covers reading it.
 * A cancelled parent signal is never retried.
 */
export async function fetchWithRetry(url: string, init: RequestInit, options: RetryOptions): Promise<Response> {
    const { retries, retryDelayMs, timeoutMs, signal: parentSignal } = options;
    let lastError: Error | null = null;
    let lastResponse: Response | null = null;

    for (let attempt = 0; attempt < retries; attempt++) {
        const { signal, cleanup } = createTimeoutSignal(timeoutMs, parentSignal);
        const isLastAttempt = attempt === retries - 1;
        let delay = retryDelayMs * Math.pow(2, attempt);
        try {
            const response = await fetch(url, { ...init, signal });

            if (!isRetryableStatus(response.status) || isLastAttempt) {
                lastResponse = await readWithin(response, signal);
                if (!isRetryableStatus(response.status)) return lastResponse;
            } else {
                // Release the connection before the next attempt
                await response.body?.cancel();
            }

            // Longer delay for rate limits
            if (response.status === 429) delay *= 2;
        } catch (error) {
            if (parentSignal?.aborted) throw toError(parentSignal.reason ?? error);
            const err = toError(error);
            lastError = isAbortError(err)
                ? new Error(`Request timed out after ${timeoutMs}ms`)
                : err;
        } finally {
            cleanup();
        }

        if (!isLastAttempt) {
            await sleep(delay, parentSignal);
        }
    }

    if (lastResponse) return lastResponse;
    throw lastError || new Error('Max retries exceeded');
}

/**
 * Parse an API error body into a readable message
 */
export async function parseErrorBody(response: Response): Promise<string> {
    try {
        const text = await response.text();
        try {
            const json: unknown = JSON.parse(text);
            if (typeof json === 'object' && json !== null) {
                const error: unknown = Reflect.get(json, 'error');
                const detail: unknown = Reflect.get(json, 'detail') ?? Reflect.get(json, 'message');
                if (typeof error === 'object' && error !== null) {
                    const nested: unknown = Reflect.get(error, 'message');
                    if (typeof nested === 'string') return nested;
                }
                if (typeof error === 'string') return error;
                if (typeof detail === 'string') return detail;
            }
            return text;
        } catch {
            return text;
        }
    } catch {
        return `HTTP ${response.status}`;
    }
}

export function retryAfterMs(response: Response): number | undefined {
    const header = response.headers?.get?.('retry-after');
    if (!header) return undefined;
    const seconds = Number(header);
    return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}
