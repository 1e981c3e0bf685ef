/**
 * Chat completions client
 * Talks to any OpenAI-compatible endpoint: OpenRouter, Ollama's /v1, a local proxy.
 */

import { z } from 'zod';
import { isLocalEndpoint, type HttpConfig, type LlmConfig } from '../config.js';
import { ApiKeyError, ModelError, RateLimitError, errorMessage } from '../errors.js';
import { fetchWithRetry, parseErrorBody, retryAfterMs } from '../utils/http.js';

export interface Message {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface ChatOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
    stop?: string[];
    /** Ask the endpoint for a single JSON object */
    jsonMode?: boolean;
    signal?: AbortSignal;
}

export interface ChatResponse {
    id: string;
    choices: {
        message: {
            role: string;
            content: string;
        };
        finishReason: string;
    }[];
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

/**
 * What the research stages need from a language model.
 */
export interface ChatModel {
    chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}

const ChatCompletionSchema = z.object({
    id: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({
                    role: z.string().optional(),
                    content: z.string().nullish(),
                }),
                finish_reason: z.string().nullish(),
            })
        )
        .default([]),
    usage: z
        .object({
            prompt_tokens: z.number().optional(),
            completion_tokens: z.number().optional(),
            total_tokens: z.number().optional(),
        })
        .nullish(),
});

export class ChatClient implements ChatModel {
    private config: LlmConfig;
    private http: HttpConfig;

    constructor(config: LlmConfig, http: HttpConfig) {
        if (!config.apiKey && !isLocalEndpoint(config.baseUrl)) {
            throw new ApiKeyError(
                'LLM_API_KEY',
                'LLM_API_KEY is required for ' + config.baseUrl + '.\n' +
                'Point LLM_BASE_URL at a local endpoint or run: research init'
            );
        }
        this.config = config;
        this.http = http;
    }

    get model(): string {
        return this.config.model;
    }

    /**
     * Send a chat completion request (non-streaming)
     */
    async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatResponse> {
        const body: Record<string, unknown> = {
            model: options.model ?? this.config.model,
            messages,
            stream: false,
            temperature: options.temperature ?? this.config.temperature,
        };
        if (typeof options.maxTokens === 'number') body.max_tokens = options.maxTokens;
        if (options.stop) body.stop = options.stop;
        if (options.jsonMode) body.response_format = { type: 'json_object' };

        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            'X-Title': 'Iterative Web Researcher',
        };
        if (this.config.apiKey) headers.Authorization = `Bearer ${this.config.apiKey}`;

        let response: Response;
        try {
            response = await fetchWithRetry(`${this.config.baseUrl}/chat/completions`, {
                method: 'POST',
                headers,
                body: JSON.stringify(body),
            }, {
                retries: this.http.retries,
                retryDelayMs: this.http.retryDelayMs,
                timeoutMs: this.config.timeoutMs,
                signal: options.signal,
            });
        } catch (error) {
            if (options.signal?.aborted) throw error;
            throw new ModelError(`Language model request failed: ${errorMessage(error)}`, undefined, { cause: error });
        }

        if (!response.ok) {
            const message = await parseErrorBody(response);

            if (response.status === 401) {
                throw new ApiKeyError(
                    'LLM_API_KEY',
                    'Language model authentication failed.\n' +
                    'Please check your LLM_API_KEY is valid.\n' +
                    'Run: research init'
                );
            }

            if (response.status === 429) {
                throw new RateLimitError('Language model', retryAfterMs(response));
            }

            throw new ModelError(`Language model error: ${response.status} - ${message}`, response.status);
        }

        const parsed = ChatCompletionSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new ModelError(`Unexpected chat completion payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        }

        const data = parsed.data;
        return {
            id: data.id ?? '',
            choices: data.choices.map((choice) => ({
                message: {
                    role: choice.message.role ?? 'assistant',
                    content: choice.message.content ?? '',
                },
                finishReason: choice.finish_reason ?? '',
            })),
            usage: {
                promptTokens: data.usage?.prompt_tokens ?? 0,
                completionTokens: data.usage?.completion_tokens ?? 0,
                totalTokens: data.usage?.total_tokens ?? 0,
            },
        };
    }
}

