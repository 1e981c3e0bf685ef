/**
 * Error types for the research loop
 * Each external collaborator (model, search, mail) fails with its own class
 * so the loop driver can decide between aborting, skipping and finalizing early.
 */

/**
 * Base error class for all research errors
 */
export class ResearchError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ResearchError';
        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * Error thrown when an API key is missing or rejected
 */
export class ApiKeyError extends ResearchError {
    public readonly keyName: string;

    constructor(keyName: string, message?: string) {
        super(message || `${keyName} is not set or invalid.\nRun: research init`);
        this.name = 'ApiKeyError';
        this.keyName = keyName;
    }
}

/**
 * Error thrown when API rate limits are exceeded
 */
export class RateLimitError extends ResearchError {
    public readonly service: string;
    public readonly retryAfterMs?: number;

    constructor(service: string, retryAfterMs?: number) {
        const retryMessage = retryAfterMs
            ? ` Please wait ${Math.ceil(retryAfterMs / 1000)} seconds and try again.`
            : ' Please wait a moment and try again.';
        super(`${service} rate limit exceeded.${retryMessage}`);
        this.name = 'RateLimitError';
        this.service = service;
        this.retryAfterMs = retryAfterMs;
    }
}

/**
 * Error thrown when configuration is invalid or incomplete
 */
export class ConfigError extends ResearchError {
    public readonly problems: string[];

    constructor(problems: string[]) {
        super(`Invalid configuration:\n${problems.map((p) => `  • ${p}`).join('\n')}`);
        this.name = 'ConfigError';
        this.problems = problems;
    }
}

/**
 * Error thrown when the language model endpoint fails
 */
export class ModelError extends ResearchError {
    public readonly status?: number;

    constructor(message: string, status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ModelError';
        this.status = status;
    }
}

/**
 * Error thrown when the model answers, but with nothing usable
 */
export class ModelOutputError extends ResearchError {
    public readonly stage: string;
    public readonly output: string;

    constructor(stage: string, message: string, output = '') {
        super(`${stage}: ${message}`);
        this.name = 'ModelOutputError';
        this.stage = stage;
        this.output = output;
    }
}

/**
 * Error thrown when search execution fails
 */
export class SearchError extends ResearchError {
    public readonly provider: string;
    public readonly query?: string;

    constructor(provider: string, message: string, query?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SearchError';
        this.provider = provider;
        this.query = query;
    }
}

/**
 * Error thrown when the report could not be handed to the mail server
 */
export class DeliveryError extends ResearchError {
    public readonly recipient: string;

    constructor(recipient: string, message: string, options?: { cause?: unknown }) {
        super(`Failed to deliver report to ${recipient}: ${message}`, options);
        this.name = 'DeliveryError';
        this.recipient = recipient;
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
    return value instanceof Error ? value.message : String(value);
}
